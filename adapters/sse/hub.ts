import { stringify } from "../json";
import type { Notify } from "../types";

/** The part of `http.ServerResponse` the stream writes to. */
export interface SseResponse {
  setHeader(name: string, value: string): unknown;
  writeHead?(status: number): unknown;
  flushHeaders?(): void;
  write(chunk: string): boolean;
  end(): unknown;
  on?(event: "close" | "finish", listener: () => void): unknown;
}

export class SseHub {
  private readonly clients = new Set<SseResponse>();

  get size(): number {
    return this.clients.size;
  }

  add(res: SseResponse): void {
    this.clients.add(res);
  }

  remove(res: SseResponse): void {
    this.clients.delete(res);
  }

  /** Write one `data:` frame to every client; returns the clients that failed and were removed. */
  broadcast(n: Notify): unknown[] {
    const payload = `data: ${stringify(n)}\n\n`;
    const failures: unknown[] = [];
    for (const res of Array.from(this.clients)) {
      try {
        res.write(payload);
      } catch (e) {
        this.clients.delete(res);
        failures.push(e);
      }
    }
    return failures;
  }
}
