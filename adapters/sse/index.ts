import { logger as rootLogger, type Logger } from "../../host/logger";
import type { Adapter, Health, Notify } from "../types";
import { SseHub, type SseResponse } from "./hub";

export type SseOptions = {
  heartbeatMs?: number;
  retryMs?: number;
  logger?: Logger;
};

export class SseAdapter implements Adapter {
  public readonly name = "sse";
  readonly hub: SseHub;
  private readonly heartbeats = new Map<SseResponse, ReturnType<typeof setInterval>>();
  private readonly heartbeatMs: number;
  private readonly retryMs: number;
  private readonly log: Logger;

  constructor(hub = new SseHub(), opts: SseOptions = {}) {
    this.hub = hub;
    this.heartbeatMs = opts.heartbeatMs ?? 15_000;
    this.retryMs = opts.retryMs ?? 2000;
    this.log = (opts.logger ?? rootLogger).child({ component: "sse" });
  }

  // HTTP handler to register a client:
  //   http.createServer((req, res) => sse.handler(req, res)).listen(8080)
  handler(_req: unknown, res: SseResponse): void {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.writeHead?.(200);
    res.flushHeaders?.();
    res.write(`retry: ${this.retryMs}\n\n`);
    // initial comment for intermediates
    res.write(": connected\n\n");
    this.hub.add(res);
    const t = setInterval(() => {
      try {
        res.write(":\n\n");
      } catch (e) {
        this.log.debug({ err: e }, "heartbeat failed, dropping client");
        this.release(res);
      }
    }, this.heartbeatMs);
    this.heartbeats.set(res, t);
    const onClose = () => this.release(res);
    res.on?.("close", onClose);
    res.on?.("finish", onClose);
  }

  async onNotify(n: Notify): Promise<void> {
    const failures = this.hub.broadcast(n);
    for (const err of failures) this.log.debug({ err }, "write failed, dropping client");
  }

  async health(): Promise<Health> {
    return { ok: true, detail: `${this.hub.size} client(s)` };
  }

  /** End every open stream. */
  async drain(): Promise<void> {
    for (const res of Array.from(this.heartbeats.keys())) this.release(res);
  }

  private release(res: SseResponse): void {
    const hb = this.heartbeats.get(res);
    if (!hb) return;
    clearInterval(hb);
    this.heartbeats.delete(res);
    this.hub.remove(res);
    try {
      res.end();
    } catch (e) {
      this.log.debug({ err: e }, "end on a closed stream");
    }
  }
}
