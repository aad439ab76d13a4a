import { constants, promises as fsp } from "fs";
import type { FileHandle } from "fs/promises";
import { join } from "path";
import { stringify } from "../json";
import type { Adapter, Health, Notify } from "../types";
import { appendAndSync } from "./fs-append";

export type WalOptions = {
  /** Decides which day file a batch goes to. */
  clock?: () => Date;
};

/** Append-only journal, one `YYYY-MM-DD.ndjson` file per day. */
export class WalNdjsonAdapter implements Adapter {
  public readonly name = "wal-ndjson";
  private readonly dir: string;
  private readonly clock: () => Date;
  private handle: FileHandle | null = null;
  private currentDay = "";

  constructor(dir = "journal", opts: WalOptions = {}) {
    this.dir = dir;
    this.clock = opts.clock ?? (() => new Date());
  }

  async onNotify(n: Notify): Promise<void> {
    await this.onNotifyBatch([n]);
  }

  async onNotifyBatch(ns: Notify[]): Promise<void> {
    if (!ns.length) return;
    const handle = await this.rotateIfNeeded(this.clock().toISOString().slice(0, 10));
    const lines = ns.map(n => stringify(n)).join("\n") + "\n";
    await appendAndSync(handle, lines);
  }

  async drain(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    this.currentDay = "";
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
  }

  async health(): Promise<Health> {
    try {
      await fsp.mkdir(this.dir, { recursive: true });
      await fsp.access(this.dir, constants.W_OK);
      return { ok: true };
    } catch (e) {
      return { ok: false, detail: e instanceof Error ? e.message : String(e) };
    }
  }

  /** Path of the journal file for `day` (`YYYY-MM-DD`). */
  fileFor(day: string): string {
    return join(this.dir, `${day}.ndjson`);
  }

  private async rotateIfNeeded(day: string): Promise<FileHandle> {
    if (this.currentDay === day && this.handle) return this.handle;
    await fsp.mkdir(this.dir, { recursive: true });
    const previous = this.handle;
    this.handle = await fsp.open(this.fileFor(day), "a");
    this.currentDay = day;
    if (previous) await previous.close();
    return this.handle;
  }
}
