import type Database from "better-sqlite3";
import { stringify } from "../json";
import type { Adapter, ChangeN, Health, Notify, SeqSource, Snapshot } from "../types";
import { openDb, type DB } from "./db";

type ChangeRow = {
  seq: bigint;
  ts: string;
  type: string;
  kind: string;
  source: string;
  event_json: string | null;
  state_json: string | null;
  previous_json: string | null;
  error_json: string | null;
  trace_id: string | null;
  actor: string | null;
  version: number;
};

type StateRow = { source: string; state_json: string | null; seq: bigint; ts: string };

const json = (value: unknown): string | null => (value === undefined ? null : stringify(value));

/**
 * Keeps the full change log in `changes` and the latest state of every live
 * source in `states`. Writes are idempotent on `seq`.
 */
export class SqliteAdapter implements Adapter, SeqSource {
  public readonly name = "sqlite";
  readonly db: DB;
  private readonly insertChange: Database.Statement<[ChangeRow]>;
  private readonly upsertState: Database.Statement<[StateRow]>;
  private readonly deleteState: Database.Statement<[string]>;
  private readonly selectMax: Database.Statement<[], { max: bigint }>;
  private readonly txApply: (ns: Notify[]) => void;

  constructor(dbOrPath: DB | string) {
    this.db = openDb(dbOrPath);
    this.insertChange = this.db.prepare<ChangeRow>(
      `INSERT INTO changes (seq, ts, type, kind, source, event_json, state_json, previous_json, error_json, trace_id, actor, version)
       VALUES (@seq, @ts, @type, @kind, @source, @event_json, @state_json, @previous_json, @error_json, @trace_id, @actor, @version)
       ON CONFLICT DO NOTHING`,
    );
    this.upsertState = this.db.prepare<StateRow>(
      `INSERT INTO states (source, state_json, seq, ts) VALUES (@source, @state_json, @seq, @ts)
       ON CONFLICT(source) DO UPDATE SET state_json = excluded.state_json, seq = excluded.seq, ts = excluded.ts`,
    );
    this.deleteState = this.db.prepare<[string]>(`DELETE FROM states WHERE source = ?`);
    this.selectMax = this.db.prepare<[], { max: bigint }>(`SELECT IFNULL(MAX(seq), 0) AS max FROM changes`).safeIntegers(true);
    this.txApply = this.db.transaction((ns: Notify[]) => {
      for (const n of ns) this.applyOne(n);
    });
  }

  async onNotify(n: Notify): Promise<void> {
    this.txApply([n]);
  }

  async onNotifyBatch(ns: Notify[]): Promise<void> {
    this.txApply(ns);
  }

  async drain(): Promise<void> {
    // synchronous driver, nothing buffered
  }

  async health(): Promise<Health> {
    try {
      this.db.prepare("SELECT 1").get();
      return { ok: true };
    } catch (e) {
      return { ok: false, detail: e instanceof Error ? e.message : String(e) };
    }
  }

  maxSeq(): bigint {
    return this.selectMax.get()?.max ?? 0n;
  }

  /** Latest persisted state per source. */
  states(): Record<string, unknown> {
    const rows = this.db.prepare<[], Pick<StateRow, "source" | "state_json">>(`SELECT source, state_json FROM states ORDER BY source`).all();
    const out: Record<string, unknown> = {};
    for (const row of rows) out[row.source] = row.state_json === null ? null : JSON.parse(row.state_json);
    return out;
  }

  private applyOne(n: Notify): void {
    if (n.type === "Snapshot") {
      this.insertSnapshot(n);
      return;
    }
    const res = this.insertChange.run(toRow(n));
    // duplicate seq or a repeated event under the same trace id
    if (res.changes === 0) return;
    switch (n.type) {
      case "Create":
      case "Change":
      case "Transition":
        this.upsertState.run({ source: n.source, state_json: json(n.state), seq: n.seq, ts: n.ts });
        break;
      case "Close":
        this.deleteState.run(n.source);
        break;
    }
  }

  private insertSnapshot(n: Snapshot): void {
    this.insertChange.run({
      seq: n.seq,
      ts: n.ts,
      type: n.type,
      kind: "host",
      source: "*",
      event_json: null,
      state_json: json(n.states),
      previous_json: null,
      error_json: null,
      trace_id: null,
      actor: null,
      version: n.version,
    });
  }
}

function toRow(n: ChangeN): ChangeRow {
  return {
    seq: n.seq,
    ts: n.ts,
    type: n.type,
    kind: n.kind,
    source: n.source,
    event_json: json(n.event),
    state_json: json(n.state),
    previous_json: json(n.previous),
    error_json: json(n.error),
    trace_id: n.traceId ?? null,
    actor: n.actor ?? null,
    version: n.version,
  };
}
