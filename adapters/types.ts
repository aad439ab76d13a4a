export type ChangeType = "Create" | "Event" | "Change" | "Transition" | "Error" | "Close";

/** Where a record came from: a bloc or cubit, or a provider element. */
export type SourceKind = "bloc" | "provider";

export type ErrorInfo = { name: string; message: string; code?: string };

export type ChangeN = {
  type: ChangeType;
  source: string;
  kind: SourceKind;
  event?: unknown;
  state?: unknown;
  previous?: unknown;
  error?: ErrorInfo;
  seq: bigint;
  ts: string;
  version: 1;
  traceId?: string;
  actor?: string;
};

/** The states of every registered bloc at one point of the sequence. */
export type Snapshot = {
  type: "Snapshot";
  states: Record<string, unknown>;
  seq: bigint;
  ts: string;
  version: 1;
};

export type Notify = ChangeN | Snapshot;

export type Health = { ok: boolean; detail?: string };

export interface Adapter {
  name: string;
  onNotify(n: Notify): Promise<void> | void;
  onNotifyBatch?(ns: Notify[]): Promise<void> | void;
  health?(): Promise<Health>;
  drain?(): Promise<void>;
}

/** Adapters that keep a log can report the highest sequence they hold. */
export interface SeqSource {
  maxSeq(): bigint;
}

export function hasMaxSeq(adapter: Adapter): adapter is Adapter & SeqSource {
  return "maxSeq" in adapter && typeof adapter.maxSeq === "function";
}
