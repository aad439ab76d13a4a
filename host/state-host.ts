import { AsyncLocalStorage } from "async_hooks";
import { promises as fsp } from "fs";
import { join } from "path";
import {
  BlocBase,
  BlocObserver,
  HandlerError,
  MultiBlocObserver,
  ProviderObserver,
  type BlocEvent,
  type Change,
  type ProviderContainer,
  type ProviderInfo,
  type Transition,
} from "@unistate/core";
import { stringify } from "../adapters/json";
import { hasMaxSeq, type Adapter, type ChangeN, type ChangeType, type ErrorInfo, type Notify, type Snapshot, type SourceKind } from "../adapters/types";
import { HostError } from "./errors";
import { logger as rootLogger, type Logger } from "./logger";
import { metrics as globalMetrics, type Metrics } from "./metrics";
import { errorInfo, toPlain } from "./plain";

export type EmitMeta = { traceId?: string; actor?: string };

export type QueueStrategy = "block" | "drop-new" | "drop-old";

export type RetryOptions = {
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
};

export type StateHostOptions = {
  startSeq?: bigint;
  clock?: () => string;
  batch?: { size?: number; intervalMs?: number };
  queueCapacity?: number;
  strategy?: QueueStrategy;
  /** Directory of the persisted `seq` file; `null` keeps the sequence in memory only. */
  metaDir?: string | null;
  dlqDir?: string;
  retry?: RetryOptions;
  logger?: Logger;
  metrics?: Metrics;
};

/** What the host needs from a bloc or cubit to list and drive it. */
export interface Dispatchable {
  readonly name: string;
  readonly state: unknown;
  readonly isClosed: boolean;
  add?(event: BlocEvent): void;
  handles?(type: string): boolean;
}

type AdapterWorker = {
  adapter: Adapter;
  queue: Notify[];
  flushing: Promise<void> | null;
  timer: ReturnType<typeof setTimeout> | null;
};

type RecordFields = { event?: unknown; state?: unknown; previous?: unknown; error?: ErrorInfo };

const MAX_TRACES = 10_000;

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function isBlocEvent(value: unknown): value is BlocEvent {
  return typeof value === "object" && value !== null && "type" in value && typeof value.type === "string";
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * Turns bloc and provider lifecycle hooks into sequenced records and fans
 * them out to adapters, each with its own batching queue, retries and a
 * dead-letter file.
 */
export class StateHost {
  readonly blocObserver: BlocObserver;
  readonly providerObserver: ProviderObserver;
  private seq: bigint;
  private readonly version = 1 as const;
  private readonly now: () => string;
  private readonly workers: AdapterWorker[];
  private readonly sends = new Set<Promise<void>>();
  private readonly blocs = new Map<string, Dispatchable>();
  private readonly meta = new AsyncLocalStorage<EmitMeta>();
  private readonly seenTraces = new Set<string>();
  private readonly batchSize: number;
  private readonly batchIntervalMs: number;
  private readonly queueCapacity: number;
  private readonly strategy: QueueStrategy;
  private readonly metaDir: string | null;
  private readonly dlqDir: string;
  private readonly retry: Required<RetryOptions>;
  private readonly log: Logger;
  private readonly metrics: Metrics;
  private installed: { previous: BlocObserver; current: BlocObserver } | null = null;
  private seqWrite: Promise<void> | null = null;
  private seqDirty = false;
  private stopped = false;

  constructor(adapters: Adapter[], opts: StateHostOptions = {}) {
    this.seq = opts.startSeq ?? 0n;
    this.now = opts.clock ?? (() => new Date().toISOString());
    this.batchSize = opts.batch?.size ?? 128;
    this.batchIntervalMs = opts.batch?.intervalMs ?? 50;
    this.queueCapacity = opts.queueCapacity ?? 10_000;
    this.strategy = opts.strategy ?? "drop-new";
    this.metaDir = opts.metaDir === undefined ? join("host", "meta") : opts.metaDir;
    this.dlqDir = opts.dlqDir ?? join("host", "dlq");
    this.retry = {
      attempts: opts.retry?.attempts ?? 5,
      baseDelayMs: opts.retry?.baseDelayMs ?? 1000,
      maxDelayMs: opts.retry?.maxDelayMs ?? 8000,
    };
    this.log = (opts.logger ?? rootLogger).child({ component: "state-host" });
    this.metrics = opts.metrics ?? globalMetrics;
    this.workers = adapters.map(adapter => ({ adapter, queue: [], flushing: null, timer: null }));
    this.blocObserver = new HostBlocObserver(this);
    this.providerObserver = new HostProviderObserver(this);
  }

  /** Create a host whose sequence continues after the highest one already stored. */
  static async open(adapters: Adapter[], opts: StateHostOptions = {}): Promise<StateHost> {
    const host = new StateHost(adapters, opts);
    await host.restoreSeq();
    return host;
  }

  get lastSeq(): bigint {
    return this.seq;
  }

  get adapters(): readonly Adapter[] {
    return this.workers.map(w => w.adapter);
  }

  /** Observe every bloc and cubit, keeping the current global observer in the chain. */
  install(): this {
    if (this.installed) return this;
    const previous = BlocBase.observer;
    const current = new MultiBlocObserver([previous, this.blocObserver]);
    BlocBase.observer = current;
    this.installed = { previous, current };
    return this;
  }

  uninstall(): void {
    if (!this.installed) return;
    if (BlocBase.observer === this.installed.current) BlocBase.observer = this.installed.previous;
    this.installed = null;
  }

  /** Make a bloc or cubit listable by `snapshot` and drivable by `dispatch`. */
  register(bloc: Dispatchable, name = bloc.name): void {
    if (this.blocs.has(name)) this.log.warn({ source: name }, "replacing registered bloc");
    this.blocs.set(name, bloc);
  }

  unregister(name: string): boolean {
    return this.blocs.delete(name);
  }

  registered(): string[] {
    return Array.from(this.blocs.keys());
  }

  /**
   * Add an event to a registered bloc. Records produced while it is handled,
   * including by asynchronous handlers, carry `meta`. Returns false when the
   * same trace id was already dispatched to this bloc.
   */
  dispatch(name: string, event: unknown, meta: EmitMeta = {}): boolean {
    const { bloc, event: checked } = this.validate(name, event);
    const key = meta.traceId ? `${meta.traceId}\u0000${name}` : null;
    if (key && this.seenTraces.has(key)) {
      this.log.debug({ source: name, traceId: meta.traceId }, "duplicate dispatch ignored");
      return false;
    }
    this.meta.run(meta, () => bloc.add?.(checked));
    if (key) this.remember(key);
    return true;
  }

  /** Throw what `dispatch` would throw for this bloc and event, without adding it. */
  validate(name: string, event: unknown): { bloc: Dispatchable; event: BlocEvent } {
    if (this.stopped) throw HostError.stopped();
    const bloc = this.blocs.get(name);
    if (!bloc) throw HostError.unknownBloc(name);
    if (!bloc.add) throw HostError.notDispatchable(name);
    if (!isBlocEvent(event)) throw HostError.invalidEvent('expected an object with a string "type"');
    if (bloc.handles && !bloc.handles(event.type)) throw HandlerError.missing(name, event.type);
    return { bloc, event };
  }

  /** Current state of every registered bloc, as plain data. */
  snapshot(): Record<string, unknown> {
    const states: Record<string, unknown> = {};
    for (const [name, bloc] of this.blocs) states[name] = this.plain(bloc.state, name);
    return states;
  }

  /** Send a `Snapshot` record of the registered blocs to every adapter. */
  publishSnapshot(): Snapshot {
    const snap: Snapshot = {
      type: "Snapshot",
      states: this.snapshot(),
      seq: this.nextSeq(),
      ts: this.now(),
      version: this.version,
    };
    if (!this.stopped) this.fanout(snap);
    return snap;
  }

  /** Stop recording, flush queues within `timeoutMs`, then drain adapters. */
  async shutdown(opts: { timeoutMs?: number } = {}): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.uninstall();
    const deadline = Date.now() + (opts.timeoutMs ?? 10_000);
    for (const w of this.workers) {
      if (w.timer) {
        clearTimeout(w.timer);
        w.timer = null;
      }
      while (w.queue.length || w.flushing) {
        if (Date.now() > deadline) {
          this.log.warn({ adapter: w.adapter.name, pending: w.queue.length }, "shutdown timed out with queued records");
          break;
        }
        if (!w.flushing) this.flushWorker(w);
        await sleep(10);
      }
    }
    await this.settleSends(Math.max(0, deadline - Date.now()));
    while (this.seqWrite) await this.seqWrite;
    await Promise.all(
      this.workers.map(async w => {
        try {
          await w.adapter.drain?.();
        } catch (e) {
          this.log.error({ err: e, adapter: w.adapter.name }, "adapter drain failed");
        }
      }),
    );
  }

  /** @internal called by the host's observers */
  record(type: ChangeType, kind: SourceKind, source: string, fields: RecordFields = {}): void {
    if (this.stopped) return;
    const n: ChangeN = { type, source, kind, seq: this.nextSeq(), ts: this.now(), version: this.version };
    if ("event" in fields) n.event = this.plain(fields.event, source);
    if ("state" in fields) n.state = this.plain(fields.state, source);
    if ("previous" in fields) n.previous = this.plain(fields.previous, source);
    if (fields.error) n.error = fields.error;
    const meta = this.meta.getStore();
    if (meta?.traceId) n.traceId = meta.traceId;
    if (meta?.actor) n.actor = meta.actor;
    this.fanout(n);
  }

  /** @internal */
  closed(bloc: object): void {
    for (const [name, registered] of this.blocs) {
      if (registered === bloc) this.blocs.delete(name);
    }
  }

  private remember(key: string): void {
    this.seenTraces.add(key);
    if (this.seenTraces.size > MAX_TRACES) {
      const oldest = this.seenTraces.values().next();
      if (!oldest.done) this.seenTraces.delete(oldest.value);
    }
  }

  private plain(value: unknown, source: string): unknown {
    try {
      return toPlain(value);
    } catch (e) {
      this.log.warn({ err: e, source }, "value is not serialisable");
      return { unserializable: String(value) };
    }
  }

  private nextSeq(): bigint {
    const seq = ++this.seq;
    this.persistSeq();
    return seq;
  }

  private fanout(n: Notify): void {
    for (const w of this.workers) {
      const a = w.adapter;
      if (typeof a.onNotifyBatch !== "function") {
        this.track(this.sendWithRetry(a, [n]));
        continue;
      }
      if (w.queue.length >= this.queueCapacity) {
        if (this.strategy === "drop-new") {
          this.metrics.inc("dropped", 1, "Dropped fanout notifications");
          continue;
        }
        if (this.strategy === "drop-old") {
          w.queue.shift();
          this.metrics.inc("dropped", 1, "Dropped fanout notifications");
        } else {
          this.enqueueWhenFree(w, n);
          continue;
        }
      }
      w.queue.push(n);
      this.afterEnqueue(w);
    }
  }

  private enqueueWhenFree(w: AdapterWorker, n: Notify): void {
    if (w.queue.length < this.queueCapacity) {
      w.queue.push(n);
      this.afterEnqueue(w);
      return;
    }
    setTimeout(() => this.enqueueWhenFree(w, n), 1);
  }

  private afterEnqueue(w: AdapterWorker): void {
    this.metrics.set("queue_depth", this.queueDepth(), "Notifications waiting in adapter queues");
    if (w.queue.length >= this.batchSize) {
      this.flushWorker(w);
    } else if (!w.timer) {
      w.timer = setTimeout(() => {
        w.timer = null;
        this.flushWorker(w);
      }, this.batchIntervalMs);
    }
  }

  private queueDepth(): number {
    return this.workers.reduce((sum, w) => sum + w.queue.length, 0);
  }

  private flushWorker(w: AdapterWorker): void {
    if (w.flushing || !w.queue.length) return;
    const batch = w.queue.splice(0, this.batchSize);
    this.metrics.set("queue_depth", this.queueDepth());
    w.flushing = this.sendWithRetry(w.adapter, batch).finally(() => {
      w.flushing = null;
      // keep order: the next batch starts only after this one settled
      if (w.queue.length) queueMicrotask(() => this.flushWorker(w));
    });
  }

  private async settleSends(ms: number): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<void>(resolve => {
      timer = setTimeout(resolve, ms);
    });
    try {
      await Promise.race([Promise.allSettled(Array.from(this.sends)), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private track(p: Promise<void>): void {
    this.sends.add(p);
    void p.finally(() => this.sends.delete(p));
  }

  /** Never rejects: exhausted batches go to the dead-letter file. */
  private async sendWithRetry(adapter: Adapter, batch: Notify[]): Promise<void> {
    const { attempts, baseDelayMs, maxDelayMs } = this.retry;
    for (let attempt = 1; ; attempt++) {
      try {
        if (typeof adapter.onNotifyBatch === "function") {
          await adapter.onNotifyBatch(batch);
        } else {
          for (const n of batch) await adapter.onNotify(n);
        }
        this.metrics.inc("sent", batch.length, "Successfully sent notifications");
        return;
      } catch (e) {
        if (attempt >= attempts) {
          this.metrics.inc("failed", batch.length, "Failed notifications after retries");
          this.log.error({ err: e, adapter: adapter.name, records: batch.length }, "delivery failed, writing to dead-letter file");
          await this.toDLQ(adapter, batch);
          return;
        }
        const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
        this.log.warn({ err: e, adapter: adapter.name, attempt, delay }, "delivery failed, retrying");
        await sleep(delay);
      }
    }
  }

  private async toDLQ(adapter: Adapter, batch: Notify[]): Promise<void> {
    const day = this.now().slice(0, 10).replace(/-/g, "");
    const file = join(this.dlqDir, `${day}.ndjson`);
    const lines = batch.map(n => stringify({ adapter: adapter.name, notify: n })).join("\n") + "\n";
    try {
      await fsp.mkdir(this.dlqDir, { recursive: true });
      await fsp.appendFile(file, lines, { encoding: "utf8" });
    } catch (e) {
      this.log.fatal({ err: e, file, records: batch.length }, "dead-letter write failed, records lost");
    }
  }

  private async restoreSeq(): Promise<void> {
    for (const a of this.workers.map(w => w.adapter)) {
      if (!hasMaxSeq(a)) continue;
      try {
        const max = a.maxSeq();
        if (max > this.seq) this.seq = max;
      } catch (e) {
        this.log.warn({ err: e, adapter: a.name }, "could not read max seq");
      }
    }
    if (this.metaDir === null) return;
    const file = join(this.metaDir, "seq");
    try {
      const s = await fsp.readFile(file, "utf8");
      const n = BigInt(s.trim() || "0");
      if (n > this.seq) this.seq = n;
    } catch (e) {
      if (!isMissingFile(e)) this.log.warn({ err: e, file }, "could not read seq file");
    }
  }

  /** One write in flight; later changes are coalesced into the next one. */
  private persistSeq(): void {
    if (this.metaDir === null) return;
    if (this.seqWrite) {
      this.seqDirty = true;
      return;
    }
    const dir = this.metaDir;
    const value = String(this.seq);
    this.seqWrite = (async () => {
      try {
        await fsp.mkdir(dir, { recursive: true });
        await fsp.writeFile(join(dir, "seq"), value, { encoding: "utf8" });
      } catch (e) {
        this.log.warn({ err: e, dir }, "could not persist seq");
      }
    })().finally(() => {
      this.seqWrite = null;
      if (this.seqDirty) {
        this.seqDirty = false;
        this.persistSeq();
      }
    });
  }
}

class HostBlocObserver extends BlocObserver {
  constructor(private readonly host: StateHost) {
    super();
  }

  override onCreate<S>(bloc: BlocBase<S>): void {
    this.host.record("Create", "bloc", bloc.name, { state: bloc.state });
  }

  override onEvent<E extends BlocEvent, S>(bloc: BlocBase<S>, event: E): void {
    this.host.record("Event", "bloc", bloc.name, { event });
  }

  override onChange<S>(bloc: BlocBase<S>, change: Change<S>): void {
    this.host.record("Change", "bloc", bloc.name, { state: change.nextState, previous: change.currentState });
  }

  override onTransition<E extends BlocEvent, S>(bloc: BlocBase<S>, transition: Transition<E, S>): void {
    this.host.record("Transition", "bloc", bloc.name, {
      event: transition.event,
      state: transition.nextState,
      previous: transition.currentState,
    });
  }

  override onError<S>(bloc: BlocBase<S>, error: unknown): void {
    this.host.record("Error", "bloc", bloc.name, { error: errorInfo(error) });
  }

  override onClose<S>(bloc: BlocBase<S>): void {
    this.host.record("Close", "bloc", bloc.name);
    this.host.closed(bloc);
  }
}

/** Provider records skip `link` providers, whose values are controllers and promises. */
class HostProviderObserver extends ProviderObserver {
  constructor(private readonly host: StateHost) {
    super();
  }

  override didAddProvider(provider: ProviderInfo, value: unknown, _container: ProviderContainer): void {
    if (provider.kind !== "link") this.host.record("Create", "provider", provider.name, { state: value });
  }

  override didUpdateProvider(provider: ProviderInfo, previous: unknown, next: unknown, _container: ProviderContainer): void {
    if (provider.kind !== "link") this.host.record("Change", "provider", provider.name, { state: next, previous });
  }

  override didDisposeProvider(provider: ProviderInfo, _container: ProviderContainer): void {
    if (provider.kind !== "link") this.host.record("Close", "provider", provider.name);
  }

  override providerDidFail(provider: ProviderInfo, error: unknown, _container: ProviderContainer): void {
    if (provider.kind !== "link") this.host.record("Error", "provider", provider.name, { error: errorInfo(error) });
  }
}
