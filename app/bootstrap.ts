import {
  BlocBase,
  InMemoryStorage,
  MultiBlocObserver,
  ProviderContainer,
  getHydratedStorage,
  setHydratedStorage,
  type HydratedStorage,
  type Override,
  type ProviderSubscription,
} from "@unistate/core";
import { SqliteAdapter } from "../adapters/sqlite";
import type { DB } from "../adapters/sqlite/db";
import { SqliteStorage } from "../adapters/sqlite/storage";
import { SseAdapter } from "../adapters/sse";
import type { Adapter } from "../adapters/types";
import { WalNdjsonAdapter } from "../adapters/wal-ndjson";
import { LoggingObserver, LoggingProviderObserver } from "../host/logging-observer";
import { createLogger, type Logger } from "../host/logger";
import { metrics as globalMetrics, type Metrics } from "../host/metrics";
import { StateHost, type StateHostOptions } from "../host/state-host";
import { CounterBloc, CounterCubit, doubledCounterProvider } from "../src/features/counter";
import { ThemeCubit } from "../src/features/settings";
import { InMemoryTodosRepository, TodosBloc, todoStatsProvider, todosRepositoryProvider, type TodosRepository } from "../src/features/todos";
import type { AppConfig } from "./config";

export type BootstrapOptions = Partial<Omit<AppConfig, "port" | "sqlitePath" | "metaDir">> & {
  /** Path or open connection; without it nothing is written to SQLite. */
  sqlite?: string | DB;
  /** `null` keeps the sequence in memory only. */
  metaDir?: string | null;
  sse?: SseAdapter;
  /** Used instead of the journal, SSE and SQLite adapters when given. */
  adapters?: Adapter[];
  repository?: TodosRepository;
  overrides?: readonly Override[];
  logger?: Logger;
  metrics?: Metrics;
  clock?: () => string;
  retry?: StateHostOptions["retry"];
};

export type App = {
  host: StateHost;
  container: ProviderContainer;
  sse: SseAdapter;
  wal: WalNdjsonAdapter | null;
  sqlite: SqliteAdapter | null;
  logger: Logger;
  metrics: Metrics;
  blocs: {
    counter: CounterBloc;
    counterCubit: CounterCubit;
    todos: TodosBloc;
    theme: ThemeCubit;
  };
  close(opts?: { timeoutMs?: number }): Promise<void>;
};

/** Wire the host, its adapters and the demo features into one running app. */
export async function bootstrap(opts: BootstrapOptions = {}): Promise<App> {
  const logger = opts.logger ?? createLogger({ level: opts.logLevel });
  const metrics = opts.metrics ?? globalMetrics;
  const sse = opts.sse ?? new SseAdapter(undefined, { logger });
  let wal: WalNdjsonAdapter | null = null;
  let sqlite: SqliteAdapter | null = null;
  let adapters: Adapter[];
  if (opts.adapters) {
    adapters = opts.adapters;
  } else {
    wal = new WalNdjsonAdapter(opts.journalDir ?? "journal");
    adapters = [sse, wal];
    if (opts.sqlite) {
      sqlite = new SqliteAdapter(opts.sqlite);
      adapters.push(sqlite);
    }
  }

  const host = await StateHost.open(adapters, {
    batch: { size: opts.batchSize, intervalMs: opts.batchIntervalMs },
    queueCapacity: opts.queueCapacity,
    strategy: opts.queueStrategy,
    metaDir: opts.metaDir,
    dlqDir: opts.dlqDir,
    clock: opts.clock,
    retry: opts.retry,
    logger,
    metrics,
  });

  const previousObserver = BlocBase.observer;
  const previousStorage = getHydratedStorage();
  BlocBase.observer = new MultiBlocObserver([previousObserver, new LoggingObserver(logger)]);
  host.install();
  const storage: HydratedStorage = sqlite ? new SqliteStorage(sqlite.db) : new InMemoryStorage();
  setHydratedStorage(storage);

  const repository = opts.repository ?? new InMemoryTodosRepository();
  const container = new ProviderContainer({
    overrides: [todosRepositoryProvider.overrideWithValue(repository), ...(opts.overrides ?? [])],
    observers: [host.providerObserver, new LoggingProviderObserver(logger)],
  });
  // keep the derived demo providers alive so their changes are recorded
  const subscriptions: ProviderSubscription<unknown>[] = [
    container.listen(doubledCounterProvider, () => {}),
    container.listen(todoStatsProvider, () => {}),
  ];

  const blocs = {
    counter: new CounterBloc(),
    counterCubit: new CounterCubit(),
    todos: new TodosBloc(repository),
    theme: new ThemeCubit(),
  };
  for (const [name, bloc] of Object.entries(blocs)) host.register(bloc, name);
  blocs.todos.add({ type: "load" });

  let closing: Promise<void> | null = null;
  const close = (closeOpts: { timeoutMs?: number } = {}): Promise<void> => {
    closing ??= (async () => {
      for (const sub of subscriptions) sub.close();
      await Promise.all(Object.values(blocs).map(b => b.close()));
      container.dispose();
      await host.shutdown(closeOpts);
      BlocBase.observer = previousObserver;
      setHydratedStorage(previousStorage);
      if (sqlite && typeof opts.sqlite === "string") sqlite.db.close();
      logger.info("app closed");
    })();
    return closing;
  };

  logger.info({ adapters: adapters.map(a => a.name), seq: String(host.lastSeq) }, "app started");
  return { host, container, sse, wal, sqlite, logger, metrics, blocs, close };
}
