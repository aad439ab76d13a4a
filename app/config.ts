import { z } from "zod";

const intFrom = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const schema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  JOURNAL_DIR: z.string().min(1).default("journal"),
  SQLITE_PATH: z.string().min(1).optional(),
  META_DIR: z.string().min(1).default("host/meta"),
  DLQ_DIR: z.string().min(1).default("host/dlq"),
  BATCH_SIZE: intFrom(128),
  BATCH_INTERVAL_MS: intFrom(50),
  QUEUE_CAPACITY: intFrom(10_000),
  QUEUE_STRATEGY: z.enum(["block", "drop-new", "drop-old"]).default("drop-new"),
});

export type AppConfig = {
  port: number;
  logLevel: z.infer<typeof schema>["LOG_LEVEL"];
  journalDir: string;
  sqlitePath?: string;
  metaDir: string;
  dlqDir: string;
  batchSize: number;
  batchIntervalMs: number;
  queueCapacity: number;
  queueStrategy: z.infer<typeof schema>["QUEUE_STRATEGY"];
};

export class ConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Read the server configuration from environment variables. Empty values count as unset. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = schema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`));
  }
  const c = parsed.data;
  return {
    port: c.PORT,
    logLevel: c.LOG_LEVEL,
    journalDir: c.JOURNAL_DIR,
    sqlitePath: c.SQLITE_PATH,
    metaDir: c.META_DIR,
    dlqDir: c.DLQ_DIR,
    batchSize: c.BATCH_SIZE,
    batchIntervalMs: c.BATCH_INTERVAL_MS,
    queueCapacity: c.QUEUE_CAPACITY,
    queueStrategy: c.QUEUE_STRATEGY,
  };
}
