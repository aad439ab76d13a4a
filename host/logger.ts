import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger };

export type LoggerConfig = {
  level?: string;
  name?: string;
};

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    name: config.name ?? "unistate",
    level: config.level ?? process.env.LOG_LEVEL ?? "info",
    serializers: { err: pino.stdSerializers.err },
  };
  return pino(options);
}

export const logger = createLogger();
