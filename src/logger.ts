import pino, { type LevelWithSilent, type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level: LevelWithSilent;
  name?: string;
}

/** Root JSON logger; components take children tagged with `component` */
export function createLogger(options: LoggerOptions): Logger {
  return pino({
    name: options.name ?? "org-rebac-api",
    level: options.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
  });
}
