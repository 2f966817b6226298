import pino, { type Logger, type LevelWithSilent } from "pino";

export interface LoggerOptions {
  level?: LevelWithSilent;
  pretty?: boolean;
}

export const createLogger = (options: LoggerOptions = {}): Logger =>
  pino({
    level: options.level ?? "info",
    transport: options.pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss Z",
            ignore: "pid,hostname",
          },
        }
      : undefined,
    base: { service: "card-atlas" },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  });

export const moduleLogger = (parent: Logger, module: string): Logger => parent.child({ module });

/** Logger for tests and library callers that want no output. */
export const silentLogger = (): Logger => pino({ level: "silent" });
