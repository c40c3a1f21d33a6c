import pino from "pino";

export type LogLevel = pino.LevelWithSilent;

export interface ILogger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

export const makeLogger = (level: LogLevel = "info"): ILogger =>
  level === "silent"
    ? pino({ level })
    : pino({
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l" },
        },
      });
