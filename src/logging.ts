import pino from "pino";

export interface ILogger {
  debug: (msg: string, fields?: object) => void;
  info: (msg: string, fields?: object) => void;
  warn: (msg: string, fields?: object) => void;
  error: (msg: string, fields?: object) => void;
}

// pino takes the merge object first
const wrap = (logger: pino.Logger): ILogger => ({
  debug: (msg, fields = {}) => logger.debug(fields, msg),
  info: (msg, fields = {}) => logger.info(fields, msg),
  warn: (msg, fields = {}) => logger.warn(fields, msg),
  error: (msg, fields = {}) => logger.error(fields, msg),
});

export const makeLogger = (
  level: pino.LevelWithSilent = "info",
  pretty = false,
): ILogger =>
  wrap(
    pretty
      ? pino({
          level,
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l" },
          },
        })
      : pino({ level }),
  );

export const silentLogger = (): ILogger => makeLogger("silent");
