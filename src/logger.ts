import { destination, multistream, pino, type Level, type LevelWithSilent, type Logger } from "pino";

export interface LoggerOptions {
  name?: string;
  level: LevelWithSilent;
  /** Also append JSON lines to this file. */
  file?: string;
}

export function createLogger(options: LoggerOptions): Logger {
  const base = {
    name: options.name ?? "relayq",
    level: options.level,
    timestamp: pino.stdTimeFunctions.isoTime
  };
  if (!options.file) {
    return pino(base);
  }
  const streamLevel: Level = options.level === "silent" ? "fatal" : options.level;
  return pino(
    base,
    multistream([
      { stream: process.stdout, level: streamLevel },
      { stream: destination({ dest: options.file, mkdir: true, sync: false }), level: streamLevel }
    ])
  );
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
