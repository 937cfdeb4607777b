import pino, { type Logger } from "pino";

/** Logger that drops everything. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
