import pino, { type Logger } from "pino";
import type { LogLevel } from "./config";

export type { Logger };

// Logs go to stderr; stdout is reserved for the rendered symbol.
export function createLogger(level: LogLevel): Logger {
  return pino({ name: "qr", level }, pino.destination(2));
}
