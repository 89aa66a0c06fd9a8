import debug from "debug";
import type { Debugger } from "debug";

export type LogScope = "endpoint" | "handshake" | "server" | "transport";

export type Logger = Debugger;

// createLogger returns a namespaced debug logger (enable with DEBUG=linesec:*).
export function createLogger(scope: LogScope): Logger {
  return debug(`linesec:${scope}`);
}
