import { errorMessage } from "./core/errors.js";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

// stdout belongs to the MCP stdio transport, so everything goes to stderr.
export const consoleLogger: Logger = {
  info: (message) => console.error(message),
  warn: (message) => console.error(`[warn] ${message}`),
  error: (message, err) =>
    console.error(err === undefined ? `[error] ${message}` : `[error] ${message}: ${errorMessage(err)}`),
};
