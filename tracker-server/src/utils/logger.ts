import { TrackerError } from "./errors.js";

/**
 * stderr-only logger.
 * CRITICAL: Never use console.log() — it corrupts the stdio JSON-RPC transport.
 * All logging must go to stderr.
 */

const PREFIX = "[options-tracker]";

export function log(message: string): void {
  console.error(`${PREFIX} ${message}`);
}

export function logWarn(message: string): void {
  console.error(`${PREFIX} WARN: ${message}`);
}

/**
 * Tracker errors are expected outcomes (unknown id, bad input) and log as one
 * line with their code. Anything else is unexpected and keeps its stack.
 */
export function describeError(error: unknown): string {
  if (error instanceof TrackerError) {
    return `${error.name} [${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

/** Logs a failure under the tool or component it happened in. */
export function logError(context: string, error: unknown): void {
  console.error(`${PREFIX} ERROR ${context}: ${describeError(error)}`);
}
