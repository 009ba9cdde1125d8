import { errorMessage } from "../utils/errors.js";
import { logError } from "../utils/logger.js";

/**
 * Pretty JSON in which non-finite numbers are written as strings
 * ("Infinity"), since JSON has no literal for them.
 */
export function toJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, v: unknown) => (typeof v === "number" && !Number.isFinite(v) ? String(v) : v),
    2
  );
}

export function jsonResult(value: unknown) {
  return {
    content: [{ type: "text" as const, text: toJson(value) }],
  };
}

export function textResult(text: string) {
  return {
    content: [{ type: "text" as const, text }],
  };
}

export function errorResult(tool: string, action: string, err: unknown) {
  logError(tool, err);
  return {
    content: [{ type: "text" as const, text: `Error ${action}: ${errorMessage(err)}` }],
    isError: true,
  };
}
