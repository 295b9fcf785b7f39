/**
 * JSON output for the scripts
 * - ZonedDateTime values become ISO8601 strings with their offset
 * - Maps become plain objects
 * - Errors become { name, message, code? }
 */

import { ZonedDateTime } from "@internationalized/date";
import { formatTimeISO } from "./date-utils";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Transform a value into plain JSON data
 * undefined object fields are dropped, like JSON.stringify does
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }

  // Handle ZonedDateTime (must check before generic objects)
  if (value instanceof ZonedDateTime) {
    return formatTimeISO(value);
  }

  if (value instanceof Error) {
    const error: { [key: string]: JsonValue } = {
      name: value.name,
      message: value.message,
    };
    if ("code" in value && typeof value.code === "string") {
      error.code = value.code;
    }
    return error;
  }

  if (value instanceof Map) {
    const transformed: { [key: string]: JsonValue } = {};
    for (const [key, entry] of value) {
      transformed[String(key)] = toJsonValue(entry);
    }
    return transformed;
  }

  if (Array.isArray(value)) {
    return value.map((item) => toJsonValue(item));
  }

  if (typeof value === "object") {
    const transformed: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry === undefined) continue;
      transformed[key] = toJsonValue(entry);
    }
    return transformed;
  }

  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  return String(value);
}

/**
 * Serialize data for printing, pretty-printed by default
 */
export function toJson(data: unknown, indent: number = 2): string {
  return JSON.stringify(toJsonValue(data), null, indent);
}
