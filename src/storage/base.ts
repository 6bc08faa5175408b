/**
 * Storage Base
 *
 * Core storage utilities - separated to avoid circular imports.
 */

import { randomUUID } from "node:crypto";

/**
 * Generate a new UUID.
 */
export function generateId(): string {
  return randomUUID();
}

/**
 * JSON reviver that converts ISO date strings back to Date objects.
 * Calendar dates ("2025-07-01") and times ("16:00") stay strings.
 */
export function dateReviver(_key: string, value: unknown): unknown {
  if (typeof value === "string") {
    // ISO 8601 date-time format
    const dateRegex = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/;
    if (dateRegex.test(value)) {
      return new Date(value);
    }
  }
  return value;
}

/**
 * Parse a stored JSON document.
 */
export function parseDocument<T>(data: string): T {
  return JSON.parse(data, dateReviver) as T;
}
