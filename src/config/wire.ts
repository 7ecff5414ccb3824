/**
 * Conversions between plain JSON data and frozen configuration values
 *
 * @module config/wire
 */

import { SchemaViolationError } from "../errors";

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep copy of caller-owned input
 *
 * @throws {SchemaViolationError} If the value holds functions, symbols or
 * other data that cannot be cloned
 */
export function cloneInput(value: unknown, path: string): unknown {
  try {
    return structuredClone(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SchemaViolationError("input must be plain data", path, undefined, reason);
  }
}

/**
 * Freeze a value and everything reachable from it
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Copy a value into JSON data
 *
 * Keys whose value is `undefined` are unset and left out; `null` is kept.
 *
 * @throws {SchemaViolationError} For non-finite numbers or non-JSON values
 */
export function toJsonValue(value: unknown, path: string): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new SchemaViolationError(`number must be finite, got ${value}`, path);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => toJsonValue(item, `${path}[${index}]`));
  }
  if (isRecord(value)) {
    return toJsonObject(value, path);
  }
  throw new SchemaViolationError(`cannot serialize a value of type ${typeof value}`, path);
}

export function toJsonObject(value: Readonly<Record<string, unknown>>, path: string): JsonObject {
  const out: JsonObject = {};
  for (const [key, child] of Object.entries(value)) {
    if (child === undefined) continue;
    out[key] = toJsonValue(child, `${path}.${key}`);
  }
  return out;
}
