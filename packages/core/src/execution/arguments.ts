import type { JsonObject, JsonValue } from "@toolgate/shared";
import { ArgumentEncodingError } from "../errors/errors.js";

/**
 * Converts call arguments into a detached JSON object, following JSON rules
 * (toJSON is honoured, undefined object members are dropped, undefined array
 * items become null). Values JSON cannot carry are rejected with their path.
 */
export function encodeArguments(args: Readonly<Record<string, unknown>>): JsonObject {
  return encodeObject(args, "arguments", new Set());
}

function encodeValue(value: unknown, path: string, seen: Set<object>): JsonValue {
  if (value === null) return null;
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      if (!Number.isFinite(value)) {
        throw new ArgumentEncodingError(`${path} is not a finite number`);
      }
      return value;
    case "bigint":
    case "symbol":
    case "function":
    case "undefined":
      throw new ArgumentEncodingError(`${path} has unsupported type ${typeof value}`);
    case "object":
      break;
  }

  if (hasToJSON(value)) {
    return encodeValue(value.toJSON(), path, seen);
  }
  if (Array.isArray(value)) {
    return guardCycle(value, path, seen, () =>
      value.map((item: unknown, i) =>
        item === undefined ? null : encodeValue(item, `${path}[${i}]`, seen),
      ),
    );
  }
  if (typeof value === "object") {
    return encodeObject(value, path, seen);
  }
  throw new ArgumentEncodingError(`${path} has unsupported type ${typeof value}`);
}

function encodeObject(value: object, path: string, seen: Set<object>): JsonObject {
  return guardCycle(value, path, seen, () => {
    const out: JsonObject = {};
    for (const [key, member] of Object.entries(value)) {
      if (member === undefined) continue;
      out[key] = encodeValue(member, `${path}.${key}`, seen);
    }
    return out;
  });
}

function guardCycle<T>(value: object, path: string, seen: Set<object>, encode: () => T): T {
  if (seen.has(value)) {
    throw new ArgumentEncodingError(`${path} contains a circular reference`);
  }
  seen.add(value);
  try {
    return encode();
  } finally {
    seen.delete(value);
  }
}

function hasToJSON(value: unknown): value is { toJSON: () => unknown } {
  return typeof value === "object" && value !== null && "toJSON" in value && typeof value.toJSON === "function";
}
