/**
 * Property codec for stores that only hold scalars and homogeneous scalar
 * lists (Neo4j). Everything else is written as a tagged JSON string and
 * restored on read, so open property bags round-trip unchanged.
 *
 * @module
 */

import { PropertyValueSchema, type PropertyBag, type PropertyValue } from "../../types/entities.js";

export type StoredScalar = string | number | boolean;
export type StoredValue = StoredScalar | string[] | number[] | boolean[];
export type StoredBag = Record<string, StoredValue>;

export const JSON_TAG = "__json__:";

function isHomogeneousList(values: PropertyValue[]): values is string[] | number[] | boolean[] {
  if (values.length === 0) return false;
  const first = values[0];
  const kind = typeof first;
  if (kind !== "string" && kind !== "number" && kind !== "boolean") return false;
  return values.every((value) => typeof value === kind);
}

export function encodeValue(value: PropertyValue): StoredValue {
  if (typeof value === "string") {
    // A string that happens to carry the tag is encoded so decoding is exact
    return value.startsWith(JSON_TAG) ? JSON_TAG + JSON.stringify(value) : value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value) && isHomogeneousList(value)) {
    return value.every((item) => typeof item !== "string" || !item.startsWith(JSON_TAG))
      ? value
      : JSON_TAG + JSON.stringify(value);
  }
  // null, empty lists, mixed lists and maps
  return JSON_TAG + JSON.stringify(value);
}

export function encodeProperties(properties: PropertyBag): StoredBag {
  const encoded: StoredBag = {};
  for (const [name, value] of Object.entries(properties)) {
    encoded[name] = encodeValue(value);
  }
  return encoded;
}

/**
 * Decodes a value read from the store. Integers arrive from the driver as
 * plain numbers by the time they reach here.
 *
 * @throws ZodError when a tagged string does not hold a property value
 */
export function decodeValue(value: unknown): PropertyValue {
  if (typeof value === "string" && value.startsWith(JSON_TAG)) {
    return PropertyValueSchema.parse(JSON.parse(value.slice(JSON_TAG.length)));
  }
  return PropertyValueSchema.parse(value);
}

export function decodeProperties(properties: Record<string, unknown>): PropertyBag {
  const decoded: PropertyBag = {};
  for (const [name, value] of Object.entries(properties)) {
    decoded[name] = decodeValue(value);
  }
  return decoded;
}
