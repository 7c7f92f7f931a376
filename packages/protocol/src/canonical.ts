/**
 * Canonical serialization: deterministic CBOR encoding.
 *
 * Rules:
 *   1. Stable field order (lexicographic by key, recursive)
 *   2. No floats: integers are bigint or safe-integer numbers
 *   3. Same value → identical bytes, always
 *
 * This is the byte string the issuing authority signs for a mint
 * challenge and that callers sign for authenticated requests.
 */

import { Encoder } from "cbor-x";

const encoder = new Encoder({
  structuredClone: false,
  mapsAsObjects: true,
  useRecords: false,
  pack: false,
});

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function normalize(value: unknown, path: string): unknown {
  if (value === null || value === undefined) return value;
  if (value instanceof Uint8Array) return value;
  switch (typeof value) {
    case "string":
    case "boolean":
    case "bigint":
      return value;
    case "number":
      if (!Number.isSafeInteger(value)) {
        throw new TypeError(`canonicalEncode: non-integer number at ${path}`);
      }
      return value;
    case "object":
      break;
    default:
      throw new TypeError(`canonicalEncode: unsupported ${typeof value} at ${path}`);
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown, i) => normalize(item, `${path}[${i}]`));
  }
  if (!isPlainObject(value)) {
    throw new TypeError(`canonicalEncode: unsupported object at ${path}`);
  }

  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    const field = value[key];
    // Absent and undefined encode the same way.
    if (field === undefined) continue;
    sorted[key] = normalize(field, `${path}.${key}`);
  }
  return sorted;
}

/**
 * Canonical encode: sort keys lexicographically, reject floats, then CBOR encode.
 */
export function canonicalEncode(value: unknown): Uint8Array {
  return encoder.encode(normalize(value, "$"));
}

export function canonicalDecode(bytes: Uint8Array): unknown {
  return encoder.decode(bytes);
}
