import { createHash } from "crypto";
import type { JsonValue } from "./json.js";

const CROCKFORD_BASE32_ALPHABET = "0123456789ABCDEFGHJKMNPQRSTVWXYZ";

export function sha256Hex(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

export function sha256Prefixed(data: string | Buffer): `sha256:${string}` {
  return `sha256:${sha256Hex(data)}`;
}

export function encodeCrockfordBase32_128bits(bytes: Uint8Array): string {
  if (bytes.byteLength !== 16) throw new Error(`expected 16 bytes, got ${bytes.byteLength}`);
  let value = 0n;
  for (const b of bytes) value = (value << 8n) | BigInt(b);

  let out = "";
  for (let i = 0; i < 26; i++) {
    out = CROCKFORD_BASE32_ALPHABET.charAt(Number(value & 31n)) + out;
    value >>= 5n;
  }
  return out;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Normalises a value into JSON with sorted object keys, so that equal job
 * parameters always hash the same. `undefined` members are dropped.
 */
export function canonicalizeJson(value: unknown): JsonValue | undefined {
  if (value === undefined) return undefined;
  if (value === null) return null;

  switch (typeof value) {
    case "number":
      if (!Number.isFinite(value)) return null;
      return Object.is(value, -0) ? 0 : value;
    case "string":
    case "boolean":
      return value;
    case "bigint":
      return value.toString();
    case "function":
    case "symbol":
      throw new Error(`value is not JSON-serializable: ${typeof value}`);
    default:
      break;
  }

  if (value instanceof Date) return value.toISOString();

  if (Array.isArray(value)) {
    return value.map((v) => canonicalizeJson(v) ?? null);
  }

  if (isPlainObject(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      const c = canonicalizeJson(value[key]);
      if (c !== undefined) out[key] = c;
    }
    return out;
  }

  throw new Error("value is not JSON-serializable");
}

export function stableJsonStringify(value: unknown): string {
  return JSON.stringify(canonicalizeJson(value) ?? null);
}
