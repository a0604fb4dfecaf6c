import crypto from "crypto";
import { v1 as uuidv1, v3 as uuidv3, v4 as uuidv4, v5 as uuidv5 } from "uuid";

export type ToolResult = { ok: true; value: string } | { ok: false; error: string };

export type UuidVersion = 1 | 3 | 4 | 5;

export const UUID_VERSIONS: readonly UuidVersion[] = [1, 3, 4, 5];
export const DEFAULT_UUID_NAME = "example.com";

export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 1000;
export const DEFAULT_PASSWORD_LENGTH = 18;

const PASSWORD_ALPHABET =
  "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~";

export const HASH_ALGORITHMS = ["md5", "sha1", "sha256", "sha512"] as const;
export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export function isUuidVersion(value: number): value is UuidVersion {
  return (UUID_VERSIONS as readonly number[]).includes(value);
}

/** Random node id with the multicast bit set so it can never collide with a real MAC. */
export function randomNodeId(): number[] {
  const node = [...crypto.randomBytes(6)];
  node[0] = (node[0] ?? 0) | 0x01;
  return node;
}

export function generateUuid(version: UuidVersion = 4, name = DEFAULT_UUID_NAME): string {
  switch (version) {
    case 1:
      return uuidv1({ node: randomNodeId() });
    case 3:
      return uuidv3(name, uuidv3.DNS);
    case 5:
      return uuidv5(name, uuidv5.DNS);
    case 4:
      return uuidv4();
    default: {
      const unsupported: never = version;
      throw new Error(`Unsupported UUID version: ${String(unsupported)}`);
    }
  }
}

export function generatePassword(length = DEFAULT_PASSWORD_LENGTH): ToolResult {
  if (!Number.isInteger(length) || length < PASSWORD_MIN_LENGTH || length > PASSWORD_MAX_LENGTH) {
    return {
      ok: false,
      error: `Password length must be between ${PASSWORD_MIN_LENGTH} and ${PASSWORD_MAX_LENGTH}.`
    };
  }
  let password = "";
  for (let index = 0; index < length; index += 1) {
    password += PASSWORD_ALPHABET.charAt(crypto.randomInt(PASSWORD_ALPHABET.length));
  }
  return { ok: true, value: password };
}

export function isHashAlgorithm(value: string): value is HashAlgorithm {
  return (HASH_ALGORITHMS as readonly string[]).includes(value);
}

export function hashText(algorithm: string, text: string): ToolResult {
  const normalized = algorithm.trim().toLowerCase();
  if (!isHashAlgorithm(normalized)) {
    return { ok: false, error: `Unsupported hash algorithm '${algorithm}'. Use one of: ${HASH_ALGORITHMS.join(", ")}.` };
  }
  return { ok: true, value: crypto.createHash(normalized).update(text, "utf-8").digest("hex") };
}

export function encodeBase64(text: string): string {
  return Buffer.from(text, "utf-8").toString("base64");
}

export function decodeBase64(encoded: string): ToolResult {
  const compact = encoded.replace(/\s+/g, "");
  if (!compact || !/^[A-Za-z0-9+/]+={0,2}$/.test(compact) || compact.length % 4 === 1) {
    return { ok: false, error: "Input is not valid base64." };
  }
  return { ok: true, value: Buffer.from(compact, "base64").toString("utf-8") };
}

/** Unix seconds become ISO 8601 (UTC); anything Date can parse becomes unix seconds. */
export function convertTimestamp(input: string): ToolResult {
  const value = input.trim();
  if (!value) {
    return { ok: false, error: "Provide a unix timestamp or a date." };
  }
  if (/^-?\d+(\.\d+)?$/.test(value)) {
    const date = new Date(Number(value) * 1000);
    if (Number.isNaN(date.getTime())) {
      return { ok: false, error: `Timestamp out of range: ${value}` };
    }
    return { ok: true, value: date.toISOString() };
  }
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    return { ok: false, error: `Could not parse '${value}' as a date.` };
  }
  return { ok: true, value: String(Math.floor(parsed / 1000)) };
}
