/**
 * Cryptographic primitives for the didfeed protocol.
 *
 * Wraps libsodium-wrappers for Ed25519 key generation, detached signing and
 * verification. This module never hand-rolls crypto -- every signature
 * operation delegates to libsodium.
 */

import sodium from "libsodium-wrappers";

import { FormatError } from "./errors.js";
import { KEY_LENGTH, SIGNATURE_LENGTH } from "./types.js";

// ---------------------------------------------------------------------------
// Sodium initialization
// ---------------------------------------------------------------------------

/**
 * Promise that resolves when libsodium is ready.
 * Callers must await this before first use of any crypto function.
 */
export const sodiumReady: Promise<void> = sodium.ready;

// ---------------------------------------------------------------------------
// Key generation
// ---------------------------------------------------------------------------

export interface Keypair {
  /** 32-byte Ed25519 public key. */
  publicKey: Uint8Array;
  /** 32-byte seed; the persisted form of the private key. */
  privateKey: Uint8Array;
  /** 64-byte libsodium secret key (seed + public). */
  signingKey: Uint8Array;
}

/**
 * Generate an Ed25519 keypair.
 */
export function generateKeypair(): Keypair {
  return keypairFromSeed(sodium.randombytes_buf(KEY_LENGTH));
}

/**
 * Rebuild a keypair from its 32-byte seed.
 *
 * @throws {FormatError} If the seed is not 32 bytes.
 */
export function keypairFromSeed(seed: Uint8Array): Keypair {
  if (seed.length !== KEY_LENGTH) {
    throw new FormatError(
      `Ed25519 seed must be ${KEY_LENGTH} bytes, got ${seed.length}`
    );
  }
  const kp = sodium.crypto_sign_seed_keypair(seed);
  return {
    publicKey: kp.publicKey,
    privateKey: new Uint8Array(seed),
    signingKey: kp.privateKey,
  };
}

// ---------------------------------------------------------------------------
// Canonical JSON
// ---------------------------------------------------------------------------

// Escape everything outside printable ASCII the way an ensure_ascii JSON
// encoder does, so the signed bytes are identical across implementations.
function asciiJson(s: string): string {
  return JSON.stringify(s).replace(
    /[\u007f-\uffff]/g,
    (c) => "\\u" + c.charCodeAt(0).toString(16).padStart(4, "0")
  );
}

/**
 * Recursively sort all object keys and produce compact JSON.
 */
function sortedStringify(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (typeof value === "string") {
    return asciiJson(value);
  }
  if (typeof value === "number") {
    return JSON.stringify(value);
  }
  if (typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    const items = value.map((v) => (v === undefined ? "null" : sortedStringify(v)));
    return "[" + items.join(",") + "]";
  }
  if (typeof value === "object") {
    const pairs = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => asciiJson(k) + ":" + sortedStringify(v));
    return "{" + pairs.join(",") + "}";
  }
  return "null";
}

/**
 * Produce the deterministic signing payload for an object.
 *
 * - Excludes the top-level "signature" key.
 * - Sorts keys at every depth, uses compact separators.
 * - Escapes non-ASCII characters as \uXXXX.
 * - Omits undefined values; keeps null as null.
 */
export function canonicalize(data: Record<string, unknown>): Uint8Array {
  const filtered = Object.fromEntries(
    Object.entries(data).filter(([k]) => k !== "signature")
  );
  return new TextEncoder().encode(sortedStringify(filtered));
}

// ---------------------------------------------------------------------------
// Signing and verification
// ---------------------------------------------------------------------------

/**
 * Sign data with the 64-byte Ed25519 signing key.
 *
 * @returns The raw 64-byte detached signature.
 */
export function signBytes(data: Uint8Array, signingKey: Uint8Array): Uint8Array {
  return sodium.crypto_sign_detached(data, signingKey);
}

/**
 * Check a detached Ed25519 signature.
 *
 * Returns false for malformed keys or signatures rather than throwing.
 */
export function verifyBytes(
  data: Uint8Array,
  signature: Uint8Array,
  publicKey: Uint8Array
): boolean {
  if (signature.length !== SIGNATURE_LENGTH || publicKey.length !== KEY_LENGTH) {
    return false;
  }
  try {
    return sodium.crypto_sign_verify_detached(signature, data, publicKey);
  } catch {
    // libsodium rejects some non-canonical points by throwing
    return false;
  }
}
