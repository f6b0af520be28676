/**
 * Core types, constants, and utility functions for the didfeed protocol.
 */

/** Envelope schema version (the `v` field). */
export const MESSAGE_VERSION = 1;

/** Maximum number of entries kept in a published feed index. */
export const MAX_FEED_ENTRIES = 100;

/** Scheme marker every encoded DID starts with (`did:key:` + multibase `z`). */
export const DID_PREFIX = "did:key:z";

/** Multicodec tag for an Ed25519 public key (varint 0xed). */
export const ED25519_MULTICODEC = Uint8Array.of(0xed, 0x01);

/** Ed25519 public key and seed length in bytes. */
export const KEY_LENGTH = 32;

/** Ed25519 detached signature length in bytes. */
export const SIGNATURE_LENGTH = 64;

/** Default value of the envelope's `type` field; replies use it too. */
export const DEFAULT_POST_TYPE = "post";

/** A local identity: never leaves this machine. */
export interface Identity {
  readonly did: string;
  /** 32-byte Ed25519 public key. */
  readonly publicKey: Uint8Array;
  /** 32-byte Ed25519 seed. */
  readonly privateKey: Uint8Array;
}

/** One row of a FeedIndex. */
export interface FeedEntry {
  readonly cid: string;
  readonly timestamp: string;
}

/** The document an author publishes under its derived name. */
export interface FeedIndex {
  readonly author: string;
  /** Newest first, at most MAX_FEED_ENTRIES long. */
  readonly posts: readonly FeedEntry[];
}

const B64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Standard (padded) base64 encode.
 */
export function b64Encode(data: Uint8Array): string {
  return Buffer.from(data).toString("base64");
}

/**
 * Strict standard base64 decode.
 *
 * Returns null instead of silently skipping characters the way
 * `Buffer.from(s, "base64")` does.
 */
export function b64DecodeStrict(s: string): Uint8Array | null {
  if (!B64_RE.test(s)) {
    return null;
  }
  return new Uint8Array(Buffer.from(s, "base64"));
}

/**
 * Return a canonical UTC timestamp: YYYY-MM-DDTHH:MM:SS.mmmZ
 */
export function utcTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Concatenate byte arrays.
 */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}
