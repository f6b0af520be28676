/**
 * didfeed post envelope -- creation, signing, verification, wire format.
 *
 * An envelope is a flat JSON object:
 *
 *   { v, type, content, author, refs, tags?, timestamp, signature }
 *
 * The signature covers the canonical form of every other field, so any
 * mutation after signing (including timestamp or refs) invalidates it.
 * Stored envelopes are addressed by the CID the content store assigns.
 */

import { z } from "zod";

import { canonicalize, signBytes, verifyBytes, type Keypair } from "./crypto.js";
import { decodeDid, encodeDid } from "./did.js";
import { DidFeedError, FormatError } from "./errors.js";
import {
  MESSAGE_VERSION,
  DEFAULT_POST_TYPE,
  b64DecodeStrict,
  b64Encode,
  utcTimestamp,
} from "./types.js";

/**
 * Wire schema. Unknown keys pass through untouched so that verification of
 * a parsed envelope covers exactly the bytes its author signed.
 */
export const PostEnvelopeSchema = z
  .object({
    v: z.number().int(),
    type: z.string(),
    content: z.string(),
    author: z.string(),
    refs: z.array(z.string()),
    tags: z.array(z.string()).optional(),
    timestamp: z.string(),
    signature: z.string().optional(),
  })
  .passthrough();

export type PostEnvelope = z.infer<typeof PostEnvelopeSchema>;

/** An envelope carrying a signature. */
export type SignedPostEnvelope = PostEnvelope & { signature: string };

/**
 * Build an unsigned post envelope.
 */
export function createPost(
  author: string,
  content: string,
  options?: {
    refs?: readonly string[];
    tags?: readonly string[];
    type?: string;
    timestamp?: string;
  }
): PostEnvelope {
  const envelope: PostEnvelope = {
    v: MESSAGE_VERSION,
    type: options?.type ?? DEFAULT_POST_TYPE,
    content,
    author,
    refs: [...(options?.refs ?? [])],
    timestamp: options?.timestamp ?? utcTimestamp(),
  };
  if (options?.tags !== undefined && options.tags.length > 0) {
    envelope.tags = [...options.tags];
  }
  return envelope;
}

/**
 * Sign an envelope with the author's keypair.
 *
 * Any existing signature is replaced. The result is frozen.
 *
 * @throws {DidFeedError} If the keypair does not belong to the envelope's author.
 */
export function signEnvelope(
  envelope: PostEnvelope,
  keypair: Keypair
): SignedPostEnvelope {
  if (encodeDid(keypair.publicKey) !== envelope.author) {
    throw new DidFeedError(
      `Signing key does not match envelope author ${envelope.author}`
    );
  }
  const signature = b64Encode(signBytes(canonicalize(envelope), keypair.signingKey));
  return Object.freeze({ ...envelope, signature });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Verify an envelope's signature against the key embedded in its author DID.
 *
 * Fails closed: returns false (never throws) when the signature is missing
 * or not base64, when the author is not a well-formed DID, or when the
 * signature does not cover the freshly recomputed canonical payload.
 */
export function verifyEnvelope(envelope: unknown): boolean {
  if (!isRecord(envelope)) {
    return false;
  }
  const { signature, author } = envelope;
  if (typeof signature !== "string" || typeof author !== "string") {
    return false;
  }
  const sigBytes = b64DecodeStrict(signature);
  if (sigBytes === null) {
    return false;
  }
  let publicKey: Uint8Array;
  try {
    publicKey = decodeDid(author);
  } catch (err) {
    if (err instanceof FormatError) return false;
    throw err;
  }
  return verifyBytes(canonicalize(envelope), sigBytes, publicKey);
}

/**
 * Serialize an envelope to the compact JSON stored in the content store.
 */
export function serializeEnvelope(envelope: PostEnvelope): string {
  return JSON.stringify(envelope);
}

/**
 * Parse stored bytes into an envelope.
 *
 * @throws {FormatError} If the data is not JSON or not envelope-shaped.
 */
export function parseEnvelope(data: Uint8Array | string): PostEnvelope {
  const text = typeof data === "string" ? data : new TextDecoder().decode(data);
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new FormatError(
      `Envelope is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  const result = PostEnvelopeSchema.safeParse(json);
  if (!result.success) {
    throw new FormatError(`Invalid envelope: ${result.error.issues[0]?.message ?? "unknown"}`);
  }
  return result.data;
}
