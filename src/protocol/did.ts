/**
 * did:key encoding for Ed25519 public keys.
 *
 * A DID has the form `did:key:z<base58btc(0xed 0x01 || publicKey)>`, e.g.
 * `did:key:z6Mk...`. The DID is a pure function of the public key.
 */

import { FormatError } from "./errors.js";
import {
  DID_PREFIX,
  ED25519_MULTICODEC,
  KEY_LENGTH,
  concatBytes,
} from "./types.js";

const BASE58_ALPHABET =
  "123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz";

const BASE58_INDEX = new Map<string, bigint>(
  [...BASE58_ALPHABET].map((c, i) => [c, BigInt(i)])
);

/**
 * Encode bytes as base58btc, one leading "1" per leading zero byte.
 */
export function base58Encode(data: Uint8Array): string {
  let zeros = 0;
  while (zeros < data.length && data[zeros] === 0) zeros++;

  let num = 0n;
  for (const byte of data) {
    num = (num << 8n) | BigInt(byte);
  }

  let encoded = "";
  while (num > 0n) {
    encoded = BASE58_ALPHABET[Number(num % 58n)] + encoded;
    num /= 58n;
  }
  return "1".repeat(zeros) + encoded;
}

/**
 * Decode base58btc text.
 *
 * @throws {FormatError} If a character is outside the alphabet.
 */
export function base58Decode(text: string): Uint8Array {
  let zeros = 0;
  while (zeros < text.length && text[zeros] === "1") zeros++;

  let num = 0n;
  for (const c of text) {
    const digit = BASE58_INDEX.get(c);
    if (digit === undefined) {
      throw new FormatError(`Invalid base58 character: ${JSON.stringify(c)}`);
    }
    num = num * 58n + digit;
  }

  const body: number[] = [];
  while (num > 0n) {
    body.unshift(Number(num & 0xffn));
    num >>= 8n;
  }
  return Uint8Array.from([...new Array<number>(zeros).fill(0), ...body]);
}

/**
 * Encode a 32-byte Ed25519 public key as a did:key string.
 *
 * @throws {FormatError} If the key is not 32 bytes.
 */
export function encodeDid(publicKey: Uint8Array): string {
  if (publicKey.length !== KEY_LENGTH) {
    throw new FormatError(
      `Ed25519 public key must be ${KEY_LENGTH} bytes, got ${publicKey.length}`
    );
  }
  return DID_PREFIX + base58Encode(concatBytes(ED25519_MULTICODEC, publicKey));
}

/**
 * Recover the 32-byte public key from a did:key string.
 *
 * @throws {FormatError} On a missing marker, bad alphabet, wrong length or
 *   wrong multicodec tag.
 */
export function decodeDid(did: string): Uint8Array {
  if (!did.startsWith(DID_PREFIX)) {
    throw new FormatError(`Invalid did:key format: ${JSON.stringify(did)}`);
  }
  const tagged = base58Decode(did.slice(DID_PREFIX.length));
  const expected = ED25519_MULTICODEC.length + KEY_LENGTH;
  if (tagged.length !== expected) {
    throw new FormatError(
      `did:key payload must be ${expected} bytes, got ${tagged.length}`
    );
  }
  if (
    tagged[0] !== ED25519_MULTICODEC[0] ||
    tagged[1] !== ED25519_MULTICODEC[1]
  ) {
    throw new FormatError("Invalid multicodec prefix for Ed25519 key");
  }
  return tagged.slice(ED25519_MULTICODEC.length);
}

/**
 * True when `did` decodes to an Ed25519 public key.
 */
export function isValidDid(did: string): boolean {
  try {
    decodeDid(did);
    return true;
  } catch (err) {
    if (err instanceof FormatError) return false;
    throw err;
  }
}
