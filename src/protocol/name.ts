/**
 * DID -> IPNS name derivation.
 *
 * Anyone holding a DID can compute the IPNS name its owner publishes a
 * feed under; no registry lookup and no private state is involved.
 *
 *   publicKey (32)
 *   -> libp2p PublicKey protobuf   08 01 12 20 || key          (36)
 *   -> identity multihash          00 24 || protobuf           (38)
 *   -> CIDv1, libp2p-key codec     01 72 || multihash          (40)
 *   -> "k" + base36(cid)
 */

import { decodeDid } from "./did.js";
import { FormatError } from "./errors.js";
import { KEY_LENGTH, concatBytes } from "./types.js";

// field 1 (KeyType) varint 1 = Ed25519; field 2 (Data) length-delimited, 32 bytes
const PUBKEY_PROTOBUF_HEADER = Uint8Array.of(0x08, 0x01, 0x12, 0x20);
const MULTIHASH_IDENTITY = 0x00;
const CID_V1 = 0x01;
const CODEC_LIBP2P_KEY = 0x72;
const BASE36_PREFIX = "k";
const BASE36_DIGITS = "0123456789abcdefghijklmnopqrstuvwxyz";

/**
 * Build the libp2p protobuf `PublicKey` record for an Ed25519 key.
 *
 * @throws {FormatError} If the key is not 32 bytes.
 */
export function publicKeyRecord(publicKey: Uint8Array): Uint8Array {
  if (publicKey.length !== KEY_LENGTH) {
    throw new FormatError(
      `Ed25519 public key must be ${KEY_LENGTH} bytes, got ${publicKey.length}`
    );
  }
  return concatBytes(PUBKEY_PROTOBUF_HEADER, publicKey);
}

/** Wrap bytes (at most 127 of them) in an identity multihash. */
export function identityMultihash(digest: Uint8Array): Uint8Array {
  if (digest.length > 0x7f) {
    throw new FormatError(
      `Identity multihash payload too long for a one-byte length: ${digest.length}`
    );
  }
  return concatBytes(Uint8Array.of(MULTIHASH_IDENTITY, digest.length), digest);
}

/** Prefix a multihash with the CIDv1 libp2p-key header. */
export function libp2pKeyCid(multihash: Uint8Array): Uint8Array {
  return concatBytes(Uint8Array.of(CID_V1, CODEC_LIBP2P_KEY), multihash);
}

/**
 * Encode bytes as one big-endian integer in base 36 (`0-9a-z`).
 *
 * Leading zero bytes are not preserved; an all-zero input encodes as "0".
 */
export function base36Encode(data: Uint8Array): string {
  let num = 0n;
  for (const byte of data) {
    num = (num << 8n) | BigInt(byte);
  }
  if (num === 0n) {
    return "0";
  }
  let out = "";
  while (num > 0n) {
    out = BASE36_DIGITS[Number(num % 36n)] + out;
    num /= 36n;
  }
  return out;
}

/**
 * Derive the IPNS name for a raw Ed25519 public key.
 */
export function publicKeyToName(publicKey: Uint8Array): string {
  const cid = libp2pKeyCid(identityMultihash(publicKeyRecord(publicKey)));
  return BASE36_PREFIX + base36Encode(cid);
}

/**
 * Derive the IPNS name a DID's owner publishes its feed under.
 *
 * @throws {FormatError} If the DID is malformed.
 */
export function didToName(did: string): string {
  return publicKeyToName(decodeDid(did));
}
