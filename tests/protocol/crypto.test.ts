import { describe, it, expect, beforeAll } from "vitest";

import {
  sodiumReady,
  generateKeypair,
  keypairFromSeed,
  canonicalize,
  signBytes,
  verifyBytes,
} from "../../src/protocol/crypto.js";
import { FormatError } from "../../src/protocol/errors.js";

const text = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);

beforeAll(async () => {
  await sodiumReady;
});

describe("keypairs", () => {
  it("generates 32-byte keys and a 64-byte signing key", () => {
    const kp = generateKeypair();
    expect(kp.publicKey).toHaveLength(32);
    expect(kp.privateKey).toHaveLength(32);
    expect(kp.signingKey).toHaveLength(64);
  });

  it("rebuilds the same keypair from a seed", () => {
    const kp = generateKeypair();
    const again = keypairFromSeed(kp.privateKey);
    expect(again.publicKey).toEqual(kp.publicKey);
    expect(again.signingKey).toEqual(kp.signingKey);
  });

  it("rejects seeds that are not 32 bytes", () => {
    expect(() => keypairFromSeed(new Uint8Array(16))).toThrow(FormatError);
  });
});

describe("canonicalize", () => {
  it("sorts keys at every depth with compact separators", () => {
    const out = canonicalize({ z: { b: 2, a: [{ d: 1, c: null }] }, m: "x" });
    expect(text(out)).toBe('{"m":"x","z":{"a":[{"c":null,"d":1}],"b":2}}');
  });

  it("drops only the top-level signature", () => {
    const out = canonicalize({ signature: "sig", inner: { signature: "kept" } });
    expect(text(out)).toBe('{"inner":{"signature":"kept"}}');
  });

  it("escapes non-ASCII as \\uXXXX", () => {
    expect(text(canonicalize({ b: "é", a: 1 }))).toBe('{"a":1,"b":"\\u00e9"}');
  });

  it("escapes DEL along with everything above it", () => {
    expect(text(canonicalize({ b: "x\u007f\u00e9", a: [1, null] }))).toBe(
      '{"a":[1,null],"b":"x\\u007f\\u00e9"}'
    );
  });

  it("escapes astral characters as surrogate pairs", () => {
    expect(text(canonicalize({ s: "\u{1F600}" }))).toBe('{"s":"\\ud83d\\ude00"}');
  });

  it("omits undefined values and keeps null", () => {
    expect(text(canonicalize({ a: undefined, b: null }))).toBe('{"b":null}');
  });

  it("does not depend on insertion order", () => {
    expect(canonicalize({ a: 1, b: 2 })).toEqual(canonicalize({ b: 2, a: 1 }));
  });
});

describe("signBytes / verifyBytes", () => {
  const data = new TextEncoder().encode("payload");

  it("verifies a signature made with the matching key", () => {
    const kp = generateKeypair();
    const sig = signBytes(data, kp.signingKey);
    expect(sig).toHaveLength(64);
    expect(verifyBytes(data, sig, kp.publicKey)).toBe(true);
  });

  it("rejects altered data or a different key", () => {
    const kp = generateKeypair();
    const sig = signBytes(data, kp.signingKey);
    expect(verifyBytes(new TextEncoder().encode("payloaD"), sig, kp.publicKey)).toBe(false);
    expect(verifyBytes(data, sig, generateKeypair().publicKey)).toBe(false);
  });

  it("returns false for malformed signatures and keys", () => {
    const kp = generateKeypair();
    const sig = signBytes(data, kp.signingKey);
    expect(verifyBytes(data, sig.slice(0, 63), kp.publicKey)).toBe(false);
    expect(verifyBytes(data, sig, kp.publicKey.slice(0, 31))).toBe(false);
  });
});
