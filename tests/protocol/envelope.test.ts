import { describe, it, expect, beforeAll } from "vitest";

import {
  sodiumReady,
  generateKeypair,
  type Keypair,
} from "../../src/protocol/crypto.js";
import { encodeDid } from "../../src/protocol/did.js";
import {
  createPost,
  parseEnvelope,
  serializeEnvelope,
  signEnvelope,
  verifyEnvelope,
} from "../../src/protocol/envelope.js";
import { DidFeedError, FormatError } from "../../src/protocol/errors.js";

const TS = "2026-01-02T03:04:05.678Z";

let alice: Keypair;
let bob: Keypair;
let aliceDid: string;
let bobDid: string;

beforeAll(async () => {
  await sodiumReady;
  alice = generateKeypair();
  bob = generateKeypair();
  aliceDid = encodeDid(alice.publicKey);
  bobDid = encodeDid(bob.publicKey);
});

describe("createPost", () => {
  it("fills in version, type, refs and timestamp", () => {
    const post = createPost(aliceDid, "hello", { timestamp: TS });
    expect(post).toEqual({
      v: 1,
      type: "post",
      content: "hello",
      author: aliceDid,
      refs: [],
      timestamp: TS,
    });
    expect("tags" in post).toBe(false);
  });

  it("includes tags only when non-empty", () => {
    expect(createPost(aliceDid, "x", { tags: [] })).not.toHaveProperty("tags");
    expect(createPost(aliceDid, "x", { tags: ["ai"] }).tags).toEqual(["ai"]);
  });

  it("copies refs instead of aliasing them", () => {
    const refs = ["QmA"];
    const post = createPost(aliceDid, "x", { refs });
    refs.push("QmB");
    expect(post.refs).toEqual(["QmA"]);
  });

  it("defaults the timestamp to the current UTC time", () => {
    expect(createPost(aliceDid, "x").timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });
});

describe("signEnvelope / verifyEnvelope", () => {
  it("verifies a freshly signed envelope", () => {
    const signed = signEnvelope(createPost(aliceDid, "hello", { refs: ["QmA"] }), alice);
    expect(typeof signed.signature).toBe("string");
    expect(verifyEnvelope(signed)).toBe(true);
  });

  it("returns a frozen copy", () => {
    const post = createPost(aliceDid, "hello");
    const signed = signEnvelope(post, alice);
    expect(Object.isFrozen(signed)).toBe(true);
    expect(post.signature).toBeUndefined();
  });

  it("refuses to sign for another author", () => {
    expect(() => signEnvelope(createPost(bobDid, "hi"), alice)).toThrow(DidFeedError);
  });

  it("detects tampering with any signed field", () => {
    const signed = signEnvelope(
      createPost(aliceDid, "hello", { refs: ["QmA"], timestamp: TS }),
      alice
    );
    expect(verifyEnvelope({ ...signed, content: "hellO" })).toBe(false);
    expect(verifyEnvelope({ ...signed, timestamp: "2026-01-02T03:04:05.679Z" })).toBe(false);
    expect(verifyEnvelope({ ...signed, refs: ["QmB"] })).toBe(false);
    expect(verifyEnvelope({ ...signed, tags: ["new"] })).toBe(false);
  });

  it("fails when the author is swapped", () => {
    const signed = signEnvelope(createPost(aliceDid, "hello"), alice);
    expect(verifyEnvelope({ ...signed, author: bobDid })).toBe(false);
  });

  it("fails closed on a missing, malformed or foreign signature", () => {
    const post = createPost(aliceDid, "hello");
    expect(verifyEnvelope(post)).toBe(false);
    expect(verifyEnvelope({ ...post, signature: "not base64!" })).toBe(false);
    expect(verifyEnvelope({ ...post, signature: "AAAA" })).toBe(false);
    expect(verifyEnvelope({ ...post, signature: 42 })).toBe(false);

    const bobs = signEnvelope(createPost(bobDid, "hello"), bob);
    expect(verifyEnvelope({ ...post, signature: bobs.signature })).toBe(false);
  });

  it("fails closed on a malformed author or a non-object", () => {
    const signed = signEnvelope(createPost(aliceDid, "hello"), alice);
    expect(verifyEnvelope({ ...signed, author: "did:key:zbad" })).toBe(false);
    expect(verifyEnvelope(null)).toBe(false);
    expect(verifyEnvelope("envelope")).toBe(false);
    expect(verifyEnvelope([signed])).toBe(false);
  });

  it("re-signing replaces an existing signature", () => {
    const signed = signEnvelope(createPost(aliceDid, "hello"), alice);
    const again = signEnvelope({ ...signed, signature: "stale" }, alice);
    expect(verifyEnvelope(again)).toBe(true);
  });
});

describe("serializeEnvelope / parseEnvelope", () => {
  it("survives the wire, non-ASCII content included", () => {
    const signed = signEnvelope(createPost(aliceDid, "héllo 世界", { tags: ["t"] }), alice);
    const parsed = parseEnvelope(new TextEncoder().encode(serializeEnvelope(signed)));
    expect(parsed.content).toBe("héllo 世界");
    expect(verifyEnvelope(parsed)).toBe(true);
  });

  it("keeps unknown fields so that they stay covered by the signature", () => {
    const signed = signEnvelope({ ...createPost(aliceDid, "hello"), lang: "en" }, alice);
    const parsed = parseEnvelope(serializeEnvelope(signed));
    expect(parsed["lang"]).toBe("en");
    expect(verifyEnvelope(parsed)).toBe(true);
    expect(verifyEnvelope({ ...parsed, lang: "fr" })).toBe(false);
  });

  it("rejects bytes that are not JSON", () => {
    expect(() => parseEnvelope("not json")).toThrow(FormatError);
  });

  it("rejects JSON that is not envelope-shaped", () => {
    expect(() => parseEnvelope('{"v":1}')).toThrow(FormatError);
    expect(() => parseEnvelope("[]")).toThrow(FormatError);
  });
});
