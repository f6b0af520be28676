import { describe, it, expect, beforeAll } from "vitest";

import { sodiumReady, generateKeypair } from "../../src/protocol/crypto.js";
import { encodeDid } from "../../src/protocol/did.js";
import { FormatError } from "../../src/protocol/errors.js";
import {
  base36Encode,
  didToName,
  identityMultihash,
  libp2pKeyCid,
  publicKeyRecord,
  publicKeyToName,
} from "../../src/protocol/name.js";

beforeAll(async () => {
  await sodiumReady;
});

describe("name derivation byte layout", () => {
  it("wraps the key in a protobuf record, multihash and CID", () => {
    const pk = generateKeypair().publicKey;

    const record = publicKeyRecord(pk);
    expect(record).toHaveLength(36);
    expect(Array.from(record.slice(0, 4))).toEqual([0x08, 0x01, 0x12, 0x20]);
    expect(record.slice(4)).toEqual(pk);

    const mh = identityMultihash(record);
    expect(mh).toHaveLength(38);
    expect(Array.from(mh.slice(0, 2))).toEqual([0x00, 0x24]);

    const cid = libp2pKeyCid(mh);
    expect(cid).toHaveLength(40);
    expect(Array.from(cid.slice(0, 2))).toEqual([0x01, 0x72]);
  });

  it("rejects keys that are not 32 bytes", () => {
    expect(() => publicKeyRecord(new Uint8Array(33))).toThrow(FormatError);
  });

  it("rejects identity multihash payloads over 127 bytes", () => {
    expect(() => identityMultihash(new Uint8Array(128))).toThrow(FormatError);
    expect(identityMultihash(new Uint8Array(127))).toHaveLength(129);
  });
});

describe("base36Encode", () => {
  it("encodes as one big-endian integer", () => {
    expect(base36Encode(Uint8Array.of(35))).toBe("z");
    expect(base36Encode(Uint8Array.of(36))).toBe("10");
    expect(base36Encode(Uint8Array.of(1, 0))).toBe("74");
  });

  it("encodes zero as '0' and drops leading zero bytes", () => {
    expect(base36Encode(Uint8Array.of(0, 0))).toBe("0");
    expect(base36Encode(new Uint8Array())).toBe("0");
    expect(base36Encode(Uint8Array.of(0, 35))).toBe("z");
  });
});

describe("didToName", () => {
  it("yields a k51... base36 libp2p-key name", () => {
    const name = publicKeyToName(generateKeypair().publicKey);
    expect(name.startsWith("k51qzi5uqu5")).toBe(true);
    expect(name).toMatch(/^k[0-9a-z]+$/);
  });

  it("maps a fixed DID to a known name", () => {
    expect(didToName("did:key:z6Mkef8AunHq44LfTfpb3S9GFtgESqsk8VkFKwpbB4Z3PvK5")).toBe(
      "k51qzi5uqu5dg9be2ha4lcb9hfc2a3a302b0c1h4sasika3ye3rlwlgxzwh68s"
    );
  });

  it("agrees with publicKeyToName and is deterministic", () => {
    const pk = generateKeypair().publicKey;
    const did = encodeDid(pk);
    expect(didToName(did)).toBe(publicKeyToName(pk));
    expect(didToName(did)).toBe(didToName(did));
  });

  it("gives distinct DIDs distinct names", () => {
    const a = didToName(encodeDid(generateKeypair().publicKey));
    const b = didToName(encodeDid(generateKeypair().publicKey));
    expect(a).not.toBe(b);
  });

  it("rejects malformed DIDs", () => {
    expect(() => didToName("did:key:zbad")).toThrow(FormatError);
  });
});
