/**
 * Ed25519 identity generation, storage, and loading.
 *
 * The identity file stores the DID alongside standard-base64 public key and
 * 32-byte seed:
 *
 *   { "did": "did:key:z6Mk...", "public_key": "...", "private_key": "..." }
 */

import { existsSync, statSync } from "node:fs";
import { platform } from "node:os";
import { z } from "zod";

import {
  type Identity,
  type Keypair,
  DidFeedError,
  IdentityNotFoundError,
  b64DecodeStrict,
  b64Encode,
  encodeDid,
  generateKeypair,
  keypairFromSeed,
} from "../protocol/index.js";
import { readJsonFile, writeJsonFile } from "./json-file.js";
import { makeLogger, type Logger } from "./logger.js";

const IdentityFileSchema = z.object({
  did: z.string(),
  public_key: z.string(),
  private_key: z.string(),
});

type IdentityFile = z.infer<typeof IdentityFileSchema>;

/** Identity plus the libsodium signing key derived from its seed. */
export interface LoadedIdentity extends Identity {
  readonly keypair: Keypair;
}

function fromKeypair(keypair: Keypair): LoadedIdentity {
  return {
    did: encodeDid(keypair.publicKey),
    publicKey: keypair.publicKey,
    privateKey: keypair.privateKey,
    keypair,
  };
}

export class IdentityStore {
  private _path: string;
  private _logger: Logger;

  constructor(path: string, options?: { logger?: Logger }) {
    this._path = path;
    this._logger = options?.logger ?? makeLogger();
  }

  get path(): string {
    return this._path;
  }

  /**
   * Whether an identity file exists on disk.
   */
  exists(): boolean {
    return existsSync(this._path);
  }

  /**
   * Generate a new identity and persist it with 0o600 permissions.
   *
   * @throws {DidFeedError} If an identity already exists and `overwrite` is not set.
   */
  create(options?: { overwrite?: boolean }): LoadedIdentity {
    if (this.exists() && !options?.overwrite) {
      throw new DidFeedError(
        `Identity already exists at ${this._path}. Pass overwrite to replace it.`
      );
    }
    const identity = fromKeypair(generateKeypair());
    const file: IdentityFile = {
      did: identity.did,
      public_key: b64Encode(identity.publicKey),
      private_key: b64Encode(identity.privateKey),
    };
    writeJsonFile(this._path, file, 0o600);
    this._logger.info({ did: identity.did }, "identity created");
    return identity;
  }

  /**
   * Load the identity, or return null when there is none.
   *
   * Checks DIDFEED_SEED (standard base64 seed) first. A file that is corrupt
   * or whose DID does not match its seed counts as missing.
   */
  load(): LoadedIdentity | null {
    const envSeed = process.env["DIDFEED_SEED"];
    if (envSeed) {
      const seed = b64DecodeStrict(envSeed.trim());
      if (seed === null) {
        throw new DidFeedError("DIDFEED_SEED is not valid base64");
      }
      return fromKeypair(keypairFromSeed(seed));
    }

    const file = readJsonFile(this._path, IdentityFileSchema, null);
    if (file === null) {
      return null;
    }
    this._checkPermissions();

    const seed = b64DecodeStrict(file.private_key);
    if (seed === null || seed.length !== 32) {
      this._logger.warn({ path: this._path }, "identity file has a malformed private key");
      return null;
    }
    const identity = fromKeypair(keypairFromSeed(seed));
    if (identity.did !== file.did) {
      this._logger.warn(
        { path: this._path, stored: file.did, derived: identity.did },
        "identity file DID does not match its private key"
      );
      return null;
    }
    return identity;
  }

  /**
   * Load the identity or throw.
   *
   * @throws {IdentityNotFoundError} If no identity exists.
   */
  require(): LoadedIdentity {
    const identity = this.load();
    if (identity === null) {
      throw new IdentityNotFoundError();
    }
    return identity;
  }

  /** Warn if the identity file permissions are too permissive. */
  private _checkPermissions(): void {
    if (platform() === "win32") {
      return; // Cannot reliably check on Windows
    }
    const mode = statSync(this._path).mode & 0o777;
    if (mode !== 0o600) {
      this._logger.warn(
        { path: this._path, mode: mode.toString(8) },
        `identity file permissions too open; run: chmod 600 ${this._path}`
      );
    }
  }
}
