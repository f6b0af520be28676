/**
 * Abstract content store interface.
 *
 * Implementations:
 * - IpfsClient: a Kubo daemon over its HTTP RPC API
 * - tests use an in-process stand-in
 *
 * Writes are content-addressed, so re-adding identical bytes yields the same
 * CID and every operation is safe to repeat.
 */

import { FormatError } from "../../protocol/errors.js";

/** A key held in the store's keystore. */
export interface StoreKey {
  readonly name: string;
  readonly id: string;
}

export abstract class ContentStore {
  /** Add bytes (or a UTF-8 string) and return their CID. */
  abstract put(data: Uint8Array | string): Promise<string>;

  /**
   * Fetch the bytes behind a CID. Without `timeoutMs` the fetch may block
   * until the content turns up.
   *
   * @throws {NotFoundError} If the content cannot be found.
   * @throws {StoreTimeoutError} If the fetch exceeds `timeoutMs`.
   */
  abstract get(cid: string, timeoutMs?: number): Promise<Uint8Array>;

  /** Pin content against local garbage collection. */
  abstract pin(cid: string): Promise<void>;

  /**
   * Point the IPNS name of `keyName` at `cid`. May take tens of seconds.
   *
   * @returns The IPNS name that was updated.
   */
  abstract publishName(cid: string, keyName: string): Promise<string>;

  /**
   * Resolve an IPNS name to the CID it currently points at.
   *
   * @throws {StoreTimeoutError} If resolution exceeds `timeoutMs`.
   * @throws {UnresolvedNameError} If the name has no record.
   */
  abstract resolveName(name: string, timeoutMs: number): Promise<string>;

  /** Import a PKCS#8 PEM private key into the keystore under `keyName`. */
  abstract importKey(keyName: string, pem: string): Promise<void>;

  /** List the keys in the keystore. */
  abstract listKeys(): Promise<StoreKey[]>;

  /** Whether the store is reachable. Never throws. */
  abstract isAvailable(): Promise<boolean>;

  /**
   * Fetch content and decode it as JSON.
   *
   * @throws {FormatError} If the content is not valid JSON.
   */
  async getJson(cid: string, timeoutMs?: number): Promise<unknown> {
    const text = new TextDecoder().decode(await this.get(cid, timeoutMs));
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new FormatError(
        `Content ${cid} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }
}
