/**
 * The local author's own FeedIndex.
 *
 * publish() updates feed.json synchronously, then hands the new index to a
 * detached task that adds it to the store and repoints the author's IPNS
 * name at it. Tasks run one after another in publish order, so the name
 * always ends up at the newest index. They have no cancel contract: failures
 * are logged and dropped, and if the process exits first, followers keep
 * resolving the previous index until a later publish goes through.
 */

import {
  type FeedIndex,
  FeedIndexSchema,
  prependEntry,
  utcTimestamp,
} from "../protocol/index.js";
import { readJsonFile, writeJsonFile } from "./json-file.js";
import { ensureNameKey } from "./keystore.js";
import { makeLogger, type Logger } from "./logger.js";
import type { LoadedIdentity } from "./identity-store.js";
import type { ContentStore } from "./store/index.js";

export class OwnFeed {
  private _path: string;
  private _store: ContentStore;
  private _identity: LoadedIdentity;
  private _keyName: string;
  private _logger: Logger;
  private _inflight: Promise<void> = Promise.resolve();

  constructor(options: {
    path: string;
    store: ContentStore;
    identity: LoadedIdentity;
    keyName: string;
    logger?: Logger;
  }) {
    this._path = options.path;
    this._store = options.store;
    this._identity = options.identity;
    this._keyName = options.keyName;
    this._logger = options.logger ?? makeLogger();
  }

  /**
   * Read the local index. A missing or corrupt file, or one written for a
   * different author, yields an empty index.
   */
  load(): FeedIndex {
    const empty: FeedIndex = { author: this._identity.did, posts: [] };
    const index = readJsonFile(this._path, FeedIndexSchema, empty);
    return index.author === this._identity.did ? index : empty;
  }

  /**
   * Record a newly stored post and start republishing the index.
   *
   * Returns once feed.json is written; the store round trip happens later.
   */
  publish(cid: string): FeedIndex {
    const index = prependEntry(this.load(), { cid, timestamp: utcTimestamp() });
    writeJsonFile(this._path, index);
    this._inflight = this._inflight.then(() => this._associate(index));
    return index;
  }

  /**
   * Settles once every association started so far has finished. Always
   * resolves.
   */
  pending(): Promise<void> {
    return this._inflight;
  }

  private async _associate(index: FeedIndex): Promise<void> {
    try {
      const indexCid = await this._store.put(JSON.stringify(index));
      await ensureNameKey(this._store, this._keyName, this._identity);
      const name = await this._store.publishName(indexCid, this._keyName);
      this._logger.info({ name, cid: indexCid, posts: index.posts.length }, "feed published");
    } catch (err) {
      this._logger.warn(
        { err: err instanceof Error ? err.message : String(err) },
        "feed publish failed"
      );
    }
  }
}
