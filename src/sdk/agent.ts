/**
 * FeedAgent -- the primary SDK interface.
 *
 * Provides identity setup, post/reply/read, follow management and feed
 * polling on top of an injected content store.
 */

import {
  DidFeedError,
  type FeedIndex,
  type Identity,
  type PostEnvelope,
  createPost,
  didToName,
  parseEnvelope,
  parseFeedIndex,
  serializeEnvelope,
  signEnvelope,
  sodiumReady,
  verifyEnvelope,
} from "../protocol/index.js";
import { FeedConfig } from "./config.js";
import {
  FollowEngine,
  type FollowEntry,
  type FollowResult,
  type PollReport,
  type UnfollowResult,
} from "./follow-engine.js";
import { IdentityStore, type LoadedIdentity } from "./identity-store.js";
import { makeLogger, type Logger } from "./logger.js";
import { OwnFeed } from "./own-feed.js";
import { PostLog, type PostLogEntry } from "./post-log.js";
import { type ContentStore, IpfsClient } from "./store/index.js";

/** A fetched post and whether its signature checks out. */
export interface ReadResult {
  readonly post: PostEnvelope;
  readonly verified: boolean;
}

export interface PostOptions {
  refs?: readonly string[];
  tags?: readonly string[];
  type?: string;
}

export class FeedAgent {
  readonly config: FeedConfig;
  readonly store: ContentStore;

  private _logger: Logger;
  private _identities: IdentityStore;
  private _follows: FollowEngine;
  private _postLog: PostLog;
  private _identity: LoadedIdentity | null = null;
  private _ownFeed: OwnFeed | null = null;

  /**
   * Create an agent. No I/O happens here; the store defaults to an
   * IpfsClient for the configured API URL.
   */
  constructor(options?: {
    config?: FeedConfig;
    store?: ContentStore;
    logger?: Logger;
  }) {
    this.config = options?.config ?? new FeedConfig();
    this.store = options?.store ?? new IpfsClient(this.config.ipfsApiUrl);
    this._logger = options?.logger ?? makeLogger(this.config.logLevel);
    this._identities = new IdentityStore(this.config.identityPath, {
      logger: this._logger,
    });
    this._follows = new FollowEngine({
      path: this.config.followingPath,
      store: this.store,
      resolveTimeoutMs: this.config.resolveTimeoutMs,
      logger: this._logger,
    });
    this._postLog = new PostLog(this.config.postsPath);
  }

  // -- Identity ------------------------------------------------------------

  /**
   * Create the local identity.
   *
   * @throws {DidFeedError} If one exists and `overwrite` is not set.
   */
  async init(options?: { overwrite?: boolean }): Promise<Identity> {
    await sodiumReady;
    const identity = this._identities.create(options);
    this._identity = identity;
    this._ownFeed = null;
    return identity;
  }

  /** The local DID, or null before init. */
  async whoami(): Promise<string | null> {
    await sodiumReady;
    return this._identities.load()?.did ?? null;
  }

  /** The IPNS name this identity publishes its feed under. */
  async feedName(): Promise<string> {
    return didToName((await this._requireIdentity()).did);
  }

  /** The IPNS name any DID publishes its feed under. */
  nameFor(did: string): string {
    return didToName(did);
  }

  // -- Posting -------------------------------------------------------------

  /**
   * Sign, store and pin a post, then add it to the own feed.
   *
   * Store failures while adding the post propagate. Republishing the feed
   * index happens in the background.
   *
   * @returns The post's CID.
   */
  async post(content: string, options?: PostOptions): Promise<string> {
    const identity = await this._requireIdentity();
    const envelope = signEnvelope(
      createPost(identity.did, content, options),
      identity.keypair
    );
    const cid = await this.store.put(serializeEnvelope(envelope));
    try {
      await this.store.pin(cid);
    } catch (err) {
      if (!(err instanceof DidFeedError)) throw err;
      this._logger.warn({ cid, err: err.message }, "pin failed");
    }
    this._getOwnFeed(identity).publish(cid);
    this._postLog.append(cid, content, options);
    return cid;
  }

  /** Post with `refs = [cid]`. */
  async reply(
    cid: string,
    content: string,
    options?: { tags?: readonly string[] }
  ): Promise<string> {
    return this.post(content, { refs: [cid], tags: options?.tags });
  }

  /**
   * Fetch a post and check its signature.
   *
   * @throws {NotFoundError} If the CID cannot be fetched.
   * @throws {StoreTimeoutError} If the fetch exceeds the resolve timeout.
   * @throws {FormatError} If the content is not an envelope.
   */
  async read(cid: string): Promise<ReadResult> {
    await sodiumReady;
    const post = parseEnvelope(await this.store.get(cid, this.config.resolveTimeoutMs));
    return { post, verified: verifyEnvelope(post) };
  }

  /** The own feed index as last written locally. */
  async ownFeed(): Promise<FeedIndex> {
    return this._getOwnFeed(await this._requireIdentity()).load();
  }

  /** Wait for the latest background feed publication, if any. */
  async pendingPublish(): Promise<void> {
    await this._ownFeed?.pending();
  }

  /** Locally recorded posts, newest first. */
  posts(limit?: number): PostLogEntry[] {
    return this._postLog.recent(limit);
  }

  // -- Following -----------------------------------------------------------

  follow(did: string, alias?: string): FollowResult {
    return this._follows.follow(did, alias);
  }

  unfollow(did: string): UnfollowResult {
    return this._follows.unfollow(did);
  }

  following(): FollowEntry[] {
    return this._follows.list();
  }

  async poll(): Promise<PollReport> {
    await sodiumReady;
    return this._follows.poll();
  }

  /**
   * Resolve a DID's current feed index in the foreground.
   *
   * @throws {FormatError} If the DID or the fetched document is malformed.
   * @throws {StoreTimeoutError} If name resolution times out.
   * @throws {UnresolvedNameError} If the DID has never published.
   */
  async resolve(did: string): Promise<FeedIndex> {
    const cid = await this.store.resolveName(
      didToName(did),
      this.config.resolveTimeoutMs
    );
    return parseFeedIndex(await this.store.getJson(cid, this.config.resolveTimeoutMs));
  }

  // -- Internal ------------------------------------------------------------

  private async _requireIdentity(): Promise<LoadedIdentity> {
    await sodiumReady;
    if (this._identity === null) {
      this._identity = this._identities.require();
    }
    return this._identity;
  }

  private _getOwnFeed(identity: LoadedIdentity): OwnFeed {
    if (this._ownFeed === null) {
      this._ownFeed = new OwnFeed({
        path: this.config.feedPath,
        store: this.store,
        identity,
        keyName: this.config.keyName,
        logger: this._logger,
      });
    }
    return this._ownFeed;
  }
}
