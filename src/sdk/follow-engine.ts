/**
 * Followed identities and the poll/ingest cycle.
 *
 * following.json holds one entry per followed DID together with the CIDs
 * seen in its feed at the last successful poll. poll() resolves every
 * followed DID's IPNS name, diffs the published FeedIndex against that set,
 * fetches only new posts and keeps those that are signed by the followed
 * DID itself.
 */

import { z } from "zod";

import {
  DidFeedError,
  type PostEnvelope,
  type SignedPostEnvelope,
  decodeDid,
  didToName,
  feedCids,
  parseEnvelope,
  parseFeedIndex,
  petnameFromDid,
  utcTimestamp,
  verifyEnvelope,
} from "../protocol/index.js";
import { readJsonFile, writeJsonFile } from "./json-file.js";
import { makeLogger, type Logger } from "./logger.js";
import type { ContentStore } from "./store/index.js";

const FollowEntrySchema = z.object({
  did: z.string(),
  alias: z.string().optional(),
  // written by older clients
  name: z.string().optional(),
  addedAt: z.string().default(""),
  lastSeenCids: z.array(z.string()).default([]),
});

export interface FollowEntry {
  readonly did: string;
  readonly alias?: string;
  readonly addedAt: string;
  readonly lastSeenCids: readonly string[];
}

export type FollowResult =
  | { status: "followed"; entry: FollowEntry }
  | { status: "already-following"; entry: FollowEntry };

export type UnfollowResult =
  | { status: "unfollowed"; entry: FollowEntry }
  | { status: "not-following" };

export interface IngestedPost {
  readonly cid: string;
  readonly post: SignedPostEnvelope;
}

export interface EntryPollResult {
  readonly did: string;
  readonly label: string;
  readonly status: "updated" | "up-to-date" | "empty" | "failed";
  readonly ingested: readonly IngestedPost[];
  readonly error?: string;
}

export interface PollReport {
  readonly results: readonly EntryPollResult[];
}

/** Short display label: the alias, or the DID's last 12 characters. */
export function entryLabel(entry: Pick<FollowEntry, "did" | "alias">): string {
  return entry.alias || entry.did.slice(-12);
}

function normalizeEntry(raw: unknown): FollowEntry | null {
  if (typeof raw === "string") {
    return { did: raw, addedAt: "", lastSeenCids: [] };
  }
  const parsed = FollowEntrySchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  const { did, alias, name, addedAt, lastSeenCids } = parsed.data;
  const label = alias ?? name;
  return label !== undefined
    ? { did, alias: label, addedAt, lastSeenCids }
    : { did, addedAt, lastSeenCids };
}

/**
 * One line per followed feed, e.g. `amber-owl: 2 new post(s)`.
 */
export function summarize(report: PollReport): string {
  if (report.results.length === 0) {
    return "Not following anyone.";
  }
  return report.results
    .map((r) => {
      switch (r.status) {
        case "updated":
          return `${r.label}: ${r.ingested.length} new post(s)`;
        case "up-to-date":
          return `${r.label}: up to date`;
        case "empty":
          return `${r.label}: empty feed`;
        case "failed":
          return `${r.label}: failed (${r.error ?? "unknown error"})`;
      }
    })
    .join("\n");
}

export class FollowEngine {
  private _path: string;
  private _store: ContentStore;
  private _resolveTimeoutMs: number;
  private _logger: Logger;

  constructor(options: {
    path: string;
    store: ContentStore;
    resolveTimeoutMs: number;
    logger?: Logger;
  }) {
    this._path = options.path;
    this._store = options.store;
    this._resolveTimeoutMs = options.resolveTimeoutMs;
    this._logger = options.logger ?? makeLogger();
  }

  /**
   * The follow list. Legacy bare-DID entries are normalised, unreadable
   * entries dropped, and only the first entry per DID kept.
   */
  list(): FollowEntry[] {
    const raw = readJsonFile(this._path, z.array(z.unknown()), []);
    const seen = new Set<string>();
    const entries: FollowEntry[] = [];
    for (const item of raw) {
      const entry = normalizeEntry(item);
      if (entry !== null && !seen.has(entry.did)) {
        seen.add(entry.did);
        entries.push(entry);
      }
    }
    return entries;
  }

  /**
   * Start following a DID.
   *
   * @throws {FormatError} If `did` is not a well-formed did:key.
   */
  follow(did: string, alias?: string): FollowResult {
    decodeDid(did);
    const entries = this.list();
    const existing = entries.find((e) => e.did === did);
    if (existing !== undefined) {
      return { status: "already-following", entry: existing };
    }
    const entry: FollowEntry = {
      did,
      alias: alias ?? petnameFromDid(did),
      addedAt: utcTimestamp(),
      lastSeenCids: [],
    };
    this._save([...entries, entry]);
    return { status: "followed", entry };
  }

  unfollow(did: string): UnfollowResult {
    const entries = this.list();
    const entry = entries.find((e) => e.did === did);
    if (entry === undefined) {
      return { status: "not-following" };
    }
    this._save(entries.filter((e) => e.did !== did));
    return { status: "unfollowed", entry };
  }

  /**
   * Check every followed feed once.
   *
   * Entries are polled concurrently, each from its own pre-poll state; a
   * failing entry is reported and leaves its lastSeenCids untouched. Every
   * store call carries the resolve timeout, so no entry stalls the rest. The
   * follow list is re-read before saving so that entries added or removed
   * meanwhile survive.
   */
  async poll(): Promise<PollReport> {
    const outcomes = await Promise.all(this.list().map((e) => this._pollEntry(e)));

    const updates = new Map<string, string[]>();
    for (const o of outcomes) {
      if (o.lastSeenCids !== null) updates.set(o.result.did, o.lastSeenCids);
    }
    const merged = this.list().map((e) => {
      const seen = updates.get(e.did);
      return seen === undefined ? e : { ...e, lastSeenCids: seen };
    });
    this._save(merged);

    return { results: outcomes.map((o) => o.result) };
  }

  // -- Internal -------------------------------------------------------------

  private async _pollEntry(
    entry: FollowEntry
  ): Promise<{ result: EntryPollResult; lastSeenCids: string[] | null }> {
    const label = entryLabel(entry);
    try {
      const feedCid = await this._store.resolveName(
        didToName(entry.did),
        this._resolveTimeoutMs
      );
      const index = parseFeedIndex(await this._store.getJson(feedCid, this._resolveTimeoutMs));
      const cids = [...new Set(feedCids(index))];

      if (cids.length === 0) {
        return {
          result: { did: entry.did, label, status: "empty", ingested: [] },
          lastSeenCids: [],
        };
      }

      const known = new Set(entry.lastSeenCids);
      const ingested: IngestedPost[] = [];
      for (const cid of cids.filter((c) => !known.has(c))) {
        const post = await this._fetchVerified(cid, entry.did);
        if (post !== null) ingested.push({ cid, post });
      }

      return {
        result: {
          did: entry.did,
          label,
          status: ingested.length > 0 ? "updated" : "up-to-date",
          ingested,
        },
        // Replaced, not merged: CIDs that fell out of the author's window are forgotten.
        lastSeenCids: cids,
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this._logger.warn({ did: entry.did, err: message }, "feed poll failed");
      return {
        result: { did: entry.did, label, status: "failed", ingested: [], error: message },
        lastSeenCids: null,
      };
    }
  }

  /** Fetch a post; null unless it parses, names `did` as author and verifies. */
  private async _fetchVerified(
    cid: string,
    did: string
  ): Promise<SignedPostEnvelope | null> {
    let bytes: Uint8Array;
    try {
      bytes = await this._store.get(cid, this._resolveTimeoutMs);
    } catch (err) {
      if (!(err instanceof DidFeedError)) throw err;
      this._logger.debug({ cid, err: err.message }, "post fetch failed");
      return null;
    }

    let post: PostEnvelope;
    try {
      post = parseEnvelope(bytes);
    } catch (err) {
      if (!(err instanceof DidFeedError)) throw err;
      this._logger.debug({ cid, err: err.message }, "post is not an envelope");
      return null;
    }

    const { signature } = post;
    if (post.author !== did || signature === undefined || !verifyEnvelope(post)) {
      this._logger.debug({ cid, author: post.author }, "post discarded: author or signature mismatch");
      return null;
    }
    return { ...post, signature };
  }

  private _save(entries: readonly FollowEntry[]): void {
    writeJsonFile(this._path, entries);
  }
}
