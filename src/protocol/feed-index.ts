/**
 * FeedIndex document: an author's capped, newest-first list of post CIDs.
 */

import { z } from "zod";

import { FormatError } from "./errors.js";
import { MAX_FEED_ENTRIES, type FeedEntry, type FeedIndex } from "./types.js";

export const FeedEntrySchema = z.object({
  cid: z.string().min(1),
  timestamp: z.string(),
});

export const FeedIndexSchema = z.object({
  author: z.string(),
  posts: z.array(FeedEntrySchema),
});

/**
 * Return a new index with `entry` prepended and the list truncated to
 * MAX_FEED_ENTRIES. Older entries are dropped, not archived.
 */
export function prependEntry(index: FeedIndex, entry: FeedEntry): FeedIndex {
  return {
    author: index.author,
    posts: [entry, ...index.posts].slice(0, MAX_FEED_ENTRIES),
  };
}

/** CIDs of an index in order. */
export function feedCids(index: FeedIndex): string[] {
  return index.posts.map((p) => p.cid);
}

/**
 * Validate a decoded JSON value as a FeedIndex.
 *
 * @throws {FormatError} If the value is not index-shaped.
 */
export function parseFeedIndex(value: unknown): FeedIndex {
  const result = FeedIndexSchema.safeParse(value);
  if (!result.success) {
    throw new FormatError(
      `Invalid feed index: ${result.error.issues[0]?.message ?? "unknown"}`
    );
  }
  return result.data;
}
