/**
 * Local history of posts this identity published (posts.json).
 *
 * Unlike the FeedIndex this list is never truncated and never leaves the
 * machine.
 */

import { z } from "zod";

import { utcTimestamp } from "../protocol/index.js";
import { readJsonFile, writeJsonFile } from "./json-file.js";

const PREVIEW_LENGTH = 50;

const PostLogEntrySchema = z.object({
  cid: z.string(),
  timestamp: z.string(),
  refs: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
  preview: z.string().default(""),
});

const PostLogSchema = z.array(PostLogEntrySchema);

export type PostLogEntry = z.infer<typeof PostLogEntrySchema>;

/** First 50 characters of `content`, with "..." when cut. */
export function previewOf(content: string): string {
  return content.length > PREVIEW_LENGTH
    ? content.slice(0, PREVIEW_LENGTH) + "..."
    : content;
}

export class PostLog {
  private _path: string;

  constructor(path: string) {
    this._path = path;
  }

  /** All entries, oldest first. */
  all(): PostLogEntry[] {
    return readJsonFile(this._path, PostLogSchema, []);
  }

  append(
    cid: string,
    content: string,
    options?: { refs?: readonly string[]; tags?: readonly string[] }
  ): PostLogEntry {
    const entry: PostLogEntry = {
      cid,
      timestamp: utcTimestamp(),
      refs: [...(options?.refs ?? [])],
      tags: [...(options?.tags ?? [])],
      preview: previewOf(content),
    };
    writeJsonFile(this._path, [...this.all(), entry]);
    return entry;
  }

  /** The `limit` most recent entries, newest first. */
  recent(limit = 10): PostLogEntry[] {
    if (limit <= 0) return [];
    return this.all().slice(-limit).reverse();
  }
}
