/**
 * CLI helper utilities shared across commands.
 */

import type { PostEnvelope } from "../protocol/index.js";
import { FeedAgent } from "../sdk/agent.js";
import { FeedConfig } from "../sdk/config.js";
import { entryLabel, type FollowEntry } from "../sdk/follow-engine.js";
import { makeLogger } from "../sdk/logger.js";
import type { PostLogEntry } from "../sdk/post-log.js";

/**
 * Build the agent for one CLI invocation. Logs go to stderr, at `warn`
 * unless DIDFEED_LOG_LEVEL says otherwise.
 */
export function createAgent(): FeedAgent {
  try {
    const config = new FeedConfig({
      logLevel: process.env["DIDFEED_LOG_LEVEL"] ?? "warn",
    });
    const logger = makeLogger(config.logLevel, { stderr: true });
    return new FeedAgent({ config, logger });
  } catch (err) {
    cliError(`Error: ${errorMessage(err)}`);
  }
}

/**
 * Exit unless the content store answers.
 */
export async function requireStore(agent: FeedAgent): Promise<void> {
  if (!(await agent.store.isAvailable())) {
    cliError(
      `Error: IPFS daemon not available at ${agent.config.ipfsApiUrl}\n` +
        "Start IPFS with: ipfs daemon"
    );
  }
}

/**
 * Print an error message to stderr and exit with code 1.
 */
export function cliError(msg: string): never {
  process.stderr.write(msg + "\n");
  process.exit(1);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** commander reducer for repeatable options (`-t a -t b`). */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Cut `text` to `max` characters, marking the cut with "...". */
export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) + "..." : text;
}

// ---------------------------------------------------------------------------
// Output formatting
// ---------------------------------------------------------------------------

/** Metadata block followed by the post body, as `didfeed read` prints it. */
export function formatPost(cid: string, post: PostEnvelope, verified: boolean): string {
  const rows: [string, string][] = [
    ["Author:", truncate(post.author, 50)],
    ["Time:", post.timestamp],
    ["CID:", cid],
  ];
  post.refs.forEach((ref, i) => rows.push([`Ref [${i}]:`, ref]));
  if (post.tags !== undefined && post.tags.length > 0) {
    rows.push(["Tags:", post.tags.join(", ")]);
  }
  rows.push(["Status:", verified ? "VERIFIED" : "UNVERIFIED"]);

  const width = Math.max(...rows.map(([label]) => label.length));
  const lines = rows.map(([label, value]) => `${label.padEnd(width)} ${value}`);
  return [...lines, "", post.content].join("\n");
}

/** Followed feeds with their label and the number of posts already seen. */
export function formatFollowing(entries: readonly FollowEntry[]): string {
  if (entries.length === 0) {
    return "Not following anyone yet.\nUse `didfeed follow <did>` to follow someone.";
  }
  const lines = [`${"NAME".padEnd(24)} ${"KNOWN".padStart(5)} DID`];
  for (const entry of entries) {
    const known = String(entry.lastSeenCids.length).padStart(5);
    lines.push(`${entryLabel(entry).padEnd(24)} ${known} ${entry.did}`);
  }
  return lines.join("\n");
}

export function formatPosts(entries: readonly PostLogEntry[]): string {
  if (entries.length === 0) {
    return 'No posts yet.\nUse `didfeed post "message"` to create one.';
  }
  const lines = [`${"TIME".padEnd(19)}  ${"CID".padEnd(23)}  PREVIEW`];
  for (const entry of entries) {
    lines.push(
      `${entry.timestamp.slice(0, 19).padEnd(19)}  ${truncate(entry.cid, 20).padEnd(23)}  ${entry.preview}`
    );
  }
  return lines.join("\n");
}
