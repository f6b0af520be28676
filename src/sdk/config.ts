/**
 * SDK configuration.
 *
 * Priority (highest wins): constructor arg > env var > default.
 * DIDFEED_HOME overrides ~/.didfeed (useful for testing / isolation).
 */

import { homedir } from "node:os";
import { join } from "node:path";

import type { LogLevel } from "./logger.js";

const DEFAULT_IPFS_API_URL = "http://127.0.0.1:5001/api/v0";
const DEFAULT_KEY_NAME = "didfeed-identity";
const DEFAULT_RESOLVE_TIMEOUT_MS = 30_000;

const VALID_LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.has(value);
}

export interface FeedConfigOptions {
  homeDir?: string | null;
  ipfsApiUrl?: string | null;
  keyName?: string | null;
  resolveTimeoutMs?: number | null;
  logLevel?: string | null;
}

export class FeedConfig {
  readonly homeDir: string;
  readonly identityPath: string;
  readonly followingPath: string;
  readonly feedPath: string;
  readonly postsPath: string;
  readonly ipfsApiUrl: string;
  readonly keyName: string;
  readonly resolveTimeoutMs: number;
  readonly logLevel: LogLevel;

  constructor(options: FeedConfigOptions = {}) {
    this.homeDir =
      options.homeDir ?? process.env["DIDFEED_HOME"] ?? join(homedir(), ".didfeed");

    this.identityPath = join(this.homeDir, "identity.json");
    this.followingPath = join(this.homeDir, "following.json");
    this.feedPath = join(this.homeDir, "feed.json");
    this.postsPath = join(this.homeDir, "posts.json");

    this.ipfsApiUrl = (
      options.ipfsApiUrl ?? process.env["DIDFEED_IPFS_API"] ?? DEFAULT_IPFS_API_URL
    ).replace(/\/+$/, "");

    this.keyName =
      options.keyName ?? process.env["DIDFEED_KEY_NAME"] ?? DEFAULT_KEY_NAME;

    const rawTimeout =
      options.resolveTimeoutMs ??
      process.env["DIDFEED_RESOLVE_TIMEOUT"] ??
      DEFAULT_RESOLVE_TIMEOUT_MS;
    const timeout = Number(rawTimeout);
    if (!Number.isInteger(timeout) || timeout <= 0) {
      throw new Error(
        `Invalid resolve timeout '${String(rawTimeout)}'. ` +
          `Must be a positive integer number of milliseconds.`
      );
    }
    this.resolveTimeoutMs = timeout;

    const level = options.logLevel ?? process.env["DIDFEED_LOG_LEVEL"] ?? "info";
    if (!isLogLevel(level)) {
      throw new Error(
        `Invalid log level '${level}'. ` +
          `Must be one of: ${JSON.stringify([...VALID_LOG_LEVELS].sort())}`
      );
    }
    this.logLevel = level;
  }
}
