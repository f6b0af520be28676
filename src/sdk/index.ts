/**
 * didfeed SDK -- the agent-facing API.
 */

export { FeedAgent, type ReadResult, type PostOptions } from "./agent.js";
export { FeedConfig, type FeedConfigOptions } from "./config.js";
export { makeLogger, type Logger, type LogLevel } from "./logger.js";
export { IdentityStore, type LoadedIdentity } from "./identity-store.js";
export { ContentStore, IpfsClient, type StoreKey } from "./store/index.js";
export { ensureNameKey, seedToPem } from "./keystore.js";
export { OwnFeed } from "./own-feed.js";
export { PostLog, previewOf, type PostLogEntry } from "./post-log.js";
export {
  FollowEngine,
  entryLabel,
  summarize,
  type FollowEntry,
  type FollowResult,
  type UnfollowResult,
  type IngestedPost,
  type EntryPollResult,
  type PollReport,
} from "./follow-engine.js";
export { toolDefinitions, executeTool, type ToolDefinition, type ToolResult } from "./tools.js";
