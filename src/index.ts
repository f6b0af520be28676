/**
 * didfeed -- signed, content-addressed agent feeds.
 *
 * Top-level package exports: FeedAgent, its collaborators, protocol.
 */

export * from "./sdk/index.js";
export type {
  FeedEntry,
  FeedIndex,
  Identity,
  PostEnvelope,
  SignedPostEnvelope,
} from "./protocol/index.js";
export * as protocol from "./protocol/index.js";
