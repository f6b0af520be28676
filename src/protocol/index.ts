/**
 * didfeed protocol -- identity, signing, and name derivation.
 *
 * Public API re-exports for the protocol layer. Nothing here performs I/O
 * except loading the petname word lists on first use.
 */

// Types
export {
  MESSAGE_VERSION,
  MAX_FEED_ENTRIES,
  DID_PREFIX,
  ED25519_MULTICODEC,
  KEY_LENGTH,
  SIGNATURE_LENGTH,
  DEFAULT_POST_TYPE,
  type Identity,
  type FeedEntry,
  type FeedIndex,
  b64Encode,
  b64DecodeStrict,
  utcTimestamp,
  concatBytes,
} from "./types.js";

// Errors
export {
  DidFeedError,
  FormatError,
  IdentityNotFoundError,
  StoreError,
  StoreUnavailableError,
  NotFoundError,
  StoreTimeoutError,
  UnresolvedNameError,
} from "./errors.js";

// Crypto
export {
  sodiumReady,
  type Keypair,
  generateKeypair,
  keypairFromSeed,
  canonicalize,
  signBytes,
  verifyBytes,
} from "./crypto.js";

// DID
export {
  base58Encode,
  base58Decode,
  encodeDid,
  decodeDid,
  isValidDid,
} from "./did.js";

// Names
export {
  publicKeyRecord,
  identityMultihash,
  libp2pKeyCid,
  base36Encode,
  publicKeyToName,
  didToName,
} from "./name.js";

// Envelope
export {
  PostEnvelopeSchema,
  type PostEnvelope,
  type SignedPostEnvelope,
  createPost,
  signEnvelope,
  verifyEnvelope,
  serializeEnvelope,
  parseEnvelope,
} from "./envelope.js";

// Feed index
export {
  FeedEntrySchema,
  FeedIndexSchema,
  prependEntry,
  feedCids,
  parseFeedIndex,
} from "./feed-index.js";

// Petnames
export { type WordLists, petnameWords, petnameFromDid } from "./petname.js";
