/**
 * didfeed exception hierarchy.
 *
 * All protocol and store errors inherit from DidFeedError. Signature
 * verification failures are deliberately absent: verification returns a
 * boolean.
 */

/** Base error for all didfeed errors. */
export class DidFeedError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = "DidFeedError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed DID, base-encoded text, multicodec tag, or JSON document. */
export class FormatError extends DidFeedError {
  constructor(message?: string) {
    super(message);
    this.name = "FormatError";
  }
}

/** Raised when an operation needs the local identity and none exists. */
export class IdentityNotFoundError extends DidFeedError {
  constructor(message = "No identity found. Run 'didfeed init' first.") {
    super(message);
    this.name = "IdentityNotFoundError";
  }
}

/** Base error for content store failures. */
export class StoreError extends DidFeedError {
  constructor(message?: string) {
    super(message);
    this.name = "StoreError";
  }
}

/** The store could not be reached or answered with an error status. */
export class StoreUnavailableError extends StoreError {
  constructor(message?: string) {
    super(message);
    this.name = "StoreUnavailableError";
  }
}

/** The requested content is not available locally or remotely. */
export class NotFoundError extends StoreError {
  constructor(message?: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

/** A bounded store operation hit its deadline. */
export class StoreTimeoutError extends StoreError {
  constructor(message?: string) {
    super(message);
    this.name = "StoreTimeoutError";
  }
}

/** A mutable name has no record pointing at content. */
export class UnresolvedNameError extends StoreError {
  constructor(message?: string) {
    super(message);
    this.name = "UnresolvedNameError";
  }
}
