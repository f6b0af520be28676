/**
 * didfeed content store layer.
 */

export { ContentStore, type StoreKey } from "./base.js";
export { IpfsClient } from "./ipfs.js";
