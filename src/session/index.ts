export { SessionStore, DEFAULT_STATE_FILENAME, DEFAULT_STALE_LOCK_MS, UNKNOWN_HOLDER } from "./store.js";
export type { SessionStoreOptions, InitOptions, SessionSection, UnlockResult, Modification } from "./store.js";
export { FileCache, DEFAULT_DISCOVER_PATTERN, fileIdFor, estimateTokens } from "./cache.js";
export type { RefFilter, DiscoverResult, FetchResult } from "./cache.js";
