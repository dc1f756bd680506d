/**
 * lrustore library exports
 *
 * The store is a plain in-process data structure; nothing here touches the
 * file system or the user config. Those live with the CLI.
 */

// ============================================================================
// Store
// ============================================================================

export { LRUStore } from "./lru";
export type { EntryInput, LRUStoreJSON, ValueEquality } from "./lru";

// ============================================================================
// Views
// ============================================================================

export { ItemsView, KeysView, ValuesView } from "./views";
export type { ViewSource } from "./views";

// ============================================================================
// Errors
// ============================================================================

export {
  EmptyStoreError,
  InvalidCapacityError,
  KeyNotFoundError,
  LRUStoreError,
  isLRUStoreError,
} from "./errors";
export type { LRUStoreErrorCode } from "./errors";
