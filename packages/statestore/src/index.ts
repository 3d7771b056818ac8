/**
 * @cadsync/statestore - SyncStateStore implementations
 */

export { InMemorySyncStateStore } from "./in-memory-sync-state-store.js";
export { JsonFileSyncStateStore } from "./json-file-sync-state-store.js";
