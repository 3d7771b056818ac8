/**
 * @cadsync/core - Sync state, conflict detection and the pull/push engine
 *
 * This package provides:
 * - Type definitions and contracts (RemoteDocumentStore, SyncStateStore, targets, outcomes)
 * - ConflictDetector functions and the SyncEngine
 * - Reference and project managers with read-only enforcement
 *
 * Core never imports a concrete store; the CLI wires everything together at runtime.
 */

export type {
  VersionToken,
  EntryKind,
  ContainerEntry,
  ElementInfo,
  ElementContent,
  RemoteDocumentStore,
  TrackedFileState,
  ConflictKind,
  ConflictReport,
  SyncOperation,
  SyncOutcome,
  SyncOptions,
  FolderTarget,
  DocumentTarget,
  SyncTarget,
  DocumentEntry,
  RemoteAddress,
  ReferenceConfig,
  ProjectConfig,
  DocumentCacheEntry,
  PolicySettings,
  SettingsRepository,
} from "./types.js";

export {
  TransportError,
  ConfigurationError,
  PolicyError,
  describeError,
} from "./errors.js";

export { hashContent, hashFile } from "./hasher.js";
export { isNotFound, pathExists, readTextIfExists } from "./files.js";
export {
  sanitizeFilename,
  normalizeStatePath,
  isExcluded,
  isWithin,
  joinRemotePath,
} from "./paths.js";
export { detectPullConflict, detectPushConflict, isBlocking } from "./conflict-detector.js";

export {
  SYNC_STATE_FILE,
  SYNC_STATE_VERSION,
  encodeSyncState,
  decodeSyncState,
  summarizeSyncState,
  isObject,
  type SyncStateStore,
  type SyncStateFile,
  type TrackedFileStateRaw,
  type SyncStatusSummary,
} from "./sync-state.js";

export {
  METADATA_FILE,
  encodeDocumentMetadata,
  decodeDocumentMetadata,
  loadDocumentMetadata,
  saveDocumentMetadata,
  findDocumentDirs,
  type DocumentMetadata,
  type DocumentMetadataRaw,
} from "./metadata.js";

export {
  DEFAULT_MAX_DEPTH,
  walkContainers,
  listDocuments,
  type ContainerVisit,
  type WalkOptions,
} from "./traversal.js";

export {
  NullReporter,
  CollectingReporter,
  type SyncEvent,
  type SyncReporter,
} from "./reporter.js";

export {
  summarizeOutcomes,
  exitCodeFor,
  transferredAny,
  type OutcomeSummary,
} from "./summary.js";

export {
  SyncEngine,
  DEFAULT_SETTINGS,
  formatBackupTimestamp,
  resolveElementId,
  type SyncSettings,
  type EngineConfig,
} from "./engine.js";

export { assertPushAllowed, targetForAddress, type ManagerContext } from "./policy.js";
export {
  ReferenceManager,
  type AddReferenceInput,
  type ReferenceUpdateResult,
  type UpdateReferencesOptions,
} from "./references.js";
export {
  ProjectManager,
  type AddProjectInput,
  type FileStatus,
  type FileStatusKind,
  type ProjectStatus,
} from "./projects.js";
