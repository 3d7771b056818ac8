/**
 * Core type definitions and contracts for cadsync.
 * These interfaces define the protocol that document stores and state stores must implement.
 */

/**
 * Opaque identity of a point-in-time state of a sub-container.
 * Compared for equality only, never ordered.
 */
export type VersionToken = string;

/**
 * Kind of an entry inside a remote container.
 */
export type EntryKind = "document" | "folder";

/**
 * One child of a remote container.
 */
export interface ContainerEntry {
  id: string;
  name: string;
  kind: EntryKind;
}

/**
 * An individually addressable source artifact inside a document.
 */
export interface ElementInfo {
  id: string;
  name: string;
}

/**
 * Element content together with the version token it was read at.
 */
export interface ElementContent {
  content: string;
  versionToken: VersionToken;
}

/**
 * Remote, version-tracked document store (the CAD platform).
 * The engine receives one instance; it never builds its own.
 */
export interface RemoteDocumentStore {
  /**
   * List documents and sub-folders of a container.
   */
  listContainerEntries(containerId: string): Promise<ContainerEntry[]>;

  /**
   * List elements of a document's sub-container, optionally filtered by kind.
   */
  listElements(
    documentId: string,
    subContainerId: string,
    kindFilter?: string
  ): Promise<ElementInfo[]>;

  /**
   * Fetch element content and the current version token.
   */
  getElementContent(
    documentId: string,
    subContainerId: string,
    elementId: string
  ): Promise<ElementContent>;

  /**
   * Replace element content.
   * @returns The version token after the submission
   */
  submitElementContent(
    documentId: string,
    subContainerId: string,
    elementId: string,
    content: string
  ): Promise<VersionToken>;

  /**
   * Lightweight lookup of the current version token, no content fetch.
   */
  getVersionToken(documentId: string, subContainerId: string): Promise<VersionToken>;

  /**
   * Resolve the sub-container a document is edited in by default.
   */
  resolveDefaultSubContainer(documentId: string): Promise<string>;
}

/**
 * What was true of a file at its last successful transfer.
 */
export interface TrackedFileState {
  localHash: string;
  remoteVersion: VersionToken;
  /** ISO-8601 timestamp */
  lastSync: string;
  elementId: string;
  documentId: string;
  /** Sub-container the file was transferred through */
  workspaceId: string;
}

export type ConflictKind = "none" | "both_changed" | "local_deleted" | "remote_deleted";

/**
 * Classification of one file before a transfer.
 */
export interface ConflictReport {
  filepath: string;
  kind: ConflictKind;
  localHash?: string;
  previousHash?: string;
  remoteVersion?: VersionToken;
  previousVersion?: VersionToken;
  message: string;
}

export type SyncOperation = "pull" | "push";

/**
 * Result of one file (or of a whole document or target when it failed early).
 */
export interface SyncOutcome {
  filepath: string;
  operation: SyncOperation;
  success: boolean;
  conflict: boolean;
  skipped: boolean;
  message: string;
}

/**
 * Flags accepted by pull and push.
 */
export interface SyncOptions {
  /** Enumerate and report, but fetch, write and submit nothing */
  dryRun?: boolean;
  /** Proceed past blocking conflicts */
  force?: boolean;
}

/**
 * A remote folder synced into a local directory tree.
 */
export interface FolderTarget {
  kind: "folder";
  name: string;
  folderId: string;
  localPath: string;
  recursive: boolean;
  exclude: string[];
  maxDepth?: number;
}

/**
 * A single remote document synced into one local directory.
 */
export interface DocumentTarget {
  kind: "document";
  name: string;
  documentId: string;
  workspaceId?: string;
  localPath: string;
  exclude: string[];
}

export type SyncTarget = FolderTarget | DocumentTarget;

/**
 * A document found while enumerating a target.
 */
export interface DocumentEntry {
  documentId: string;
  name: string;
  /** Remote hierarchy path of the containing folder, "/"-separated, "" at the root */
  folderPath: string;
  /** Local directory the document's elements are written to */
  localDir: string;
  workspaceId?: string;
  excluded: boolean;
}

/**
 * Remote address a reference or project URL resolves to.
 */
export type RemoteAddress =
  | { kind: "folder"; folderId: string }
  | { kind: "document"; documentId: string; workspaceId?: string };

/**
 * A read-only synced root, refreshed only by pull.
 */
export interface ReferenceConfig {
  name: string;
  url: string;
  localPath: string;
  address: RemoteAddress;
  readOnly: true;
  autoUpdate: boolean;
  recursive: boolean;
  lastSync?: string;
}

/**
 * A bidirectional synced root.
 */
export interface ProjectConfig {
  name: string;
  description: string;
  url: string;
  workingDirectory: string;
  address: RemoteAddress;
  /** Names of references this project depends on */
  references: string[];
  recursive: boolean;
  lastPull?: string;
  lastPush?: string;
}

/**
 * Version token cached for a document reference at its last update.
 */
export interface DocumentCacheEntry {
  versionToken: VersionToken;
  lastChecked: string;
}

/**
 * The parts of the settings file the policy layer reads and rewrites.
 */
export interface PolicySettings {
  references: ReferenceConfig[];
  projects: ProjectConfig[];
  documentCache: { [documentId: string]: DocumentCacheEntry };
}

/**
 * Persists policy settings after a manager changed them.
 */
export interface SettingsRepository {
  save(settings: PolicySettings): Promise<void>;
}
