/**
 * SyncStateStore contract and the codec for the persisted state file.
 */

import { ConfigurationError } from "./errors.js";
import type { TrackedFileState } from "./types.js";

export const SYNC_STATE_FILE = ".sync-state.json";
export const SYNC_STATE_VERSION = "1.0";

/**
 * Durable mapping from normalized relative path to TrackedFileState.
 * Loaded on first access, written wholesale by `save()`. Not safe for
 * concurrent use; callers serialize access.
 */
export interface SyncStateStore {
  get(filePath: string): Promise<TrackedFileState | null>;
  set(filePath: string, state: TrackedFileState): Promise<void>;
  /** Explicit deletion; absence on disk never removes an entry */
  remove(filePath: string): Promise<void>;
  list(): Promise<string[]>;
  save(): Promise<void>;
}

/**
 * One file entry as written to disk.
 */
export interface TrackedFileStateRaw {
  local_hash: string;
  remote_version: string;
  last_sync: string;
  element_id: string;
  document_id: string;
  workspace_id: string;
}

/**
 * The state file as written to disk.
 */
export interface SyncStateFile {
  version: string;
  files: { [filePath: string]: TrackedFileStateRaw };
}

/**
 * Convert the in-memory map to its on-disk shape.
 */
export function encodeSyncState(files: ReadonlyMap<string, TrackedFileState>): SyncStateFile {
  const encoded: SyncStateFile["files"] = {};
  for (const [filePath, state] of files) {
    encoded[filePath] = {
      local_hash: state.localHash,
      remote_version: state.remoteVersion,
      last_sync: state.lastSync,
      element_id: state.elementId,
      document_id: state.documentId,
      workspace_id: state.workspaceId,
    };
  }
  return { version: SYNC_STATE_VERSION, files: encoded };
}

/**
 * Read the on-disk shape. Missing fields decode as empty strings.
 * @throws ConfigurationError if the value is not a state file
 */
export function decodeSyncState(raw: unknown): Map<string, TrackedFileState> {
  if (!isObject(raw)) {
    throw new ConfigurationError("Sync state must be a JSON object");
  }
  const files = raw.files ?? {};
  if (!isObject(files)) {
    throw new ConfigurationError("Sync state 'files' must be an object");
  }

  const decoded = new Map<string, TrackedFileState>();
  for (const [filePath, entry] of Object.entries(files)) {
    if (!isObject(entry)) {
      throw new ConfigurationError(`Sync state entry '${filePath}' must be an object`);
    }
    decoded.set(filePath, {
      localHash: stringField(entry, "local_hash"),
      remoteVersion: stringField(entry, "remote_version"),
      lastSync: stringField(entry, "last_sync"),
      elementId: stringField(entry, "element_id"),
      documentId: stringField(entry, "document_id"),
      workspaceId: stringField(entry, "workspace_id"),
    });
  }
  return decoded;
}

/**
 * Per-file overview used by the `status` command.
 */
export interface SyncStatusSummary {
  trackedFiles: number;
  files: { path: string; lastSync: string; hash: string }[];
}

export async function summarizeSyncState(store: SyncStateStore): Promise<SyncStatusSummary> {
  const paths = (await store.list()).sort();
  const files: SyncStatusSummary["files"] = [];
  for (const filePath of paths) {
    const state = await store.get(filePath);
    if (state) {
      files.push({ path: filePath, lastSync: state.lastSync, hash: `${state.localHash.slice(0, 8)}...` });
    }
  }
  return { trackedFiles: files.length, files };
}

export function isObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(entry: { [key: string]: unknown }, key: string): string {
  const value = entry[key];
  return typeof value === "string" ? value : "";
}
