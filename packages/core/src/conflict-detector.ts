/**
 * Conflict classification for pull and push.
 *
 * Pure functions of the tracked state, the current local hash and the live
 * version token. `force` is not an input: the report is always produced and
 * the engine decides whether a blocking report stops the transfer.
 */

import type { ConflictReport, TrackedFileState, VersionToken } from "./types.js";

/**
 * Classify a pull of one file.
 * @param currentLocalHash - undefined when the local file does not exist
 */
export function detectPullConflict(
  filepath: string,
  previous: TrackedFileState | null,
  currentLocalHash: string | undefined,
  currentRemoteVersion: VersionToken
): ConflictReport {
  if (!previous) {
    return {
      filepath,
      kind: "none",
      localHash: currentLocalHash,
      remoteVersion: currentRemoteVersion,
      message: "New file, safe to pull",
    };
  }

  const base = {
    filepath,
    localHash: currentLocalHash,
    previousHash: previous.localHash,
    remoteVersion: currentRemoteVersion,
    previousVersion: previous.remoteVersion,
  };
  const remoteChanged = currentRemoteVersion !== previous.remoteVersion;

  if (currentLocalHash === undefined) {
    return remoteChanged
      ? { ...base, kind: "local_deleted", message: "Local file deleted but remote has changes" }
      : {
          ...base,
          kind: "none",
          message: "Local deleted, remote unchanged - safe to skip or restore",
        };
  }

  const localChanged = currentLocalHash !== previous.localHash;

  if (localChanged && remoteChanged) {
    return {
      ...base,
      kind: "both_changed",
      message: "Both local and remote have changes - manual resolution required",
    };
  }
  if (localChanged) {
    return { ...base, kind: "none", message: "Warning: Local changes will be overwritten" };
  }
  if (remoteChanged) {
    return { ...base, kind: "none", message: "Safe to pull" };
  }
  return { ...base, kind: "none", message: "Already in sync" };
}

/**
 * Classify a push of one file. Only the version token matters; local content
 * is never consulted.
 */
export function detectPushConflict(
  filepath: string,
  previous: TrackedFileState | null,
  currentRemoteVersion: VersionToken
): ConflictReport {
  if (!previous) {
    return {
      filepath,
      kind: "none",
      remoteVersion: currentRemoteVersion,
      message: "New file, safe to push",
    };
  }

  const base = {
    filepath,
    previousHash: previous.localHash,
    remoteVersion: currentRemoteVersion,
    previousVersion: previous.remoteVersion,
  };

  if (currentRemoteVersion !== previous.remoteVersion) {
    return {
      ...base,
      kind: "both_changed",
      message: "Remote has changed since last sync - use --force to override",
    };
  }
  return { ...base, kind: "none", message: "Safe to push" };
}

/**
 * Reports that stop a transfer unless it is forced.
 */
export function isBlocking(report: ConflictReport): boolean {
  return report.kind === "both_changed" || report.kind === "local_deleted";
}
