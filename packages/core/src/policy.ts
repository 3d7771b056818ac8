/**
 * Read-only enforcement for reference roots, and the mapping from a
 * configured remote address to a sync target.
 */

import * as path from "path";
import { PolicyError } from "./errors.js";
import { isWithin } from "./paths.js";
import type { SyncEngine } from "./engine.js";
import type {
  PolicySettings,
  ReferenceConfig,
  RemoteAddress,
  RemoteDocumentStore,
  SettingsRepository,
  SyncTarget,
} from "./types.js";
import type { SyncStateStore } from "./sync-state.js";

/**
 * Everything a reference or project manager works with.
 */
export interface ManagerContext {
  baseDir: string;
  settings: PolicySettings;
  repository: SettingsRepository;
  engine: SyncEngine;
  store: RemoteDocumentStore;
  state: SyncStateStore;
  clock?: () => Date;
}

/**
 * Fail when `targetPath` is a reference root or lies inside one.
 * @throws PolicyError naming the reference
 */
export function assertPushAllowed(
  targetPath: string,
  references: readonly ReferenceConfig[],
  baseDir: string
): void {
  const resolved = path.resolve(baseDir, targetPath);
  for (const reference of references) {
    if (isWithin(resolved, path.resolve(baseDir, reference.localPath))) {
      throw new PolicyError(
        `Cannot push to '${targetPath}': it is inside read-only reference '${reference.name}' (${reference.localPath})`,
        reference.name
      );
    }
  }
}

export function targetForAddress(
  name: string,
  address: RemoteAddress,
  localPath: string,
  recursive: boolean
): SyncTarget {
  if (address.kind === "folder") {
    return { kind: "folder", name, folderId: address.folderId, localPath, recursive, exclude: [] };
  }
  return {
    kind: "document",
    name,
    documentId: address.documentId,
    workspaceId: address.workspaceId,
    localPath,
    exclude: [],
  };
}
