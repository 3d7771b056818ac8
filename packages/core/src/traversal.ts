/**
 * Lazy enumeration of remote hierarchies.
 *
 * Folder and document targets share one capability, `listDocuments`, so the
 * engine has a single code path for both.
 */

import * as path from "path";
import { isExcluded, joinRemotePath, sanitizeFilename } from "./paths.js";
import type { ContainerEntry, DocumentEntry, RemoteDocumentStore, SyncTarget } from "./types.js";

export const DEFAULT_MAX_DEPTH = 10;

/**
 * One visited container and the documents directly inside it.
 */
export interface ContainerVisit {
  /** "/"-separated folder names from the walk root, "" for the root itself */
  relativePath: string;
  containerId: string;
  depth: number;
  documents: ContainerEntry[];
}

export interface WalkOptions {
  recursive: boolean;
  /** Deepest level visited; the root is level 0 */
  maxDepth?: number;
  /** Sub-folders matching these globs are not entered */
  exclude?: readonly string[];
}

/**
 * Depth-first walk of a container tree, root first. Each container is listed
 * only when the consumer asks for the next visit; calling again restarts.
 */
export async function* walkContainers(
  store: RemoteDocumentStore,
  rootId: string,
  options: WalkOptions
): AsyncGenerator<ContainerVisit> {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const exclude = options.exclude ?? [];
  const pending: { containerId: string; relativePath: string; depth: number }[] = [
    { containerId: rootId, relativePath: "", depth: 0 },
  ];

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) {
      break;
    }
    const entries = await store.listContainerEntries(next.containerId);
    yield {
      relativePath: next.relativePath,
      containerId: next.containerId,
      depth: next.depth,
      documents: entries.filter((entry) => entry.kind === "document"),
    };

    if (!options.recursive || next.depth + 1 > maxDepth) {
      continue;
    }
    const folders = entries
      .filter((entry) => entry.kind === "folder")
      .map((entry) => ({
        containerId: entry.id,
        relativePath: joinRemotePath(next.relativePath, entry.name),
        depth: next.depth + 1,
      }))
      .filter((folder) => !isExcluded(folder.relativePath, exclude));
    // reversed so the first folder is popped first
    pending.push(...folders.reverse());
  }
}

/**
 * Documents a target covers, in traversal order. Excluded documents are
 * yielded with `excluded: true` so they can be reported.
 */
export async function* listDocuments(
  store: RemoteDocumentStore,
  target: SyncTarget,
  defaultMaxDepth: number = DEFAULT_MAX_DEPTH
): AsyncGenerator<DocumentEntry> {
  if (target.kind === "document") {
    yield {
      documentId: target.documentId,
      name: target.name,
      folderPath: "",
      localDir: target.localPath,
      workspaceId: target.workspaceId,
      excluded: false,
    };
    return;
  }

  const visits = walkContainers(store, target.folderId, {
    recursive: target.recursive,
    maxDepth: target.maxDepth ?? defaultMaxDepth,
    exclude: target.exclude,
  });
  for await (const visit of visits) {
    const localParent = path.join(
      target.localPath,
      ...visit.relativePath
        .split("/")
        .filter((segment) => segment.length > 0)
        .map(sanitizeFilename)
    );
    for (const document of visit.documents) {
      yield {
        documentId: document.id,
        name: document.name,
        folderPath: visit.relativePath,
        localDir: path.join(localParent, sanitizeFilename(document.name)),
        excluded: isExcluded(joinRemotePath(visit.relativePath, document.name), target.exclude),
      };
    }
  }
}
