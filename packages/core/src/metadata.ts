/**
 * Sidecar metadata written into every synced document directory.
 * Push relies on it to map local file names to remote element ids.
 */

import type { Dirent } from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import { ConfigurationError, describeError } from "./errors.js";
import { isNotFound, readTextIfExists } from "./files.js";
import { isObject } from "./sync-state.js";

export const METADATA_FILE = ".document.json";

export interface DocumentMetadata {
  documentId: string;
  workspaceId: string;
  documentName: string;
  folderPath: string;
  url: string;
  lastSync: string;
  /** Element name to element id */
  elements: { [elementName: string]: string };
}

/**
 * The sidecar as written to disk.
 */
export interface DocumentMetadataRaw {
  document_id: string;
  workspace_id: string;
  document_name: string;
  folder_path: string;
  url: string;
  last_sync: string;
  feature_studios: { [elementName: string]: string };
}

export function encodeDocumentMetadata(metadata: DocumentMetadata): DocumentMetadataRaw {
  return {
    document_id: metadata.documentId,
    workspace_id: metadata.workspaceId,
    document_name: metadata.documentName,
    folder_path: metadata.folderPath,
    url: metadata.url,
    last_sync: metadata.lastSync,
    feature_studios: { ...metadata.elements },
  };
}

/**
 * @throws ConfigurationError when the ids are missing or a field has the wrong type
 */
export function decodeDocumentMetadata(raw: unknown): DocumentMetadata {
  if (!isObject(raw)) {
    throw new ConfigurationError("Document metadata must be a JSON object");
  }
  const documentId = raw.document_id;
  const workspaceId = raw.workspace_id;
  if (typeof documentId !== "string" || documentId === "") {
    throw new ConfigurationError("Document metadata is missing 'document_id'");
  }
  if (typeof workspaceId !== "string" || workspaceId === "") {
    throw new ConfigurationError("Document metadata is missing 'workspace_id'");
  }

  const elements: DocumentMetadata["elements"] = {};
  const rawElements = raw.feature_studios ?? {};
  if (!isObject(rawElements)) {
    throw new ConfigurationError("Document metadata 'feature_studios' must be an object");
  }
  for (const [name, id] of Object.entries(rawElements)) {
    if (typeof id !== "string") {
      throw new ConfigurationError(`Element id for '${name}' must be a string`);
    }
    elements[name] = id;
  }

  return {
    documentId,
    workspaceId,
    documentName: optionalString(raw.document_name),
    folderPath: optionalString(raw.folder_path),
    url: optionalString(raw.url),
    lastSync: optionalString(raw.last_sync),
    elements,
  };
}

/**
 * Read the sidecar of a document directory.
 * @returns null when the directory has no sidecar
 * @throws ConfigurationError when the sidecar cannot be parsed
 */
export async function loadDocumentMetadata(dir: string): Promise<DocumentMetadata | null> {
  const file = path.join(dir, METADATA_FILE);
  const content = await readTextIfExists(file);
  if (content === undefined) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid metadata file ${file}: ${describeError(error)}`, error);
  }
  try {
    return decodeDocumentMetadata(parsed);
  } catch (error) {
    throw new ConfigurationError(`Invalid metadata file ${file}: ${describeError(error)}`, error);
  }
}

export async function saveDocumentMetadata(dir: string, metadata: DocumentMetadata): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
  const body = JSON.stringify(encodeDocumentMetadata(metadata), null, 2);
  await fs.writeFile(path.join(dir, METADATA_FILE), `${body}\n`, "utf-8");
}

/**
 * All directories at or below `root` that hold a sidecar, sorted.
 * A missing root yields an empty list.
 */
export async function findDocumentDirs(root: string): Promise<string[]> {
  const found: string[] = [];

  async function visit(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw error;
    }
    if (entries.some((entry) => entry.isFile() && entry.name === METADATA_FILE)) {
      found.push(dir);
    }
    for (const entry of entries) {
      if (entry.isDirectory() && !entry.name.startsWith(".")) {
        await visit(path.join(dir, entry.name));
      }
    }
  }

  await visit(root);
  return found.sort();
}

function optionalString(value: unknown): string {
  return typeof value === "string" ? value : "";
}
