/**
 * Parsing and building Onshape document, element and folder URLs.
 * Any host is accepted, so enterprise domains work.
 */

import { ConfigurationError, type RemoteAddress } from "@cadsync/core";

export type OnshapeUrlType = "document" | "element" | "folder";

export interface ParsedOnshapeUrl {
  baseUrl: string;
  type: OnshapeUrlType;
  documentId?: string;
  workspaceId?: string;
  elementId?: string;
  folderId?: string;
}

const ID = "([a-zA-Z0-9_-]+)";
const FOLDER_PATH = new RegExp(`/documents/folder/${ID}`);
const DOCUMENT_PATH = new RegExp(`/documents/(?:d/)?${ID}`);
const WORKSPACE_PATH = new RegExp(`/w/${ID}`);
const ELEMENT_PATH = new RegExp(`/e/${ID}`);

/**
 * @throws ConfigurationError when the URL is not an Onshape document or folder URL
 */
export function parseOnshapeUrl(url: string): ParsedOnshapeUrl {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new ConfigurationError(`Invalid URL format: ${url}`, error);
  }
  const baseUrl = `${parsed.protocol}//${parsed.host}`;
  const pathname = parsed.pathname;

  const folder = FOLDER_PATH.exec(pathname);
  if (folder) {
    return { baseUrl, type: "folder", folderId: folder[1] };
  }

  const document = DOCUMENT_PATH.exec(pathname);
  if (document) {
    const workspace = WORKSPACE_PATH.exec(pathname);
    const element = ELEMENT_PATH.exec(pathname);
    return {
      baseUrl,
      type: element ? "element" : "document",
      documentId: document[1],
      workspaceId: workspace?.[1],
      elementId: element?.[1],
    };
  }

  throw new ConfigurationError(`Unable to parse Onshape URL: ${url}`);
}

export interface OnshapeUrlParts {
  documentId?: string;
  workspaceId?: string;
  elementId?: string;
  folderId?: string;
}

/**
 * @throws ConfigurationError when neither a folder nor a document id is given
 */
export function buildOnshapeUrl(base: string, parts: OnshapeUrlParts): string {
  const root = base.replace(/\/+$/, "");
  if (parts.folderId) {
    return `${root}/documents/folder/${parts.folderId}`;
  }
  if (parts.documentId) {
    let url = `${root}/documents/d/${parts.documentId}`;
    if (parts.workspaceId) {
      url += `/w/${parts.workspaceId}`;
      if (parts.elementId) {
        url += `/e/${parts.elementId}`;
      }
    }
    return url;
  }
  throw new ConfigurationError("Must provide either a folder id or a document id");
}

/**
 * Canonical form of a URL: query, fragment and unknown path parts dropped.
 */
export function normalizeOnshapeUrl(url: string): string {
  const parsed = parseOnshapeUrl(url);
  return buildOnshapeUrl(parsed.baseUrl, parsed);
}

/**
 * Remote address of a reference or project URL. Element URLs address their document.
 */
export function toRemoteAddress(url: string): RemoteAddress {
  const parsed = parseOnshapeUrl(url);
  if (parsed.type === "folder" && parsed.folderId) {
    return { kind: "folder", folderId: parsed.folderId };
  }
  if (parsed.documentId) {
    return { kind: "document", documentId: parsed.documentId, workspaceId: parsed.workspaceId };
  }
  throw new ConfigurationError(`URL does not name a document or folder: ${url}`);
}
