/**
 * OnshapeDocumentStore - RemoteDocumentStore over the Onshape REST API.
 * Folders come from the global tree nodes API, elements are feature studios,
 * version tokens are workspace microversions.
 */

import {
  TransportError,
  isObject,
  type ContainerEntry,
  type ElementContent,
  type ElementInfo,
  type RemoteDocumentStore,
  type VersionToken,
} from "@cadsync/core";
import type { OnshapeClient } from "./client.js";

/**
 * Folder hierarchy as shown by the `tree` command.
 */
export interface FolderTreeNode {
  id: string;
  name: string;
  folders: FolderTreeNode[];
  documents: { id: string; name: string }[];
}

export class OnshapeDocumentStore implements RemoteDocumentStore {
  private readonly client: OnshapeClient;

  constructor(client: OnshapeClient) {
    this.client = client;
  }

  async listContainerEntries(containerId: string): Promise<ContainerEntry[]> {
    const entries: ContainerEntry[] = [];
    let page = await this.client.get(`/globaltreenodes/folder/${containerId}`);
    for (;;) {
      for (const item of arrayField(page, "items")) {
        const kind = entryKind(item);
        if (kind) {
          entries.push({ id: stringField(item, "id"), name: stringField(item, "name"), kind });
        }
      }
      const next = isObject(page) && typeof page.next === "string" ? page.next : "";
      if (!next) {
        return entries;
      }
      page = await this.client.getUrl(next);
    }
  }

  async listElements(
    documentId: string,
    subContainerId: string,
    kindFilter?: string
  ): Promise<ElementInfo[]> {
    const response = await this.client.get(
      `/documents/d/${documentId}/w/${subContainerId}/elements`,
      kindFilter ? { elementType: kindFilter } : undefined
    );
    if (!Array.isArray(response)) {
      throw new TransportError(`Unexpected element list for document ${documentId}`);
    }
    return response
      .filter(isObject)
      .map((element) => ({ id: stringField(element, "id"), name: stringField(element, "name") }));
  }

  async getElementContent(
    documentId: string,
    subContainerId: string,
    elementId: string
  ): Promise<ElementContent> {
    const response = await this.client.get(this.contentsPath(documentId, subContainerId, elementId));
    return {
      content: stringField(response, "contents"),
      versionToken: microversionOf(response, documentId),
    };
  }

  async submitElementContent(
    documentId: string,
    subContainerId: string,
    elementId: string,
    content: string
  ): Promise<VersionToken> {
    const response = await this.client.post(this.contentsPath(documentId, subContainerId, elementId), {
      contents: content,
    });
    return microversionOf(response, documentId);
  }

  async getVersionToken(documentId: string, subContainerId: string): Promise<VersionToken> {
    const response = await this.client.get(`/documents/d/${documentId}/w/${subContainerId}`);
    return microversionOf(response, documentId);
  }

  async resolveDefaultSubContainer(documentId: string): Promise<string> {
    const response = await this.client.get(`/documents/d/${documentId}`);
    const workspace = isObject(response) ? response.defaultWorkspace : undefined;
    return stringField(workspace, "id");
  }

  /**
   * True when the session endpoint answers with a user.
   * @throws TransportError on network or authentication failure
   */
  async verifyConnection(): Promise<boolean> {
    const response = await this.client.get("/users/sessioninfo");
    return isObject(response) && ("id" in response || "email" in response);
  }

  /**
   * Folder hierarchy down to `maxDepth` levels below the root.
   */
  async getFolderTree(folderId: string, maxDepth: number, depth: number = 0): Promise<FolderTreeNode> {
    const node: FolderTreeNode = { id: folderId, name: "", folders: [], documents: [] };
    for (const entry of await this.listContainerEntries(folderId)) {
      if (entry.kind === "document") {
        node.documents.push({ id: entry.id, name: entry.name });
      } else if (depth < maxDepth) {
        const child = await this.getFolderTree(entry.id, maxDepth, depth + 1);
        node.folders.push({ ...child, name: entry.name });
      }
    }
    return node;
  }

  private contentsPath(documentId: string, subContainerId: string, elementId: string): string {
    return `/featurestudios/d/${documentId}/w/${subContainerId}/e/${elementId}/featurestudiocontents`;
  }
}

function entryKind(item: { [key: string]: unknown }): ContainerEntry["kind"] | undefined {
  if (item.resourceType === "folder") {
    return "folder";
  }
  if (item.resourceType === "document" || item.jsonType === "document-summary") {
    return "document";
  }
  return undefined;
}

function microversionOf(response: unknown, documentId: string): VersionToken {
  const token = stringField(response, "microversion") || stringField(response, "sourceMicroversion");
  if (!token) {
    throw new TransportError(`Response for document ${documentId} carries no microversion`);
  }
  return token;
}

function stringField(value: unknown, key: string): string {
  if (!isObject(value)) {
    return "";
  }
  const field = value[key];
  return typeof field === "string" ? field : "";
}

function arrayField(value: unknown, key: string): { [key: string]: unknown }[] {
  if (!isObject(value)) {
    return [];
  }
  const field = value[key];
  return Array.isArray(field) ? field.filter(isObject) : [];
}
