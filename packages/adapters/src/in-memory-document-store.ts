/**
 * InMemoryDocumentStore - An in-memory implementation of RemoteDocumentStore for testing.
 * Holds folders, documents and elements in maps and versions each workspace
 * with a counter.
 */

import {
  TransportError,
  type ContainerEntry,
  type ElementContent,
  type ElementInfo,
  type RemoteDocumentStore,
  type VersionToken,
} from "@cadsync/core";

type StoreMethod = keyof RemoteDocumentStore;

interface StoredElement {
  id: string;
  name: string;
  kind: string;
  content: string;
}

interface StoredWorkspace {
  version: number;
  elements: Map<string, StoredElement>;
}

interface StoredDocument {
  id: string;
  name: string;
  defaultWorkspace: string;
  workspaces: Map<string, StoredWorkspace>;
}

interface StoredFolder {
  id: string;
  name: string;
  children: ContainerEntry[];
}

/**
 * One recorded call, for asserting which remote operations ran.
 */
export interface StoreCall {
  method: StoreMethod;
  args: string[];
}

/**
 * Configuration options for InMemoryDocumentStore.
 */
export interface InMemoryDocumentStoreOptions {
  /**
   * Id of the root folder created up front.
   */
  rootFolderId?: string;
}

/**
 * In-memory document store with folders, workspaces and version tokens.
 * Useful for testing and development without network access.
 */
export class InMemoryDocumentStore implements RemoteDocumentStore {
  readonly calls: StoreCall[] = [];
  private folders: Map<string, StoredFolder>;
  private documents: Map<string, StoredDocument>;
  private failures: { method: StoreMethod; id?: string; error: Error }[];

  constructor(options: InMemoryDocumentStoreOptions = {}) {
    this.folders = new Map();
    this.documents = new Map();
    this.failures = [];
    this.addFolder(options.rootFolderId ?? "root", "root");
  }

  async listContainerEntries(containerId: string): Promise<ContainerEntry[]> {
    this.record("listContainerEntries", [containerId]);
    return this.folder(containerId).children.map((entry) => ({ ...entry }));
  }

  async listElements(
    documentId: string,
    subContainerId: string,
    kindFilter?: string
  ): Promise<ElementInfo[]> {
    this.record("listElements", [documentId, subContainerId]);
    return Array.from(this.workspace(documentId, subContainerId).elements.values())
      .filter((element) => !kindFilter || element.kind === kindFilter)
      .map((element) => ({ id: element.id, name: element.name }));
  }

  async getElementContent(
    documentId: string,
    subContainerId: string,
    elementId: string
  ): Promise<ElementContent> {
    this.record("getElementContent", [documentId, subContainerId, elementId]);
    const workspace = this.workspace(documentId, subContainerId);
    const element = this.element(workspace, elementId);
    return { content: element.content, versionToken: tokenOf(workspace) };
  }

  async submitElementContent(
    documentId: string,
    subContainerId: string,
    elementId: string,
    content: string
  ): Promise<VersionToken> {
    this.record("submitElementContent", [documentId, subContainerId, elementId]);
    const workspace = this.workspace(documentId, subContainerId);
    this.element(workspace, elementId).content = content;
    workspace.version++;
    return tokenOf(workspace);
  }

  async getVersionToken(documentId: string, subContainerId: string): Promise<VersionToken> {
    this.record("getVersionToken", [documentId, subContainerId]);
    return tokenOf(this.workspace(documentId, subContainerId));
  }

  async resolveDefaultSubContainer(documentId: string): Promise<string> {
    this.record("resolveDefaultSubContainer", [documentId]);
    return this.document(documentId).defaultWorkspace;
  }

  // --- Test helpers ---

  /**
   * Add a folder, under `parentId` when given.
   */
  addFolder(id: string, name: string, parentId?: string): void {
    this.folders.set(id, { id, name, children: [] });
    if (parentId) {
      this.folder(parentId).children.push({ id, name, kind: "folder" });
    }
  }

  /**
   * Add a document with one workspace at version 1.
   */
  addDocument(id: string, name: string, parentId?: string, workspaceId: string = "w1"): void {
    this.documents.set(id, {
      id,
      name,
      defaultWorkspace: workspaceId,
      workspaces: new Map([[workspaceId, { version: 1, elements: new Map() }]]),
    });
    if (parentId) {
      this.folder(parentId).children.push({ id, name, kind: "document" });
    }
  }

  /**
   * Add an element without moving the version token.
   */
  addElement(
    documentId: string,
    element: { id: string; name: string; content: string; kind?: string },
    workspaceId?: string
  ): void {
    const workspace = this.workspace(documentId, workspaceId ?? this.document(documentId).defaultWorkspace);
    workspace.elements.set(element.id, { ...element, kind: element.kind ?? "FEATURESTUDIO" });
  }

  /**
   * Simulate an edit by another party: replace content and move the token.
   */
  editElement(documentId: string, elementId: string, content: string, workspaceId?: string): VersionToken {
    const workspace = this.workspace(documentId, workspaceId ?? this.document(documentId).defaultWorkspace);
    this.element(workspace, elementId).content = content;
    workspace.version++;
    return tokenOf(workspace);
  }

  getContent(documentId: string, elementId: string, workspaceId?: string): string {
    const workspace = this.workspace(documentId, workspaceId ?? this.document(documentId).defaultWorkspace);
    return this.element(workspace, elementId).content;
  }

  currentToken(documentId: string, workspaceId?: string): VersionToken {
    return tokenOf(this.workspace(documentId, workspaceId ?? this.document(documentId).defaultWorkspace));
  }

  /**
   * Make calls of `method` fail, only those mentioning `id` when given.
   */
  failOn(method: StoreMethod, id?: string, error?: Error): void {
    this.failures.push({
      method,
      id,
      error: error ?? new TransportError(`Simulated failure in ${method}`, 503),
    });
  }

  callsTo(method: StoreMethod): StoreCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  /**
   * Clear recorded calls and injected failures.
   */
  reset(): void {
    this.calls.length = 0;
    this.failures = [];
  }

  private record(method: StoreMethod, args: string[]): void {
    this.calls.push({ method, args });
    const failure = this.failures.find(
      (f) => f.method === method && (f.id === undefined || args.includes(f.id))
    );
    if (failure) {
      throw failure.error;
    }
  }

  private folder(id: string): StoredFolder {
    const folder = this.folders.get(id);
    if (!folder) {
      throw new TransportError(`API error 404: folder ${id} not found`, 404);
    }
    return folder;
  }

  private document(id: string): StoredDocument {
    const document = this.documents.get(id);
    if (!document) {
      throw new TransportError(`API error 404: document ${id} not found`, 404);
    }
    return document;
  }

  private workspace(documentId: string, workspaceId: string): StoredWorkspace {
    const workspace = this.document(documentId).workspaces.get(workspaceId);
    if (!workspace) {
      throw new TransportError(`API error 404: workspace ${workspaceId} not found`, 404);
    }
    return workspace;
  }

  private element(workspace: StoredWorkspace, elementId: string): StoredElement {
    const element = workspace.elements.get(elementId);
    if (!element) {
      throw new TransportError(`API error 404: element ${elementId} not found`, 404);
    }
    return element;
  }
}

function tokenOf(workspace: StoredWorkspace): VersionToken {
  return `v${workspace.version}`;
}
