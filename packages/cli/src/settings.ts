/**
 * Conversion between the raw settings file (snake_case) and the core's
 * engine and policy types (camelCase), and the repository that writes
 * policy changes back to the file.
 */

import {
  DEFAULT_SETTINGS,
  type DocumentTarget,
  type FolderTarget,
  type PolicySettings,
  type ProjectConfig,
  type ReferenceConfig,
  type RemoteAddress,
  type SettingsRepository,
  type SyncSettings,
} from "@cadsync/core";
import { toRemoteAddress } from "@cadsync/adapter-onshape";
import type {
  ConfigFile,
  DocumentConfigRaw,
  FolderConfigRaw,
  ProjectConfigRaw,
  ReferenceConfigRaw,
  SettingsConfigRaw,
} from "./config.js";
import { saveManagedSections, type ManagedSections } from "./parser.js";

/**
 * Convert raw engine settings (snake_case) to engine settings (camelCase).
 */
export function convertSettings(raw: SettingsConfigRaw = {}, baseUrl: string = DEFAULT_SETTINGS.baseUrl): SyncSettings {
  return {
    backupOnPull: raw.backup_on_pull ?? DEFAULT_SETTINGS.backupOnPull,
    backupDir: raw.backup_dir ?? DEFAULT_SETTINGS.backupDir,
    fileExtension: raw.file_extension ?? DEFAULT_SETTINGS.fileExtension,
    elementKind: raw.element_type ?? DEFAULT_SETTINGS.elementKind,
    defaultWorkspace: raw.default_workspace ?? DEFAULT_SETTINGS.defaultWorkspace,
    maxDepth: raw.max_depth ?? DEFAULT_SETTINGS.maxDepth,
    baseUrl,
  };
}

export function convertFolder(raw: FolderConfigRaw): FolderTarget {
  return {
    kind: "folder",
    name: raw.name,
    folderId: raw.folder_id,
    localPath: raw.local_path,
    recursive: raw.recursive ?? true,
    exclude: raw.exclude ?? [],
    maxDepth: raw.max_depth,
  };
}

export function convertDocument(raw: DocumentConfigRaw): DocumentTarget {
  return {
    kind: "document",
    name: raw.name,
    documentId: raw.document_id,
    workspaceId: raw.workspace_id,
    localPath: raw.local_path,
    exclude: raw.exclude ?? [],
  };
}

/**
 * Address from explicit ids when present, otherwise parsed from the URL.
 */
function addressFor(
  ids: { folder_id?: string | null; document_id?: string | null; workspace_id?: string | null },
  url: string,
  preferred?: "folder" | "document"
): RemoteAddress {
  if (ids.folder_id && preferred !== "document") {
    return { kind: "folder", folderId: ids.folder_id };
  }
  if (ids.document_id && preferred !== "folder") {
    return { kind: "document", documentId: ids.document_id, workspaceId: ids.workspace_id || undefined };
  }
  return toRemoteAddress(url);
}

export function convertReference(raw: ReferenceConfigRaw): ReferenceConfig {
  return {
    name: raw.name,
    url: raw.url,
    localPath: raw.local_path,
    address: addressFor(raw, raw.url, raw.type),
    readOnly: true,
    autoUpdate: raw.auto_update ?? false,
    recursive: raw.recursive ?? true,
    lastSync: raw.last_sync || undefined,
  };
}

export function convertProject(raw: ProjectConfigRaw): ProjectConfig {
  return {
    name: raw.name,
    description: raw.description ?? "",
    url: raw.onshape_url,
    workingDirectory: raw.working_directory,
    address: addressFor(raw, raw.onshape_url),
    references: raw.references ?? [],
    recursive: raw.recursive ?? true,
    lastPull: raw.last_pull || undefined,
    lastPush: raw.last_push || undefined,
  };
}

/**
 * The references, projects and document cache of a settings file.
 */
export function convertPolicySettings(config: ConfigFile): PolicySettings {
  const documentCache: PolicySettings["documentCache"] = {};
  for (const [documentId, entry] of Object.entries(config.sync_metadata?.document_cache ?? {})) {
    documentCache[documentId] = { versionToken: entry.version_token, lastChecked: entry.last_checked };
  }
  return {
    references: (config.references ?? []).map(convertReference),
    projects: (config.projects ?? []).map(convertProject),
    documentCache,
  };
}

export function encodeReference(reference: ReferenceConfig): ReferenceConfigRaw {
  const address = reference.address;
  return {
    name: reference.name,
    type: address.kind,
    url: reference.url,
    local_path: reference.localPath,
    read_only: true,
    auto_update: reference.autoUpdate,
    recursive: reference.recursive,
    last_sync: reference.lastSync ?? null,
    document_id: address.kind === "document" ? address.documentId : null,
    workspace_id: address.kind === "document" ? address.workspaceId ?? null : null,
    folder_id: address.kind === "folder" ? address.folderId : null,
  };
}

/**
 * Optional fields are written only when set.
 */
export function encodeProject(project: ProjectConfig): ProjectConfigRaw {
  const raw: ProjectConfigRaw = {
    name: project.name,
    description: project.description,
    working_directory: project.workingDirectory,
    onshape_url: project.url,
    references: project.references,
    last_pull: project.lastPull ?? null,
    last_push: project.lastPush ?? null,
  };
  if (project.address.kind === "folder") {
    raw.folder_id = project.address.folderId;
  } else {
    raw.document_id = project.address.documentId;
    if (project.address.workspaceId) {
      raw.workspace_id = project.address.workspaceId;
    }
  }
  if (!project.recursive) {
    raw.recursive = false;
  }
  return raw;
}

export function encodePolicySettings(settings: PolicySettings): ManagedSections {
  const documentCache: NonNullable<ManagedSections["sync_metadata"]["document_cache"]> = {};
  for (const [documentId, entry] of Object.entries(settings.documentCache)) {
    documentCache[documentId] = { version_token: entry.versionToken, last_checked: entry.lastChecked };
  }
  return {
    references: settings.references.map(encodeReference),
    projects: settings.projects.map(encodeProject),
    sync_metadata: { document_cache: documentCache },
  };
}

/**
 * Writes policy changes into the settings file, keeping its comments and
 * every section cadsync does not manage.
 */
export class JsoncSettingsRepository implements SettingsRepository {
  readonly configPath: string;

  constructor(configPath: string) {
    this.configPath = configPath;
  }

  async save(settings: PolicySettings): Promise<void> {
    await saveManagedSections(this.configPath, encodePolicySettings(settings));
  }
}
