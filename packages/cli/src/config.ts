/**
 * Type definitions for the cadsync.jsonc settings file.
 * These types represent the raw configuration as it appears in the JSONC file.
 */

/**
 * API location (as it appears in JSONC).
 */
export interface OnshapeConfigRaw {
  base_url?: string;
  api_version?: string;
}

/**
 * Engine behaviour (as it appears in JSONC).
 * Uses snake_case to match JSONC format.
 */
export interface SettingsConfigRaw {
  backup_on_pull?: boolean;
  backup_dir?: string;
  file_extension?: string;
  element_type?: string;
  default_workspace?: string;
  max_depth?: number;
  verbose?: boolean;
  /** Cron expression for `cadsync schedule` */
  auto_update_schedule?: string;
}

/**
 * A remote folder mirrored by plain `pull` / `push`.
 */
export interface FolderConfigRaw {
  name: string;
  folder_id: string;
  local_path: string;
  recursive?: boolean;
  max_depth?: number;
  exclude?: string[];
}

/**
 * A single remote document mirrored by plain `pull` / `push`.
 */
export interface DocumentConfigRaw {
  name: string;
  document_id: string;
  workspace_id?: string;
  local_path: string;
  exclude?: string[];
}

export type AddressType = "folder" | "document";

/**
 * A read-only reference library. Ids are filled from the URL when absent.
 */
export interface ReferenceConfigRaw {
  name: string;
  type: AddressType;
  url: string;
  local_path: string;
  read_only?: boolean;
  auto_update?: boolean;
  recursive?: boolean;
  last_sync?: string | null;
  document_id?: string | null;
  workspace_id?: string | null;
  folder_id?: string | null;
}

/**
 * A bidirectional working project.
 */
export interface ProjectConfigRaw {
  name: string;
  description?: string;
  working_directory: string;
  onshape_url: string;
  references?: string[];
  last_pull?: string | null;
  last_push?: string | null;
  document_id?: string | null;
  workspace_id?: string | null;
  folder_id?: string | null;
  recursive?: boolean;
}

export interface DocumentCacheEntryRaw {
  version_token: string;
  last_checked: string;
}

/**
 * Bookkeeping written back by reference updates.
 */
export interface SyncMetadataRaw {
  document_cache?: { [documentId: string]: DocumentCacheEntryRaw };
}

/**
 * Complete configuration file structure (as it appears in JSONC).
 * Every section is optional; a missing file is an empty object.
 */
export interface ConfigFile {
  version?: string;
  onshape?: OnshapeConfigRaw;
  settings?: SettingsConfigRaw;
  folders?: FolderConfigRaw[];
  documents?: DocumentConfigRaw[];
  references?: ReferenceConfigRaw[];
  projects?: ProjectConfigRaw[];
  sync_metadata?: SyncMetadataRaw;
}

export const DEFAULT_CONFIG_FILE = "cadsync.jsonc";
