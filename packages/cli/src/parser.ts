/**
 * JSONC settings file parsing, validation, environment variable expansion
 * and comment-preserving write-back.
 */

import * as fs from "fs/promises";
import * as path from "path";
import {
  applyEdits,
  modify,
  parse as parseJsonc,
  printParseErrorCode,
  type ParseError,
} from "jsonc-parser";
import { ConfigurationError, describeError, isObject, readTextIfExists } from "@cadsync/core";
import type { ConfigFile, ProjectConfigRaw, ReferenceConfigRaw, SyncMetadataRaw } from "./config.js";

/**
 * Load, expand and validate a settings file. A missing file is an empty
 * configuration.
 * @throws ConfigurationError if the file cannot be read, parsed or validated
 */
export async function loadConfigFile(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<ConfigFile> {
  const fullPath = path.resolve(configPath);
  let content: string | undefined;
  try {
    content = await readTextIfExists(fullPath);
  } catch (error) {
    throw new ConfigurationError(`Failed to load config from ${fullPath}: ${describeError(error)}`, error);
  }
  if (content === undefined) {
    return {};
  }

  try {
    return parseConfigText(content, env);
  } catch (error) {
    throw new ConfigurationError(`Failed to load config from ${fullPath}: ${describeError(error)}`, error);
  }
}

/**
 * Parse JSONC text (comments and trailing commas allowed), expand
 * environment variables and validate the result.
 */
export function parseConfigText(content: string, env: NodeJS.ProcessEnv = process.env): ConfigFile {
  if (content.trim() === "") {
    return {};
  }
  const errors: ParseError[] = [];
  const parsed: unknown = parseJsonc(content, errors, {
    allowTrailingComma: true,
    disallowComments: false,
  });

  if (errors.length > 0) {
    const errorMessages = errors.map((e) => `Error at offset ${e.offset}: ${printParseErrorCode(e.error)}`);
    throw new ConfigurationError(`Failed to parse JSONC file: ${errorMessages.join(", ")}`);
  }

  const config = expandEnvironmentVariables(parsed, env);
  validateConfig(config);
  return config;
}

/**
 * Expand environment variables in a string.
 * Supports ${VAR} and ${VAR:-default} syntax; unknown variables without a
 * default are left as written.
 */
export function expandEnvVar(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(
    /\$\{([^}:]+)(?::-([^}]*))?\}/g,
    (match: string, varName: string, defaultValue: string | undefined) => {
      const envValue = env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      return defaultValue ?? match;
    }
  );
}

/**
 * Recursively expand environment variables in every string of a parsed value.
 */
export function expandEnvironmentVariables(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === "string") {
    return expandEnvVar(value, env);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => expandEnvironmentVariables(item, env));
  }
  if (isObject(value)) {
    const expanded: { [key: string]: unknown } = {};
    for (const [key, entry] of Object.entries(value)) {
      expanded[key] = expandEnvironmentVariables(entry, env);
    }
    return expanded;
  }
  return value;
}

// --- Validation ---

type JsonObject = { [key: string]: unknown };

/**
 * Validate the structure of the configuration object.
 * @throws ConfigurationError naming the offending entry
 */
export function validateConfig(config: unknown): asserts config is ConfigFile {
  if (!isObject(config)) {
    throw new ConfigurationError("Configuration file must contain an object");
  }

  optionalString(config, "version", "Configuration");

  if (config.onshape !== undefined) {
    const onshape = requireObject(config.onshape, "'onshape'");
    optionalString(onshape, "base_url", "'onshape'");
    optionalString(onshape, "api_version", "'onshape'");
  }

  if (config.settings !== undefined) {
    validateSettings(requireObject(config.settings, "'settings'"));
  }

  for (const folder of optionalArray(config, "folders")) {
    const where = `Folder '${nameOf(folder)}'`;
    const entry = requireObject(folder, where);
    requireString(entry, "name", where);
    requireString(entry, "folder_id", where);
    requireString(entry, "local_path", where);
    optionalBoolean(entry, "recursive", where);
    optionalDepth(entry, where);
    optionalStringArray(entry, "exclude", where);
  }

  for (const document of optionalArray(config, "documents")) {
    const where = `Document '${nameOf(document)}'`;
    const entry = requireObject(document, where);
    requireString(entry, "name", where);
    requireString(entry, "document_id", where);
    requireString(entry, "local_path", where);
    optionalString(entry, "workspace_id", where);
    optionalStringArray(entry, "exclude", where);
  }

  const referenceNames = new Set<string>();
  for (const reference of optionalArray(config, "references")) {
    const where = `Reference '${nameOf(reference)}'`;
    const entry = requireObject(reference, where);
    const name = requireString(entry, "name", where);
    if (referenceNames.has(name)) {
      throw new ConfigurationError(`${where}: duplicate name`);
    }
    referenceNames.add(name);
    if (entry.type !== "folder" && entry.type !== "document") {
      throw new ConfigurationError(`${where}: 'type' must be "folder" or "document"`);
    }
    requireString(entry, "url", where);
    requireString(entry, "local_path", where);
    if (entry.read_only === false) {
      throw new ConfigurationError(`${where}: references are read-only, 'read_only' cannot be false`);
    }
    optionalBoolean(entry, "read_only", where);
    optionalBoolean(entry, "auto_update", where);
    optionalBoolean(entry, "recursive", where);
    for (const key of ["last_sync", "document_id", "workspace_id", "folder_id"]) {
      optionalNullableString(entry, key, where);
    }
  }

  const projectNames = new Set<string>();
  for (const project of optionalArray(config, "projects")) {
    const where = `Project '${nameOf(project)}'`;
    const entry = requireObject(project, where);
    const name = requireString(entry, "name", where);
    if (projectNames.has(name)) {
      throw new ConfigurationError(`${where}: duplicate name`);
    }
    projectNames.add(name);
    requireString(entry, "working_directory", where);
    requireString(entry, "onshape_url", where);
    optionalString(entry, "description", where);
    optionalStringArray(entry, "references", where);
    optionalBoolean(entry, "recursive", where);
    for (const key of ["last_pull", "last_push", "document_id", "workspace_id", "folder_id"]) {
      optionalNullableString(entry, key, where);
    }
  }

  if (config.sync_metadata !== undefined) {
    const metadata = requireObject(config.sync_metadata, "'sync_metadata'");
    if (metadata.document_cache !== undefined) {
      const cache = requireObject(metadata.document_cache, "'sync_metadata.document_cache'");
      for (const [documentId, cached] of Object.entries(cache)) {
        const where = `Document cache entry '${documentId}'`;
        const entry = requireObject(cached, where);
        requireString(entry, "version_token", where);
        requireString(entry, "last_checked", where);
      }
    }
  }
}

function validateSettings(settings: JsonObject): void {
  const where = "'settings'";
  optionalBoolean(settings, "backup_on_pull", where);
  optionalString(settings, "backup_dir", where);
  optionalString(settings, "file_extension", where);
  optionalString(settings, "element_type", where);
  optionalString(settings, "default_workspace", where);
  optionalDepth(settings, where);
  optionalBoolean(settings, "verbose", where);
  optionalString(settings, "auto_update_schedule", where);

  const extension = settings.file_extension;
  if (typeof extension === "string" && !extension.startsWith(".")) {
    throw new ConfigurationError(`${where}: file_extension must start with "."`);
  }
}

function nameOf(entry: unknown): string {
  return isObject(entry) && typeof entry.name === "string" ? entry.name : "?";
}

function requireObject(value: unknown, where: string): JsonObject {
  if (!isObject(value)) {
    throw new ConfigurationError(`${where} must be an object`);
  }
  return value;
}

function requireString(entry: JsonObject, key: string, where: string): string {
  const value = entry[key];
  if (typeof value !== "string" || value === "") {
    throw new ConfigurationError(`${where}: must have '${key}' string`);
  }
  return value;
}

function optionalString(entry: JsonObject, key: string, where: string): void {
  if (entry[key] !== undefined && typeof entry[key] !== "string") {
    throw new ConfigurationError(`${where}: '${key}' must be a string`);
  }
}

function optionalNullableString(entry: JsonObject, key: string, where: string): void {
  if (entry[key] !== null) {
    optionalString(entry, key, where);
  }
}

function optionalBoolean(entry: JsonObject, key: string, where: string): void {
  if (entry[key] !== undefined && typeof entry[key] !== "boolean") {
    throw new ConfigurationError(`${where}: '${key}' must be a boolean`);
  }
}

function optionalDepth(entry: JsonObject, where: string): void {
  const value = entry.max_depth;
  if (value !== undefined && (typeof value !== "number" || !Number.isInteger(value) || value < 0)) {
    throw new ConfigurationError(`${where}: 'max_depth' must be a non-negative integer`);
  }
}

function optionalStringArray(entry: JsonObject, key: string, where: string): void {
  const value = entry[key];
  if (value === undefined) {
    return;
  }
  if (!Array.isArray(value) || !value.every((item: unknown) => typeof item === "string")) {
    throw new ConfigurationError(`${where}: '${key}' must be an array of strings`);
  }
}

function optionalArray(config: JsonObject, key: string): unknown[] {
  const value = config[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`Configuration '${key}' must be an array`);
  }
  return value;
}

// --- Write-back ---

/**
 * The sections cadsync itself rewrites.
 */
export interface ManagedSections {
  references: ReferenceConfigRaw[];
  projects: ProjectConfigRaw[];
  sync_metadata: SyncMetadataRaw;
}

/**
 * Replace the managed sections of a JSONC document, leaving comments and
 * every other section as written.
 */
export function updateConfigText(content: string, sections: ManagedSections): string {
  let text = content.trim() === "" ? "{}\n" : content;
  const keys: (keyof ManagedSections)[] = ["references", "projects", "sync_metadata"];
  for (const key of keys) {
    const edits = modify(text, [key], sections[key], {
      formattingOptions: { insertSpaces: true, tabSize: 2, eol: "\n" },
    });
    text = applyEdits(text, edits);
  }
  return text;
}

/**
 * Rewrite the managed sections of the settings file, creating it if needed.
 */
export async function saveManagedSections(configPath: string, sections: ManagedSections): Promise<void> {
  const fullPath = path.resolve(configPath);
  const current = (await readTextIfExists(fullPath)) ?? "";
  await fs.mkdir(path.dirname(fullPath), { recursive: true });
  await fs.writeFile(fullPath, updateConfigText(current, sections), "utf-8");
}
