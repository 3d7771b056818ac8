/**
 * ProjectManager - bidirectional synced roots with pull/push audit stamps.
 */

import type { Dirent } from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import { ConfigurationError } from "./errors.js";
import { isNotFound } from "./files.js";
import { hashFile } from "./hasher.js";
import { normalizeStatePath, isWithin, sanitizeFilename } from "./paths.js";
import { assertPushAllowed, targetForAddress, type ManagerContext } from "./policy.js";
import { transferredAny } from "./summary.js";
import type { ProjectConfig, RemoteAddress, SyncOptions, SyncOutcome, SyncTarget } from "./types.js";

export interface AddProjectInput {
  name: string;
  url: string;
  address: RemoteAddress;
  description?: string;
  workingDirectory?: string;
  references?: string[];
  recursive?: boolean;
}

export type FileStatusKind =
  | "in_sync"
  | "modified_locally"
  | "modified_remotely"
  | "both_modified"
  | "deleted_locally"
  | "untracked";

export interface FileStatus {
  path: string;
  status: FileStatusKind;
}

export interface ProjectStatus {
  name: string;
  workingDirectory: string;
  lastPull?: string;
  lastPush?: string;
  files: FileStatus[];
}

export class ProjectManager {
  private readonly ctx: ManagerContext;
  private readonly clock: () => Date;
  private readonly fileExtension: string;

  constructor(ctx: ManagerContext, fileExtension: string = ".fs") {
    this.ctx = ctx;
    this.clock = ctx.clock ?? (() => new Date());
    this.fileExtension = fileExtension;
  }

  list(): ProjectConfig[] {
    return [...this.ctx.settings.projects];
  }

  /**
   * @throws ConfigurationError for an unknown name
   */
  get(name: string): ProjectConfig {
    const project = this.ctx.settings.projects.find((p) => p.name === name);
    if (!project) {
      throw new ConfigurationError(`Project '${name}' not found`);
    }
    return project;
  }

  /**
   * Register a project and pull it for the first time.
   */
  async add(input: AddProjectInput): Promise<SyncOutcome[]> {
    if (this.ctx.settings.projects.some((p) => p.name === input.name)) {
      throw new ConfigurationError(`Project '${input.name}' already exists`);
    }
    const references = input.references ?? [];
    for (const referenceName of references) {
      if (!this.ctx.settings.references.some((r) => r.name === referenceName)) {
        throw new ConfigurationError(`Project '${input.name}' uses unknown reference '${referenceName}'`);
      }
    }

    const project: ProjectConfig = {
      name: input.name,
      description: input.description ?? "",
      url: input.url,
      workingDirectory: input.workingDirectory ?? `projects/${sanitizeFilename(input.name)}`,
      address: input.address,
      references,
      recursive: input.recursive ?? true,
    };
    assertPushAllowed(project.workingDirectory, this.ctx.settings.references, this.ctx.baseDir);

    this.ctx.settings.projects.push(project);
    await this.ctx.repository.save(this.ctx.settings);

    return this.pull(project.name, { force: true });
  }

  targetFor(project: ProjectConfig): SyncTarget {
    return targetForAddress(project.name, project.address, project.workingDirectory, project.recursive);
  }

  async pull(name: string, options: SyncOptions = {}): Promise<SyncOutcome[]> {
    const project = this.get(name);
    const outcomes = await this.ctx.engine.pullTarget(this.targetFor(project), options);
    if (!options.dryRun && transferredAny(outcomes)) {
      project.lastPull = this.clock().toISOString();
      await this.ctx.repository.save(this.ctx.settings);
    }
    return outcomes;
  }

  /**
   * @throws PolicyError before the engine runs when the working directory is inside a reference
   */
  async push(name: string, options: SyncOptions = {}): Promise<SyncOutcome[]> {
    const project = this.get(name);
    assertPushAllowed(project.workingDirectory, this.ctx.settings.references, this.ctx.baseDir);

    const outcomes = await this.ctx.engine.pushTarget(this.targetFor(project), options);
    if (!options.dryRun && transferredAny(outcomes)) {
      project.lastPush = this.clock().toISOString();
      await this.ctx.repository.save(this.ctx.settings);
    }
    return outcomes;
  }

  /**
   * Compare every element file of the working directory with its tracked
   * state. Remote changes are only looked up when `checkRemote` is set.
   */
  async status(name: string, options: { checkRemote?: boolean } = {}): Promise<ProjectStatus> {
    const project = this.get(name);
    const root = path.resolve(this.ctx.baseDir, project.workingDirectory);
    const localFiles = await this.listElementFiles(root);
    const localKeys = new Set(localFiles.map((file) => normalizeStatePath(file, this.ctx.baseDir)));
    const liveTokens = new Map<string, string>();
    const files: FileStatus[] = [];

    const remoteChanged = async (documentId: string, workspaceId: string, recorded: string) => {
      if (!options.checkRemote) {
        return false;
      }
      const cacheKey = `${documentId}/${workspaceId}`;
      let live = liveTokens.get(cacheKey);
      if (live === undefined) {
        live = await this.ctx.store.getVersionToken(documentId, workspaceId);
        liveTokens.set(cacheKey, live);
      }
      return live !== recorded;
    };

    for (const file of localFiles) {
      const key = normalizeStatePath(file, this.ctx.baseDir);
      const tracked = await this.ctx.state.get(key);
      if (!tracked) {
        files.push({ path: key, status: "untracked" });
        continue;
      }
      const localChanged = (await hashFile(file)) !== tracked.localHash;
      const remote = await remoteChanged(tracked.documentId, tracked.workspaceId, tracked.remoteVersion);
      files.push({ path: key, status: classify(localChanged, remote) });
    }

    for (const key of await this.ctx.state.list()) {
      if (!localKeys.has(key) && isWithin(path.resolve(this.ctx.baseDir, key), root)) {
        files.push({ path: key, status: "deleted_locally" });
      }
    }

    files.sort((a, b) => a.path.localeCompare(b.path));
    return {
      name: project.name,
      workingDirectory: project.workingDirectory,
      lastPull: project.lastPull,
      lastPush: project.lastPush,
      files,
    };
  }

  async remove(name: string, options: { deleteFiles?: boolean } = {}): Promise<ProjectConfig> {
    const project = this.get(name);
    this.ctx.settings.projects = this.ctx.settings.projects.filter((p) => p.name !== name);
    if (options.deleteFiles) {
      await fs.rm(path.resolve(this.ctx.baseDir, project.workingDirectory), { recursive: true, force: true });
    }
    await this.ctx.repository.save(this.ctx.settings);
    return project;
  }

  private async listElementFiles(root: string): Promise<string[]> {
    const found: string[] = [];
    const visit = async (dir: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        if (isNotFound(error)) {
          return;
        }
        throw error;
      }
      for (const entry of entries) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory() && !entry.name.startsWith(".")) {
          await visit(full);
        } else if (entry.isFile() && entry.name.endsWith(this.fileExtension)) {
          found.push(full);
        }
      }
    };
    await visit(root);
    return found;
  }
}

function classify(localChanged: boolean, remoteChanged: boolean): FileStatusKind {
  if (localChanged && remoteChanged) {
    return "both_modified";
  }
  if (localChanged) {
    return "modified_locally";
  }
  return remoteChanged ? "modified_remotely" : "in_sync";
}
