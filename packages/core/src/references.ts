/**
 * ReferenceManager - read-only synced roots that are only ever pulled.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { ConfigurationError, describeError } from "./errors.js";
import { isWithin, sanitizeFilename } from "./paths.js";
import { targetForAddress, type ManagerContext } from "./policy.js";
import type { ReferenceConfig, RemoteAddress, SyncOutcome, SyncTarget } from "./types.js";

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

export interface AddReferenceInput {
  name: string;
  url: string;
  address: RemoteAddress;
  localPath?: string;
  autoUpdate?: boolean;
  recursive?: boolean;
}

export interface ReferenceUpdateResult {
  name: string;
  /** True when the reference was pulled and nothing failed */
  updated: boolean;
  outcomes: SyncOutcome[];
  /** Set by check-only runs */
  needsUpdate?: boolean;
  message: string;
}

export interface UpdateReferencesOptions {
  /** Pull every reference, even up-to-date or non auto-updating ones */
  force?: boolean;
  /** Report which references need an update without pulling */
  checkOnly?: boolean;
}

export class ReferenceManager {
  private readonly ctx: ManagerContext;
  private readonly clock: () => Date;

  constructor(ctx: ManagerContext) {
    this.ctx = ctx;
    this.clock = ctx.clock ?? (() => new Date());
  }

  list(): ReferenceConfig[] {
    return [...this.ctx.settings.references];
  }

  /**
   * @throws ConfigurationError for an unknown name
   */
  get(name: string): ReferenceConfig {
    const reference = this.ctx.settings.references.find((r) => r.name === name);
    if (!reference) {
      throw new ConfigurationError(`Reference '${name}' not found`);
    }
    return reference;
  }

  /**
   * Register a reference and pull it for the first time.
   * @throws ConfigurationError for a taken name or a local path inside a project
   */
  async add(input: AddReferenceInput): Promise<ReferenceUpdateResult> {
    if (this.ctx.settings.references.some((r) => r.name === input.name)) {
      throw new ConfigurationError(`Reference '${input.name}' already exists`);
    }
    const localPath = input.localPath ?? `references/${sanitizeFilename(input.name)}`;
    const resolved = path.resolve(this.ctx.baseDir, localPath);
    for (const project of this.ctx.settings.projects) {
      if (isWithin(resolved, path.resolve(this.ctx.baseDir, project.workingDirectory))) {
        throw new ConfigurationError(
          `Reference '${input.name}' cannot live inside project '${project.name}' (${project.workingDirectory})`
        );
      }
    }
    const reference: ReferenceConfig = {
      name: input.name,
      url: input.url,
      localPath,
      address: input.address,
      readOnly: true,
      autoUpdate: input.autoUpdate ?? false,
      recursive: input.recursive ?? true,
    };
    this.ctx.settings.references.push(reference);
    await this.ctx.repository.save(this.ctx.settings);

    return this.updateOne(reference.name);
  }

  targetFor(reference: ReferenceConfig): SyncTarget {
    return targetForAddress(reference.name, reference.address, reference.localPath, reference.recursive);
  }

  /**
   * Never synced, a document whose token moved since the cached one, or a
   * folder last synced a day or more ago.
   */
  async needsUpdate(reference: ReferenceConfig): Promise<boolean> {
    if (!reference.lastSync) {
      return true;
    }
    if (reference.address.kind === "document") {
      const cached = this.ctx.settings.documentCache[reference.address.documentId];
      if (!cached) {
        return true;
      }
      return (await this.currentToken(reference.address.documentId, reference.address.workspaceId)) !==
        cached.versionToken;
    }
    const age = this.clock().getTime() - Date.parse(reference.lastSync);
    return Number.isNaN(age) || age >= ONE_DAY_MS;
  }

  /**
   * Update every reference. Failures are captured per reference.
   */
  async update(options: UpdateReferencesOptions = {}): Promise<ReferenceUpdateResult[]> {
    const results: ReferenceUpdateResult[] = [];
    for (const reference of this.list()) {
      if (!reference.autoUpdate && !options.force) {
        results.push({ name: reference.name, updated: false, outcomes: [], message: "Auto-update disabled" });
        continue;
      }
      try {
        const needed = options.force || (await this.needsUpdate(reference));
        if (options.checkOnly) {
          results.push({
            name: reference.name,
            updated: false,
            outcomes: [],
            needsUpdate: needed,
            message: needed ? "Update available" : "Up to date",
          });
        } else if (!needed) {
          results.push({ name: reference.name, updated: false, outcomes: [], message: "Up to date" });
        } else {
          results.push(await this.updateOne(reference.name));
        }
      } catch (error) {
        results.push({
          name: reference.name,
          updated: false,
          outcomes: [],
          message: `Update failed: ${describeError(error)}`,
        });
      }
    }
    return results;
  }

  /**
   * Pull one reference, overwriting local edits. `lastSync` and the cached
   * document token only move when nothing failed.
   */
  async updateOne(name: string): Promise<ReferenceUpdateResult> {
    const reference = this.get(name);
    const outcomes = await this.ctx.engine.pullTarget(this.targetFor(reference), { force: true });
    const failed = outcomes.filter((outcome) => !outcome.success).length;

    if (failed > 0) {
      return { name, updated: false, outcomes, message: `${failed} file(s) failed` };
    }

    const now = this.clock().toISOString();
    reference.lastSync = now;
    if (reference.address.kind === "document") {
      const token = await this.currentToken(reference.address.documentId, reference.address.workspaceId);
      this.ctx.settings.documentCache[reference.address.documentId] = {
        versionToken: token,
        lastChecked: now,
      };
    }
    await this.ctx.repository.save(this.ctx.settings);
    return { name, updated: true, outcomes, message: "Updated" };
  }

  async remove(name: string, options: { deleteFiles?: boolean } = {}): Promise<ReferenceConfig> {
    const reference = this.get(name);
    this.ctx.settings.references = this.ctx.settings.references.filter((r) => r.name !== name);
    if (reference.address.kind === "document") {
      delete this.ctx.settings.documentCache[reference.address.documentId];
    }
    if (options.deleteFiles) {
      await fs.rm(path.resolve(this.ctx.baseDir, reference.localPath), { recursive: true, force: true });
    }
    await this.ctx.repository.save(this.ctx.settings);
    return reference;
  }

  private async currentToken(documentId: string, workspaceId: string | undefined): Promise<string> {
    const workspace = workspaceId || (await this.ctx.store.resolveDefaultSubContainer(documentId));
    return this.ctx.store.getVersionToken(documentId, workspace);
  }
}
