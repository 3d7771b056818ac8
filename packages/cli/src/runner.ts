/**
 * Wire everything together: parse the settings file, build the document
 * store, state store, engine and managers, and run pull and push.
 */

import * as path from "path";
import {
  ConfigurationError,
  ProjectManager,
  ReferenceManager,
  SYNC_STATE_FILE,
  SyncEngine,
  assertPushAllowed,
  exitCodeFor,
  summarizeOutcomes,
  type ContainerEntry,
  type ElementContent,
  type ElementInfo,
  type OutcomeSummary,
  type PolicySettings,
  type RemoteDocumentStore,
  type SettingsRepository,
  type SyncOptions,
  type SyncOutcome,
  type SyncReporter,
  type SyncSettings,
  type SyncStateStore,
  type SyncTarget,
  type VersionToken,
} from "@cadsync/core";
import { JsonFileSyncStateStore } from "@cadsync/statestore";
import {
  OnshapeClient,
  OnshapeDocumentStore,
  loadCredentials,
} from "@cadsync/adapter-onshape";
import type { ConfigFile } from "./config.js";
import { loadConfigFile } from "./parser.js";
import {
  JsoncSettingsRepository,
  convertDocument,
  convertFolder,
  convertPolicySettings,
  convertSettings,
} from "./settings.js";

/**
 * Everything a command works with.
 */
export interface RunContext {
  configPath: string;
  /** Directory of the settings file; relative paths resolve against it */
  baseDir: string;
  config: ConfigFile;
  settings: SyncSettings;
  policy: PolicySettings;
  store: RemoteDocumentStore;
  state: SyncStateStore;
  engine: SyncEngine;
  references: ReferenceManager;
  projects: ProjectManager;
}

/**
 * Overrides for tests and embedding.
 */
export interface ContextOptions {
  env?: NodeJS.ProcessEnv;
  store?: RemoteDocumentStore;
  state?: SyncStateStore;
  repository?: SettingsRepository;
  reporter?: SyncReporter;
  clock?: () => Date;
}

export interface RunResult {
  outcomes: SyncOutcome[];
  summary: OutcomeSummary;
  exitCode: number;
}

/**
 * Builds the Onshape store on the first remote call, so commands that stay
 * local never need credentials.
 */
class DeferredDocumentStore implements RemoteDocumentStore {
  private store: RemoteDocumentStore | undefined;
  private readonly factory: () => RemoteDocumentStore;

  constructor(factory: () => RemoteDocumentStore) {
    this.factory = factory;
  }

  private resolve(): RemoteDocumentStore {
    if (!this.store) {
      this.store = this.factory();
    }
    return this.store;
  }

  listContainerEntries(containerId: string): Promise<ContainerEntry[]> {
    return this.resolve().listContainerEntries(containerId);
  }

  listElements(documentId: string, subContainerId: string, kindFilter?: string): Promise<ElementInfo[]> {
    return this.resolve().listElements(documentId, subContainerId, kindFilter);
  }

  getElementContent(documentId: string, subContainerId: string, elementId: string): Promise<ElementContent> {
    return this.resolve().getElementContent(documentId, subContainerId, elementId);
  }

  submitElementContent(
    documentId: string,
    subContainerId: string,
    elementId: string,
    content: string
  ): Promise<VersionToken> {
    return this.resolve().submitElementContent(documentId, subContainerId, elementId, content);
  }

  getVersionToken(documentId: string, subContainerId: string): Promise<VersionToken> {
    return this.resolve().getVersionToken(documentId, subContainerId);
  }

  resolveDefaultSubContainer(documentId: string): Promise<string> {
    return this.resolve().resolveDefaultSubContainer(documentId);
  }
}

/**
 * Client for the API named by the environment and the settings file.
 * @throws ConfigurationError when credentials are missing
 */
export function createOnshapeClient(config: ConfigFile, env: NodeJS.ProcessEnv = process.env): OnshapeClient {
  const credentials = loadCredentials(env, config.onshape?.base_url);
  return new OnshapeClient({ credentials, apiVersion: config.onshape?.api_version });
}

/**
 * Load the settings file and build the engine and managers around it.
 */
export async function createContext(configPath: string, options: ContextOptions = {}): Promise<RunContext> {
  const env = options.env ?? process.env;
  const fullPath = path.resolve(configPath);
  const baseDir = path.dirname(fullPath);
  const config = await loadConfigFile(fullPath, env);

  const store =
    options.store ?? new DeferredDocumentStore(() => new OnshapeDocumentStore(createOnshapeClient(config, env)));
  const state = options.state ?? new JsonFileSyncStateStore(path.join(baseDir, SYNC_STATE_FILE));
  const baseUrl = (env.ONSHAPE_BASE_URL || config.onshape?.base_url || "").replace(/\/+$/, "");
  const settings = convertSettings(config.settings, baseUrl || undefined);
  const policy = convertPolicySettings(config);
  const engine = new SyncEngine({
    baseDir,
    store,
    state,
    reporter: options.reporter,
    settings,
    clock: options.clock,
    readOnlyRoots: () => policy.references.map((reference) => reference.localPath),
  });

  const managerContext = {
    baseDir,
    settings: policy,
    repository: options.repository ?? new JsoncSettingsRepository(fullPath),
    engine,
    store,
    state,
    clock: options.clock,
  };

  return {
    configPath: fullPath,
    baseDir,
    config,
    settings,
    policy,
    store,
    state,
    engine,
    references: new ReferenceManager(managerContext),
    projects: new ProjectManager(managerContext, settings.fileExtension),
  };
}

/**
 * Configured folder and document targets, optionally limited to `names`.
 * @throws ConfigurationError for a name that matches no target
 */
export function selectTargets(config: ConfigFile, names?: string[]): SyncTarget[] {
  const targets: SyncTarget[] = [
    ...(config.folders ?? []).map(convertFolder),
    ...(config.documents ?? []).map(convertDocument),
  ];
  if (!names || names.length === 0) {
    return targets;
  }
  for (const name of names) {
    if (!targets.some((target) => target.name === name)) {
      throw new ConfigurationError(`No folder or document named '${name}' in the settings file`);
    }
  }
  return targets.filter((target) => names.includes(target.name));
}

export function resultOf(outcomes: SyncOutcome[]): RunResult {
  const summary = summarizeOutcomes(outcomes);
  return { outcomes, summary, exitCode: exitCodeFor(summary) };
}

/**
 * Pull every configured folder and document.
 */
export async function runPull(
  ctx: RunContext,
  options: SyncOptions & { names?: string[] } = {}
): Promise<RunResult> {
  const targets = selectTargets(ctx.config, options.names);
  return resultOf(await ctx.engine.pull(targets, options));
}

/**
 * Push every configured folder and document. Every target is checked
 * against the reference roots before anything is submitted.
 * @throws PolicyError when a target lies inside a reference
 */
export async function runPush(
  ctx: RunContext,
  options: SyncOptions & { names?: string[] } = {}
): Promise<RunResult> {
  const targets = selectTargets(ctx.config, options.names);
  for (const target of targets) {
    assertPushAllowed(target.localPath, ctx.policy.references, ctx.baseDir);
  }
  return resultOf(await ctx.engine.push(targets, options));
}

export async function runProjectPull(ctx: RunContext, name: string, options: SyncOptions = {}): Promise<RunResult> {
  return resultOf(await ctx.projects.pull(name, options));
}

export async function runProjectPush(ctx: RunContext, name: string, options: SyncOptions = {}): Promise<RunResult> {
  return resultOf(await ctx.projects.push(name, options));
}

export function formatSummary(summary: OutcomeSummary): string {
  return (
    `${summary.succeeded} transferred, ${summary.skipped} skipped, ` +
    `${summary.conflicted} conflict(s), ${summary.failed} failed`
  );
}
