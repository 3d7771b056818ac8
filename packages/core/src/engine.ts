/**
 * SyncEngine - pull and push orchestration between a local tree and a
 * RemoteDocumentStore.
 *
 * Per file the order is always: read remote, classify, back up, write, hash,
 * record state, save state. A crash leaves the state store holding exactly
 * the files that completed, so rerunning is safe.
 */

import type { Dirent } from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import { detectPullConflict, detectPushConflict, isBlocking } from "./conflict-detector.js";
import { ConfigurationError, describeError } from "./errors.js";
import { pathExists } from "./files.js";
import { hashContent, hashFile } from "./hasher.js";
import {
  findDocumentDirs,
  loadDocumentMetadata,
  saveDocumentMetadata,
  METADATA_FILE,
  type DocumentMetadata,
} from "./metadata.js";
import { isExcluded, isWithin, normalizeStatePath, sanitizeFilename } from "./paths.js";
import { NullReporter, type SyncReporter } from "./reporter.js";
import type { SyncStateStore } from "./sync-state.js";
import { transferredAny } from "./summary.js";
import { DEFAULT_MAX_DEPTH, listDocuments } from "./traversal.js";
import type {
  ConflictReport,
  DocumentEntry,
  ElementInfo,
  RemoteDocumentStore,
  SyncOperation,
  SyncOptions,
  SyncOutcome,
  SyncTarget,
  VersionToken,
} from "./types.js";

/**
 * Engine behaviour that comes from the settings file.
 */
export interface SyncSettings {
  backupOnPull: boolean;
  /** Relative to the base directory */
  backupDir: string;
  fileExtension: string;
  /** Element kind requested from the store */
  elementKind: string;
  /** Sub-container used when the store reports none */
  defaultWorkspace: string;
  maxDepth: number;
  /** Used to build the `url` field of sidecars */
  baseUrl: string;
}

export interface EngineConfig {
  /** Directory state keys and relative target paths are resolved against */
  baseDir: string;
  store: RemoteDocumentStore;
  state: SyncStateStore;
  reporter?: SyncReporter;
  settings?: Partial<SyncSettings>;
  clock?: () => Date;
  /**
   * Local roots that push never submits from, relative to `baseDir`. Read at
   * the start of every push.
   */
  readOnlyRoots?: () => readonly string[];
}

export const DEFAULT_SETTINGS: SyncSettings = {
  backupOnPull: true,
  backupDir: ".sync-backups",
  fileExtension: ".fs",
  elementKind: "FEATURESTUDIO",
  defaultWorkspace: "main",
  maxDepth: DEFAULT_MAX_DEPTH,
  baseUrl: "https://cad.onshape.com",
};

/**
 * A directory found under a push target: a document to push, or one that is
 * reported without pushing.
 */
type PushDocument =
  | { kind: "document"; dir: string; metadata: DocumentMetadata }
  | { kind: "skipped"; dir: string; reason: string }
  | { kind: "failed"; dir: string; reason: string };

interface PushPlan {
  target: SyncTarget;
  root: string;
  rootExists: boolean;
  documents: PushDocument[];
  /** Set when the target could not be scanned */
  error?: string;
}

const READ_ONLY_SKIP = "Inside a read-only reference, not pushed";

/**
 * Tokens produced by this run's own submissions to one document.
 *
 * A submission moves the token of the whole sub-container, so without this
 * every sibling element would look remotely changed after the first push.
 */
class TokenChain {
  private readonly tokens: Set<VersionToken>;
  private latest: VersionToken;

  constructor(base: VersionToken) {
    this.tokens = new Set([base]);
    this.latest = base;
  }

  get last(): VersionToken {
    return this.latest;
  }

  advance(token: VersionToken): void {
    this.tokens.add(token);
    this.latest = token;
  }

  /**
   * True when `live` is still our own latest token and `recorded` is one we
   * saw or produced on the way there.
   */
  explains(recorded: VersionToken, live: VersionToken): boolean {
    return live === this.latest && this.tokens.has(recorded);
  }

  isStale(recorded: VersionToken): boolean {
    return recorded !== this.latest && this.tokens.has(recorded);
  }
}

/**
 * Format a timestamp as YYYYMMDD_HHMMSS (UTC).
 */
export function formatBackupTimestamp(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * SyncEngine transfers element content between the local tree and the store.
 */
export class SyncEngine {
  private readonly baseDir: string;
  private readonly store: RemoteDocumentStore;
  private readonly state: SyncStateStore;
  private readonly reporter: SyncReporter;
  private readonly settings: SyncSettings;
  private readonly clock: () => Date;
  private readonly readOnlyRoots: () => readonly string[];

  constructor(config: EngineConfig) {
    this.baseDir = path.resolve(config.baseDir);
    this.store = config.store;
    this.state = config.state;
    this.reporter = config.reporter ?? new NullReporter();
    this.settings = { ...DEFAULT_SETTINGS, ...config.settings };
    this.clock = config.clock ?? (() => new Date());
    this.readOnlyRoots = config.readOnlyRoots ?? (() => []);
  }

  // --- Pull ---

  /**
   * Pull every target in order.
   * @throws ConfigurationError, which aborts the remaining targets
   */
  async pull(targets: readonly SyncTarget[], options: SyncOptions = {}): Promise<SyncOutcome[]> {
    const outcomes: SyncOutcome[] = [];
    for (const target of targets) {
      outcomes.push(...(await this.pullTarget(target, options)));
    }
    return outcomes;
  }

  async pullTarget(target: SyncTarget, options: SyncOptions = {}): Promise<SyncOutcome[]> {
    const resolved = this.resolveTarget(target);
    this.reporter.report({ type: "target", operation: "pull", name: target.name, dryRun: !!options.dryRun });

    const outcomes: SyncOutcome[] = [];
    let found = 0;
    const documents = listDocuments(this.store, resolved, this.settings.maxDepth);
    try {
      for await (const document of documents) {
        found++;
        if (document.excluded) {
          outcomes.push(
            this.emit(this.skipped("pull", this.keyFor(document.localDir), "Excluded by pattern"))
          );
          continue;
        }
        outcomes.push(...(await this.pullDocument(document, options)));
      }
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      outcomes.push(
        this.emit(
          this.failed(
            "pull",
            this.keyFor(resolved.localPath),
            `Failed to list '${target.name}': ${describeError(error)}`
          )
        )
      );
      return outcomes;
    }

    if (found === 0) {
      outcomes.push(
        this.emit(this.skipped("pull", this.keyFor(resolved.localPath), "No documents found in folder"))
      );
    }
    return outcomes;
  }

  private async pullDocument(document: DocumentEntry, options: SyncOptions): Promise<SyncOutcome[]> {
    this.reporter.report({
      type: "document",
      operation: "pull",
      documentId: document.documentId,
      name: document.name,
      localDir: document.localDir,
    });
    const label = this.keyFor(document.localDir);

    let workspaceId: string;
    let elements: ElementInfo[];
    try {
      workspaceId =
        document.workspaceId ||
        (await this.store.resolveDefaultSubContainer(document.documentId)) ||
        this.settings.defaultWorkspace;
      elements = await this.store.listElements(
        document.documentId,
        workspaceId,
        this.settings.elementKind
      );
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      return [
        this.emit(
          this.failed("pull", label, `Failed to list elements of '${document.name}': ${describeError(error)}`)
        ),
      ];
    }

    if (elements.length === 0) {
      return [this.emit(this.skipped("pull", label, `No elements in document '${document.name}'`))];
    }

    if (options.dryRun) {
      return elements.map((element) => {
        const fileName = this.fileNameFor(element.name);
        return this.emit(
          this.skipped("pull", this.keyFor(path.join(document.localDir, fileName)), `[DRY RUN] Would pull ${fileName}`)
        );
      });
    }

    let existing: DocumentMetadata | null;
    try {
      existing = await loadDocumentMetadata(document.localDir);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      return [
        this.emit(
          this.failed("pull", label, `Failed to read ${METADATA_FILE} of '${document.name}': ${describeError(error)}`)
        ),
      ];
    }
    const mapped: DocumentMetadata["elements"] = { ...existing?.elements };
    const outcomes: SyncOutcome[] = [];
    for (const element of elements) {
      const outcome = await this.pullElement(document, workspaceId, element, options);
      if (outcome.success) {
        mapped[element.name] = element.id;
      }
      outcomes.push(outcome);
    }

    const mappingChanged =
      !existing ||
      existing.workspaceId !== workspaceId ||
      Object.entries(mapped).some(([name, id]) => existing.elements[name] !== id);
    if (outcomes.some((outcome) => outcome.success) && (mappingChanged || transferredAny(outcomes))) {
      try {
        await saveDocumentMetadata(document.localDir, {
          documentId: document.documentId,
          workspaceId,
          documentName: document.name,
          folderPath: document.folderPath,
          url: `${this.settings.baseUrl}/documents/${document.documentId}/w/${workspaceId}`,
          lastSync: this.clock().toISOString(),
          elements: mapped,
        });
      } catch (error) {
        const message = `Failed to write ${METADATA_FILE} of '${document.name}': ${describeError(error)}`;
        outcomes.push(this.emit(this.failed("pull", label, message)));
      }
    }
    return outcomes;
  }

  private async pullElement(
    document: DocumentEntry,
    workspaceId: string,
    element: ElementInfo,
    options: SyncOptions
  ): Promise<SyncOutcome> {
    const fileName = this.fileNameFor(element.name);
    const localFile = path.join(document.localDir, fileName);
    const key = this.keyFor(localFile);

    try {
      const { content, versionToken } = await this.store.getElementContent(
        document.documentId,
        workspaceId,
        element.id
      );
      const previous = await this.state.get(key);
      const localHash = await hashFile(localFile);
      const report = detectPullConflict(key, previous, localHash, versionToken);

      const blocked = this.reportConflict("pull", report, options);
      if (blocked) {
        return blocked;
      }
      if (
        !options.force &&
        previous &&
        localHash === previous.localHash &&
        versionToken === previous.remoteVersion
      ) {
        return this.emit(this.skipped("pull", key, "Already in sync"));
      }

      if (this.settings.backupOnPull && localHash !== undefined) {
        await this.backupFile(localFile, key);
      }
      await fs.mkdir(document.localDir, { recursive: true });
      await fs.writeFile(localFile, content, "utf-8");

      await this.state.set(key, {
        localHash: hashContent(content),
        remoteVersion: versionToken,
        lastSync: this.clock().toISOString(),
        elementId: element.id,
        documentId: document.documentId,
        workspaceId,
      });
      await this.state.save();

      const overwritten = previous && localHash !== undefined && localHash !== previous.localHash;
      return this.emit(
        this.succeeded("pull", key, this.transferMessage(`Pulled ${fileName}`, report, !!overwritten))
      );
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      return this.emit(this.failed("pull", key, `Failed to pull ${fileName}: ${describeError(error)}`));
    }
  }

  private async backupFile(localFile: string, key: string): Promise<void> {
    const backupDir = path.resolve(this.baseDir, this.settings.backupDir);
    await fs.mkdir(backupDir, { recursive: true });

    const ext = path.extname(localFile);
    const stem = path.basename(localFile, ext);
    const stamp = formatBackupTimestamp(this.clock());
    let candidate = path.join(backupDir, `${stem}_${stamp}${ext}`);
    for (let n = 1; await pathExists(candidate); n++) {
      candidate = path.join(backupDir, `${stem}_${stamp}_${n}${ext}`);
    }

    await fs.copyFile(localFile, candidate);
    this.reporter.report({ type: "backup", source: key, backup: this.keyFor(candidate) });
  }

  // --- Push ---

  /**
   * Push every target in order. All targets are checked for their sidecars
   * before anything is submitted.
   * @throws ConfigurationError when a document target was never pulled or a sidecar is not valid JSON
   */
  async push(targets: readonly SyncTarget[], options: SyncOptions = {}): Promise<SyncOutcome[]> {
    const plans: PushPlan[] = [];
    for (const target of targets) {
      plans.push(await this.planPush(target));
    }

    const outcomes: SyncOutcome[] = [];
    for (const plan of plans) {
      outcomes.push(...(await this.executePush(plan, options)));
    }
    return outcomes;
  }

  async pushTarget(target: SyncTarget, options: SyncOptions = {}): Promise<SyncOutcome[]> {
    return this.push([target], options);
  }

  private async planPush(target: SyncTarget): Promise<PushPlan> {
    const root = this.resolveTarget(target).localPath;
    const rootExists = await pathExists(root);
    const readOnly = this.readOnlyRoots().map((localPath) => path.resolve(this.baseDir, localPath));
    const isReadOnly = (dir: string) => readOnly.some((readOnlyRoot) => isWithin(dir, readOnlyRoot));

    if (target.kind === "document") {
      if (isReadOnly(root)) {
        return { target, root, rootExists, documents: [{ kind: "skipped", dir: root, reason: READ_ONLY_SKIP }] };
      }
      const document = rootExists ? await this.planDocument(root) : null;
      if (!document) {
        throw new ConfigurationError(
          `No ${METADATA_FILE} found in ${this.keyFor(root)} - pull '${target.name}' first`
        );
      }
      return { target, root, rootExists, documents: [document] };
    }

    const documents: PushDocument[] = [];
    if (!rootExists) {
      return { target, root, rootExists, documents };
    }
    let dirs: string[];
    try {
      dirs = await findDocumentDirs(root);
    } catch (error) {
      const message = `Failed to scan ${this.keyFor(root)}: ${describeError(error)}`;
      return { target, root, rootExists, documents, error: message };
    }
    for (const dir of dirs) {
      const relative = normalizeStatePath(dir, root);
      if (relative !== "" && isExcluded(relative, target.exclude)) {
        documents.push({ kind: "skipped", dir, reason: "Excluded by pattern" });
      } else if (isReadOnly(dir)) {
        documents.push({ kind: "skipped", dir, reason: READ_ONLY_SKIP });
      } else {
        const document = await this.planDocument(dir);
        if (document) {
          documents.push(document);
        }
      }
    }
    return { target, root, rootExists, documents };
  }

  /**
   * The push entry for one directory, or null when it has no sidecar.
   * @throws ConfigurationError when the sidecar cannot be parsed
   */
  private async planDocument(dir: string): Promise<PushDocument | null> {
    try {
      const metadata = await loadDocumentMetadata(dir);
      return metadata ? { kind: "document", dir, metadata } : null;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      return { kind: "failed", dir, reason: `Failed to read ${METADATA_FILE}: ${describeError(error)}` };
    }
  }

  private async executePush(plan: PushPlan, options: SyncOptions): Promise<SyncOutcome[]> {
    const { target, root } = plan;
    this.reporter.report({ type: "target", operation: "push", name: target.name, dryRun: !!options.dryRun });

    if (!plan.rootExists) {
      return [this.emit(this.failed("push", this.keyFor(root), `Local path not found: ${this.keyFor(root)}`))];
    }
    if (plan.error) {
      return [this.emit(this.failed("push", this.keyFor(root), plan.error))];
    }
    if (plan.documents.length === 0) {
      return [
        this.emit(
          this.skipped("push", this.keyFor(root), `No synced documents under ${this.keyFor(root)} - pull first`)
        ),
      ];
    }

    const outcomes: SyncOutcome[] = [];
    for (const document of plan.documents) {
      switch (document.kind) {
        case "skipped":
          outcomes.push(this.emit(this.skipped("push", this.keyFor(document.dir), document.reason)));
          break;
        case "failed":
          outcomes.push(this.emit(this.failed("push", this.keyFor(document.dir), document.reason)));
          break;
        case "document":
          outcomes.push(...(await this.pushDocument(document.dir, document.metadata, options)));
          break;
      }
    }
    return outcomes;
  }

  private async pushDocument(dir: string, metadata: DocumentMetadata, options: SyncOptions): Promise<SyncOutcome[]> {
    this.reporter.report({
      type: "document",
      operation: "push",
      documentId: metadata.documentId,
      name: metadata.documentName,
      localDir: dir,
    });

    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      const label = this.keyFor(dir);
      return [this.emit(this.failed("push", label, `Failed to read ${label}: ${describeError(error)}`))];
    }
    const files = entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(this.settings.fileExtension))
      .map((entry) => entry.name)
      .sort();
    if (files.length === 0) {
      return [
        this.emit(
          this.skipped("push", this.keyFor(dir), `No ${this.settings.fileExtension} files in ${this.keyFor(dir)}`)
        ),
      ];
    }

    const outcomes: SyncOutcome[] = [];
    const chain: { current?: TokenChain } = {};
    for (const fileName of files) {
      outcomes.push(await this.pushFile(metadata, path.join(dir, fileName), chain, options));
    }

    if (chain.current) {
      await this.advanceStaleTokens(dir, metadata.documentId, chain.current);
    }
    return outcomes;
  }

  private async pushFile(
    metadata: DocumentMetadata,
    localFile: string,
    chain: { current?: TokenChain },
    options: SyncOptions
  ): Promise<SyncOutcome> {
    const fileName = path.basename(localFile);
    const stem = fileName.slice(0, fileName.length - this.settings.fileExtension.length);
    const key = this.keyFor(localFile);

    const elementId = resolveElementId(metadata.elements, stem);
    if (!elementId) {
      return this.emit(this.failed("push", key, `No element ID found for ${stem} - pull first`));
    }

    try {
      const bytes = await fs.readFile(localFile);
      const localHash = hashContent(bytes);
      const content = bytes.toString("utf-8");
      const previous = await this.state.get(key);
      const live = await this.store.getVersionToken(metadata.documentId, metadata.workspaceId);

      const effective =
        previous && chain.current && chain.current.explains(previous.remoteVersion, live)
          ? previous.remoteVersion
          : live;
      const report = detectPushConflict(key, previous, effective);

      const blocked = this.reportConflict("push", report, options);
      if (blocked) {
        return blocked;
      }
      if (
        !options.force &&
        previous &&
        localHash === previous.localHash &&
        effective === previous.remoteVersion
      ) {
        return this.emit(this.skipped("push", key, "Already in sync"));
      }
      if (options.dryRun) {
        return this.emit(this.skipped("push", key, `[DRY RUN] Would push ${fileName}`));
      }

      const newToken = await this.store.submitElementContent(
        metadata.documentId,
        metadata.workspaceId,
        elementId,
        content
      );
      if (!chain.current || chain.current.last !== live) {
        chain.current = new TokenChain(live);
      }
      chain.current.advance(newToken);

      await this.state.set(key, {
        localHash,
        remoteVersion: newToken,
        lastSync: this.clock().toISOString(),
        elementId,
        documentId: metadata.documentId,
        workspaceId: metadata.workspaceId,
      });
      await this.state.save();

      return this.emit(this.succeeded("push", key, this.transferMessage(`Pushed ${fileName}`, report, false)));
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      return this.emit(this.failed("push", key, `Failed to push ${fileName}: ${describeError(error)}`));
    }
  }

  /**
   * After pushing a document directory, move every file in that directory
   * still recorded at one of this run's intermediate tokens to the final
   * token. Other local copies of the same document keep their tokens.
   */
  private async advanceStaleTokens(dir: string, documentId: string, chain: TokenChain): Promise<void> {
    let changed = false;
    for (const key of await this.state.list()) {
      if (path.dirname(path.resolve(this.baseDir, key)) !== dir) {
        continue;
      }
      const tracked = await this.state.get(key);
      if (tracked && tracked.documentId === documentId && chain.isStale(tracked.remoteVersion)) {
        await this.state.set(key, { ...tracked, remoteVersion: chain.last });
        changed = true;
      }
    }
    if (changed) {
      await this.state.save();
    }
  }

  // --- Helpers ---

  /**
   * Emit the conflict report and return the blocking outcome, if any.
   */
  private reportConflict(
    operation: SyncOperation,
    report: ConflictReport,
    options: SyncOptions
  ): SyncOutcome | undefined {
    if (report.kind === "none") {
      return undefined;
    }
    this.reporter.report({ type: "conflict", operation, report, forced: !!options.force });
    if (isBlocking(report) && !options.force) {
      return this.emit({
        filepath: report.filepath,
        operation,
        success: false,
        conflict: true,
        skipped: false,
        message: report.message,
      });
    }
    return undefined;
  }

  private transferMessage(base: string, report: ConflictReport, overwritten: boolean): string {
    if (report.kind !== "none") {
      return `${base} (forced past conflict: ${report.message})`;
    }
    return overwritten ? `${base} (local changes overwritten)` : base;
  }

  private resolveTarget(target: SyncTarget): SyncTarget {
    return { ...target, localPath: path.resolve(this.baseDir, target.localPath) };
  }

  private fileNameFor(elementName: string): string {
    return `${sanitizeFilename(elementName)}${this.settings.fileExtension}`;
  }

  private keyFor(localPath: string): string {
    return normalizeStatePath(localPath, this.baseDir);
  }

  private emit(outcome: SyncOutcome): SyncOutcome {
    this.reporter.report({ type: "outcome", outcome });
    return outcome;
  }

  private succeeded(operation: SyncOperation, filepath: string, message: string): SyncOutcome {
    return { filepath, operation, success: true, conflict: false, skipped: false, message };
  }

  private skipped(operation: SyncOperation, filepath: string, message: string): SyncOutcome {
    return { filepath, operation, success: true, conflict: false, skipped: true, message };
  }

  private failed(operation: SyncOperation, filepath: string, message: string): SyncOutcome {
    return { filepath, operation, success: false, conflict: false, skipped: false, message };
  }
}

/**
 * Element id for a local file stem: exact element name first, then the
 * element whose sanitized name is the stem.
 */
export function resolveElementId(
  elements: DocumentMetadata["elements"],
  stem: string
): string | undefined {
  if (Object.prototype.hasOwnProperty.call(elements, stem)) {
    return elements[stem];
  }
  const match = Object.entries(elements).find(([name]) => sanitizeFilename(name) === stem);
  return match?.[1];
}
