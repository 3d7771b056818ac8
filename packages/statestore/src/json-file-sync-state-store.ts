/**
 * JsonFileSyncStateStore - SyncStateStore persisted as one JSON file.
 * The file is read on first access and rewritten wholesale by `save()`.
 */

import * as fs from "fs/promises";
import * as path from "path";
import {
  ConfigurationError,
  decodeSyncState,
  describeError,
  encodeSyncState,
  normalizeStatePath,
  readTextIfExists,
  type SyncStateStore,
  type TrackedFileState,
} from "@cadsync/core";

export class JsonFileSyncStateStore implements SyncStateStore {
  private readonly filePath: string;
  private files: Map<string, TrackedFileState> | null = null;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  get location(): string {
    return this.filePath;
  }

  async get(filePath: string): Promise<TrackedFileState | null> {
    const state = (await this.load()).get(normalizeStatePath(filePath));
    return state ? { ...state } : null;
  }

  async set(filePath: string, state: TrackedFileState): Promise<void> {
    (await this.load()).set(normalizeStatePath(filePath), { ...state });
  }

  async remove(filePath: string): Promise<void> {
    (await this.load()).delete(normalizeStatePath(filePath));
  }

  async list(): Promise<string[]> {
    return Array.from((await this.load()).keys());
  }

  async save(): Promise<void> {
    const files = await this.load();
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const body = JSON.stringify(encodeSyncState(files), null, 2);
    await fs.writeFile(this.filePath, `${body}\n`, "utf-8");
  }

  /**
   * Load the file once. A missing file is an empty state.
   * @throws ConfigurationError if the file exists but cannot be parsed
   */
  private async load(): Promise<Map<string, TrackedFileState>> {
    if (this.files) {
      return this.files;
    }
    const content = await readTextIfExists(this.filePath);
    if (content === undefined) {
      this.files = new Map();
      return this.files;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(
        `Failed to parse sync state ${this.filePath}: ${describeError(error)}`,
        error
      );
    }
    this.files = decodeSyncState(parsed);
    return this.files;
  }
}
