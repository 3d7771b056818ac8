/**
 * InMemorySyncStateStore - An in-memory implementation of SyncStateStore for testing.
 * `save()` snapshots the current map so tests can see what was persisted and when.
 */

import { normalizeStatePath, type SyncStateStore, type TrackedFileState } from "@cadsync/core";

export class InMemorySyncStateStore implements SyncStateStore {
  private files: Map<string, TrackedFileState>;
  private snapshots: Map<string, TrackedFileState>[];

  constructor(initial?: { [filePath: string]: TrackedFileState }) {
    this.files = new Map();
    for (const [key, value] of Object.entries(initial ?? {})) {
      this.files.set(normalizeStatePath(key), { ...value });
    }
    this.snapshots = [];
  }

  async get(filePath: string): Promise<TrackedFileState | null> {
    const state = this.files.get(normalizeStatePath(filePath));
    return state ? { ...state } : null;
  }

  async set(filePath: string, state: TrackedFileState): Promise<void> {
    this.files.set(normalizeStatePath(filePath), { ...state });
  }

  async remove(filePath: string): Promise<void> {
    this.files.delete(normalizeStatePath(filePath));
  }

  async list(): Promise<string[]> {
    return Array.from(this.files.keys());
  }

  async save(): Promise<void> {
    const snapshot = new Map<string, TrackedFileState>();
    for (const [key, value] of this.files) {
      snapshot.set(key, { ...value });
    }
    this.snapshots.push(snapshot);
  }

  /**
   * Number of times `save()` was called.
   */
  get saveCount(): number {
    return this.snapshots.length;
  }

  /**
   * Contents as of the most recent `save()`, or undefined before the first.
   */
  lastSaved(): ReadonlyMap<string, TrackedFileState> | undefined {
    return this.snapshots[this.snapshots.length - 1];
  }

  clear(): void {
    this.files.clear();
    this.snapshots = [];
  }
}
