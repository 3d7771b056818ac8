/**
 * Structured events the engine emits instead of printing.
 */

import type { ConflictReport, SyncOperation, SyncOutcome } from "./types.js";

export type SyncEvent =
  | { type: "target"; operation: SyncOperation; name: string; dryRun: boolean }
  | { type: "document"; operation: SyncOperation; documentId: string; name: string; localDir: string }
  | { type: "conflict"; operation: SyncOperation; report: ConflictReport; forced: boolean }
  | { type: "backup"; source: string; backup: string }
  | { type: "outcome"; outcome: SyncOutcome };

export interface SyncReporter {
  report(event: SyncEvent): void;
}

/**
 * Discards every event.
 */
export class NullReporter implements SyncReporter {
  report(): void {}
}

/**
 * Keeps every event in order. Used by tests.
 */
export class CollectingReporter implements SyncReporter {
  readonly events: SyncEvent[] = [];

  report(event: SyncEvent): void {
    this.events.push(event);
  }

  ofType<T extends SyncEvent["type"]>(type: T): Extract<SyncEvent, { type: T }>[] {
    return this.events.filter((event): event is Extract<SyncEvent, { type: T }> => event.type === type);
  }
}
