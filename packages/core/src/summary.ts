/**
 * Aggregate counts over outcomes and the resulting exit code.
 */

import type { SyncOutcome } from "./types.js";

export interface OutcomeSummary {
  succeeded: number;
  skipped: number;
  conflicted: number;
  failed: number;
}

export function summarizeOutcomes(outcomes: readonly SyncOutcome[]): OutcomeSummary {
  const summary: OutcomeSummary = { succeeded: 0, skipped: 0, conflicted: 0, failed: 0 };
  for (const outcome of outcomes) {
    if (outcome.conflict) {
      summary.conflicted++;
    } else if (!outcome.success) {
      summary.failed++;
    } else if (outcome.skipped) {
      summary.skipped++;
    } else {
      summary.succeeded++;
    }
  }
  return summary;
}

/**
 * Non-zero when anything conflicted or failed.
 */
export function exitCodeFor(summary: OutcomeSummary): number {
  return summary.conflicted > 0 || summary.failed > 0 ? 1 : 0;
}

/**
 * True when at least one file was actually transferred.
 */
export function transferredAny(outcomes: readonly SyncOutcome[]): boolean {
  return outcomes.some((outcome) => outcome.success && !outcome.skipped);
}
