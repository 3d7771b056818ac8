import { exitCodeFor, summarizeOutcomes, transferredAny } from "../src/summary";
import type { SyncOutcome } from "../src/types";

function outcome(overrides: Partial<SyncOutcome>): SyncOutcome {
  return {
    filepath: "a.fs",
    operation: "pull",
    success: true,
    conflict: false,
    skipped: false,
    message: "",
    ...overrides,
  };
}

describe("summarizeOutcomes", () => {
  it("should count each outcome exactly once", () => {
    const summary = summarizeOutcomes([
      outcome({}),
      outcome({ skipped: true }),
      outcome({ success: false, conflict: true }),
      outcome({ success: false }),
      outcome({ success: false }),
    ]);

    expect(summary).toEqual({ succeeded: 1, skipped: 1, conflicted: 1, failed: 2 });
  });

  it("should exit 0 when nothing failed or conflicted", () => {
    expect(exitCodeFor(summarizeOutcomes([outcome({}), outcome({ skipped: true })]))).toBe(0);
    expect(exitCodeFor(summarizeOutcomes([]))).toBe(0);
  });

  it("should exit 1 on a conflict", () => {
    expect(exitCodeFor(summarizeOutcomes([outcome({ success: false, conflict: true })]))).toBe(1);
  });
});

describe("transferredAny", () => {
  it("should ignore skipped and failed outcomes", () => {
    expect(transferredAny([outcome({ skipped: true }), outcome({ success: false })])).toBe(false);
    expect(transferredAny([outcome({ skipped: true }), outcome({})])).toBe(true);
  });
});
