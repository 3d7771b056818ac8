/**
 * Tests for command output.
 */

import {
  formatOutcome,
  formatProjectStatus,
  formatReferenceResult,
  formatReferences,
  formatTree,
} from "../src/output";

describe("output", () => {
  it("should mark outcomes by result", () => {
    const base = { filepath: "cad/Gears/Gear.fs", operation: "pull" as const, message: "m" };
    expect(formatOutcome({ ...base, success: true, conflict: false, skipped: false })).toBe("✓ cad/Gears/Gear.fs: m");
    expect(formatOutcome({ ...base, success: true, conflict: false, skipped: true })).toBe("- cad/Gears/Gear.fs: m");
    expect(formatOutcome({ ...base, success: false, conflict: true, skipped: false })).toBe("! cad/Gears/Gear.fs: m");
    expect(formatOutcome({ ...base, success: false, conflict: false, skipped: false })).toBe("✗ cad/Gears/Gear.fs: m");
  });

  it("should indent nested folders before documents", () => {
    const tree = {
      id: "root",
      name: "",
      folders: [{ id: "f1", name: "Parts", folders: [], documents: [{ id: "d2", name: "Bracket" }] }],
      documents: [{ id: "d1", name: "Gears" }],
    };
    expect(formatTree(tree)).toEqual(["📁 Parts (f1)", "  📄 Bracket (d2)", "📄 Gears (d1)"]);
  });

  it("should list references", () => {
    expect(formatReferences([])).toEqual(["No references configured"]);
    expect(
      formatReferences([
        {
          name: "Lib",
          url: "https://cad.onshape.com/documents/d/d-lib",
          localPath: "references/Lib",
          address: { kind: "document", documentId: "d-lib" },
          readOnly: true,
          autoUpdate: true,
          recursive: true,
        },
      ])
    ).toEqual(["Lib  [document d-lib]", "  path: references/Lib", "  auto-update: yes", "  last sync: never"]);
  });

  it("should mark reference results", () => {
    expect(formatReferenceResult({ name: "Lib", updated: true, outcomes: [], message: "Updated" })).toBe("✓ Lib: Updated");
    expect(
      formatReferenceResult({ name: "Lib", updated: false, outcomes: [], needsUpdate: true, message: "Update available" })
    ).toBe("↻ Lib: Update available");
  });

  it("should pad project file statuses", () => {
    expect(
      formatProjectStatus({
        name: "Gearbox",
        workingDirectory: "projects/Gearbox",
        lastPull: "2024-03-05T06:07:08.000Z",
        files: [{ path: "projects/Gearbox/Gear.fs", status: "in_sync" }],
      })
    ).toEqual([
      "Project Gearbox (projects/Gearbox)",
      "  last pull: 2024-03-05T06:07:08.000Z, last push: never",
      "  in_sync           projects/Gearbox/Gear.fs",
    ]);
  });
});
