/**
 * Tests for the reference and project managers and read-only enforcement.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { SyncEngine } from "../src/engine";
import { ConfigurationError, PolicyError } from "../src/errors";
import { assertPushAllowed, targetForAddress, type ManagerContext } from "../src/policy";
import { ProjectManager } from "../src/projects";
import { ReferenceManager } from "../src/references";
import type { PolicySettings, ReferenceConfig, SettingsRepository } from "../src/types";
import { InMemoryDocumentStore } from "@cadsync/adapter-in-memory";
import { InMemorySyncStateStore } from "@cadsync/statestore";

const START = new Date("2024-03-05T06:00:00.000Z");
const HOUR_MS = 60 * 60 * 1000;

class RecordingRepository implements SettingsRepository {
  readonly saved: PolicySettings[] = [];

  async save(settings: PolicySettings): Promise<void> {
    this.saved.push(structuredClone(settings));
  }
}

interface Fixture {
  baseDir: string;
  store: InMemoryDocumentStore;
  repository: RecordingRepository;
  settings: PolicySettings;
  references: ReferenceManager;
  projects: ProjectManager;
  advance(ms: number): void;
}

async function createFixture(): Promise<Fixture> {
  const baseDir = await fs.mkdtemp(path.join(os.tmpdir(), "cadsync-policy-"));
  const store = new InMemoryDocumentStore();
  store.addFolder("f-lib", "Library", "root");
  store.addDocument("d-lib", "Fasteners", "f-lib");
  store.addElement("d-lib", { id: "e-bolt", name: "Bolt", content: "bolt v1" });
  store.addDocument("d-gear", "Gears", "root");
  store.addElement("d-gear", { id: "e-gear", name: "Gear", content: "gear v1" });
  store.addElement("d-gear", { id: "e-shaft", name: "Shaft", content: "shaft v1" });

  let now = START;
  const clock = () => now;
  const state = new InMemorySyncStateStore();
  const settings: PolicySettings = { references: [], projects: [], documentCache: {} };
  const engine = new SyncEngine({
    baseDir,
    store,
    state,
    clock,
    settings: { backupOnPull: false },
    readOnlyRoots: () => settings.references.map((reference) => reference.localPath),
  });
  const repository = new RecordingRepository();
  const ctx: ManagerContext = { baseDir, settings, repository, engine, store, state, clock };

  return {
    baseDir,
    store,
    repository,
    settings,
    references: new ReferenceManager(ctx),
    projects: new ProjectManager(ctx),
    advance(ms: number) {
      now = new Date(now.getTime() + ms);
    },
  };
}

function read(fixture: Fixture, relative: string): Promise<string> {
  return fs.readFile(path.join(fixture.baseDir, relative), "utf-8");
}

const LIB_URL = "https://cad.onshape.com/documents/d/d-lib";
const GEAR_URL = "https://cad.onshape.com/documents/d/d-gear";

function addLib(fixture: Fixture) {
  return fixture.references.add({
    name: "Lib",
    url: LIB_URL,
    address: { kind: "document", documentId: "d-lib" },
    autoUpdate: true,
  });
}

describe("assertPushAllowed", () => {
  const baseDir = path.resolve("/tmp/work");
  const references: ReferenceConfig[] = [
    {
      name: "Lib",
      url: LIB_URL,
      localPath: "references/Lib",
      address: { kind: "document", documentId: "d-lib" },
      readOnly: true,
      autoUpdate: true,
      recursive: true,
    },
  ];

  it("should refuse the reference root and anything inside it", () => {
    expect(() => assertPushAllowed("references/Lib", references, baseDir)).toThrow(PolicyError);
    expect(() => assertPushAllowed("references/Lib/sub", references, baseDir)).toThrow(
      "Cannot push to 'references/Lib/sub': it is inside read-only reference 'Lib' (references/Lib)"
    );
  });

  it("should name the reference on the error", () => {
    try {
      assertPushAllowed("./references/Lib", references, baseDir);
      throw new Error("expected a PolicyError");
    } catch (error) {
      expect(error).toBeInstanceOf(PolicyError);
      expect(error instanceof PolicyError && error.referenceName).toBe("Lib");
    }
  });

  it("should allow siblings that only share a name prefix", () => {
    expect(() => assertPushAllowed("references/Library", references, baseDir)).not.toThrow();
    expect(() => assertPushAllowed("projects/x", references, baseDir)).not.toThrow();
  });
});

describe("targetForAddress", () => {
  it("should build a folder target", () => {
    expect(targetForAddress("lib", { kind: "folder", folderId: "f1" }, "references/lib", false)).toEqual({
      kind: "folder",
      name: "lib",
      folderId: "f1",
      localPath: "references/lib",
      recursive: false,
      exclude: [],
    });
  });

  it("should build a document target carrying the workspace", () => {
    expect(
      targetForAddress("gear", { kind: "document", documentId: "d1", workspaceId: "w9" }, "p", true)
    ).toEqual({ kind: "document", name: "gear", documentId: "d1", workspaceId: "w9", localPath: "p", exclude: [] });
  });
});

describe("ReferenceManager", () => {
  let fixture: Fixture;

  beforeEach(async () => {
    fixture = await createFixture();
  });

  afterEach(async () => {
    await fs.rm(fixture.baseDir, { recursive: true, force: true });
  });

  it("should pull a new document reference and cache its token", async () => {
    const result = await fixture.references.add({
      name: "Lib",
      url: LIB_URL,
      address: { kind: "document", documentId: "d-lib" },
    });

    expect(result.updated).toBe(true);
    expect(result.message).toBe("Updated");
    expect(await read(fixture, "references/Lib/Bolt.fs")).toBe("bolt v1");
    expect(fixture.settings.references[0]).toMatchObject({
      localPath: "references/Lib",
      readOnly: true,
      autoUpdate: false,
      lastSync: START.toISOString(),
    });
    expect(fixture.settings.documentCache["d-lib"]).toEqual({
      versionToken: "v1",
      lastChecked: START.toISOString(),
    });
    expect(fixture.repository.saved).toHaveLength(2);
  });

  it("should refuse a local path inside a project working directory", async () => {
    await fixture.projects.add({
      name: "Gears",
      url: GEAR_URL,
      address: { kind: "document", documentId: "d-gear" },
    });

    await expect(
      fixture.references.add({
        name: "Lib",
        url: LIB_URL,
        address: { kind: "document", documentId: "d-lib" },
        localPath: "projects/Gears/libs/Lib",
      })
    ).rejects.toThrow("Reference 'Lib' cannot live inside project 'Gears' (projects/Gears)");
    expect(fixture.settings.references).toEqual([]);
  });

  it("should reject duplicate names", async () => {
    await addLib(fixture);

    await expect(addLib(fixture)).rejects.toThrow("Reference 'Lib' already exists");
  });

  it("should raise ConfigurationError for unknown names", () => {
    expect(() => fixture.references.get("Nope")).toThrow(ConfigurationError);
  });

  it("should need an update once the document token moves", async () => {
    await addLib(fixture);
    const reference = fixture.references.get("Lib");

    expect(await fixture.references.needsUpdate(reference)).toBe(false);
    fixture.store.editElement("d-lib", "e-bolt", "bolt v2");
    expect(await fixture.references.needsUpdate(reference)).toBe(true);
  });

  it("should need an update for a folder reference after a day", async () => {
    await fixture.references.add({ name: "Shelf", url: "u", address: { kind: "folder", folderId: "f-lib" } });
    const reference = fixture.references.get("Shelf");

    expect(await read(fixture, "references/Shelf/Fasteners/Bolt.fs")).toBe("bolt v1");
    fixture.advance(23 * HOUR_MS);
    expect(await fixture.references.needsUpdate(reference)).toBe(false);
    fixture.advance(HOUR_MS);
    expect(await fixture.references.needsUpdate(reference)).toBe(true);
  });

  it("should only report when checking", async () => {
    await addLib(fixture);
    fixture.store.editElement("d-lib", "e-bolt", "bolt v2");

    const results = await fixture.references.update({ checkOnly: true });

    expect(results).toEqual([
      { name: "Lib", updated: false, outcomes: [], needsUpdate: true, message: "Update available" },
    ]);
    expect(await read(fixture, "references/Lib/Bolt.fs")).toBe("bolt v1");
  });

  it("should overwrite local edits when updating", async () => {
    await addLib(fixture);
    await fs.writeFile(path.join(fixture.baseDir, "references/Lib/Bolt.fs"), "edited");
    fixture.store.editElement("d-lib", "e-bolt", "bolt v2");
    fixture.advance(HOUR_MS);

    const [result] = await fixture.references.update();

    expect(result.message).toBe("Updated");
    expect(await read(fixture, "references/Lib/Bolt.fs")).toBe("bolt v2");
    expect(fixture.settings.documentCache["d-lib"].versionToken).toBe("v2");
    expect(fixture.references.get("Lib").lastSync).toBe(new Date(START.getTime() + HOUR_MS).toISOString());
  });

  it("should leave up-to-date references alone", async () => {
    await addLib(fixture);
    fixture.store.reset();

    const [result] = await fixture.references.update();

    expect(result.message).toBe("Up to date");
    expect(fixture.store.callsTo("getElementContent")).toHaveLength(0);
  });

  it("should skip references with auto-update off unless forced", async () => {
    await fixture.references.add({
      name: "Lib",
      url: LIB_URL,
      address: { kind: "document", documentId: "d-lib" },
      autoUpdate: false,
    });

    expect((await fixture.references.update())[0].message).toBe("Auto-update disabled");
    expect((await fixture.references.update({ force: true }))[0].message).toBe("Updated");
  });

  it("should capture a failing reference in its result", async () => {
    await addLib(fixture);
    fixture.store.failOn("getVersionToken");

    const [result] = await fixture.references.update();

    expect(result).toEqual({
      name: "Lib",
      updated: false,
      outcomes: [],
      message: "Update failed: Simulated failure in getVersionToken",
    });
  });

  it("should keep lastSync when a file fails to pull", async () => {
    await addLib(fixture);
    fixture.store.failOn("getElementContent");
    fixture.advance(HOUR_MS);

    const result = await fixture.references.updateOne("Lib");

    expect(result.updated).toBe(false);
    expect(result.message).toBe("1 file(s) failed");
    expect(fixture.references.get("Lib").lastSync).toBe(START.toISOString());
  });

  it("should remove a reference with its files and cache entry", async () => {
    await addLib(fixture);

    await fixture.references.remove("Lib", { deleteFiles: true });

    expect(fixture.references.list()).toEqual([]);
    expect(fixture.settings.documentCache).toEqual({});
    await expect(fs.access(path.join(fixture.baseDir, "references/Lib"))).rejects.toThrow();
  });
});

describe("ProjectManager", () => {
  let fixture: Fixture;

  beforeEach(async () => {
    fixture = await createFixture();
  });

  afterEach(async () => {
    await fs.rm(fixture.baseDir, { recursive: true, force: true });
  });

  async function addGears(): Promise<void> {
    await fixture.projects.add({
      name: "Gears",
      url: GEAR_URL,
      address: { kind: "document", documentId: "d-gear" },
    });
  }

  it("should pull a new project into its working directory", async () => {
    await addGears();

    expect(await read(fixture, "projects/Gears/Gear.fs")).toBe("gear v1");
    expect(fixture.projects.get("Gears")).toMatchObject({
      workingDirectory: "projects/Gears",
      description: "",
      references: [],
      lastPull: START.toISOString(),
    });
  });

  it("should reject unknown references", async () => {
    await expect(
      fixture.projects.add({ name: "P", url: GEAR_URL, address: { kind: "document", documentId: "d-gear" }, references: ["Nope"] })
    ).rejects.toThrow("Project 'P' uses unknown reference 'Nope'");
    expect(fixture.settings.projects).toEqual([]);
  });

  it("should refuse a working directory inside a reference", async () => {
    await addLib(fixture);

    await expect(
      fixture.projects.add({
        name: "Sneaky",
        url: GEAR_URL,
        address: { kind: "document", documentId: "d-gear" },
        workingDirectory: "references/Lib/mine",
      })
    ).rejects.toBeInstanceOf(PolicyError);
    expect(fixture.settings.projects).toEqual([]);
  });

  it("should refuse to push into a reference before any remote call", async () => {
    await addLib(fixture);
    fixture.settings.projects.push({
      name: "Edited",
      description: "",
      url: LIB_URL,
      workingDirectory: "references/Lib",
      address: { kind: "document", documentId: "d-lib" },
      references: [],
      recursive: true,
    });
    await fs.writeFile(path.join(fixture.baseDir, "references/Lib/Bolt.fs"), "edited");
    fixture.store.reset();

    await expect(fixture.projects.push("Edited")).rejects.toThrow(
      "Cannot push to 'references/Lib': it is inside read-only reference 'Lib' (references/Lib)"
    );
    expect(fixture.store.calls).toEqual([]);
    expect(fixture.store.getContent("d-lib", "e-bolt")).toBe("bolt v1");
  });

  it("should leave a reference nested in a folder project out of its push", async () => {
    await fixture.projects.add({
      name: "Work",
      url: "https://cad.onshape.com/documents/folder/root",
      address: { kind: "folder", folderId: "root" },
      workingDirectory: "work",
    });
    fixture.settings.references.push({
      name: "Lib",
      url: LIB_URL,
      localPath: "work/libs/Lib",
      address: { kind: "document", documentId: "d-lib" },
      readOnly: true,
      autoUpdate: false,
      recursive: true,
    });
    await fixture.references.updateOne("Lib");
    await fs.writeFile(path.join(fixture.baseDir, "work/libs/Lib/Bolt.fs"), "edited");
    fixture.store.reset();

    const outcomes = await fixture.projects.push("Work");

    expect(outcomes.map((outcome) => `${outcome.filepath}: ${outcome.message}`)).toContain(
      "work/libs/Lib: Inside a read-only reference, not pushed"
    );
    expect(outcomes.every((outcome) => outcome.skipped)).toBe(true);
    expect(fixture.store.callsTo("submitElementContent")).toEqual([]);
    expect(fixture.store.getContent("d-lib", "e-bolt")).toBe("bolt v1");
  });

  it("should stamp lastPull only when something was transferred", async () => {
    await addGears();
    fixture.advance(HOUR_MS);

    await fixture.projects.pull("Gears");
    expect(fixture.projects.get("Gears").lastPull).toBe(START.toISOString());

    fixture.store.editElement("d-gear", "e-gear", "gear v2");
    await fixture.projects.pull("Gears", { dryRun: true });
    expect(fixture.projects.get("Gears").lastPull).toBe(START.toISOString());

    await fixture.projects.pull("Gears");
    expect(fixture.projects.get("Gears").lastPull).toBe(new Date(START.getTime() + HOUR_MS).toISOString());
  });

  it("should push local edits and stamp lastPush", async () => {
    await addGears();
    await fs.writeFile(path.join(fixture.baseDir, "projects/Gears/Gear.fs"), "gear local");
    fixture.advance(HOUR_MS);

    const outcomes = await fixture.projects.push("Gears");

    expect(outcomes.map((outcome) => outcome.message)).toEqual(["Pushed Gear.fs", "Already in sync"]);
    expect(fixture.store.getContent("d-gear", "e-gear")).toBe("gear local");
    expect(fixture.projects.get("Gears").lastPush).toBe(new Date(START.getTime() + HOUR_MS).toISOString());
  });

  it("should not stamp lastPush when nothing was pushed", async () => {
    await addGears();

    await fixture.projects.push("Gears");

    expect(fixture.projects.get("Gears").lastPush).toBeUndefined();
  });

  it("should report per-file status", async () => {
    await addGears();
    const dir = path.join(fixture.baseDir, "projects/Gears");
    await fs.writeFile(path.join(dir, "Gear.fs"), "gear local");
    await fs.writeFile(path.join(dir, "New.fs"), "new");
    await fs.rm(path.join(dir, "Shaft.fs"));

    const local = await fixture.projects.status("Gears");
    expect(local.files).toEqual([
      { path: "projects/Gears/Gear.fs", status: "modified_locally" },
      { path: "projects/Gears/New.fs", status: "untracked" },
      { path: "projects/Gears/Shaft.fs", status: "deleted_locally" },
    ]);

    fixture.store.editElement("d-gear", "e-shaft", "shaft v2");
    const remote = await fixture.projects.status("Gears", { checkRemote: true });
    expect(remote.files[0]).toEqual({ path: "projects/Gears/Gear.fs", status: "both_modified" });
    expect(fixture.store.callsTo("getVersionToken")).toHaveLength(1);
  });

  it("should report in-sync and remotely modified files", async () => {
    await addGears();
    fixture.store.editElement("d-gear", "e-gear", "gear v2");

    const status = await fixture.projects.status("Gears", { checkRemote: true });

    expect(status.files).toEqual([
      { path: "projects/Gears/Gear.fs", status: "modified_remotely" },
      { path: "projects/Gears/Shaft.fs", status: "modified_remotely" },
    ]);
    expect((await fixture.projects.status("Gears")).files.map((file) => file.status)).toEqual([
      "in_sync",
      "in_sync",
    ]);
  });

  it("should raise ConfigurationError for unknown projects", async () => {
    await expect(fixture.projects.pull("Nope")).rejects.toThrow(ConfigurationError);
  });

  it("should remove a project", async () => {
    await addGears();

    const removed = await fixture.projects.remove("Gears");

    expect(removed.name).toBe("Gears");
    expect(fixture.projects.list()).toEqual([]);
    expect(await read(fixture, "projects/Gears/Gear.fs")).toBe("gear v1");
  });
});
