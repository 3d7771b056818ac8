/**
 * Tests for converting between the settings file and core types.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { DEFAULT_SETTINGS, type PolicySettings } from "@cadsync/core";
import type { ProjectConfigRaw, ReferenceConfigRaw } from "../src/config";
import { parseConfigText } from "../src/parser";
import {
  JsoncSettingsRepository,
  convertDocument,
  convertFolder,
  convertPolicySettings,
  convertProject,
  convertReference,
  convertSettings,
  encodePolicySettings,
  encodeProject,
  encodeReference,
} from "../src/settings";

describe("convertSettings", () => {
  it("should fall back to the engine defaults", () => {
    expect(convertSettings()).toEqual(DEFAULT_SETTINGS);
  });

  it("should map every snake_case key", () => {
    expect(
      convertSettings(
        {
          backup_on_pull: false,
          backup_dir: "backups",
          file_extension: ".txt",
          element_type: "PARTSTUDIO",
          default_workspace: "dev",
          max_depth: 2,
        },
        "https://example.onshape.com"
      )
    ).toEqual({
      backupOnPull: false,
      backupDir: "backups",
      fileExtension: ".txt",
      elementKind: "PARTSTUDIO",
      defaultWorkspace: "dev",
      maxDepth: 2,
      baseUrl: "https://example.onshape.com",
    });
  });
});

describe("targets", () => {
  it("should default folder targets to recursive with no excludes", () => {
    expect(convertFolder({ name: "Main", folder_id: "f-main", local_path: "cad" })).toEqual({
      kind: "folder",
      name: "Main",
      folderId: "f-main",
      localPath: "cad",
      recursive: true,
      exclude: [],
    });
  });

  it("should keep folder depth and excludes", () => {
    const target = convertFolder({
      name: "Main",
      folder_id: "f-main",
      local_path: "cad",
      recursive: false,
      max_depth: 1,
      exclude: ["Archive/**"],
    });
    expect(target).toMatchObject({ recursive: false, maxDepth: 1, exclude: ["Archive/**"] });
  });

  it("should map document targets", () => {
    expect(convertDocument({ name: "Solo", document_id: "d-solo", workspace_id: "w-dev", local_path: "solo" })).toEqual({
      kind: "document",
      name: "Solo",
      documentId: "d-solo",
      workspaceId: "w-dev",
      localPath: "solo",
      exclude: [],
    });
  });
});

describe("references", () => {
  const raw: ReferenceConfigRaw = {
    name: "Lib",
    type: "document",
    url: "https://cad.onshape.com/documents/d/d-lib/w/w-main",
    local_path: "references/Lib",
  };

  it("should read the address from the URL when no ids are stored", () => {
    expect(convertReference(raw)).toEqual({
      name: "Lib",
      url: raw.url,
      localPath: "references/Lib",
      address: { kind: "document", documentId: "d-lib", workspaceId: "w-main" },
      readOnly: true,
      autoUpdate: false,
      recursive: true,
    });
  });

  it("should prefer stored ids over the URL", () => {
    const reference = convertReference({
      ...raw,
      type: "folder",
      url: "https://cad.onshape.com/documents/folder/f-other",
      folder_id: "f-lib",
      document_id: null,
    });
    expect(reference.address).toEqual({ kind: "folder", folderId: "f-lib" });
  });

  it("should write every field back", () => {
    const reference = convertReference({ ...raw, auto_update: true, last_sync: "2024-03-05T06:07:08.000Z" });
    expect(encodeReference(reference)).toEqual({
      name: "Lib",
      type: "document",
      url: raw.url,
      local_path: "references/Lib",
      read_only: true,
      auto_update: true,
      recursive: true,
      last_sync: "2024-03-05T06:07:08.000Z",
      document_id: "d-lib",
      workspace_id: "w-main",
      folder_id: null,
    });
  });
});

describe("projects", () => {
  const raw: ProjectConfigRaw = {
    name: "Gearbox",
    working_directory: "projects/Gearbox",
    onshape_url: "https://cad.onshape.com/documents/folder/f-gear",
  };

  it("should fill defaults", () => {
    expect(convertProject(raw)).toEqual({
      name: "Gearbox",
      description: "",
      url: raw.onshape_url,
      workingDirectory: "projects/Gearbox",
      address: { kind: "folder", folderId: "f-gear" },
      references: [],
      recursive: true,
    });
  });

  it("should only write optional fields that are set", () => {
    expect(encodeProject(convertProject(raw))).toEqual({
      name: "Gearbox",
      description: "",
      working_directory: "projects/Gearbox",
      onshape_url: raw.onshape_url,
      references: [],
      last_pull: null,
      last_push: null,
      folder_id: "f-gear",
    });

    const document = convertProject({
      ...raw,
      onshape_url: "https://cad.onshape.com/documents/d/d-gear",
      recursive: false,
      last_pull: "2024-03-05T06:07:08.000Z",
    });
    expect(encodeProject(document)).toEqual({
      name: "Gearbox",
      description: "",
      working_directory: "projects/Gearbox",
      onshape_url: "https://cad.onshape.com/documents/d/d-gear",
      references: [],
      last_pull: "2024-03-05T06:07:08.000Z",
      last_push: null,
      document_id: "d-gear",
      recursive: false,
    });
  });
});

describe("policy settings", () => {
  it("should convert the document cache both ways", () => {
    const settings = convertPolicySettings({
      sync_metadata: {
        document_cache: { "d-lib": { version_token: "v3", last_checked: "2024-03-05T06:07:08.000Z" } },
      },
    });
    expect(settings).toEqual({
      references: [],
      projects: [],
      documentCache: { "d-lib": { versionToken: "v3", lastChecked: "2024-03-05T06:07:08.000Z" } },
    });
    expect(encodePolicySettings(settings)).toEqual({
      references: [],
      projects: [],
      sync_metadata: {
        document_cache: { "d-lib": { version_token: "v3", last_checked: "2024-03-05T06:07:08.000Z" } },
      },
    });
  });
});

describe("JsoncSettingsRepository", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "cadsync-settings-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should save policy changes and leave other sections alone", async () => {
    const file = path.join(dir, "cadsync.jsonc");
    await fs.writeFile(
      file,
      `{
  // engine
  "settings": { "backup_dir": "\${BACKUPS:-.sync-backups}" }
}
`
    );
    const settings: PolicySettings = {
      references: [
        convertReference({
          name: "Lib",
          type: "folder",
          url: "https://cad.onshape.com/documents/folder/f-lib",
          local_path: "references/Lib",
        }),
      ],
      projects: [],
      documentCache: {},
    };

    await new JsoncSettingsRepository(file).save(settings);

    const text = await fs.readFile(file, "utf-8");
    expect(text).toContain("// engine");
    expect(text).toContain(`"backup_dir": "\${BACKUPS:-.sync-backups}"`);
    expect(convertPolicySettings(parseConfigText(text, {}))).toEqual(settings);
  });
});
