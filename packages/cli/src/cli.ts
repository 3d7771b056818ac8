#!/usr/bin/env node
/**
 * cadsync CLI - Main entry point
 */

import { Command } from "commander";
import * as path from "path";
import * as fs from "fs/promises";
import { config } from "dotenv";
import * as cron from "node-cron";
import { describeError, summarizeSyncState, type SyncOptions } from "@cadsync/core";
import { OnshapeDocumentStore, normalizeOnshapeUrl, toRemoteAddress } from "@cadsync/adapter-onshape";
import { DEFAULT_CONFIG_FILE } from "./config.js";
import { getLog, logError, setLogLevel } from "./logger.js";
import { loadConfigFile } from "./parser.js";
import { LogReporter } from "./reporter.js";
import {
  createContext,
  createOnshapeClient,
  formatSummary,
  resultOf,
  runProjectPull,
  runProjectPush,
  runPull,
  runPush,
  type RunContext,
  type RunResult,
} from "./runner.js";
import {
  formatOutcome,
  formatProjectStatus,
  formatProjects,
  formatReferenceResult,
  formatReferences,
  formatSyncStatus,
  formatTree,
} from "./output.js";

// Load environment variables from .env file if it exists
config();

interface ConfigOptions {
  config: string;
}

interface SyncCommandOptions extends ConfigOptions {
  dryRun?: boolean;
  force?: boolean;
}

const program = new Command();

program
  .name("cadsync")
  .description("Sync Onshape Feature Studio elements with a local directory tree")
  .version("0.1.0")
  .option("-v, --verbose", "Log debug output");

program.hook("preAction", (thisCommand) => {
  if (thisCommand.opts().verbose === true) {
    setLogLevel("debug");
  }
});

/**
 * Build the context and run `action`, exiting with its code. Errors that
 * abort a command exit with 1.
 */
async function withContext(options: ConfigOptions, action: (ctx: RunContext) => Promise<number>): Promise<void> {
  let code: number;
  try {
    const ctx = await createContext(options.config, { reporter: new LogReporter(() => getLog("sync")) });
    if (ctx.config.settings?.verbose) {
      setLogLevel("debug");
    }
    code = await action(ctx);
  } catch (error) {
    logError(getLog("cli"), error, "Command failed");
    console.error(`Error: ${describeError(error)}`);
    code = 1;
  }
  process.exit(code);
}

function printResult(title: string, result: RunResult): number {
  for (const outcome of result.outcomes) {
    console.log(formatOutcome(outcome));
  }
  console.log(`\n${title}: ${formatSummary(result.summary)}`);
  return result.exitCode;
}

function syncOptions(options: SyncCommandOptions): SyncOptions {
  return { dryRun: options.dryRun === true, force: options.force === true };
}

program
  .command("pull")
  .description("Pull configured folders and documents (default: all)")
  .argument("[names...]", "Folder or document names to pull")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .option("--dry-run", "Report what would change without writing")
  .option("--force", "Overwrite local changes that conflict")
  .action(async (names: string[], options: SyncCommandOptions) => {
    await withContext(options, async (ctx) =>
      printResult("Pull", await runPull(ctx, { ...syncOptions(options), names }))
    );
  });

program
  .command("push")
  .description("Push local edits of configured folders and documents (default: all)")
  .argument("[names...]", "Folder or document names to push")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .option("--dry-run", "Report what would change without submitting")
  .option("--force", "Submit even when the remote changed")
  .action(async (names: string[], options: SyncCommandOptions) => {
    await withContext(options, async (ctx) =>
      printResult("Push", await runPush(ctx, { ...syncOptions(options), names }))
    );
  });

program
  .command("status")
  .description("Show files tracked in the sync state")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .action(async (options: ConfigOptions) => {
    await withContext(options, async (ctx) => {
      for (const line of formatSyncStatus(await summarizeSyncState(ctx.state))) {
        console.log(line);
      }
      return 0;
    });
  });

program
  .command("tree")
  .description("Show the folder hierarchy below a remote folder")
  .argument("<folder-id>", "Remote folder id")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .option("-d, --depth <n>", "Levels to descend", (value: string) => Number.parseInt(value, 10))
  .action(async (folderId: string, options: ConfigOptions & { depth?: number }) => {
    await withContext(options, async (ctx) => {
      const store = new OnshapeDocumentStore(createOnshapeClient(ctx.config));
      const tree = await store.getFolderTree(folderId, options.depth ?? ctx.settings.maxDepth);
      for (const line of formatTree(tree)) {
        console.log(line);
      }
      return 0;
    });
  });

program
  .command("verify-auth")
  .description("Check the API credentials")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .action(async (options: ConfigOptions) => {
    await withContext(options, async (ctx) => {
      const store = new OnshapeDocumentStore(createOnshapeClient(ctx.config));
      if (await store.verifyConnection()) {
        console.log("✓ Authentication succeeded");
        return 0;
      }
      console.error("✗ Authentication failed: unexpected session response");
      return 1;
    });
  });

program
  .command("validate")
  .description("Validate a configuration file without syncing")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .action(async (options: ConfigOptions) => {
    const configPath = path.resolve(options.config);
    try {
      await fs.access(configPath);
    } catch {
      console.error(`Error: Configuration file not found: ${configPath}`);
      process.exit(1);
    }
    try {
      const parsed = await loadConfigFile(configPath);
      console.log(`✓ Configuration file is valid: ${configPath}`);
      console.log(`  Folders: ${parsed.folders?.length ?? 0}`);
      console.log(`  Documents: ${parsed.documents?.length ?? 0}`);
      console.log(`  References: ${parsed.references?.length ?? 0}`);
      console.log(`  Projects: ${parsed.projects?.length ?? 0}`);
      process.exit(0);
    } catch (error) {
      console.error(`Configuration validation failed: ${describeError(error)}`);
      process.exit(1);
    }
  });

// --- References ---

const reference = program.command("reference").description("Manage read-only reference libraries");

reference
  .command("add")
  .description("Add a reference and pull it")
  .argument("<url>", "Folder or document URL")
  .argument("<name>", "Reference name")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .option("-p, --path <dir>", "Local directory (default: references/<name>)")
  .option("--auto-update", "Update on `reference update` and on schedule")
  .option("--no-recursive", "Do not descend into subfolders")
  .action(
    async (
      url: string,
      name: string,
      options: ConfigOptions & { path?: string; autoUpdate?: boolean; recursive: boolean }
    ) => {
      await withContext(options, async (ctx) => {
        const result = await ctx.references.add({
          name,
          url: normalizeOnshapeUrl(url),
          address: toRemoteAddress(url),
          localPath: options.path,
          autoUpdate: options.autoUpdate === true,
          recursive: options.recursive,
        });
        for (const outcome of result.outcomes) {
          console.log(formatOutcome(outcome));
        }
        console.log(formatReferenceResult(result));
        return result.updated ? 0 : 1;
      });
    }
  );

reference
  .command("list")
  .description("List references")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .action(async (options: ConfigOptions) => {
    await withContext(options, async (ctx) => {
      for (const line of formatReferences(ctx.references.list())) {
        console.log(line);
      }
      return 0;
    });
  });

reference
  .command("update")
  .description("Pull auto-updating references that changed, or one named reference")
  .argument("[name]", "Reference to update")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .option("--force", "Update every reference regardless of age or auto-update")
  .option("--check", "Only report which references need an update")
  .action(async (name: string | undefined, options: ConfigOptions & { force?: boolean; check?: boolean }) => {
    await withContext(options, async (ctx) => {
      const results = name
        ? [await ctx.references.updateOne(name)]
        : await ctx.references.update({ force: options.force === true, checkOnly: options.check === true });
      for (const result of results) {
        console.log(formatReferenceResult(result));
      }
      const failed = results.filter(
        (result) => result.message.startsWith("Update failed") || result.outcomes.some((o) => !o.success)
      );
      return failed.length > 0 ? 1 : 0;
    });
  });

reference
  .command("remove")
  .description("Remove a reference")
  .argument("<name>", "Reference name")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .option("--delete-files", "Also delete its local directory")
  .action(async (name: string, options: ConfigOptions & { deleteFiles?: boolean }) => {
    await withContext(options, async (ctx) => {
      const removed = await ctx.references.remove(name, { deleteFiles: options.deleteFiles === true });
      console.log(`Removed reference '${removed.name}'${options.deleteFiles ? ` and ${removed.localPath}` : ""}`);
      return 0;
    });
  });

// --- Projects ---

const project = program.command("project").description("Manage bidirectional working projects");

project
  .command("add")
  .description("Add a project and pull it")
  .argument("<url>", "Folder or document URL")
  .argument("<name>", "Project name")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .option("-p, --path <dir>", "Working directory (default: projects/<name>)")
  .option("--description <text>", "Description")
  .option("--references <names...>", "References the project uses")
  .action(
    async (
      url: string,
      name: string,
      options: ConfigOptions & { path?: string; description?: string; references?: string[] }
    ) => {
      await withContext(options, async (ctx) => {
        const outcomes = await ctx.projects.add({
          name,
          url: normalizeOnshapeUrl(url),
          address: toRemoteAddress(url),
          description: options.description,
          workingDirectory: options.path,
          references: options.references,
        });
        return printResult(`Project '${name}' added`, resultOf(outcomes));
      });
    }
  );

project
  .command("list")
  .description("List projects")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .action(async (options: ConfigOptions) => {
    await withContext(options, async (ctx) => {
      for (const line of formatProjects(ctx.projects.list())) {
        console.log(line);
      }
      return 0;
    });
  });

project
  .command("status")
  .description("Compare a project's files with the sync state")
  .argument("<name>", "Project name")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .option("--remote", "Also check for remote changes")
  .action(async (name: string, options: ConfigOptions & { remote?: boolean }) => {
    await withContext(options, async (ctx) => {
      const status = await ctx.projects.status(name, { checkRemote: options.remote === true });
      for (const line of formatProjectStatus(status)) {
        console.log(line);
      }
      return 0;
    });
  });

project
  .command("pull")
  .description("Pull a project")
  .argument("<name>", "Project name")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .option("--dry-run", "Report what would change without writing")
  .option("--force", "Overwrite local changes that conflict")
  .action(async (name: string, options: SyncCommandOptions) => {
    await withContext(options, async (ctx) =>
      printResult("Pull", await runProjectPull(ctx, name, syncOptions(options)))
    );
  });

project
  .command("push")
  .description("Push a project's local edits")
  .argument("<name>", "Project name")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .option("--dry-run", "Report what would change without submitting")
  .option("--force", "Submit even when the remote changed")
  .action(async (name: string, options: SyncCommandOptions) => {
    await withContext(options, async (ctx) =>
      printResult("Push", await runProjectPush(ctx, name, syncOptions(options)))
    );
  });

project
  .command("remove")
  .description("Remove a project")
  .argument("<name>", "Project name")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .option("--delete-files", "Also delete its working directory")
  .action(async (name: string, options: ConfigOptions & { deleteFiles?: boolean }) => {
    await withContext(options, async (ctx) => {
      const removed = await ctx.projects.remove(name, { deleteFiles: options.deleteFiles === true });
      console.log(
        `Removed project '${removed.name}'${options.deleteFiles ? ` and ${removed.workingDirectory}` : ""}`
      );
      return 0;
    });
  });

// --- Scheduler ---

program
  .command("schedule")
  .description("Update auto-updating references on settings.auto_update_schedule")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG_FILE)
  .action(async (options: ConfigOptions) => {
    const configPath = path.resolve(options.config);
    const log = getLog("scheduler");
    let expression: string | undefined;
    try {
      expression = (await loadConfigFile(configPath)).settings?.auto_update_schedule;
    } catch (error) {
      console.error(`Error: ${describeError(error)}`);
      process.exit(1);
    }
    if (!expression) {
      console.log("No settings.auto_update_schedule configured. Use 'cadsync reference update' to update manually.");
      process.exit(0);
    }
    if (!cron.validate(expression)) {
      console.error(`Invalid cron expression in settings.auto_update_schedule: ${expression}`);
      process.exit(1);
    }

    const task = cron.schedule(
      expression,
      async () => {
        log.info("Running scheduled reference update");
        try {
          // Reload each run so lastSync and the document cache stay current.
          const ctx = await createContext(configPath, { reporter: new LogReporter(() => getLog("sync")) });
          for (const result of await ctx.references.update()) {
            log.info(formatReferenceResult(result));
          }
        } catch (error) {
          logError(log, error, "Scheduled reference update failed");
        }
      },
      {
        scheduled: true,
        timezone: "UTC",
      }
    );

    console.log(`Scheduled reference updates with cron: ${expression} (UTC). Press Ctrl+C to stop.`);

    process.on("SIGINT", () => {
      console.log("\nShutting down...");
      task.stop();
      process.exit(0);
    });

    // Keep process alive
    await new Promise(() => {}); // Never resolves
  });

// Parse command line arguments
program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${describeError(error)}`);
  process.exit(1);
});
