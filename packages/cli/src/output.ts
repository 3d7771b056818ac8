/**
 * Plain-text renderings printed by the commands.
 */

import type {
  ProjectConfig,
  ProjectStatus,
  ReferenceConfig,
  ReferenceUpdateResult,
  SyncOutcome,
  SyncStatusSummary,
} from "@cadsync/core";
import type { FolderTreeNode } from "@cadsync/adapter-onshape";

function addressLabel(config: ReferenceConfig | ProjectConfig): string {
  return config.address.kind === "folder"
    ? `folder ${config.address.folderId}`
    : `document ${config.address.documentId}`;
}

export function formatOutcome(outcome: SyncOutcome): string {
  const mark = outcome.conflict ? "!" : !outcome.success ? "✗" : outcome.skipped ? "-" : "✓";
  return `${mark} ${outcome.filepath}: ${outcome.message}`;
}

export function formatSyncStatus(summary: SyncStatusSummary): string[] {
  const lines = [`Tracked files: ${summary.trackedFiles}`];
  for (const file of summary.files) {
    lines.push(`  ${file.path}  (last sync ${file.lastSync}, ${file.hash})`);
  }
  return lines;
}

export function formatTree(node: FolderTreeNode, indent: string = ""): string[] {
  const lines: string[] = [];
  for (const folder of node.folders) {
    lines.push(`${indent}📁 ${folder.name} (${folder.id})`);
    lines.push(...formatTree(folder, `${indent}  `));
  }
  for (const document of node.documents) {
    lines.push(`${indent}📄 ${document.name} (${document.id})`);
  }
  return lines;
}

export function formatReferences(references: readonly ReferenceConfig[]): string[] {
  if (references.length === 0) {
    return ["No references configured"];
  }
  const lines: string[] = [];
  for (const reference of references) {
    lines.push(`${reference.name}  [${addressLabel(reference)}]`);
    lines.push(`  path: ${reference.localPath}`);
    lines.push(`  auto-update: ${reference.autoUpdate ? "yes" : "no"}`);
    lines.push(`  last sync: ${reference.lastSync ?? "never"}`);
  }
  return lines;
}

export function formatReferenceResult(result: ReferenceUpdateResult): string {
  const mark = result.updated ? "✓" : result.needsUpdate ? "↻" : "-";
  return `${mark} ${result.name}: ${result.message}`;
}

export function formatProjects(projects: readonly ProjectConfig[]): string[] {
  if (projects.length === 0) {
    return ["No projects configured"];
  }
  const lines: string[] = [];
  for (const project of projects) {
    lines.push(`${project.name}  [${addressLabel(project)}]${project.description ? ` ${project.description}` : ""}`);
    lines.push(`  path: ${project.workingDirectory}`);
    if (project.references.length > 0) {
      lines.push(`  references: ${project.references.join(", ")}`);
    }
    lines.push(`  last pull: ${project.lastPull ?? "never"}, last push: ${project.lastPush ?? "never"}`);
  }
  return lines;
}

export function formatProjectStatus(status: ProjectStatus): string[] {
  const lines = [
    `Project ${status.name} (${status.workingDirectory})`,
    `  last pull: ${status.lastPull ?? "never"}, last push: ${status.lastPush ?? "never"}`,
  ];
  if (status.files.length === 0) {
    lines.push("  no element files");
  }
  for (const file of status.files) {
    lines.push(`  ${file.status.padEnd(17)} ${file.path}`);
  }
  return lines;
}
