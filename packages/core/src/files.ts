/**
 * Small filesystem helpers.
 */

import * as fs from "fs/promises";

/**
 * True for the error fs raises when a path does not exist. Checked by shape,
 * since errors from another realm fail `instanceof Error`.
 */
export function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Read a UTF-8 file, or undefined when it does not exist.
 */
export async function readTextIfExists(target: string): Promise<string | undefined> {
  try {
    return await fs.readFile(target, "utf-8");
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw error;
  }
}
