/**
 * Content fingerprints used to detect local edits.
 */

import { createHash } from "crypto";
import * as fs from "fs/promises";
import { isNotFound } from "./files.js";

/**
 * SHA-256 of the content, lowercase hex. Strings are hashed as UTF-8.
 */
export function hashContent(content: string | Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Hash of a file's raw bytes, or undefined when the file does not exist.
 */
export async function hashFile(filePath: string): Promise<string | undefined> {
  try {
    return hashContent(await fs.readFile(filePath));
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw error;
  }
}
