/**
 * File deployment
 *
 * Writes preprocessed files to their final locations. Every write goes through
 * a temporary sibling and an atomic rename.
 */

import { dirname } from "node:path";
import { ensureDir, writeFileAtomic } from "../utils/fs.js";
import { logger } from "../utils/logger.js";
import type { DeployFile } from "./ledger.js";

/**
 * Write `files` concurrently (they target disjoint paths) and return the
 * written paths in input order.
 */
export async function deployFiles(files: DeployFile[]): Promise<string[]> {
  if (files.length === 0) {
    logger.debug("No files to deploy");
    return [];
  }

  // All writes settle before this returns or throws
  const results = await Promise.allSettled(
    files.map(async (file) => {
      await ensureDir(dirname(file.path));
      await writeFileAtomic(file.path, file.content, file.mode);
    }),
  );
  const failed = files.filter((_, index) => results[index]?.status === "rejected");
  const [cause] = results.flatMap((result) => (result.status === "rejected" ? [result.reason] : []));
  if (failed.length > 0) {
    throw new Error(`Failed to write ${failed.map((file) => file.path).join(", ")}`, { cause });
  }

  for (const file of files) {
    logger.debug(`  deployed ${file.kind} file ${file.path}`);
  }
  return files.map((file) => file.path);
}
