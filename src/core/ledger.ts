/**
 * Checksum ledger
 *
 * Decides which deployed files changed since the last successful deployment
 * by comparing content digests against the persisted deployment record.
 */

import { createHash } from "node:crypto";
import { join } from "node:path";
import * as v from "valibot";
import { fileExists, readJsonFile, writeJsonFile } from "../utils/fs.js";
import { logger } from "../utils/logger.js";

export type DeployFileKind = "unit" | "init" | "config";

/**
 * A fully rendered and preprocessed file, ready to be written
 */
export interface DeployFile {
  kind: DeployFileKind;
  /** Absolute target path */
  path: string;
  content: string;
  mode: number;
}

export interface FileRecord {
  digest: string;
  mode: number;
  /** ISO timestamp of the deployment that last wrote this file */
  deployedAt: string;
}

export interface DeploymentRecord {
  version: 1;
  app: string;
  updatedAt: string;
  files: Record<string, FileRecord>;
}

export interface LedgerDiff {
  changed: DeployFile[];
  unchanged: DeployFile[];
  /** Recorded paths the current run no longer produces */
  stale: string[];
  anyChanged: boolean;
}

export interface DiffOptions {
  /** Mark every file changed regardless of digests */
  force?: boolean;
  /** Probe for the deployed file; a recorded file that vanished counts as changed */
  isPresent?: (path: string) => Promise<boolean>;
}

const fileRecordSchema = v.object({
  digest: v.string(),
  mode: v.number(),
  deployedAt: v.string(),
});

const recordSchema = v.object({
  version: v.literal(1),
  app: v.string(),
  updatedAt: v.string(),
  files: v.record(v.string(), fileRecordSchema),
});

/**
 * Content digest over the file mode and the final content
 */
export function digest(content: string, mode: number): string {
  const hash = createHash("sha256");
  hash.update(`${mode.toString(8).padStart(4, "0")}\0`);
  hash.update(content, "utf8");
  return `sha256:${hash.digest("hex")}`;
}

/**
 * Compare files against a previous record
 */
export async function diff(
  files: DeployFile[],
  previous: DeploymentRecord | null,
  options: DiffOptions = {},
): Promise<LedgerDiff> {
  const { force = false, isPresent } = options;
  const changed: DeployFile[] = [];
  const unchanged: DeployFile[] = [];

  for (const file of files) {
    const recorded = previous?.files[file.path];
    const same = !force &&
      recorded !== undefined &&
      recorded.digest === digest(file.content, file.mode) &&
      (isPresent === undefined || await isPresent(file.path));

    if (same) {
      unchanged.push(file);
    } else {
      changed.push(file);
    }
  }

  const current = new Set(files.map((file) => file.path));
  const stale = Object.keys(previous?.files ?? {}).filter((path) => !current.has(path)).sort();

  return { changed, unchanged, stale, anyChanged: changed.length > 0 };
}

/**
 * Record describing `files` after a successful deployment. Files that were not
 * rewritten keep their previous timestamp; stale entries are dropped.
 */
export function nextRecord(
  app: string,
  files: DeployFile[],
  changed: DeployFile[],
  previous: DeploymentRecord | null,
  now: Date = new Date(),
): DeploymentRecord {
  const timestamp = now.toISOString();
  const written = new Set(changed.map((file) => file.path));
  const entries: Record<string, FileRecord> = {};

  for (const file of files) {
    const recorded = previous?.files[file.path];
    entries[file.path] = {
      digest: digest(file.content, file.mode),
      mode: file.mode,
      deployedAt: written.has(file.path) || !recorded ? timestamp : recorded.deployedAt,
    };
  }

  return { version: 1, app, updatedAt: timestamp, files: entries };
}

/**
 * Location of an application's record inside the state directory
 */
export function recordPath(stateDir: string, app: string): string {
  return join(stateDir, `${app}.json`);
}

/**
 * Load the record of the last successful deployment. A missing record means
 * first deployment; an unreadable one is treated the same way.
 */
export async function loadRecord(stateDir: string, app: string): Promise<DeploymentRecord | null> {
  const path = recordPath(stateDir, app);
  if (!(await fileExists(path))) {
    return null;
  }

  let data: unknown;
  try {
    data = await readJsonFile(path);
  } catch (error) {
    logger.warn(`Ignoring unreadable deployment record ${path}:`, error);
    return null;
  }

  const result = v.safeParse(recordSchema, data);
  if (!result.success) {
    logger.warn(`Ignoring malformed deployment record ${path}`);
    return null;
  }
  if (result.output.app !== app) {
    logger.warn(`Ignoring deployment record ${path}: it belongs to "${result.output.app}"`);
    return null;
  }
  return result.output;
}

export async function saveRecord(stateDir: string, record: DeploymentRecord): Promise<void> {
  await writeJsonFile(recordPath(stateDir, record.app), record);
}
