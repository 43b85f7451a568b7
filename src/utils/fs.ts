/**
 * File system utilities
 *
 * Helpers for reading application sources and writing deployed files.
 */

import { randomBytes } from "node:crypto";
import { chmod, mkdir, readdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join, relative, sep } from "node:path";
import { logger } from "./logger.js";

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR");
}

/**
 * Ensure directory exists, create if missing
 */
export async function ensureDir(path: string, mode = 0o755): Promise<void> {
  await mkdir(path, { recursive: true, mode });
}

/**
 * Read file as raw bytes
 */
export async function readBytes(path: string): Promise<Uint8Array> {
  try {
    return await readFile(path);
  } catch (error) {
    logger.error(`Failed to read file: ${path}`, error);
    throw error;
  }
}

/**
 * Read file as text
 */
export async function readTextFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    logger.error(`Failed to read file: ${path}`, error);
    throw error;
  }
}

/**
 * Write a file through a temporary sibling and an atomic rename, so the
 * final path holds either the old or the new content, never a partial one.
 */
export async function writeFileAtomic(path: string, content: string, mode = 0o644): Promise<void> {
  const dir = dirname(path);
  const tempPath = join(dir, `.${basename(path)}.${randomBytes(6).toString("hex")}.tmp`);

  try {
    await writeFile(tempPath, content, { encoding: "utf8", mode });
    // mode passed to writeFile is filtered by the umask
    await chmod(tempPath, mode);
    await rename(tempPath, path);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    await rm(tempPath, { force: true });
    logger.error(`Failed to write file: ${path}`, error);
    throw error;
  }
}

/**
 * Read JSON file, returning the parsed but unvalidated value
 */
export async function readJsonFile(path: string): Promise<unknown> {
  const text = await readTextFile(path);
  return JSON.parse(text);
}

/**
 * Write JSON file (pretty-printed)
 */
export async function writeJsonFile(path: string, data: unknown): Promise<void> {
  const json = JSON.stringify(data, null, 2);
  await writeFileAtomic(path, `${json}\n`);
}

/**
 * Check if file exists
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    return info.isFile();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Check if directory exists
 */
export async function dirExists(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    return info.isDirectory();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * List entries of a directory, sorted by name
 */
export async function listDir(path: string): Promise<{ name: string; isFile: boolean; isDirectory: boolean }[]> {
  const entries = await readdir(path, { withFileTypes: true });
  return entries
    .map((entry) => ({ name: entry.name, isFile: entry.isFile(), isDirectory: entry.isDirectory() }))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Recursively list regular files below `root`, as POSIX relative paths in
 * sorted order.
 */
export async function walkFiles(root: string): Promise<string[]> {
  const files: string[] = [];

  const visit = async (dir: string): Promise<void> => {
    for (const entry of await listDir(dir)) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory) {
        await visit(fullPath);
      } else if (entry.isFile) {
        files.push(relative(root, fullPath).split(sep).join("/"));
      }
    }
  };

  await visit(root);
  return files;
}
