/**
 * Per-application advisory lock
 *
 * Serializes concurrent invocations that target the same application while
 * leaving different applications independent.
 */

import { dirname } from "node:path";
import lockfile from "proper-lockfile";
import { ensureDir } from "./fs.js";
import { logger } from "./logger.js";

const LOCK_OPTIONS = {
  retries: {
    retries: 120,
    factor: 1.5,
    minTimeout: 200,
    maxTimeout: 5_000,
  },
  stale: 30_000,
  realpath: false,
} as const;

/**
 * Hold `<path>.lock` while `fn` runs. Waits for a concurrent holder to finish.
 */
export async function withLock<T>(path: string, fn: () => Promise<T>): Promise<T> {
  await ensureDir(dirname(path));

  const release = await lockfile.lock(path, {
    ...LOCK_OPTIONS,
    onCompromised: (error) => {
      logger.error(`Lock on ${path} was compromised:`, error);
    },
  });
  logger.debug(`Acquired lock ${path}.lock`);

  try {
    return await fn();
  } finally {
    await release();
    logger.debug(`Released lock ${path}.lock`);
  }
}
