/**
 * Command execution utilities
 *
 * Run systemctl and the Quadlet generator with a hard timeout.
 */

import { execFile } from "node:child_process";
import { logger } from "./logger.js";

export interface ExecResult {
  success: boolean;
  stdout: string;
  stderr: string;
  code: number;
  /** True when the process was killed because it exceeded `timeoutMs` */
  timedOut: boolean;
}

export interface ExecOptions {
  /** Kill the process after this many milliseconds (0 disables the limit) */
  timeoutMs?: number;
  /** Largest stdout or stderr accepted before the process is killed */
  maxBuffer?: number;
}

const MAX_BUFFER = 16 * 1024 * 1024;
const MAX_BUFFER_EXCEEDED = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";

/**
 * Execute a command and return its result. Non-zero exits and timeouts are
 * reported in the result; failing to spawn at all rejects.
 */
export function exec(cmd: string[], options: ExecOptions = {}): Promise<ExecResult> {
  const [file, ...args] = cmd;
  if (file === undefined) {
    return Promise.reject(new Error("Cannot execute an empty command"));
  }

  const timeoutMs = options.timeoutMs ?? 0;
  logger.debug(`Executing: ${cmd.join(" ")}`);

  return new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { encoding: "utf8", timeout: timeoutMs, maxBuffer: options.maxBuffer ?? MAX_BUFFER },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ success: true, stdout, stderr, code: 0, timedOut: false });
          return;
        }

        // Exceeding maxBuffer also kills the child
        const code: unknown = error.code;
        if (code === MAX_BUFFER_EXCEEDED) {
          logger.debug(`Command output exceeded the buffer limit: ${cmd.join(" ")}`);
          resolve({ success: false, stdout, stderr, code: -1, timedOut: false });
          return;
        }

        if (timeoutMs > 0 && error.killed) {
          logger.debug(`Command timed out after ${timeoutMs}ms: ${cmd.join(" ")}`);
          resolve({ success: false, stdout, stderr, code: -1, timedOut: true });
          return;
        }

        if (typeof code === "number") {
          logger.debug(`Command failed with code ${code}`);
          if (stderr) logger.debug(`stderr: ${stderr.trim()}`);
          resolve({ success: false, stdout, stderr, code, timedOut: false });
          return;
        }

        reject(new Error(`Failed to execute ${file}: ${error.message}`, { cause: error }));
      },
    );
  });
}
