import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { RunState, Supervisor } from "../src/core/supervisor.js";
import { createStreamSink, logger } from "../src/utils/logger.js";

export async function makeTempDir(): Promise<string> {
  return await mkdtemp(join(tmpdir(), "quadlet-deployer-"));
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Create files below `root`; keys are POSIX relative paths
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const path = join(root, relativePath);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
  }
}

/**
 * Route the shared logger into an array for the duration of a test
 */
export function captureLogs(): { lines: string[]; restore: () => void } {
  const lines: string[] = [];
  const previous = logger.setSinks([createStreamSink((line) => lines.push(line))]);
  return { lines, restore: () => logger.setSinks(previous) };
}

/**
 * In-memory supervisor. `calls` records every state-changing call in order.
 */
export class FakeSupervisor implements Supervisor {
  readonly calls: string[] = [];
  readonly states = new Map<string, RunState>();
  readonly deps = new Map<string, string[]>();
  failOn: string | null = null;

  async verify(): Promise<void> {
    this.record("verify");
  }

  async reload(): Promise<void> {
    this.record("reload");
  }

  async start(unit: string): Promise<void> {
    this.record(`start ${unit}`);
    this.states.set(unit, "active");
  }

  async restart(unit: string): Promise<void> {
    this.record(`restart ${unit}`);
    this.states.set(unit, "active");
  }

  async runState(unit: string): Promise<RunState> {
    return this.states.get(unit) ?? "inactive";
  }

  async dependencies(unit: string): Promise<string[]> {
    return this.deps.get(unit) ?? [];
  }

  private record(call: string): void {
    if (this.failOn === call) {
      throw new Error(`${call} failed`);
    }
    this.calls.push(call);
  }
}
