/**
 * Process supervisor access
 *
 * The orchestrator talks to systemd only through the Supervisor interface.
 * SystemctlSupervisor is the real implementation; tests use an in-memory one.
 */

import { exec, type ExecResult } from "../utils/exec.js";
import { ServiceError } from "../utils/errors.js";

export type RunState = "active" | "inactive" | "unknown";

/** Unit properties listing what a service requires or is ordered after */
export const DEPENDENCY_PROPERTIES = ["Requires", "Wants", "Requisite", "BindsTo", "Upholds", "After"] as const;

export interface Supervisor {
  /** Dry-run the unit generator over the deployed unit files */
  verify(): Promise<void>;
  /** Reload unit definitions (systemctl daemon-reload) */
  reload(): Promise<void>;
  start(unit: string): Promise<void>;
  restart(unit: string): Promise<void>;
  runState(unit: string): Promise<RunState>;
  /** Units `unit` declares as requirements or orders itself after */
  dependencies(unit: string): Promise<string[]>;
}

export interface SystemctlSupervisorOptions {
  timeoutSeconds: number;
  generatorPath: string;
  /** systemctl binary (default: "systemctl" from PATH) */
  systemctl?: string;
}

/**
 * Map `systemctl is-active` output to a run state
 */
export function parseRunState(output: string): RunState {
  switch (output.trim()) {
    case "active":
    case "activating":
    case "reloading":
      return "active";
    case "inactive":
    case "failed":
    case "deactivating":
      return "inactive";
    default:
      return "unknown";
  }
}

/**
 * Parse `systemctl show -p A,B` output (`A=x.service y.service` lines) into a
 * de-duplicated list, in property order.
 */
export function parseDependencies(output: string): string[] {
  const seen = new Set<string>();
  for (const line of output.split("\n")) {
    const eq = line.indexOf("=");
    if (eq === -1) continue;
    for (const unit of line.slice(eq + 1).trim().split(/\s+/)) {
      if (unit !== "") seen.add(unit);
    }
  }
  return [...seen];
}

export class SystemctlSupervisor implements Supervisor {
  private readonly timeoutMs: number;
  private readonly systemctl: string;

  constructor(private readonly options: SystemctlSupervisorOptions) {
    this.timeoutMs = options.timeoutSeconds * 1000;
    this.systemctl = options.systemctl ?? "systemctl";
  }

  async verify(): Promise<void> {
    const cmd = [this.options.generatorPath, "-dryrun", "-v"];
    const result = await this.run(cmd);
    this.assertSuccess(cmd, result);
  }

  async reload(): Promise<void> {
    await this.systemctlOrThrow(["daemon-reload"]);
  }

  async start(unit: string): Promise<void> {
    await this.systemctlOrThrow(["start", unit]);
  }

  async restart(unit: string): Promise<void> {
    await this.systemctlOrThrow(["restart", unit]);
  }

  async runState(unit: string): Promise<RunState> {
    const cmd = [this.systemctl, "is-active", unit];
    const result = await this.run(cmd);
    if (result.timedOut) {
      throw this.timeoutError(cmd);
    }
    // is-active exits non-zero for anything but "active"; the state is on stdout
    return parseRunState(result.stdout);
  }

  async dependencies(unit: string): Promise<string[]> {
    const stdout = await this.systemctlOrThrow(["show", unit, `--property=${DEPENDENCY_PROPERTIES.join(",")}`]);
    return parseDependencies(stdout);
  }

  private async systemctlOrThrow(args: string[]): Promise<string> {
    const cmd = [this.systemctl, ...args];
    const result = await this.run(cmd);
    this.assertSuccess(cmd, result);
    return result.stdout;
  }

  private async run(cmd: string[]): Promise<ExecResult> {
    try {
      return await exec(cmd, { timeoutMs: this.timeoutMs });
    } catch (error) {
      throw new ServiceError(cmd.join(" "), `Failed to execute ${cmd[0]}`, { cause: error });
    }
  }

  private assertSuccess(cmd: string[], result: ExecResult): void {
    if (result.timedOut) {
      throw this.timeoutError(cmd);
    }
    if (!result.success) {
      const command = cmd.join(" ");
      throw new ServiceError(
        command,
        `${command} failed (exit code: ${result.code}): ${result.stderr.trim()}`,
      );
    }
  }

  private timeoutError(cmd: string[]): ServiceError {
    const command = cmd.join(" ");
    return new ServiceError(command, `${command} timed out after ${this.options.timeoutSeconds}s`);
  }
}
