/**
 * Shared CLI option handling
 *
 * minimist hands back loosely typed values; everything a command reads goes
 * through the narrowing helpers below.
 */

import type { ParsedArgs } from "minimist";
import * as v from "valibot";
import { type ConfigOverrides, type EngineConfig, resolveConfig } from "../config.js";
import type { Supervisor } from "../core/supervisor.js";
import type { DesiredState, Variables } from "../types.js";
import { ConfigError } from "../utils/errors.js";
import { fileExists, readJsonFile } from "../utils/fs.js";

export interface CommandContext {
  /** Positional arguments after the command name */
  positionals: string[];
  args: ParsedArgs;
  /** Writes one line of command output to stdout */
  out: (line: string) => void;
  createSupervisor: (config: EngineConfig) => Supervisor;
}

export interface Command {
  summary: string;
  usage: string;
  run(ctx: CommandContext): Promise<void>;
}

export const STRING_OPTIONS = [
  "name",
  "state",
  "vars",
  "e",
  "units-dir",
  "base-path",
  "state-dir",
  "secrets-dir",
  "generator",
  "timeout",
  "log-format",
];

export const BOOLEAN_OPTIONS = ["help", "version", "verbose", "force", "skip-verify", "json", "show"];

export function stringOption(args: ParsedArgs, key: string): string | undefined {
  const value: unknown = args[key];
  if (Array.isArray(value)) {
    // repeated single-valued option: last one wins
    const last: unknown = value[value.length - 1];
    return typeof last === "string" ? last : undefined;
  }
  return typeof value === "string" ? value : undefined;
}

export function stringListOption(args: ParsedArgs, key: string): string[] {
  const value: unknown = args[key];
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === "string");
  }
  return typeof value === "string" ? [value] : [];
}

export function booleanOption(args: ParsedArgs, key: string): boolean {
  return args[key] === true;
}

/**
 * Engine configuration from command-line flags
 */
export function configFromArgs(args: ParsedArgs): EngineConfig {
  const overrides: ConfigOverrides = {
    unitsDir: stringOption(args, "units-dir"),
    basePath: stringOption(args, "base-path"),
    stateDir: stringOption(args, "state-dir"),
    secretsDir: stringOption(args, "secrets-dir"),
    generatorPath: stringOption(args, "generator"),
    skipVerify: booleanOption(args, "skip-verify"),
  };
  const timeout = stringOption(args, "timeout");
  if (timeout !== undefined) {
    overrides.timeoutSeconds = Number(timeout);
  }
  return resolveConfig(overrides);
}

const stateSchema = v.picklist(["installed", "started", "restarted"]);

export function stateOption(args: ParsedArgs): DesiredState | undefined {
  const state = stringOption(args, "state");
  if (state === undefined) return undefined;
  const result = v.safeParse(stateSchema, state);
  if (!result.success) {
    throw new ConfigError(`Invalid --state: ${state} (expected installed, started or restarted)`);
  }
  return result.output;
}

const variablesSchema = v.record(v.string(), v.unknown());

/**
 * Template variables from `--vars file.json`, then each `-e key=value`
 * (later assignments win)
 */
export async function variablesFromArgs(args: ParsedArgs): Promise<Variables> {
  const variables: Variables = {};

  const varsFile = stringOption(args, "vars");
  if (varsFile !== undefined) {
    if (!(await fileExists(varsFile))) {
      throw new ConfigError(`Variables file not found: ${varsFile}`);
    }
    let data: unknown;
    try {
      data = await readJsonFile(varsFile);
    } catch (error) {
      throw new ConfigError(`Cannot parse variables file ${varsFile}`, { cause: error });
    }
    const result = v.safeParse(variablesSchema, data);
    if (!result.success) {
      throw new ConfigError(`Variables file must contain a JSON object: ${varsFile}`);
    }
    Object.assign(variables, result.output);
  }

  for (const assignment of stringListOption(args, "e")) {
    const eq = assignment.indexOf("=");
    if (eq <= 0) {
      throw new ConfigError(`Invalid variable assignment (expected NAME=VALUE): ${assignment}`);
    }
    variables[assignment.slice(0, eq)] = assignment.slice(eq + 1);
  }

  return variables;
}

/**
 * The single `<src>` positional of deploy and plan
 */
export function sourceArgument(ctx: CommandContext): string {
  const [source, ...rest] = ctx.positionals;
  if (source === undefined || rest.length > 0) {
    throw new ConfigError("Expected exactly one source directory");
  }
  return source;
}
