/**
 * Engine configuration
 *
 * Defaults are applied once, here, and the resulting value is passed down the
 * pipeline explicitly.
 */

import * as v from "valibot";
import { ConfigError } from "./utils/errors.js";

/**
 * Directory the Quadlet generator reads unit files from
 */
export const DEFAULT_UNITS_DIR = "/etc/containers/systemd";

/**
 * Root for per-application init/config payloads
 */
export const DEFAULT_BASE_PATH = "/srv";

/**
 * Directory holding deployment records and locks
 */
export const DEFAULT_STATE_DIR = "/var/lib/quadlet-deployer";

/**
 * Timeout for each supervisor call, in seconds
 */
export const DEFAULT_TIMEOUT_SECONDS = 120;

/**
 * Quadlet generator used to validate units before a reload
 */
export const DEFAULT_GENERATOR_PATH = "/usr/lib/systemd/system-generators/podman-system-generator";

/**
 * Podman's file secret driver location for rootful storage
 */
export const DEFAULT_SECRETS_DIR = "/var/lib/containers/storage/secrets";

/**
 * Mode for every deployed file (owner read/write, group/other read)
 */
export const DEPLOYED_FILE_MODE = 0o644;

export interface EngineConfig {
  unitsDir: string;
  basePath: string;
  stateDir: string;
  timeoutSeconds: number;
  generatorPath: string;
  /** Skip the generator dry-run before reloading */
  skipVerify: boolean;
  /** Podman secret store; templates get `secret()` only when set */
  secretsDir?: string;
}

const absolutePath = (label: string) =>
  v.pipe(v.string(), v.startsWith("/", `${label} must be an absolute path`));

const configSchema = v.object({
  unitsDir: v.optional(absolutePath("unitsDir"), DEFAULT_UNITS_DIR),
  basePath: v.optional(absolutePath("basePath"), DEFAULT_BASE_PATH),
  stateDir: v.optional(absolutePath("stateDir"), DEFAULT_STATE_DIR),
  timeoutSeconds: v.optional(
    v.pipe(
      v.number(),
      v.integer("timeoutSeconds must be an integer"),
      v.minValue(1, "timeoutSeconds must be positive"),
    ),
    DEFAULT_TIMEOUT_SECONDS,
  ),
  generatorPath: v.optional(absolutePath("generatorPath"), DEFAULT_GENERATOR_PATH),
  skipVerify: v.optional(v.boolean(), false),
  secretsDir: v.optional(absolutePath("secretsDir")),
});

export type ConfigOverrides = v.InferInput<typeof configSchema>;

/**
 * Apply defaults to caller-supplied overrides and validate the result
 */
export function resolveConfig(overrides: ConfigOverrides = {}): EngineConfig {
  const result = v.safeParse(configSchema, overrides);
  if (!result.success) {
    const messages = result.issues.map((issue) => issue.message);
    throw new ConfigError(`Invalid configuration:\n${messages.join("\n")}`);
  }

  return result.output;
}

export const VERSION = "0.1.0";
