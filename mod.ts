/**
 * quadlet-deployer
 *
 * Deploys an application directory of Podman Quadlet units, with their init
 * and config payloads, into the locations the Quadlet generator and the
 * containers expect, and drives systemd towards a requested state.
 *
 * @example
 * ```ts
 * import { deploy, resolveConfig, SystemctlSupervisor } from "quadlet-deployer";
 *
 * const config = resolveConfig({ basePath: "/srv" });
 * const supervisor = new SystemctlSupervisor({
 *   timeoutSeconds: config.timeoutSeconds,
 *   generatorPath: config.generatorPath,
 * });
 * const result = await deploy({ source: "./myapp", state: "started" }, config, { supervisor });
 * console.log(result.message);
 * ```
 */

export { deploy, plan, createRenderer, type EngineDeps } from "./src/core/applier.js";
export { resolveConfig, type ConfigOverrides, type EngineConfig, VERSION } from "./src/config.js";
export { NunjucksRenderer, type TemplateRenderer, APP_NAME_VARIABLE } from "./src/core/renderer.js";
export { SystemctlSupervisor, type RunState, type Supervisor } from "./src/core/supervisor.js";
export { SecretStore } from "./src/core/secrets.js";
export { parseQuadlet, serializeQuadlet, type QuadletDocument, type UnitKind } from "./src/core/quadlet.js";
export { preprocessUnit } from "./src/core/preprocessor.js";
export { validateLayout, type Layout } from "./src/core/validator.js";
export { restartOrder, type DependencyGraph } from "./src/core/dependencies.js";
export {
  ConfigError,
  DependencyError,
  LayoutError,
  PreprocessError,
  QuadletError,
  SecretError,
  ServiceError,
  TemplateError,
} from "./src/utils/errors.js";
export { createLogger, createStreamSink, logger, type Logger, type LogSink } from "./src/utils/logger.js";
export type * from "./src/types.js";
