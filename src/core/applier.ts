/**
 * Apply orchestration logic
 *
 * Coordinates the full deployment flow from an application directory to
 * running services.
 */

import { join, posix } from "node:path";
import * as v from "valibot";
import { DEPLOYED_FILE_MODE, type EngineConfig } from "../config.js";
import type { DeployPlan, DeployRequest, DeployResult, DesiredState, Variables } from "../types.js";
import { ConfigError } from "../utils/errors.js";
import { fileExists, readBytes } from "../utils/fs.js";
import { withLock } from "../utils/lock.js";
import { logger } from "../utils/logger.js";
import { deployFiles } from "./deployer.js";
import { type DeployFile, type DeploymentRecord, diff, type LedgerDiff, loadRecord, nextRecord, saveRecord } from "./ledger.js";
import { orchestrate } from "./orchestrator.js";
import { auxiliaryRoot, preprocessUnit } from "./preprocessor.js";
import { createUnitDescriptor, prefixName, serviceNameFor, type UnitDescriptor } from "./quadlet.js";
import { NunjucksRenderer, renderFile, type TemplateRenderer } from "./renderer.js";
import { SecretStore } from "./secrets.js";
import type { Supervisor } from "./supervisor.js";
import { type Layout, MAIN_UNIT, resolveAppName, validateLayout } from "./validator.js";

export interface EngineDeps {
  supervisor: Supervisor;
  /** Defaults to the nunjucks renderer from createRenderer() */
  renderer?: TemplateRenderer;
}

interface NormalizedRequest {
  source: string;
  name?: string;
  state: DesiredState;
  force: boolean;
  variables: Variables;
}

const requestSchema = v.object({
  source: v.pipe(v.string(), v.minLength(1, "source must not be empty")),
  name: v.optional(v.string()),
  state: v.optional(
    v.picklist(["installed", "started", "restarted"], "state must be one of installed, started, restarted"),
    "installed",
  ),
  force: v.optional(v.boolean("force must be a boolean"), false),
  variables: v.optional(v.record(v.string(), v.unknown()), {}),
});

interface Prepared {
  layout: Layout;
  files: DeployFile[];
  serviceName: string;
  quadletFiles: string[];
}

function normalizeRequest(request: DeployRequest): NormalizedRequest {
  const result = v.safeParse(requestSchema, request);
  if (!result.success) {
    const messages = result.issues.map((issue) => issue.message);
    throw new ConfigError(`Invalid deployment request:\n${messages.join("\n")}`);
  }
  return result.output;
}

/**
 * Template renderer for `appName`. When a secret store is configured,
 * templates can call `secret(name)` or `secret(name, namespace)`; the
 * namespace defaults to the application name.
 */
export async function createRenderer(config: EngineConfig, appName: string): Promise<TemplateRenderer> {
  if (config.secretsDir === undefined) {
    return new NunjucksRenderer();
  }
  const store = await SecretStore.load(config.secretsDir);
  return new NunjucksRenderer({
    globals: {
      secret: (name: string, namespace: string = appName) => store.get(namespace, name),
    },
  });
}

/**
 * Validate, render and preprocess an application directory. Every file is
 * rendered before any unit is preprocessed.
 */
async function prepare(request: NormalizedRequest, config: EngineConfig, renderer: TemplateRenderer): Promise<Prepared> {
  // Step 1: Validate layout
  const layout = await validateLayout(request.source, request.name);
  const appName = layout.appName;
  logger.info(`✓ Layout validated (${layout.units.length} unit(s), ${layout.auxiliary.length} auxiliary file(s))`);

  // Step 2: Render
  const descriptors: UnitDescriptor[] = [];
  for (const unit of layout.units) {
    const bytes = await readBytes(unit.path);
    const text = renderFile(renderer, bytes, request.variables, appName, `quadlets/${unit.fileName}`);
    descriptors.push(createUnitDescriptor(unit.fileName, text));
  }

  const auxiliary: DeployFile[] = [];
  for (const file of layout.auxiliary) {
    const bytes = await readBytes(file.path);
    const displayName = `${file.area}.d/${file.unit}/${file.relativePath}`;
    auxiliary.push({
      kind: file.area,
      path: posix.join(auxiliaryRoot(config.basePath, appName, file.area, file.unit), file.relativePath),
      content: renderFile(renderer, bytes, request.variables, appName, displayName),
      mode: DEPLOYED_FILE_MODE,
    });
  }
  logger.info(`✓ Rendered ${descriptors.length + auxiliary.length} file(s)`);

  // Step 3: Preprocess
  const unitBaseNames = new Set(layout.units.map((unit) => unit.baseName));
  const units = descriptors.map((descriptor) =>
    preprocessUnit(descriptor, { appName, basePath: config.basePath, unitBaseNames })
  );
  logger.info(`✓ Preprocessed ${units.length} unit(s)`);

  const unitFiles: DeployFile[] = units.map((result) => ({
    kind: "unit",
    path: join(config.unitsDir, prefixName(appName, result.unit.fileName)),
    content: result.content,
    mode: DEPLOYED_FILE_MODE,
  }));

  return {
    layout,
    files: [...unitFiles, ...auxiliary],
    serviceName: serviceNameFor(appName, "container", MAIN_UNIT),
    quadletFiles: units.map((result) => prefixName(appName, result.unit.fileName)),
  };
}

async function compare(
  prepared: Prepared,
  config: EngineConfig,
  force: boolean,
): Promise<{ record: DeploymentRecord | null; changes: LedgerDiff }> {
  const record = await loadRecord(config.stateDir, prepared.layout.appName);
  const changes = await diff(prepared.files, record, { force, isPresent: fileExists });
  return { record, changes };
}

/**
 * Compute what a deployment would write, without touching the host
 */
export async function plan(
  request: DeployRequest,
  config: EngineConfig,
  renderer?: TemplateRenderer,
): Promise<DeployPlan> {
  const normalized = normalizeRequest(request);
  const appName = resolveAppName(normalized.source, normalized.name);
  const prepared = await prepare(
    { ...normalized, name: appName },
    config,
    renderer ?? await createRenderer(config, appName),
  );
  const { changes } = await compare(prepared, config, normalized.force);
  const changed = new Set(changes.changed.map((file) => file.path));

  return {
    applicationName: appName,
    serviceName: prepared.serviceName,
    files: prepared.files.map((file) => ({
      path: file.path,
      content: file.content,
      mode: file.mode,
      changed: changed.has(file.path),
    })),
    staleFiles: changes.stale,
    anyChanged: changes.anyChanged,
  };
}

/**
 * Deploy an application directory
 *
 * Steps, under the per-application lock:
 * 1. Validate, render and preprocess
 * 2. Compare against the deployment record
 * 3. Write changed files
 * 4. Save the deployment record
 * 5. Drive systemd towards the requested state
 */
export async function deploy(request: DeployRequest, config: EngineConfig, deps: EngineDeps): Promise<DeployResult> {
  const normalized = normalizeRequest(request);
  const appName = resolveAppName(normalized.source, normalized.name);

  logger.info(`🚀 Deploying ${appName} (state: ${normalized.state}${normalized.force ? ", forced" : ""})`);

  return await withLock(join(config.stateDir, appName), async () => {
    // Step 1: Validate, render and preprocess
    const renderer = deps.renderer ?? await createRenderer(config, appName);
    const prepared = await prepare({ ...normalized, name: appName }, config, renderer);

    // Step 2: Compare against the deployment record
    const { record, changes } = await compare(prepared, config, normalized.force);
    logger.info(`✓ ${changes.changed.length} changed, ${changes.unchanged.length} unchanged file(s)`);
    for (const path of changes.stale) {
      logger.warn(`No longer produced, left in place: ${path}`);
    }

    // Step 3: Write changed files
    const changedFiles = await deployFiles(changes.changed);
    if (changedFiles.length > 0) {
      logger.info(`✓ Deployed ${changedFiles.length} file(s)`);
    }

    // Step 4: Save the deployment record
    if (changes.anyChanged || record === null || changes.stale.length > 0) {
      await saveRecord(config.stateDir, nextRecord(appName, prepared.files, changes.changed, record));
      logger.debug(`Saved deployment record for ${appName}`);
    }

    // Step 5: Drive systemd
    const actions = await orchestrate(
      {
        appName,
        mainService: prepared.serviceName,
        state: normalized.state,
        anyChanged: changes.anyChanged,
        firstDeploy: record === null,
        verify: !config.skipVerify,
      },
      deps.supervisor,
    );

    const started = actions.some((action) => action.type === "start");
    const restarted = actions.some((action) => action.type === "restart");
    const message = summarize(changes.anyChanged, started, restarted);
    logger.info(`✅ ${appName}: ${message}`);

    return {
      changed: changes.anyChanged || started || restarted,
      applicationName: appName,
      serviceName: prepared.serviceName,
      quadletFiles: prepared.quadletFiles,
      changedFiles,
      staleFiles: changes.stale,
      actions,
      message,
    };
  });
}

export function summarize(filesChanged: boolean, started: boolean, restarted: boolean): string {
  if (!filesChanged && !started && !restarted) {
    return "application already up to date";
  }
  const files = filesChanged ? "quadlet files deployed" : "quadlet files unchanged";
  if (restarted) return `${files} and service restarted`;
  if (started) return `${files} and service started`;
  return files;
}
