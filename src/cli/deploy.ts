/**
 * Deploy command
 *
 * Deploys an application directory and drives its main service towards the
 * requested state.
 */

import { deploy } from "../core/applier.js";
import type { DeployRequest } from "../types.js";
import {
  booleanOption,
  type Command,
  type CommandContext,
  configFromArgs,
  sourceArgument,
  stateOption,
  stringOption,
  variablesFromArgs,
} from "./options.js";

export async function runDeploy(ctx: CommandContext): Promise<void> {
  const config = configFromArgs(ctx.args);
  const request: DeployRequest = {
    source: sourceArgument(ctx),
    name: stringOption(ctx.args, "name"),
    force: booleanOption(ctx.args, "force"),
    state: stateOption(ctx.args),
    variables: await variablesFromArgs(ctx.args),
  };

  const result = await deploy(request, config, { supervisor: ctx.createSupervisor(config) });

  if (booleanOption(ctx.args, "json")) {
    ctx.out(JSON.stringify(result, null, 2));
    return;
  }

  ctx.out(`${result.changed ? "changed" : "ok"}: ${result.message}`);
  for (const path of result.changedFiles) {
    ctx.out(`  wrote ${path}`);
  }
  for (const path of result.staleFiles) {
    ctx.out(`  stale ${path}`);
  }
}

export const deployCommand: Command = {
  summary: "Deploy an application directory",
  usage: "deploy <src> [--name NAME] [--state installed|started|restarted] [--force] [--vars FILE] [-e KEY=VALUE]... [--json]",
  run: runDeploy,
};
