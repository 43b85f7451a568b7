/**
 * Plan command
 *
 * Shows what a deployment would write without touching the host.
 */

import { plan } from "../core/applier.js";
import {
  booleanOption,
  type Command,
  type CommandContext,
  configFromArgs,
  sourceArgument,
  stringOption,
  variablesFromArgs,
} from "./options.js";

export async function runPlan(ctx: CommandContext): Promise<void> {
  const config = configFromArgs(ctx.args);
  const result = await plan(
    {
      source: sourceArgument(ctx),
      name: stringOption(ctx.args, "name"),
      force: booleanOption(ctx.args, "force"),
      variables: await variablesFromArgs(ctx.args),
    },
    config,
  );

  if (booleanOption(ctx.args, "json")) {
    ctx.out(JSON.stringify(result, null, 2));
    return;
  }

  const show = booleanOption(ctx.args, "show");
  for (const file of result.files) {
    ctx.out(`${file.changed ? "~" : "="} ${file.path}`);
    if (show && file.changed) {
      ctx.out(file.content.replace(/\n$/, ""));
    }
  }
  for (const path of result.staleFiles) {
    ctx.out(`- ${path}`);
  }
  ctx.out(result.anyChanged ? `${result.applicationName}: changes pending` : `${result.applicationName}: up to date`);
}

export const planCommand: Command = {
  summary: "Show the files a deployment would write",
  usage: "plan <src> [--name NAME] [--force] [--vars FILE] [-e KEY=VALUE]... [--show] [--json]",
  run: runPlan,
};
