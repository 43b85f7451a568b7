/**
 * Secret command
 *
 * Prints a secret from the Podman secret store, as templates see it through
 * `secret(name, namespace)`.
 */

import { DEFAULT_SECRETS_DIR } from "../config.js";
import { SecretStore } from "../core/secrets.js";
import { ConfigError } from "../utils/errors.js";
import { type Command, type CommandContext, stringOption } from "./options.js";

export async function runSecret(ctx: CommandContext): Promise<void> {
  const [namespace, name, ...rest] = ctx.positionals;
  if (namespace === undefined || name === undefined || rest.length > 0) {
    throw new ConfigError("Expected <namespace> <name>");
  }

  const store = await SecretStore.load(stringOption(ctx.args, "secrets-dir") ?? DEFAULT_SECRETS_DIR);
  ctx.out(store.get(namespace, name));
}

export const secretCommand: Command = {
  summary: "Print a secret from the Podman secret store",
  usage: "secret <namespace> <name> [--secrets-dir DIR]",
  run: runSecret,
};
