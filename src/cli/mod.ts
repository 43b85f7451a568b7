/**
 * quadlet-deploy CLI entry point
 *
 * Handles command routing and argument parsing.
 */

import minimist from "minimist";
import { type EngineConfig, VERSION } from "../config.js";
import { type Supervisor, SystemctlSupervisor } from "../core/supervisor.js";
import { QuadletError } from "../utils/errors.js";
import { type LogFormat, logger } from "../utils/logger.js";
import { deployCommand } from "./deploy.js";
import { type Command, BOOLEAN_OPTIONS, booleanOption, STRING_OPTIONS, stringOption } from "./options.js";
import { planCommand } from "./plan.js";
import { secretCommand } from "./secret.js";

const COMMANDS: Record<string, Command> = {
  deploy: deployCommand,
  plan: planCommand,
  secret: secretCommand,
};

export interface CliIo {
  out?: (line: string) => void;
  createSupervisor?: (config: EngineConfig) => Supervisor;
}

function defaultSupervisor(config: EngineConfig): Supervisor {
  return new SystemctlSupervisor({ timeoutSeconds: config.timeoutSeconds, generatorPath: config.generatorPath });
}

/**
 * Run the CLI with `argv` (without the node and script paths) and return
 * the process exit code.
 */
export async function main(argv: string[], io: CliIo = {}): Promise<number> {
  const out = io.out ?? ((line: string) => process.stdout.write(`${line}\n`));

  const args = minimist(argv, {
    string: STRING_OPTIONS,
    boolean: BOOLEAN_OPTIONS,
    alias: {
      h: "help",
      v: "version",
    },
  });

  if (booleanOption(args, "version")) {
    out(`quadlet-deploy v${VERSION}`);
    return 0;
  }

  const [name, ...positionals] = args._.map(String);
  const command = name !== undefined && Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;

  if (booleanOption(args, "help") || name === undefined) {
    out(helpText(command));
    return 0;
  }
  if (command === undefined) {
    logger.error(`Unknown command: ${name}`);
    out(helpText());
    return 1;
  }

  if (booleanOption(args, "verbose")) {
    logger.setLevel("debug");
  }
  const format = stringOption(args, "log-format");
  if (format !== undefined) {
    const parsed = parseLogFormat(format);
    if (parsed === undefined) {
      logger.error(`Invalid --log-format: ${format} (expected text or json)`);
      return 1;
    }
    logger.setFormat(parsed);
  }

  try {
    await command.run({
      positionals,
      args,
      out,
      createSupervisor: io.createSupervisor ?? defaultSupervisor,
    });
    return 0;
  } catch (error) {
    logger.error(`${name} failed:`, error);
    return error instanceof QuadletError ? error.exitCode : 1;
  }
}

function parseLogFormat(value: string): LogFormat | undefined {
  return value === "text" || value === "json" ? value : undefined;
}

const GLOBAL_OPTIONS = `
OPTIONS:
  --units-dir DIR     Quadlet unit directory (default: /etc/containers/systemd)
  --base-path DIR     Root for init/config payloads (default: /srv)
  --state-dir DIR     Deployment records and locks (default: /var/lib/quadlet-deployer)
  --secrets-dir DIR   Podman secret store; enables secret() in templates
  --generator PATH    Quadlet generator used to validate units
  --skip-verify       Do not dry-run the generator before reloading
  --timeout SECONDS   Timeout for each systemctl call (default: 120)
  --verbose           Debug logging
  --log-format FMT    text or json (default: text)
  -h, --help          Show this help message
  -v, --version       Show version
`;

function helpText(command?: Command): string {
  if (command) {
    return `Usage: quadlet-deploy ${command.usage}\n\n${command.summary}\n${GLOBAL_OPTIONS}`;
  }
  const commands = Object.entries(COMMANDS)
    .map(([name, entry]) => `  ${name.padEnd(18)}${entry.summary}`)
    .join("\n");
  return `quadlet-deploy - Deploy Podman Quadlet applications

USAGE:
  quadlet-deploy <command> [options]

COMMANDS:
${commands}
${GLOBAL_OPTIONS}
EXAMPLES:
  # Install units without starting anything
  sudo quadlet-deploy deploy ./myapp

  # Deploy and make sure the service runs
  sudo quadlet-deploy deploy ./myapp --state started -e image_tag=1.4.2

  # Preview the rendered files
  quadlet-deploy plan ./myapp --vars vars.json --show
`;
}
