/**
 * Service orchestration
 *
 * Maps the requested state, whether any file changed and the main service's
 * run state to supervisor calls:
 *
 * | requested | changed | main active | action                                 |
 * |-----------|---------|-------------|----------------------------------------|
 * | installed | any     | any         | reload only                            |
 * | started   | no      | yes         | nothing beyond reload                  |
 * | started   | no      | no          | start main                             |
 * | started   | yes     | yes         | restart dependencies in order, then main |
 * | started   | yes     | no          | start main                             |
 * | restarted | any     | any         | restart dependencies in order, then main |
 *
 * The reload itself only runs when files changed or on the first deployment.
 * Supervisor failures are not retried.
 */

import type { DesiredState, OrchestratorAction } from "../types.js";
import { logger } from "../utils/logger.js";
import { resolveDependencies } from "./dependencies.js";
import type { Supervisor } from "./supervisor.js";

export interface OrchestrateInput {
  appName: string;
  mainService: string;
  state: DesiredState;
  anyChanged: boolean;
  /** No deployment record existed before this run */
  firstDeploy: boolean;
  /** Dry-run the unit generator before reloading */
  verify: boolean;
}

export async function orchestrate(input: OrchestrateInput, supervisor: Supervisor): Promise<OrchestratorAction[]> {
  const actions: OrchestratorAction[] = [];

  if (input.anyChanged || input.firstDeploy) {
    if (input.verify) {
      await supervisor.verify();
      actions.push({ type: "verify" });
      logger.info("✓ Unit files validated by the generator");
    }
    await supervisor.reload();
    actions.push({ type: "reload" });
    logger.info("✓ Reloaded systemd");
  }

  if (input.state === "installed") {
    return actions;
  }

  const running = (await supervisor.runState(input.mainService)) === "active";
  const restart = input.state === "restarted" || (input.anyChanged && running);

  if (restart) {
    const order = await resolveDependencies(input.mainService, input.appName, supervisor);
    if (order.length > 1) {
      logger.info(`Restart order: ${order.join(" → ")}`);
    }
    for (const unit of order) {
      await supervisor.restart(unit);
      actions.push({ type: "restart", unit });
      logger.info(`✓ Restarted ${unit}`);
    }
  } else if (!running) {
    await supervisor.start(input.mainService);
    actions.push({ type: "start", unit: input.mainService });
    logger.info(`✓ Started ${input.mainService}`);
  } else {
    logger.debug(`${input.mainService} already active`);
  }

  return actions;
}
