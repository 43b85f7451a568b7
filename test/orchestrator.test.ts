import { describe, expect, it } from "vitest";
import { type OrchestrateInput, orchestrate } from "../src/core/orchestrator.js";
import { DependencyError } from "../src/utils/errors.js";
import { FakeSupervisor } from "./helpers.js";

const MAIN = "myapp--main.service";
const DB = "myapp--db.service";

function input(overrides: Partial<OrchestrateInput>): OrchestrateInput {
  return {
    appName: "myapp",
    mainService: MAIN,
    state: "started",
    anyChanged: false,
    firstDeploy: false,
    verify: true,
    ...overrides,
  };
}

function supervisorWith(mainState: "active" | "inactive" | "unknown"): FakeSupervisor {
  const supervisor = new FakeSupervisor();
  supervisor.states.set(MAIN, mainState);
  supervisor.deps.set(MAIN, [DB]);
  return supervisor;
}

describe("orchestrate", () => {
  it("installed: verifies and reloads when files changed", async () => {
    const supervisor = supervisorWith("active");
    const actions = await orchestrate(input({ state: "installed", anyChanged: true }), supervisor);

    expect(supervisor.calls).toEqual(["verify", "reload"]);
    expect(actions).toEqual([{ type: "verify" }, { type: "reload" }]);
  });

  it("installed: does nothing when nothing changed", async () => {
    const supervisor = supervisorWith("inactive");
    expect(await orchestrate(input({ state: "installed" }), supervisor)).toEqual([]);
    expect(supervisor.calls).toEqual([]);
  });

  it("reloads on the first deployment even without changes", async () => {
    const supervisor = supervisorWith("inactive");
    await orchestrate(input({ state: "installed", firstDeploy: true, verify: false }), supervisor);
    expect(supervisor.calls).toEqual(["reload"]);
  });

  it("started, unchanged, active: nothing to do", async () => {
    const supervisor = supervisorWith("active");
    expect(await orchestrate(input({}), supervisor)).toEqual([]);
    expect(supervisor.calls).toEqual([]);
  });

  it("started, unchanged, inactive: starts main", async () => {
    const supervisor = supervisorWith("inactive");
    expect(await orchestrate(input({}), supervisor)).toEqual([{ type: "start", unit: MAIN }]);
    expect(supervisor.calls).toEqual([`start ${MAIN}`]);
  });

  it("started, changed, active: restarts dependencies then main", async () => {
    const supervisor = supervisorWith("active");
    await orchestrate(input({ anyChanged: true }), supervisor);
    expect(supervisor.calls).toEqual(["verify", "reload", `restart ${DB}`, `restart ${MAIN}`]);
  });

  it("started, changed, inactive: starts main without touching dependencies", async () => {
    const supervisor = supervisorWith("inactive");
    await orchestrate(input({ anyChanged: true }), supervisor);
    expect(supervisor.calls).toEqual(["verify", "reload", `start ${MAIN}`]);
  });

  it("started: an unknown run state counts as not running", async () => {
    const supervisor = supervisorWith("unknown");
    await orchestrate(input({}), supervisor);
    expect(supervisor.calls).toEqual([`start ${MAIN}`]);
  });

  it("restarted: always restarts the cascade", async () => {
    const supervisor = supervisorWith("inactive");
    const actions = await orchestrate(input({ state: "restarted" }), supervisor);

    expect(actions).toEqual([
      { type: "restart", unit: DB },
      { type: "restart", unit: MAIN },
    ]);
  });

  it("propagates dependency cycles before restarting anything", async () => {
    const supervisor = supervisorWith("active");
    supervisor.deps.set(DB, [MAIN]);

    await expect(orchestrate(input({ state: "restarted" }), supervisor)).rejects.toBeInstanceOf(DependencyError);
    expect(supervisor.calls).toEqual([]);
  });

  it("stops at the first supervisor failure", async () => {
    const supervisor = supervisorWith("active");
    supervisor.failOn = "reload";

    await expect(orchestrate(input({ anyChanged: true }), supervisor)).rejects.toThrow("reload failed");
    expect(supervisor.calls).toEqual(["verify"]);
  });
});
