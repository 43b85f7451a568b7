import { describe, expect, it } from "vitest";
import { discoverGraph, findCycle, resolveDependencies, restartOrder } from "../src/core/dependencies.js";
import { DependencyError } from "../src/utils/errors.js";
import { FakeSupervisor } from "./helpers.js";

const MAIN = "app--main.service";
const A = "app--a.service";
const B = "app--b.service";
const C = "app--c.service";

describe("restartOrder", () => {
  it("puts dependencies first and the main service last", () => {
    const graph = new Map([
      [MAIN, [A, B]],
      [A, []],
      [B, [C]],
      [C, []],
    ]);
    expect(restartOrder(graph)).toEqual([C, B, A, MAIN]);
  });

  it("restarts a shared dependency once, before both dependents", () => {
    const graph = new Map([
      [MAIN, [A, B]],
      [A, [C]],
      [B, [C]],
      [C, []],
    ]);
    expect(restartOrder(graph)).toEqual([C, B, A, MAIN]);
  });

  it("returns just the main service without dependencies", () => {
    expect(restartOrder(new Map([[MAIN, []]]))).toEqual([MAIN]);
  });

  it("reports cycles with the services involved", () => {
    const graph = new Map([
      [MAIN, [A]],
      [A, [B]],
      [B, [A]],
    ]);

    expect(() => restartOrder(graph)).toThrow(DependencyError);
    expect(() => restartOrder(graph)).toThrow(`Dependency cycle detected: ${A} -> ${B} -> ${A}`);
    expect(findCycle(graph)).toEqual([A, B, A]);
  });
});

describe("discoverGraph", () => {
  it("keeps only services of the same application", async () => {
    const supervisor = new FakeSupervisor();
    supervisor.deps.set(MAIN, ["network-online.target", "other--db.service", A, MAIN, A, "systemd-journald.socket"]);
    supervisor.deps.set(A, ["sysinit.target"]);

    const graph = await discoverGraph(MAIN, "app", supervisor);
    expect([...graph.entries()]).toEqual([
      [MAIN, [A]],
      [A, []],
    ]);
  });

  it("does not treat another application's prefix as a prefix match", async () => {
    const supervisor = new FakeSupervisor();
    supervisor.deps.set(MAIN, ["app-x--db.service", "app--db.service"]);

    const graph = await discoverGraph(MAIN, "app", supervisor);
    expect(graph.get(MAIN)).toEqual(["app--db.service"]);
  });
});

describe("resolveDependencies", () => {
  it("walks the supervisor's graph transitively", async () => {
    const supervisor = new FakeSupervisor();
    supervisor.deps.set(MAIN, [A, B]);
    supervisor.deps.set(B, [C]);

    expect(await resolveDependencies(MAIN, "app", supervisor)).toEqual([C, B, A, MAIN]);
  });
});
