/**
 * Dependency resolution
 *
 * Walks the supervisor's view of what the main service requires, keeping only
 * services of the same application, and produces a restart order in which
 * every service comes after everything it depends on. The main service is
 * always last.
 */

import { DependencyError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { PREFIX_SEPARATOR } from "./quadlet.js";
import type { Supervisor } from "./supervisor.js";

export type DependencyGraph = Map<string, string[]>;

/**
 * Discover the same-application dependency graph reachable from `mainService`
 */
export async function discoverGraph(
  mainService: string,
  appName: string,
  supervisor: Pick<Supervisor, "dependencies">,
): Promise<DependencyGraph> {
  const prefix = `${appName}${PREFIX_SEPARATOR}`;
  const graph: DependencyGraph = new Map();
  const queue = [mainService];

  while (queue.length > 0) {
    const service = queue.shift();
    if (service === undefined || graph.has(service)) continue;

    const declared = await supervisor.dependencies(service);
    const own: string[] = [];
    for (const dependency of declared) {
      if (!dependency.endsWith(".service") || dependency === service) continue;
      if (!dependency.startsWith(prefix)) {
        logger.debug(`Skipping ${dependency} (required by ${service}): not part of ${appName}`);
        continue;
      }
      if (!own.includes(dependency)) own.push(dependency);
    }

    graph.set(service, own);
    queue.push(...own.filter((dependency) => !graph.has(dependency)));
  }

  return graph;
}

/**
 * Reverse topological order of `graph`: dependencies first, the root (the
 * node nothing depends on) last.
 * Throws DependencyError when the graph has a cycle.
 */
export function restartOrder(graph: DependencyGraph): string[] {
  const indegree = new Map<string, number>();
  for (const node of graph.keys()) indegree.set(node, 0);
  for (const dependencies of graph.values()) {
    for (const dependency of dependencies) {
      indegree.set(dependency, (indegree.get(dependency) ?? 0) + 1);
    }
  }

  const queue = [...graph.keys()].filter((node) => indegree.get(node) === 0);
  const order: string[] = [];

  while (queue.length > 0) {
    const node = queue.shift();
    if (node === undefined) break;
    order.push(node);
    for (const dependency of graph.get(node) ?? []) {
      const remaining = (indegree.get(dependency) ?? 0) - 1;
      indegree.set(dependency, remaining);
      if (remaining === 0) queue.push(dependency);
    }
  }

  if (order.length < graph.size) {
    const cycle = findCycle(graph) ?? [...graph.keys()].filter((node) => !order.includes(node));
    throw new DependencyError(`Dependency cycle detected: ${cycle.join(" -> ")}`, { services: cycle });
  }

  // every node is reachable from the root, so without a cycle the root is the only
  // node without dependents and comes first; reversed, it comes last
  return order.reverse();
}

/**
 * One cycle as a closed path (first node repeated at the end), or null
 */
export function findCycle(graph: DependencyGraph): string[] | null {
  const state = new Map<string, "visiting" | "done">();
  const path: string[] = [];

  const visit = (node: string): string[] | null => {
    state.set(node, "visiting");
    path.push(node);
    for (const dependency of graph.get(node) ?? []) {
      const seen = state.get(dependency);
      if (seen === "visiting") {
        return [...path.slice(path.indexOf(dependency)), dependency];
      }
      if (seen === undefined) {
        const found = visit(dependency);
        if (found) return found;
      }
    }
    path.pop();
    state.set(node, "done");
    return null;
  };

  for (const node of graph.keys()) {
    if (state.has(node)) continue;
    const found = visit(node);
    if (found) return found;
  }
  return null;
}

/**
 * Restart order for the main service and its same-application dependencies
 */
export async function resolveDependencies(
  mainService: string,
  appName: string,
  supervisor: Pick<Supervisor, "dependencies">,
): Promise<string[]> {
  const graph = await discoverGraph(mainService, appName, supervisor);
  return restartOrder(graph);
}
