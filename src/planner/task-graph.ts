import type { TaskRegistry } from "../tasks/registry.js";
import { SATISFYING_STATUSES, type TaskCallback, type TaskInput } from "../tasks/types.js";

type GraphNode = Pick<TaskInput, "dependsOn" | "onSuccess" | "onFail"> & { id: string };

export type GraphIssue =
  | { kind: "unknown-dependency"; taskId: string; dependency: string }
  | { kind: "self-dependency"; taskId: string }
  | { kind: "unknown-callback"; taskId: string; target: string }
  | { kind: "cycle"; path: string[] };

/** Dependencies of a task that are not yet success or skipped. */
export function unmetDependencies(dependsOn: readonly string[], registry: TaskRegistry): string[] {
  return dependsOn.filter((dep) => {
    const status = registry.statusOf(dep);
    return status === undefined || !SATISFYING_STATUSES.has(status);
  });
}

/** Task ids named by a callback spec, in order. */
export function callbackTargets(callback: TaskCallback | undefined): string[] {
  if (callback === undefined) return [];
  const list = Array.isArray(callback) ? callback : [callback];
  return list.filter((c): c is string => typeof c === "string");
}

/** Find one dependency cycle using DFS with coloring. Returns its path, first id repeated at the end. */
export function findCycle(nodes: readonly GraphNode[]): string[] | undefined {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const byId = new Map(nodes.map((n) => [n.id, n]));
  const color = new Map<string, number>();
  const stack: string[] = [];

  function dfs(id: string): string[] | undefined {
    color.set(id, GRAY);
    stack.push(id);
    for (const dep of byId.get(id)?.dependsOn ?? []) {
      if (!byId.has(dep)) continue;
      const c = color.get(dep) ?? WHITE;
      if (c === GRAY) return [...stack.slice(stack.indexOf(dep)), dep];
      if (c === WHITE) {
        const found = dfs(dep);
        if (found) return found;
      }
    }
    stack.pop();
    color.set(id, BLACK);
    return undefined;
  }

  for (const node of nodes) {
    if ((color.get(node.id) ?? WHITE) === WHITE) {
      const found = dfs(node.id);
      if (found) return found;
    }
  }
  return undefined;
}

/**
 * Static checks over a batch. `known` holds ids that exist outside the batch
 * (templates), which callbacks may name.
 */
export function validateGraph(nodes: readonly GraphNode[], known: Iterable<string> = []): GraphIssue[] {
  const ids = new Set(nodes.map((n) => n.id));
  const callable = new Set([...ids, ...known]);
  const issues: GraphIssue[] = [];

  for (const node of nodes) {
    for (const dep of node.dependsOn ?? []) {
      if (dep === node.id) {
        issues.push({ kind: "self-dependency", taskId: node.id });
      } else if (!ids.has(dep)) {
        issues.push({ kind: "unknown-dependency", taskId: node.id, dependency: dep });
      }
    }
    for (const target of [...callbackTargets(node.onSuccess), ...callbackTargets(node.onFail)]) {
      if (!callable.has(target)) {
        issues.push({ kind: "unknown-callback", taskId: node.id, target });
      }
    }
  }

  const withoutSelfLoops = nodes.map((n) => ({ ...n, dependsOn: (n.dependsOn ?? []).filter((d) => d !== n.id) }));
  const cycle = findCycle(withoutSelfLoops);
  if (cycle) issues.push({ kind: "cycle", path: cycle });

  return issues;
}

export function describeIssue(issue: GraphIssue): string {
  switch (issue.kind) {
    case "unknown-dependency":
      return `Task "${issue.taskId}" depends on unknown task "${issue.dependency}"`;
    case "self-dependency":
      return `Task "${issue.taskId}" depends on itself`;
    case "unknown-callback":
      return `Task "${issue.taskId}" has unknown callback target "${issue.target}"`;
    case "cycle":
      return `Dependency cycle: ${issue.path.join(" -> ")}`;
  }
}

/** Tasks in dependency order (dependencies first); ties keep input order. */
export function topologicalOrder<T extends GraphNode>(nodes: readonly T[]): T[] {
  const byId = new Map(nodes.map((n) => [n.id, n]));
  const visited = new Set<string>();
  const sorted: T[] = [];

  function visit(id: string): void {
    if (visited.has(id)) return;
    visited.add(id);
    const node = byId.get(id);
    if (!node) return;
    for (const dep of node.dependsOn ?? []) {
      visit(dep);
    }
    sorted.push(node);
  }

  for (const node of nodes) {
    visit(node.id);
  }

  return sorted;
}

