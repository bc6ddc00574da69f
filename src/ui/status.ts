import type { TaskSnapshot } from "../orchestrator.js";
import type { TaskStatus } from "../tasks/types.js";

export const STATUS_ICONS: Record<TaskStatus, string> = {
  pending: "…",
  waiting: "◷",
  running: "▶",
  success: "✓",
  failed: "✗",
  skipped: "○",
  aborted: "⊘",
};

export type RenderOptions = {
  hideSkipped?: boolean;
  /** Time since the batch started, shown in the header. */
  batchElapsedMs?: number;
};

function seconds(ms: number): string {
  return `(${(ms / 1000).toFixed(2)}s)`;
}

/** Parents before their callback tasks, each callback right below its parent chain. */
export function orderForDisplay(snapshots: TaskSnapshot[]): TaskSnapshot[] {
  const ids = new Set(snapshots.map((s) => s.id));
  const children = new Map<string, TaskSnapshot[]>();
  const roots: TaskSnapshot[] = [];

  for (const snapshot of snapshots) {
    const parent = snapshot.state.parentTask;
    if (parent !== undefined && parent !== snapshot.id && ids.has(parent)) {
      const list = children.get(parent) ?? [];
      list.push(snapshot);
      children.set(parent, list);
    } else {
      roots.push(snapshot);
    }
  }

  const ordered: TaskSnapshot[] = [];
  const placed = new Set<string>();
  const place = (snapshot: TaskSnapshot): void => {
    if (placed.has(snapshot.id)) return;
    placed.add(snapshot.id);
    ordered.push(snapshot);
    for (const child of children.get(snapshot.id) ?? []) {
      place(child);
    }
  };

  for (const root of roots) {
    place(root);
  }
  // Parent chains that loop back on themselves have no root.
  for (const snapshot of snapshots) {
    place(snapshot);
  }
  return ordered;
}

function statusText(snapshot: TaskSnapshot): string {
  const { status } = snapshot.state;
  const icon = STATUS_ICONS[status];
  switch (status) {
    case "running":
      return `${icon} Running...`;
    case "waiting":
      return `${icon} Waiting for dependencies...`;
    case "pending":
      return `${icon} Pending`;
    case "skipped":
      return `${icon} Skipped`;
    case "success":
      return `${icon} Success ${seconds(snapshot.elapsedMs)}`;
    case "failed":
      return `${icon} Failed ${seconds(snapshot.elapsedMs)}`;
    case "aborted":
      return `${icon} Aborted ${seconds(snapshot.elapsedMs)}`;
  }
}

export function taskLine(snapshot: TaskSnapshot): string {
  const { definition } = snapshot;
  const label = definition.label ?? snapshot.id;
  const name = definition.icon ? `${definition.icon} ${label}` : label;
  return `${"  ".repeat(snapshot.depth)}${name} ${statusText(snapshot)}`;
}

export function headerLine(snapshots: TaskSnapshot[], elapsedMs = 0): string {
  const running = snapshots.filter((s) => s.state.status === "running").length;
  if (running > 0) {
    return `Running ${running} ${running === 1 ? "task" : "tasks"}... ${seconds(elapsedMs)}`;
  }
  const failed = snapshots.some((s) => s.state.status === "failed" || s.state.status === "aborted");
  return failed
    ? `${STATUS_ICONS.failed} Some tasks failed ${seconds(elapsedMs)}`
    : `${STATUS_ICONS.success} All tasks completed ${seconds(elapsedMs)}`;
}

/** Header line followed by one line per task. */
export function renderStatus(snapshots: TaskSnapshot[], opts: RenderOptions = {}): string[] {
  const visible = orderForDisplay(snapshots).filter((s) => !(opts.hideSkipped && s.state.status === "skipped"));
  return [headerLine(snapshots, opts.batchElapsedMs), ...visible.map(taskLine)];
}
