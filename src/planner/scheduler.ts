import { errorMessage } from "../errors.js";
import type { RegistryEvent, TaskRegistry } from "../tasks/registry.js";
import type { TaskDefinition } from "../tasks/types.js";
import { createLogger } from "../utils/logger.js";
import { unmetDependencies } from "./task-graph.js";

const log = createLogger("scheduler");

export type BlockedTask = { id: string; waitingOn: string[] };

export type SchedulerOutcome =
  | { reason: "complete" }
  | { reason: "blocked"; blocked: BlockedTask[] };

export type DependencySchedulerOptions = {
  registry: TaskRegistry;
  /** Definitions of the current batch, including callback tasks added later. */
  tasks: Map<string, TaskDefinition>;
  launch: (task: TaskDefinition) => void;
  /** Work the registry cannot see, such as callback functions still in flight. */
  busy?: () => boolean;
  onWarning?: (message: string) => void;
  onSettled: (outcome: SchedulerOutcome) => void;
};

/**
 * Starts tasks whose dependencies are met. Every status change in the
 * registry schedules one sweep on the next tick; the sweep launches waiting
 * tasks that became ready and settles the batch once nothing can move.
 */
export class DependencyScheduler {
  private opts: DependencySchedulerOptions;
  private unsubscribe?: () => void;
  private sweepScheduled = false;
  private stopped = false;
  /** Tasks whose condition already allowed them to run. */
  private allowed = new Set<string>();

  constructor(opts: DependencySchedulerOptions) {
    this.opts = opts;
  }

  start(seeded: TaskDefinition[]): void {
    const { registry } = this.opts;
    this.unsubscribe = registry.onChange((event: RegistryEvent) => {
      if (event.type === "status") this.poke();
    });

    for (const task of seeded) {
      this.gate(task);
    }

    for (const task of seeded) {
      if (registry.statusOf(task.id) !== "pending") continue;
      const unmet = unmetDependencies(task.dependsOn ?? [], registry);
      if (unmet.length > 0) {
        log.debug(`Task "${task.id}" waiting`, { on: unmet });
        registry.setWaiting(task.id);
      }
    }

    const ready = seeded.filter((task) => registry.statusOf(task.id) === "pending");
    log.info(`Starting ${ready.length} of ${seeded.length} tasks`);
    for (const task of ready) {
      this.opts.launch(task);
    }

    this.poke();
  }

  /**
   * Evaluate `when`, once per task. A false or throwing gate marks the task
   * skipped. Returns whether the task may run.
   */
  gate(task: TaskDefinition): boolean {
    if (!task.when || this.allowed.has(task.id)) return true;
    let allowed: boolean;
    try {
      allowed = task.when();
    } catch (err) {
      const message = `Condition of task "${task.id}" threw: ${errorMessage(err)}`;
      log.warn(message);
      this.opts.onWarning?.(message);
      allowed = false;
    }
    if (allowed) {
      this.allowed.add(task.id);
      return true;
    }

    const { registry } = this.opts;
    if (registry.safeSetState(task.id, "skipped")) {
      registry.setResult(task.id, { success: true, output: registry.get(task.id)?.output ?? "" });
      log.debug(`Task "${task.id}" skipped by its condition`);
    }
    return false;
  }

  /** Schedule a sweep on the next tick, unless one is already scheduled. */
  poke(): void {
    if (this.stopped || this.sweepScheduled) return;
    this.sweepScheduled = true;
    setImmediate(() => {
      this.sweepScheduled = false;
      this.sweep();
    });
  }

  stop(): void {
    this.stopped = true;
    this.unsubscribe?.();
    this.unsubscribe = undefined;
  }

  private sweep(): void {
    if (this.stopped) return;
    const { registry, tasks } = this.opts;

    let moved = 0;
    for (const id of registry.inStatus("waiting")) {
      const task = tasks.get(id);
      if (!task) continue;
      if (unmetDependencies(registry.get(id)?.dependsOn ?? [], registry).length === 0) {
        log.debug(`Dependencies of "${id}" met`);
        moved++;
        if (this.gate(task)) this.opts.launch(task);
      }
    }
    if (moved > 0 || this.opts.busy?.()) return;

    if (registry.allTerminal()) {
      this.settle({ reason: "complete" });
      return;
    }

    const active = registry.inStatus("pending").length + registry.inStatus("running").length;
    if (active > 0) return;

    const blocked = registry.inStatus("waiting").map((id) => ({
      id,
      waitingOn: unmetDependencies(registry.get(id)?.dependsOn ?? [], registry),
    }));
    for (const { id, waitingOn } of blocked) {
      log.warn(`Task "${id}" can never run`, { waitingOn });
    }
    this.settle({ reason: "blocked", blocked });
  }

  private settle(outcome: SchedulerOutcome): void {
    this.stop();
    log.info(`Batch settled: ${outcome.reason}`);
    this.opts.onSettled(outcome);
  }
}
