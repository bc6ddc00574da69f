import { randomUUID } from "node:crypto";
import { getConfig } from "./config.js";
import { RunnerError, ValidationError } from "./errors.js";
import { CallbackDispatcher } from "./executor/callbacks.js";
import { Executor } from "./executor/executor.js";
import { ABORT_NOTE, ProcessManager } from "./executor/process-manager.js";
import type { SpawnFn } from "./executor/types.js";
import { DependencyScheduler, type BlockedTask, type SchedulerOutcome } from "./planner/scheduler.js";
import { describeIssue, validateGraph } from "./planner/task-graph.js";
import { checkDefinition } from "./schemas.js";
import { TaskRegistry, type Clock } from "./tasks/registry.js";
import { expandBatchEntries, TemplateRegistry } from "./tasks/templates.js";
import type { TaskDefinition, TaskMap, TaskResult, TaskState, TaskStatus } from "./tasks/types.js";
import { createLogger } from "./utils/logger.js";
import { Ticker } from "./utils/ticker.js";

const log = createLogger("orchestrator");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TaskSnapshot = {
  id: string;
  state: Readonly<TaskState>;
  definition: TaskDefinition;
  /** Number of callback hops from a seeded task. */
  depth: number;
  elapsedMs: number;
};

export type BatchSummary = {
  runId: string;
  reason: "complete" | "blocked" | "killed";
  success: boolean;
  durationMs: number;
  counts: Record<TaskStatus, number>;
  blocked: BlockedTask[];
};

export type RejectedTask = { key: string; error: ValidationError };

export type BatchRun = {
  runId: string;
  /** Entries that were not started because their definition is invalid. */
  rejected: RejectedTask[];
  done: Promise<BatchSummary>;
};

export type RunHooks = {
  onTaskStart?: (taskId: string) => void;
  onTaskEnd?: (taskId: string, status: TaskStatus, result: TaskResult) => void;
  onOutput?: (taskId: string, chunk: string) => void;
  onWarning?: (message: string) => void;
  onCallbackError?: (taskId: string, error: unknown) => void;
  /** Called every `ui.refreshMs` while the batch runs. */
  onTick?: (snapshot: TaskSnapshot[]) => void;
  onSettled?: (summary: BatchSummary) => void;
};

export type OrchestratorOptions = {
  templates?: TemplateRegistry;
  /** Replaces `child_process.spawn` (for testing). */
  spawn?: SpawnFn;
  clock?: Clock;
  killGraceMs?: number;
};

type ActiveBatch = {
  runId: string;
  startedAt: number;
  tasks: Map<string, TaskDefinition>;
  settled: boolean;
  settle: (reason: BatchSummary["reason"], blocked?: BlockedTask[]) => void;
};

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class Orchestrator {
  readonly registry: TaskRegistry;
  readonly templates: TemplateRegistry;
  private processes: ProcessManager;
  private active?: ActiveBatch;

  constructor(opts: OrchestratorOptions = {}) {
    this.registry = new TaskRegistry(opts.clock);
    this.templates = opts.templates ?? new TemplateRegistry();
    this.processes = new ProcessManager(this.registry, { spawn: opts.spawn, killGraceMs: opts.killGraceMs });
  }

  /**
   * Start a batch. Returns immediately; `done` resolves once every task is
   * terminal, once the remaining tasks can never run, or after `killAll()`.
   */
  runBatch(tasks: TaskMap, hooks: RunHooks = {}): BatchRun {
    if (this.active && !this.active.settled) {
      throw new RunnerError("BATCH_IN_PROGRESS", `Batch ${this.active.runId} is still running`);
    }

    const runId = randomUUID();
    const warn = (message: string): void => {
      log.warn(message);
      hooks.onWarning?.(message);
    };

    this.registry.clear();

    const { definitions, rejected } = expandBatchEntries(tasks, this.templates);
    const accepted = new Map<string, TaskDefinition>();
    for (const definition of definitions) {
      const error = checkDefinition(definition, definition.id);
      if (error) {
        rejected.push({ key: definition.id, error });
      } else if (accepted.has(definition.id)) {
        rejected.push({
          key: definition.id,
          error: new ValidationError("DUPLICATE_REGISTRATION", `Task id "${definition.id}" is used more than once`),
        });
      } else {
        accepted.set(definition.id, definition);
      }
    }
    for (const { key, error } of rejected) {
      warn(`Rejected task "${key}": ${error.message}`);
    }

    const seeded = [...accepted.values()];
    for (const issue of validateGraph(seeded, this.templates.names())) {
      warn(describeIssue(issue));
    }

    for (const task of seeded) {
      this.registry.initialize(task.id, task);
    }

    let resolveDone: (summary: BatchSummary) => void = () => {};
    const done = new Promise<BatchSummary>((resolve) => {
      resolveDone = resolve;
    });

    const dispatcher = new CallbackDispatcher({
      registry: this.registry,
      templates: this.templates,
      tasks: accepted,
      launch: (task) => {
        if (scheduler.gate(task)) launch(task);
      },
      onWarning: warn,
      onCallbackError: hooks.onCallbackError,
      onIdle: () => scheduler.poke(),
    });

    const executor = new Executor({
      registry: this.registry,
      processes: this.processes,
      callbacks: dispatcher,
      onTaskStart: hooks.onTaskStart,
      onTaskEnd: hooks.onTaskEnd,
      onWarning: warn,
    });

    const launch = (task: TaskDefinition): void => {
      executor.runTask(task).catch((err: unknown) => {
        log.error(`Task "${task.id}" could not be run`, { error: String(err) });
      });
    };

    const scheduler = new DependencyScheduler({
      registry: this.registry,
      tasks: accepted,
      launch,
      busy: () => dispatcher.busy(),
      onWarning: warn,
      onSettled: (outcome: SchedulerOutcome) => {
        batch.settle(outcome.reason, outcome.reason === "blocked" ? outcome.blocked : []);
      },
    });

    const unsubscribe = this.registry.onChange((event) => {
      if (event.type === "output") hooks.onOutput?.(event.id, event.chunk);
    });

    const onTick = hooks.onTick;
    const ticker = onTick ? new Ticker(getConfig().ui.refreshMs, () => onTick(this.snapshot())) : undefined;

    const batch: ActiveBatch = {
      runId,
      startedAt: this.registry.now(),
      tasks: accepted,
      settled: false,
      settle: (reason, blocked = []) => {
        if (batch.settled) return;
        batch.settled = true;
        scheduler.stop();
        ticker?.stop();
        unsubscribe();
        if (reason === "killed") {
          dispatcher.stop();
          executor.stop();
        }

        const summary = this.summarize(batch, reason, blocked);
        log.info(`Batch ${runId} finished`, { reason, success: summary.success, durationMs: summary.durationMs });
        hooks.onSettled?.(summary);
        resolveDone(summary);
      },
    };
    this.active = batch;

    log.info(`Batch ${runId} starting`, { tasks: seeded.length, rejected: rejected.length });
    ticker?.start();
    scheduler.start(seeded);

    return { runId, rejected, done };
  }

  /**
   * Abort every running task and end the batch. Tasks that have not started
   * stay as they are. Returns the ids of the aborted tasks.
   */
  killAll(): string[] {
    const killed = this.processes.killAll();
    for (const id of this.registry.inStatus("running")) {
      this.registry.setAborted(id, ABORT_NOTE);
      killed.push(id);
    }
    log.info(`Killed ${killed.length} tasks`);
    this.active?.settle("killed");
    return killed;
  }

  /** True when no task of the current batch is pending, waiting or running. */
  isBatchComplete(): boolean {
    return this.registry.allTerminal();
  }

  snapshot(): TaskSnapshot[] {
    const tasks = this.active?.tasks;
    if (!tasks) return [];
    const now = this.registry.now();
    const snapshots: TaskSnapshot[] = [];

    for (const [id, state] of this.registry.entries()) {
      const definition = tasks.get(id);
      if (!definition) continue;
      snapshots.push({
        id,
        state,
        definition,
        depth: this.depthOf(id),
        elapsedMs: state.startTime === 0 ? 0 : (state.endTime ?? now) - state.startTime,
      });
    }
    return snapshots;
  }

  private depthOf(id: string): number {
    const seen = new Set<string>([id]);
    let depth = 0;
    let parent = this.registry.get(id)?.parentTask;
    while (parent !== undefined && !seen.has(parent)) {
      seen.add(parent);
      depth++;
      parent = this.registry.get(parent)?.parentTask;
    }
    return depth;
  }

  private summarize(batch: ActiveBatch, reason: BatchSummary["reason"], blocked: BlockedTask[]): BatchSummary {
    const counts: Record<TaskStatus, number> = {
      pending: 0,
      waiting: 0,
      running: 0,
      success: 0,
      failed: 0,
      skipped: 0,
      aborted: 0,
    };
    for (const [, state] of this.registry.entries()) {
      counts[state.status]++;
    }
    return {
      runId: batch.runId,
      reason,
      success: reason === "complete" && counts.failed === 0 && counts.aborted === 0,
      durationMs: this.registry.now() - batch.startedAt,
      counts,
      blocked,
    };
  }
}
