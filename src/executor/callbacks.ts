import { errorMessage } from "../errors.js";
import { unmetDependencies } from "../planner/task-graph.js";
import type { TaskRegistry } from "../tasks/registry.js";
import type { TemplateRegistry } from "../tasks/templates.js";
import type { CallbackFn, TaskCallback, TaskDefinition, TaskResult } from "../tasks/types.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("callbacks");

export type CallbackDispatcherOptions = {
  registry: TaskRegistry;
  templates: TemplateRegistry;
  /** Definitions of the current batch; materialized templates are added here. */
  tasks: Map<string, TaskDefinition>;
  launch: (task: TaskDefinition) => void;
  onWarning?: (message: string) => void;
  onCallbackError?: (taskId: string, error: unknown) => void;
  /** Called when the last callback function in flight has finished. */
  onIdle?: () => void;
};

/**
 * Runs `onSuccess` / `onFail` reactions. Task callbacks are created (from a
 * template on first use) and launched at most once; function callbacks run on
 * the next tick and their errors never reach the scheduler.
 */
export class CallbackDispatcher {
  private opts: CallbackDispatcherOptions;
  private stopped = false;
  private inFlight = 0;

  constructor(opts: CallbackDispatcherOptions) {
    this.opts = opts;
  }

  /** Drop callbacks that were deferred but have not run yet. */
  stop(): void {
    this.stopped = true;
  }

  /** Whether callback functions are scheduled or still running. */
  busy(): boolean {
    return this.inFlight > 0;
  }

  dispatch(spec: TaskCallback | undefined, result: TaskResult, triggeringId: string): void {
    if (spec === undefined) return;

    if (Array.isArray(spec)) {
      log.debug(`Dispatching ${spec.length} callbacks for "${triggeringId}"`);
      spec.forEach((callback, i) => {
        const previous = i > 0 ? spec[i - 1] : undefined;
        const parent = typeof previous === "string" ? previous : triggeringId;
        this.dispatchOne(callback, result, parent);
      });
      return;
    }

    this.dispatchOne(spec, result, triggeringId);
  }

  private dispatchOne(callback: string | CallbackFn, result: TaskResult, parentId: string): void {
    if (typeof callback === "string") {
      this.runTaskCallback(callback, parentId);
    } else {
      this.runFunctionCallback(callback, result, parentId);
    }
  }

  private resolveTarget(id: string): TaskDefinition | undefined {
    const existing = this.opts.tasks.get(id);
    if (existing) return existing;

    const materialized = this.opts.templates.materialize(id);
    if (materialized) {
      log.debug(`Materialized template "${id}" as a callback task`);
      this.opts.tasks.set(id, materialized);
    }
    return materialized;
  }

  private runTaskCallback(id: string, parentId: string): void {
    const { registry } = this.opts;
    const task = this.resolveTarget(id);
    if (!task) {
      const message = `Callback task not found: ${id}`;
      log.warn(message, { parent: parentId });
      this.opts.onWarning?.(message);
      return;
    }

    if (registry.has(id)) {
      registry.markCallback(id, parentId);
    } else {
      registry.initialize(id, task, { parentTask: parentId });
    }

    if (registry.statusOf(id) !== "pending") return;

    if (unmetDependencies(registry.get(id)?.dependsOn ?? [], registry).length > 0) {
      registry.setWaiting(id);
      return;
    }

    setImmediate(() => {
      if (this.stopped || registry.statusOf(id) !== "pending") return;
      this.opts.launch(task);
    });
  }

  private runFunctionCallback(callback: CallbackFn, result: TaskResult, parentId: string): void {
    this.inFlight++;
    setImmediate(() => {
      if (this.stopped) {
        this.inFlight--;
        return;
      }
      void Promise.resolve()
        .then(() => callback(result))
        .catch((err: unknown) => {
          log.error(`Callback function of "${parentId}" failed`, { error: errorMessage(err) });
          this.opts.onCallbackError?.(parentId, err);
        })
        .finally(() => {
          this.inFlight--;
          if (this.inFlight === 0) this.opts.onIdle?.();
        });
    });
  }
}
