import { createLogger } from "../utils/logger.js";
import { isTerminal, type TaskDefinition, type TaskResult, type TaskState, type TaskStatus } from "./types.js";

const log = createLogger("registry");

export type RegistryEvent =
  | { type: "status"; id: string; from: TaskStatus | undefined; to: TaskStatus }
  | { type: "output"; id: string; chunk: string };

export type RegistryListener = (event: RegistryEvent) => void;

export type Lineage = { parentTask: string };

export type Clock = () => number;

const monotonic: Clock = () => performance.now();

/**
 * Mutable state of every task in the current run.
 *
 * Terminal statuses are final: once a task is `success`, `failed`, `skipped`
 * or `aborted`, `safeSetState` refuses every write. Only `setAborted` still
 * applies, and nothing moves a task out of `aborted`, so a process that
 * finishes after a kill cannot turn the task back into `success` or `failed`.
 */
export class TaskRegistry {
  private states = new Map<string, TaskState>();
  /** Callback marks for ids whose state does not exist yet. */
  private pendingLineage = new Map<string, string>();
  private listeners = new Set<RegistryListener>();
  private clock: Clock;

  constructor(clock: Clock = monotonic) {
    this.clock = clock;
  }

  now(): number {
    return this.clock();
  }

  /**
   * Create a pending state, or refresh an existing one that has not started.
   * A running, terminal or aborted state is left as it is; callback lineage
   * is always kept.
   */
  initialize(id: string, definition: Pick<TaskDefinition, "dependsOn">, lineage?: Lineage): TaskState {
    const existing = this.states.get(id);
    const dependsOn = [...(definition.dependsOn ?? [])];

    if (!existing) {
      const parentTask = lineage?.parentTask ?? this.pendingLineage.get(id);
      this.pendingLineage.delete(id);
      const state: TaskState = {
        status: "pending",
        output: "",
        startTime: 0,
        dependsOn,
        isCallback: parentTask !== undefined,
        parentTask,
      };
      this.states.set(id, state);
      log.debug(parentTask ? `Created callback task "${id}"` : `Initialized task "${id}"`, { parentTask });
      this.emit({ type: "status", id, from: undefined, to: "pending" });
      return state;
    }

    if (lineage && !existing.isCallback) {
      existing.isCallback = true;
      existing.parentTask = lineage.parentTask;
    }

    if (existing.status === "pending" || existing.status === "waiting") {
      const from = existing.status;
      existing.status = "pending";
      existing.output = "";
      existing.startTime = 0;
      existing.endTime = undefined;
      existing.dependsOn = dependsOn;
      if (from !== "pending") this.emit({ type: "status", id, from, to: "pending" });
    } else {
      log.debug(`Task "${id}" already ${existing.status}, not re-initialized`);
    }
    return existing;
  }

  /** Tag a task as a callback of `parentId`. The first parent recorded wins. */
  markCallback(id: string, parentId: string): void {
    const state = this.states.get(id);
    if (!state) {
      if (!this.pendingLineage.has(id)) this.pendingLineage.set(id, parentId);
      return;
    }
    if (state.isCallback) return;
    state.isCallback = true;
    state.parentTask = parentId;
    log.debug(`Marked task "${id}" as callback of "${parentId}"`);
  }

  /** `pending|waiting → running`. Returns whether the transition was applied. */
  setRunning(id: string): boolean {
    const state = this.states.get(id);
    if (!state || (state.status !== "pending" && state.status !== "waiting")) return false;
    const from = state.status;
    state.status = "running";
    state.startTime = this.clock();
    state.endTime = undefined;
    this.emit({ type: "status", id, from, to: "running" });
    return true;
  }

  /** `pending → waiting`. */
  setWaiting(id: string): boolean {
    const state = this.states.get(id);
    if (!state || state.status !== "pending") return false;
    state.status = "waiting";
    this.emit({ type: "status", id, from: "pending", to: "waiting" });
    return true;
  }

  /**
   * Status write that never leaves a terminal status. Terminal statuses
   * stamp `endTime`. Returns whether the write was applied.
   */
  safeSetState(id: string, status: TaskStatus): boolean {
    const state = this.states.get(id);
    if (!state || isTerminal(state.status)) return false;
    const from = state.status;
    state.status = status;
    if (isTerminal(status)) state.endTime = this.clock();
    if (from !== status) this.emit({ type: "status", id, from, to: status });
    return true;
  }

  setResult(id: string, result: TaskResult): void {
    const state = this.states.get(id);
    if (state) state.result = result;
  }

  appendOutput(id: string, chunk: string): void {
    const state = this.states.get(id);
    if (!state || chunk.length === 0) return;
    state.output += chunk;
    this.emit({ type: "output", id, chunk });
  }

  /** Force `aborted`, stamping `endTime` and appending `note` on its own line. */
  setAborted(id: string, note?: string): void {
    const state = this.states.get(id);
    if (!state) return;
    const from = state.status;
    state.status = "aborted";
    state.endTime = this.clock();
    if (note) this.appendOutput(id, `\n${note}`);
    if (from !== "aborted") this.emit({ type: "status", id, from, to: "aborted" });
  }

  get(id: string): Readonly<TaskState> | undefined {
    return this.states.get(id);
  }

  has(id: string): boolean {
    return this.states.has(id);
  }

  statusOf(id: string): TaskStatus | undefined {
    return this.states.get(id)?.status;
  }

  ids(): string[] {
    return [...this.states.keys()];
  }

  entries(): Array<[string, Readonly<TaskState>]> {
    return [...this.states.entries()];
  }

  inStatus(status: TaskStatus): string[] {
    return this.ids().filter((id) => this.states.get(id)?.status === status);
  }

  /** True iff no task is pending, waiting or running. */
  allTerminal(): boolean {
    for (const state of this.states.values()) {
      if (!isTerminal(state.status)) return false;
    }
    return true;
  }

  clear(): void {
    this.states.clear();
    this.pendingLineage.clear();
  }

  onChange(listener: RegistryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(event: RegistryEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (err) {
        log.error("Registry listener threw", { error: String(err), event: event.type, id: event.id });
      }
    }
  }
}
