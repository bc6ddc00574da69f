import type { RunnerConfig } from "../config.js";
import type { TaskRegistry } from "./registry.js";

export type TaskStatus = "pending" | "waiting" | "running" | "success" | "failed" | "skipped" | "aborted";

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>([
  "success",
  "failed",
  "skipped",
  "aborted",
]);

/** Statuses that satisfy a dependency. */
export const SATISFYING_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>(["success", "skipped"]);

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export type TaskResult = {
  success: boolean;
  exitCode?: number | null;
  /** Combined stdout/stderr of the task, in arrival order. */
  output: string;
  stdout?: string;
  stderr?: string;
  errorMessage?: string;
  timedOut?: boolean;
};

export type CallbackFn = (result: TaskResult) => void | Promise<void>;

/** A task id to run, a function to call, or an ordered list of both. */
export type TaskCallback = string | CallbackFn | Array<string | CallbackFn>;

export type CommandValue = string | string[] | undefined;

export type CommandSpec = string | string[] | ((task: TaskDefinition) => CommandValue);

export type FunctionResult = boolean | { ok: boolean; message?: string };

export type TaskFunction = () => FunctionResult | Promise<FunctionResult>;

/**
 * What a handler may return:
 * - `true` / `false` / `{ ok, message }`: the task is finished
 * - a string: run it as this task's command
 * - `undefined`: the handler finishes the task later through `ctx.resolve` or `ctx.skip`
 */
export type HandlerReturn = FunctionResult | string | undefined | void;

export type HandlerContext = {
  task: TaskDefinition;
  config: Readonly<RunnerConfig>;
  registry: TaskRegistry;
  appendOutput(chunk: string): void;
  /** Finish a deferred task. Only the first call has an effect. */
  resolve(result: FunctionResult): void;
  /** Finish a deferred task as skipped, with an optional note in its output. */
  skip(note?: string): void;
};

export type TaskHandler = (ctx: HandlerContext) => HandlerReturn | Promise<HandlerReturn>;

export type TaskDefinition = {
  id: string;
  label?: string;
  icon?: string;
  command?: CommandSpec;
  fn?: TaskFunction;
  handler?: TaskHandler;
  when?: () => boolean;
  dependsOn?: string[];
  onSuccess?: TaskCallback;
  onFail?: TaskCallback;
  cwd?: string;
  env?: Record<string, string>;
  /** Milliseconds before a running command is terminated and the task failed. */
  timeout?: number;
};

/** A definition as supplied by a caller; `id` is checked when the batch starts. */
export type TaskInput = Omit<TaskDefinition, "id"> & { id?: string };

/** `false` disables an entry, `true` enables the template of the same name. */
export type TaskEntry = TaskInput | boolean;

export type TaskMap = Record<string, TaskEntry>;

export type TaskState = {
  status: TaskStatus;
  output: string;
  /** Monotonic ms; 0 until the task starts running. */
  startTime: number;
  endTime?: number;
  dependsOn: string[];
  isCallback: boolean;
  parentTask?: string;
  result?: TaskResult;
};
