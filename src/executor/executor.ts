import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import type { TaskRegistry } from "../tasks/registry.js";
import type { FunctionResult, HandlerContext, TaskDefinition, TaskResult, TaskStatus } from "../tasks/types.js";
import { createLogger } from "../utils/logger.js";
import type { CallbackDispatcher } from "./callbacks.js";
import { fromFunctionReturn, fromHandlerReturn, type FinalOutcome } from "./outcome.js";
import type { ProcessManager } from "./process-manager.js";
import type { CommandResult } from "./types.js";

const log = createLogger("executor");

type FinalStatus = Extract<TaskStatus, "success" | "failed" | "skipped">;

export type ExecutorHooks = {
  onTaskStart?: (taskId: string) => void;
  onTaskEnd?: (taskId: string, status: FinalStatus, result: TaskResult) => void;
  onWarning?: (message: string) => void;
};

export type ExecutorOptions = ExecutorHooks & {
  registry: TaskRegistry;
  processes: ProcessManager;
  callbacks: CallbackDispatcher;
};

/** Exit code of a literal `exit 0` / `exit 1`, answered without spawning. */
function literalExit(command: string): number | undefined {
  const trimmed = command.trim();
  if (trimmed === "exit 0") return 0;
  if (trimmed === "exit 1") return 1;
  return undefined;
}

function toCommandList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  if (typeof value === "string") return value.trim() === "" ? [] : [value];
  return value;
}

export class Executor {
  private opts: ExecutorOptions;
  private stopped = false;

  constructor(opts: ExecutorOptions) {
    this.opts = opts;
  }

  /** Ignore completions of tasks that are still in flight. */
  stop(): void {
    this.stopped = true;
  }

  /**
   * Run a task to completion. Resolves once the task is terminal, or once a
   * handler has taken over completion. Never rejects.
   */
  async runTask(task: TaskDefinition): Promise<void> {
    const { registry } = this.opts;
    if (!task.id) {
      log.error("Refusing to run a task without an id");
      return;
    }
    if (!registry.setRunning(task.id)) {
      log.debug(`Task "${task.id}" is ${registry.statusOf(task.id) ?? "unknown"}, not starting it`);
      return;
    }
    log.info(`Running task "${task.id}"`);
    this.opts.onTaskStart?.(task.id);

    try {
      if (task.handler) {
        await this.runHandler(task);
      } else if (task.fn) {
        this.finishOutcome(task, fromFunctionReturn(await task.fn()));
      } else {
        const command = typeof task.command === "function" ? task.command(task) : task.command;
        await this.runCommands(task, toCommandList(command));
      }
    } catch (err) {
      const message = errorMessage(err);
      log.error(`Task "${task.id}" threw`, { error: message });
      registry.appendOutput(task.id, `${message}\n`);
      this.finish(task, "failed", { success: false, output: this.outputOf(task.id), errorMessage: message });
    }
  }

  private async runHandler(task: TaskDefinition): Promise<void> {
    const { registry } = this.opts;
    const handler = task.handler;
    if (!handler) return;

    const ctx: HandlerContext = {
      task,
      config: getConfig(),
      registry,
      appendOutput: (chunk) => registry.appendOutput(task.id, chunk),
      resolve: (result: FunctionResult) => this.finishOutcome(task, fromFunctionReturn(result)),
      skip: (note) => {
        if (note) registry.appendOutput(task.id, note);
        this.finish(task, "skipped", { success: true, output: this.outputOf(task.id) });
      },
    };

    const outcome = fromHandlerReturn(await handler(ctx));
    switch (outcome.kind) {
      case "success":
      case "failure":
        this.finishOutcome(task, outcome);
        return;
      case "command":
        await this.runCommands(task, [outcome.command]);
        return;
      case "deferred":
        log.debug(`Handler of "${task.id}" will finish the task itself`);
        return;
    }
  }

  private finishOutcome(task: TaskDefinition, outcome: FinalOutcome): void {
    if (outcome.message) this.opts.registry.appendOutput(task.id, outcome.message);
    const success = outcome.kind === "success";
    this.finish(task, success ? "success" : "failed", {
      success,
      output: this.outputOf(task.id),
      errorMessage: success ? undefined : outcome.message,
    });
  }

  private async runCommands(task: TaskDefinition, commands: string[]): Promise<void> {
    const { registry } = this.opts;
    if (commands.length === 0) {
      const message = `Task "${task.id}" has no command; marking it successful`;
      log.warn(message);
      this.opts.onWarning?.(message);
      this.finish(task, "success", { success: true, output: this.outputOf(task.id) });
      return;
    }

    let last: CommandResult | undefined;
    for (const [i, command] of commands.entries()) {
      if (registry.statusOf(task.id) !== "running") {
        log.debug(`Task "${task.id}" stopped before "${command}"`);
        return;
      }
      if (i > 0) registry.appendOutput(task.id, `\n--- ${command} ---\n`);
      last = await this.runCommand(task, command);
      if (!last.success) break;
    }
    if (!last) return;

    this.finish(task, last.success ? "success" : "failed", {
      success: last.success,
      exitCode: last.exitCode,
      output: this.outputOf(task.id),
      stdout: last.stdout,
      stderr: last.stderr,
      errorMessage: last.error ?? (last.timedOut ? `Timed out after ${last.timeoutMs ?? 0}ms` : undefined),
      timedOut: last.timedOut || undefined,
    });
  }

  private runCommand(task: TaskDefinition, command: string): Promise<CommandResult> {
    const code = literalExit(command);
    if (code !== undefined) {
      return Promise.resolve({
        success: code === 0,
        exitCode: code,
        signal: null,
        output: this.outputOf(task.id),
        stdout: "",
        stderr: "",
        timedOut: false,
      });
    }

    const { defaults } = getConfig();
    return this.opts.processes.run(task.id, command, {
      cwd: task.cwd ?? defaults.cwd,
      env: task.env,
      timeoutMs: task.timeout ?? defaults.timeoutMs,
    });
  }

  /**
   * Write the final status. Only the first completion of a running task is
   * applied, and callbacks fire only when it was.
   */
  private finish(task: TaskDefinition, status: FinalStatus, result: TaskResult): void {
    const { registry } = this.opts;
    if (this.stopped || registry.statusOf(task.id) !== "running") return;
    if (!registry.safeSetState(task.id, status)) return;
    registry.setResult(task.id, result);
    log.info(`Task "${task.id}" ${status}`);
    this.opts.onTaskEnd?.(task.id, status, result);

    if (status === "success") {
      this.opts.callbacks.dispatch(task.onSuccess, result, task.id);
    } else if (status === "failed") {
      this.opts.callbacks.dispatch(task.onFail, result, task.id);
    }
  }

  private outputOf(taskId: string): string {
    return this.opts.registry.get(taskId)?.output ?? "";
  }
}
