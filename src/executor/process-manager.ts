import { spawn } from "node:child_process";
import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import type { TaskRegistry } from "../tasks/registry.js";
import { createLogger } from "../utils/logger.js";
import type { CommandOptions, CommandResult, SpawnedProcess, SpawnFn } from "./types.js";

const log = createLogger("process");

export const ABORT_NOTE = "[Process aborted by user]";

export const defaultSpawn: SpawnFn = (command, options) =>
  spawn(command, {
    cwd: options.cwd,
    env: options.env,
    shell: options.shell,
    stdio: ["ignore", "pipe", "pipe"],
  });

export type ProcessManagerOptions = {
  spawn?: SpawnFn;
  /** Overrides `process.killGraceMs` from config. */
  killGraceMs?: number;
};

type ActiveProcess = {
  child: SpawnedProcess;
  /** Stop writing into the registry and cancel the timeout. */
  detach: () => void;
};

/**
 * Launches task commands, streams their output into the registry and keeps
 * one live handle per task id so they can all be killed at once. A killed
 * process is detached: whatever it prints or does afterwards never reaches
 * the registry, which may already hold a new run under the same id.
 */
export class ProcessManager {
  private active = new Map<string, ActiveProcess>();
  private exited = new WeakSet<SpawnedProcess>();
  private registry: TaskRegistry;
  private spawnFn: SpawnFn;
  private killGraceMs?: number;

  constructor(registry: TaskRegistry, opts: ProcessManagerOptions = {}) {
    this.registry = registry;
    this.spawnFn = opts.spawn ?? defaultSpawn;
    this.killGraceMs = opts.killGraceMs;
  }

  /** Run `command` through the shell for `taskId`. Never rejects; failures are in the result. */
  run(taskId: string, command: string, opts: CommandOptions = {}): Promise<CommandResult> {
    return new Promise<CommandResult>((resolve) => {
      let stdout = "";
      let stderr = "";
      let timedOut = false;
      let settled = false;
      let detached = false;
      let timer: NodeJS.Timeout | undefined;
      const timeoutMs = opts.timeoutMs !== undefined && opts.timeoutMs > 0 ? opts.timeoutMs : undefined;

      const taskOutput = (): string =>
        (detached ? undefined : this.registry.get(taskId)?.output) ?? `${stdout}${stderr}`;

      let child: SpawnedProcess;
      try {
        child = this.spawnFn(command, {
          cwd: opts.cwd,
          env: { ...process.env, ...opts.env },
          shell: getConfig().process.shell,
        });
      } catch (err) {
        const message = errorMessage(err);
        log.error(`Could not start command for task "${taskId}"`, { command, error: message });
        this.registry.appendOutput(taskId, `${message}\n`);
        resolve({
          success: false,
          exitCode: null,
          signal: null,
          output: taskOutput(),
          stdout,
          stderr: message,
          timedOut,
          error: message,
        });
        return;
      }

      const entry: ActiveProcess = {
        child,
        detach: () => {
          detached = true;
          if (timer) clearTimeout(timer);
        },
      };
      this.active.set(taskId, entry);
      log.debug(`Started command for task "${taskId}"`, { command, pid: child.pid, cwd: opts.cwd });

      const finish = (exitCode: number | null, signal: NodeJS.Signals | null, error?: string): void => {
        if (settled) return;
        settled = true;
        this.exited.add(child);
        if (timer) clearTimeout(timer);
        if (this.active.get(taskId) === entry) this.active.delete(taskId);
        log.debug(`Command for task "${taskId}" finished`, { exitCode, signal, timedOut });
        resolve({
          success: exitCode === 0 && !timedOut && error === undefined,
          exitCode,
          signal,
          output: taskOutput(),
          stdout,
          stderr,
          timedOut,
          timeoutMs,
          error,
        });
      };

      child.stdout?.on("data", (chunk: Buffer | string) => {
        if (detached) return;
        const text = chunk.toString();
        stdout += text;
        this.registry.appendOutput(taskId, text);
      });
      child.stderr?.on("data", (chunk: Buffer | string) => {
        if (detached) return;
        const text = chunk.toString();
        stderr += text;
        this.registry.appendOutput(taskId, text);
      });

      child.on("exit", () => {
        this.exited.add(child);
      });
      child.on("error", (err: Error) => {
        if (!detached) this.registry.appendOutput(taskId, `${err.message}\n`);
        finish(null, null, err.message);
      });
      child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
        finish(code, signal);
      });

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          timedOut = true;
          log.warn(`Task "${taskId}" timed out`, { timeoutMs });
          this.registry.appendOutput(taskId, `\n[Process timed out after ${timeoutMs}ms]`);
          this.terminate(child);
        }, timeoutMs);
      }
    });
  }

  /**
   * Terminate every tracked process and mark its task aborted right away,
   * without waiting for the process to exit. Returns the aborted task ids.
   */
  killAll(note: string = ABORT_NOTE): string[] {
    const ids = [...this.active.keys()];
    for (const [taskId, { child, detach }] of this.active) {
      log.info(`Killing task "${taskId}"`, { pid: child.pid });
      detach();
      this.terminate(child);
      this.registry.setAborted(taskId, note);
    }
    this.active.clear();
    return ids;
  }

  /** SIGTERM now, SIGKILL after the grace period unless the process has exited. */
  private terminate(child: SpawnedProcess): void {
    if (!this.signal(child, "SIGTERM")) return;
    const graceMs = this.killGraceMs ?? getConfig().process.killGraceMs;
    const timer = setTimeout(() => {
      if (!this.exited.has(child)) this.signal(child, "SIGKILL");
    }, graceMs);
    timer.unref();
  }

  private signal(child: SpawnedProcess, signal: NodeJS.Signals): boolean {
    try {
      return child.kill(signal);
    } catch (err) {
      log.warn(`Failed to send ${signal}`, { pid: child.pid, error: errorMessage(err) });
      return false;
    }
  }
}
