import type { EventEmitter } from "node:events";
import type { Readable } from "node:stream";

export type CommandOptions = {
  cwd?: string;
  env?: Record<string, string>;
  /** Terminate the command and fail it after this many ms. */
  timeoutMs?: number;
};

export type CommandResult = {
  success: boolean;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** The task's combined output at the moment the command finished. */
  output: string;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** The timeout that was applied, when there was one. */
  timeoutMs?: number;
  error?: string;
};

/**
 * The part of a spawned child process the process manager relies on.
 * `ChildProcess` satisfies it; tests pass an in-process fake.
 */
export interface SpawnedProcess extends EventEmitter {
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnOptions = {
  cwd?: string;
  env: NodeJS.ProcessEnv;
  shell: boolean | string;
};

export type SpawnFn = (command: string, options: SpawnOptions) => SpawnedProcess;
