import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import type { SpawnedProcess, SpawnFn, SpawnOptions } from "../../src/executor/types.js";

/** Stand-in for a child process. Output and exit are driven by the test. */
export class FakeProcess extends EventEmitter implements SpawnedProcess {
  readonly pid = 4242;
  exitCode: number | null = null;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: NodeJS.Signals[] = [];
  ignoreTerm = false;
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  write(stdout?: string, stderr?: string): void {
    if (stdout) this.stdout.emit("data", Buffer.from(stdout));
    if (stderr) this.stderr.emit("data", Buffer.from(stderr));
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.closed) return;
    this.closed = true;
    this.exitCode = code;
    this.emit("exit", code, signal);
    this.emit("close", code, signal);
  }

  kill(signal: NodeJS.Signals | number = "SIGTERM"): boolean {
    if (this.closed) return false;
    const name: NodeJS.Signals = typeof signal === "number" ? "SIGTERM" : signal;
    this.signals.push(name);
    if (name === "SIGTERM" && this.ignoreTerm) return true;
    setImmediate(() => this.exit(null, name));
    return true;
  }
}

export type FakeScript = {
  stdout?: string;
  stderr?: string;
  code?: number;
  delayMs?: number;
  /** Never exits on its own. */
  hang?: boolean;
  ignoreTerm?: boolean;
  /** `spawn` itself throws this message. */
  spawnError?: string;
};

export type SpawnRecord = { command: string; options: SpawnOptions; process: FakeProcess };

/** A spawn function answering from a table of scripted commands. Unknown commands hang. */
export function fakeSpawner(scripts: Record<string, FakeScript> = {}) {
  const spawned: SpawnRecord[] = [];

  const spawn: SpawnFn = (command, options) => {
    const script = scripts[command] ?? { hang: true };
    if (script.spawnError) throw new Error(script.spawnError);

    const proc = new FakeProcess();
    proc.ignoreTerm = script.ignoreTerm ?? false;
    spawned.push({ command, options, process: proc });

    if (!script.hang) {
      setTimeout(() => {
        proc.write(script.stdout, script.stderr);
        proc.exit(script.code ?? 0);
      }, script.delayMs ?? 0);
    }
    return proc;
  };

  return {
    spawn,
    spawned,
    commands: () => spawned.map((s) => s.command),
    processFor: (command: string) => spawned.find((s) => s.command === command)?.process,
  };
}
