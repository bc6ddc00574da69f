import { ConfigError } from "./errors.js";

export type RunnerConfig = {
  process: {
    /** Delay between SIGTERM and SIGKILL when terminating a command. */
    killGraceMs: number;
    /** Passed to `spawn` as the `shell` option: `true` for the platform shell, or a shell path. */
    shell: boolean | string;
  };
  ui: {
    refreshMs: number;
    hideSkipped: boolean;
  };
  defaults: {
    cwd?: string;
    timeoutMs?: number;
  };
  limits: {
    outputTruncation: number;
  };
};

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: RunnerConfig = {
  process: {
    killGraceMs: 1_000,
    shell: true,
  },
  ui: {
    refreshMs: 100,
    hideSkipped: false,
  },
  defaults: {},
  limits: {
    outputTruncation: 3_000,
  },
};

let current: RunnerConfig = structuredClone(DEFAULTS);

function merge(base: RunnerConfig, overrides: DeepPartial<RunnerConfig>): RunnerConfig {
  return {
    process: { ...base.process, ...overrides.process },
    ui: { ...base.ui, ...overrides.ui },
    defaults: { ...base.defaults, ...overrides.defaults },
    limits: { ...base.limits, ...overrides.limits },
  };
}

function assertPositive(name: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number, got ${value}`);
  }
}

/**
 * Override config values. Merges with defaults, not with earlier overrides.
 * Throws a ConfigError when a duration or limit is not a positive number.
 */
export function configure(overrides: DeepPartial<RunnerConfig>): void {
  const next = merge(structuredClone(DEFAULTS), overrides);
  assertPositive("process.killGraceMs", next.process.killGraceMs);
  assertPositive("ui.refreshMs", next.ui.refreshMs);
  assertPositive("defaults.timeoutMs", next.defaults.timeoutMs);
  assertPositive("limits.outputTruncation", next.limits.outputTruncation);
  current = next;
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<RunnerConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<RunnerConfig> = Object.freeze(structuredClone(DEFAULTS));

export type { DeepPartial };
