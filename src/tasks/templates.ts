import { ValidationError } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import type { TaskCallback, TaskDefinition, TaskInput, TaskMap } from "./types.js";

const log = createLogger("templates");

/** Copy a definition so that later edits to the copy never reach the source. Functions are shared. */
export function cloneDefinition<T extends TaskInput>(definition: T): T {
  return {
    ...definition,
    dependsOn: definition.dependsOn ? [...definition.dependsOn] : undefined,
    env: definition.env ? { ...definition.env } : undefined,
    command: Array.isArray(definition.command) ? [...definition.command] : definition.command,
    onSuccess: cloneCallback(definition.onSuccess),
    onFail: cloneCallback(definition.onFail),
  };
}

function cloneCallback(callback: TaskCallback | undefined): TaskCallback | undefined {
  return Array.isArray(callback) ? [...callback] : callback;
}

/**
 * Reusable definitions that do not run by default. A template runs when a
 * batch enables it with `true`, or when a callback names it.
 */
export class TemplateRegistry {
  private templates = new Map<string, TaskInput>();

  register(id: string, definition: TaskInput): void {
    this.templates.set(id, cloneDefinition({ ...definition, id }));
    log.debug(`Registered template "${id}"`);
  }

  get(id: string): Readonly<TaskInput> | undefined {
    return this.templates.get(id);
  }

  names(): string[] {
    return [...this.templates.keys()];
  }

  /** A fresh concrete task bound to `id`, or undefined when no template has that name. */
  materialize(id: string): TaskDefinition | undefined {
    const template = this.templates.get(id);
    if (!template) return undefined;
    return cloneDefinition({ ...template, id });
  }

  clear(): void {
    this.templates.clear();
  }
}

/** A task entry that may inherit from a template or an earlier task. */
export type ExtendableInput = TaskInput & { extend?: string };

export type ExtendableMap = Record<string, ExtendableInput | boolean>;

function mergeDefinitions(base: TaskInput, override: TaskInput): TaskInput {
  const merged: TaskInput = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }
  if (base.env || override.env) merged.env = { ...base.env, ...override.env };
  return merged;
}

/**
 * Turn a raw task map into concrete definitions:
 * - `true` copies the template of the same name (unknown names are dropped with a warning)
 * - `false` disables the entry
 * - `extend` merges the entry over a template or over another entry of the map
 *
 * An entry that extends an unknown name is disabled. Every resulting
 * definition carries an `id`, defaulting to its key.
 */
export function resolveTaskMap(entries: ExtendableMap, templates: TemplateRegistry): Record<string, TaskDefinition | false> {
  const result: Record<string, TaskDefinition | false> = {};

  for (const [key, entry] of Object.entries(entries)) {
    if (entry === false) {
      result[key] = false;
      continue;
    }
    if (entry === true) {
      const template = templates.materialize(key);
      if (template) {
        result[key] = template;
      } else {
        log.warn(`Unknown template "${key}"`);
      }
      continue;
    }
    if (entry.extend === undefined) {
      const { extend: _extend, ...rest } = entry;
      result[key] = cloneDefinition({ ...rest, id: entry.id ?? key });
    }
  }

  for (const [key, entry] of Object.entries(entries)) {
    if (typeof entry === "boolean" || entry.extend === undefined) continue;
    const { extend, ...rest } = entry;
    const base = templates.get(extend) ?? takeDefinition(result[extend]);
    if (!base) {
      log.error(`Task "${key}" extends unknown task "${extend}"`);
      result[key] = false;
      continue;
    }
    const merged = mergeDefinitions(cloneDefinition(base), rest);
    result[key] = cloneDefinition({ ...merged, id: rest.id ?? key });
  }

  return result;
}

function takeDefinition(value: TaskDefinition | false | undefined): TaskDefinition | undefined {
  return value === false ? undefined : value;
}

/** Apply `true`/`false` entries of a batch and check every definition has an id. */
export function expandBatchEntries(
  tasks: TaskMap,
  templates: TemplateRegistry,
): { definitions: TaskDefinition[]; rejected: Array<{ key: string; error: ValidationError }> } {
  const definitions: TaskDefinition[] = [];
  const rejected: Array<{ key: string; error: ValidationError }> = [];

  for (const [key, entry] of Object.entries(tasks)) {
    if (entry === false) continue;
    if (entry === true) {
      const template = templates.materialize(key);
      if (template) {
        definitions.push(template);
      } else {
        rejected.push({ key, error: new ValidationError("UNKNOWN_TEMPLATE", `Unknown template "${key}"`) });
      }
      continue;
    }
    const withId = requireId(key, entry);
    if (withId instanceof ValidationError) {
      rejected.push({ key, error: withId });
    } else {
      definitions.push(withId);
    }
  }

  return { definitions, rejected };
}

function requireId(key: string, entry: TaskInput): TaskDefinition | ValidationError {
  const { id } = entry;
  if (typeof id !== "string" || id.trim() === "") {
    return new ValidationError("MISSING_TASK_ID", `Task "${key}" has no id`);
  }
  return { ...entry, id };
}

