import { readFile } from "node:fs/promises";
import { errorMessage, ParseError } from "../errors.js";
import { parseOrThrow, TaskFileSchema, type FileTask, type TaskFile } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import { resolveTaskMap, TemplateRegistry, type ExtendableMap } from "./templates.js";
import type { TaskMap } from "./types.js";

const log = createLogger("task-file");

export type LoadedTasks = {
  tasks: TaskMap;
  templates: TemplateRegistry;
  sources: string[];
};

/** Parse and validate the JSON text of one task file. */
export function parseTaskFile(raw: string, source: string): TaskFile {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ParseError(`${source}: invalid JSON (${errorMessage(err)})`, { cause: err });
  }
  return parseOrThrow(TaskFileSchema, data, source);
}

type FileEntry = FileTask | boolean;

/** Later entries override earlier ones field by field; a boolean replaces the whole entry. */
function mergeEntry(base: FileEntry | undefined, override: FileEntry): FileEntry {
  if (base === undefined || typeof base === "boolean" || typeof override === "boolean") return override;
  return { ...base, ...override, env: base.env || override.env ? { ...base.env, ...override.env } : undefined };
}

function mergeFiles(files: TaskFile[]): { templates: Record<string, FileTask>; tasks: Record<string, FileEntry> } {
  const templates: Record<string, FileTask> = {};
  const tasks: Record<string, FileEntry> = {};
  for (const file of files) {
    for (const [key, template] of Object.entries(file.templates ?? {})) {
      const merged = mergeEntry(templates[key], template);
      if (typeof merged !== "boolean") templates[key] = merged;
    }
    for (const [key, entry] of Object.entries(file.tasks)) {
      tasks[key] = mergeEntry(tasks[key], entry);
    }
  }
  return { templates, tasks };
}

/**
 * Build a batch from parsed task files. Templates are registered into
 * `templates` (a new registry by default); `true` entries, `false` entries and
 * `extend` are resolved against them.
 */
export function resolveTaskFiles(files: TaskFile[], templates: TemplateRegistry = new TemplateRegistry()): Omit<LoadedTasks, "sources"> {
  const merged = mergeFiles(files);

  const templateEntries: ExtendableMap = merged.templates;
  for (const [id, definition] of Object.entries(resolveTaskMap(templateEntries, templates))) {
    if (definition !== false) templates.register(id, definition);
  }

  const taskEntries: ExtendableMap = merged.tasks;
  const tasks: TaskMap = {};
  for (const [key, definition] of Object.entries(resolveTaskMap(taskEntries, templates))) {
    tasks[key] = definition;
  }

  return { tasks, templates };
}

/** Read task files in order; later files override earlier ones. */
export async function loadTaskFiles(paths: string[], templates?: TemplateRegistry): Promise<LoadedTasks> {
  const files: TaskFile[] = [];
  for (const path of paths) {
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (err) {
      throw new ParseError(`${path}: cannot read file (${errorMessage(err)})`, { cause: err });
    }
    files.push(parseTaskFile(raw, path));
    log.debug(`Loaded task file ${path}`);
  }

  const resolved = resolveTaskFiles(files, templates);
  log.info(`Loaded ${Object.keys(resolved.tasks).length} tasks from ${paths.length} files`, {
    templates: resolved.templates.names().length,
  });
  return { ...resolved, sources: paths };
}
