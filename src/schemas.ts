import { z } from "zod";
import { ValidationError } from "./errors.js";
import type { CallbackFn, TaskDefinition } from "./tasks/types.js";

const fn = <T extends (...args: never[]) => unknown>(what: string) =>
  z.custom<T>((value) => typeof value === "function", { message: `${what} must be a function` });

const TaskIdSchema = z.string().trim().min(1, "id must be a non-empty string");

const CallbackSchema = z.union([
  TaskIdSchema,
  fn<CallbackFn>("callback"),
  z.array(z.union([TaskIdSchema, fn<CallbackFn>("callback")])),
]);

/** Runtime shape check for a definition handed to `runBatch`. */
export const TaskDefinitionSchema = z.object({
  id: TaskIdSchema,
  label: z.string().optional(),
  icon: z.string().optional(),
  command: z
    .union([z.string(), z.array(z.string()), fn<Exclude<TaskDefinition["command"], string | string[] | undefined>>("command")])
    .optional(),
  fn: fn<NonNullable<TaskDefinition["fn"]>>("fn").optional(),
  handler: fn<NonNullable<TaskDefinition["handler"]>>("handler").optional(),
  when: fn<NonNullable<TaskDefinition["when"]>>("when").optional(),
  dependsOn: z.array(TaskIdSchema).optional(),
  onSuccess: CallbackSchema.optional(),
  onFail: CallbackSchema.optional(),
  cwd: z.string().optional(),
  env: z.record(z.string()).optional(),
  timeout: z.number().int().positive().optional(),
});

const FileCallbackSchema = z.union([TaskIdSchema, z.array(TaskIdSchema)]);

/** A task as written in a JSON task file: commands only, callbacks by id. */
export const FileTaskSchema = z
  .object({
    id: TaskIdSchema.optional(),
    label: z.string().optional(),
    icon: z.string().optional(),
    extend: TaskIdSchema.optional(),
    command: z.union([z.string(), z.array(z.string())]).optional(),
    dependsOn: z.array(TaskIdSchema).optional(),
    onSuccess: FileCallbackSchema.optional(),
    onFail: FileCallbackSchema.optional(),
    cwd: z.string().optional(),
    env: z.record(z.string()).optional(),
    timeout: z.number().int().positive().optional(),
  })
  .strict();

export const TaskFileSchema = z
  .object({
    templates: z.record(FileTaskSchema).optional(),
    tasks: z.record(z.union([FileTaskSchema, z.boolean()])).default({}),
  })
  .strict();

export type FileTask = z.infer<typeof FileTaskSchema>;
export type TaskFile = z.infer<typeof TaskFileSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Parse `data` with `schema`, throwing a ValidationError that names `label`. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, data: unknown, label: string): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError("VALIDATION_FAILED", `${label}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/** Validate a definition's shape; returns an error instead of throwing. */
export function checkDefinition(definition: unknown, key: string): ValidationError | undefined {
  const result = TaskDefinitionSchema.safeParse(definition);
  if (result.success) return undefined;
  return new ValidationError("VALIDATION_FAILED", `Task "${key}": ${formatIssues(result.error)}`);
}
