/** What a handler or in-process function asked the executor to do. */
export type Outcome =
  | { kind: "success"; message?: string }
  | { kind: "failure"; message?: string }
  | { kind: "command"; command: string }
  | { kind: "deferred" };

/** An outcome that settles the task right away. */
export type FinalOutcome = Extract<Outcome, { kind: "success" | "failure" }>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function fromOkResult(value: unknown): FinalOutcome | undefined {
  if (typeof value === "boolean") return { kind: value ? "success" : "failure" };
  if (isRecord(value) && typeof value.ok === "boolean") {
    const message = typeof value.message === "string" ? value.message : undefined;
    return { kind: value.ok ? "success" : "failure", message };
  }
  return undefined;
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/** Map an in-process function's return value. Anything but a boolean or `{ ok }` is a failure. */
export function fromFunctionReturn(value: unknown): FinalOutcome {
  return (
    fromOkResult(value) ?? {
      kind: "failure",
      message: `Function returned unsupported value (${describe(value)})`,
    }
  );
}

/** Map a handler's return value. A string is a command to run; `undefined` defers completion to the handler. */
export function fromHandlerReturn(value: unknown): Outcome {
  if (value === undefined || value === null) return { kind: "deferred" };
  if (typeof value === "string") return { kind: "command", command: value };
  return (
    fromOkResult(value) ?? {
      kind: "failure",
      message: `Handler returned unsupported value (${describe(value)})`,
    }
  );
}
