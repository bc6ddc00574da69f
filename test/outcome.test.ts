import { describe, expect, expectTypeOf, it } from "vitest";
import { fromFunctionReturn, fromHandlerReturn, type FinalOutcome } from "../src/executor/outcome.js";

describe("fromFunctionReturn", () => {
  it("only produces outcomes that settle the task", () => {
    expectTypeOf(fromFunctionReturn).returns.toEqualTypeOf<FinalOutcome>();
    expect(["success", "failure"]).toContain(fromFunctionReturn(42).kind);
  });

  it("maps booleans and ok-results", () => {
    expect(fromFunctionReturn(true)).toEqual({ kind: "success" });
    expect(fromFunctionReturn(false)).toEqual({ kind: "failure" });
    expect(fromFunctionReturn({ ok: true, message: "done" })).toEqual({ kind: "success", message: "done" });
    expect(fromFunctionReturn({ ok: false })).toEqual({ kind: "failure", message: undefined });
  });

  it("treats anything else as failure", () => {
    expect(fromFunctionReturn("yes")).toEqual({ kind: "failure", message: "Function returned unsupported value (string)" });
    expect(fromFunctionReturn(undefined)).toEqual({
      kind: "failure",
      message: "Function returned unsupported value (undefined)",
    });
    expect(fromFunctionReturn({ ok: "true" })).toEqual({
      kind: "failure",
      message: "Function returned unsupported value (object)",
    });
  });
});

describe("fromHandlerReturn", () => {
  it("defers on undefined and runs strings as commands", () => {
    expect(fromHandlerReturn(undefined)).toEqual({ kind: "deferred" });
    expect(fromHandlerReturn(null)).toEqual({ kind: "deferred" });
    expect(fromHandlerReturn("make lint")).toEqual({ kind: "command", command: "make lint" });
  });

  it("finishes on booleans and ok-results", () => {
    expect(fromHandlerReturn(true)).toEqual({ kind: "success" });
    expect(fromHandlerReturn({ ok: false, message: "nope" })).toEqual({ kind: "failure", message: "nope" });
  });

  it("fails on unsupported values", () => {
    expect(fromHandlerReturn(42)).toEqual({ kind: "failure", message: "Handler returned unsupported value (number)" });
    expect(fromHandlerReturn(["a"])).toEqual({ kind: "failure", message: "Handler returned unsupported value (array)" });
  });
});
