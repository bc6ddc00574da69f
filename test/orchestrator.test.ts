import { afterEach, describe, expect, it, vi } from "vitest";
import { configure, resetConfig } from "../src/config.js";
import { RunnerError } from "../src/errors.js";
import { Orchestrator, type BatchSummary } from "../src/orchestrator.js";
import { fakeSpawner, type FakeScript } from "./helpers/fake-process.js";

function setup(scripts: Record<string, FakeScript> = {}) {
  const spawner = fakeSpawner(scripts);
  const orch = new Orchestrator({ spawn: spawner.spawn });
  return { spawner, orch };
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

afterEach(() => {
  resetConfig();
});

describe("Orchestrator.runBatch", () => {
  it("runs dependent tasks in dependency order", async () => {
    const { orch } = setup({ build: { stdout: "built\n" }, test: {}, deploy: {} });
    const started: string[] = [];

    const run = orch.runBatch(
      {
        deploy: { id: "deploy", command: "deploy", dependsOn: ["test"] },
        build: { id: "build", command: "build" },
        test: { id: "test", command: "test", dependsOn: ["build"] },
      },
      { onTaskStart: (id) => started.push(id) },
    );
    const summary = await run.done;

    expect(started).toEqual(["build", "test", "deploy"]);
    expect(summary.reason).toBe("complete");
    expect(summary.success).toBe(true);
    expect(summary.counts.success).toBe(3);
    expect(orch.isBatchComplete()).toBe(true);
    expect(orch.registry.get("build")?.output).toBe("built\n");
  });

  it("starts independent tasks together", async () => {
    const { orch, spawner } = setup({ a: { delayMs: 5 }, b: { delayMs: 5 } });
    const run = orch.runBatch({ a: { id: "a", command: "a" }, b: { id: "b", command: "b" } });

    expect(spawner.commands()).toEqual(["a", "b"]);
    expect((await run.done).success).toBe(true);
  });

  it("succeeds on a task with nothing to run, with a warning", async () => {
    const { orch } = setup();
    const warnings: string[] = [];
    const summary = await orch.runBatch({ empty: { id: "empty" } }, { onWarning: (m) => warnings.push(m) }).done;

    expect(summary.success).toBe(true);
    expect(orch.registry.statusOf("empty")).toBe("success");
    expect(warnings).toEqual(['Task "empty" has no command; marking it successful']);
  });

  it("settles an empty batch at once", async () => {
    const { orch } = setup();
    const summary = await orch.runBatch({}).done;
    expect(summary).toMatchObject({ reason: "complete", success: true, blocked: [] });
  });

  it("rejects entries without an id and runs the rest", async () => {
    const { orch } = setup();
    const run = orch.runBatch({
      noid: { command: "exit 0" },
      bad: { id: "bad", timeout: -5 },
      ok: { id: "ok", command: "exit 0" },
    });

    expect(run.rejected.map((r) => [r.key, r.error.code])).toEqual([
      ["noid", "MISSING_TASK_ID"],
      ["bad", "VALIDATION_FAILED"],
    ]);
    const summary = await run.done;
    expect(summary.success).toBe(true);
    expect(orch.registry.ids()).toEqual(["ok"]);
  });

  it("resolves true and false entries", async () => {
    const { orch } = setup();
    orch.templates.register("fmt", { command: "exit 0", label: "Format" });

    const run = orch.runBatch({
      fmt: true,
      missing: true,
      lint: false,
    });
    await run.done;

    expect(run.rejected.map((r) => r.error.code)).toEqual(["UNKNOWN_TEMPLATE"]);
    expect(orch.registry.statusOf("fmt")).toBe("success");
    expect(orch.registry.has("lint")).toBe(false);
  });

  it("refuses to start a second batch while one is running", async () => {
    const { orch } = setup();
    orch.runBatch({ a: { id: "a", command: "serve" } });

    let caught: unknown;
    try {
      orch.runBatch({ b: { id: "b", command: "exit 0" } });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(RunnerError);
    expect(caught).toMatchObject({ code: "BATCH_IN_PROGRESS" });

    orch.killAll();
    const summary = await orch.runBatch({ b: { id: "b", command: "exit 0" } }).done;
    expect(summary.success).toBe(true);
  });

  it("forwards output and settle hooks", async () => {
    const { orch } = setup({ greet: { stdout: "hello\n" } });
    const chunks: Array<[string, string]> = [];
    const settled: BatchSummary[] = [];

    const summary = await orch.runBatch(
      { greet: { id: "greet", command: "greet" } },
      { onOutput: (id, chunk) => chunks.push([id, chunk]), onSettled: (s) => settled.push(s) },
    ).done;

    expect(chunks).toEqual([["greet", "hello\n"]]);
    expect(settled).toEqual([summary]);
  });
});

describe("Orchestrator blocked batches", () => {
  it("settles as blocked when a dependency fails", async () => {
    const { orch } = setup();
    const summary = await orch.runBatch({
      a: { id: "a", command: "exit 1" },
      b: { id: "b", command: "exit 0", dependsOn: ["a"] },
    }).done;

    expect(summary.reason).toBe("blocked");
    expect(summary.success).toBe(false);
    expect(summary.blocked).toEqual([{ id: "b", waitingOn: ["a"] }]);
    expect(orch.registry.statusOf("b")).toBe("waiting");
    expect(orch.isBatchComplete()).toBe(false);
  });

  it("warns about unknown dependencies", async () => {
    const { orch } = setup();
    const warnings: string[] = [];
    const summary = await orch.runBatch(
      { a: { id: "a", command: "exit 0", dependsOn: ["ghost"] } },
      { onWarning: (m) => warnings.push(m) },
    ).done;

    expect(warnings).toContain('Task "a" depends on unknown task "ghost"');
    expect(summary.blocked).toEqual([{ id: "a", waitingOn: ["ghost"] }]);
  });
});

describe("Orchestrator callbacks", () => {
  it("runs a template as the failure callback of a task", async () => {
    const { orch, spawner } = setup({ lint: { code: 1, stdout: "2 problems\n" }, report: { stdout: "sent\n" } });
    orch.templates.register("report", { command: "report", label: "Report" });

    const summary = await orch.runBatch({ lint: { id: "lint", command: "lint", onFail: "report" } }).done;

    expect(spawner.commands()).toEqual(["lint", "report"]);
    expect(summary.reason).toBe("complete");
    expect(summary.success).toBe(false);
    expect(summary.counts).toMatchObject({ failed: 1, success: 1 });
    expect(orch.registry.get("report")).toMatchObject({ status: "success", isCallback: true, parentTask: "lint" });

    const report = orch.snapshot().find((s) => s.id === "report");
    expect(report?.depth).toBe(1);
    expect(report?.definition.label).toBe("Report");
  });

  it("skips a callback task whose condition fails once its dependencies are met", async () => {
    const { orch } = setup({ dep: { delayMs: 5 } });
    let ran = 0;
    orch.templates.register("fix", {
      dependsOn: ["dep"],
      when: () => false,
      fn: () => {
        ran++;
        return true;
      },
    });

    const summary = await orch.runBatch({
      a: { id: "a", fn: () => false, onFail: "fix" },
      dep: { id: "dep", command: "dep" },
    }).done;

    expect(ran).toBe(0);
    expect(orch.registry.statusOf("fix")).toBe("skipped");
    expect(summary.reason).toBe("complete");
    expect(summary.counts).toMatchObject({ success: 1, failed: 1, skipped: 1 });
  });

  it("runs a task named by two callbacks once", async () => {
    const { orch } = setup();
    let calls = 0;
    orch.templates.register("notify", {
      fn: () => {
        calls++;
        return true;
      },
    });

    const summary = await orch.runBatch({
      a: { id: "a", fn: () => true, onSuccess: "notify" },
      b: { id: "b", fn: () => true, onSuccess: "notify" },
    }).done;

    expect(calls).toBe(1);
    expect(summary.counts.success).toBe(3);
    expect(orch.registry.get("notify")?.parentTask).toBe("a");
  });

  it("finishes function callbacks before the batch settles", async () => {
    const { orch } = setup();
    const seen: boolean[] = [];
    await orch.runBatch({
      a: {
        id: "a",
        fn: () => false,
        onFail: async (result) => {
          await sleep(5);
          seen.push(result.success);
        },
      },
    }).done;

    expect(seen).toEqual([false]);
  });

  it("reports callback errors through the hook", async () => {
    const { orch } = setup();
    const errors: string[] = [];
    const summary = await orch.runBatch(
      {
        a: {
          id: "a",
          fn: () => true,
          onSuccess: () => {
            throw new Error("webhook down");
          },
        },
      },
      { onCallbackError: (id, err) => errors.push(`${id}: ${err instanceof Error ? err.message : String(err)}`) },
    ).done;

    expect(errors).toEqual(["a: webhook down"]);
    expect(summary.success).toBe(true);
  });
});

describe("Orchestrator.killAll", () => {
  it("aborts running tasks, leaves waiting ones and ends the batch", async () => {
    const { orch, spawner } = setup();
    const run = orch.runBatch({
      a: { id: "a", command: "serve" },
      b: { id: "b", command: ["watch", "never"] },
      c: { id: "c", command: "exit 0", dependsOn: ["a"] },
    });

    expect(orch.killAll()).toEqual(["a", "b"]);
    const summary = await run.done;

    expect(summary.reason).toBe("killed");
    expect(summary.success).toBe(false);
    expect(summary.counts).toMatchObject({ aborted: 2, waiting: 1 });
    expect(orch.registry.get("a")?.output).toBe("\n[Process aborted by user]");

    await sleep(10);
    expect(orch.registry.statusOf("a")).toBe("aborted");
    expect(orch.registry.statusOf("b")).toBe("aborted");
    expect(orch.registry.statusOf("c")).toBe("waiting");
    expect(spawner.commands()).toEqual(["serve", "watch"]);
  });

  it("keeps a killed task aborted when its process later exits cleanly", async () => {
    const { orch, spawner } = setup({ serve: { hang: true, ignoreTerm: true } });
    let notified = 0;
    const run = orch.runBatch({
      a: {
        id: "a",
        command: "serve",
        onSuccess: () => {
          notified++;
        },
      },
    });

    orch.killAll();
    await run.done;
    const proc = spawner.processFor("serve");
    proc?.write("done\n");
    proc?.exit(0);
    await sleep(10);

    expect(orch.registry.statusOf("a")).toBe("aborted");
    expect(orch.registry.get("a")?.output).toBe("\n[Process aborted by user]");
    expect(notified).toBe(0);
    expect(proc?.signals).toEqual(["SIGTERM"]);
  });

  it("keeps output of a killed process out of the next batch", async () => {
    const { orch, spawner } = setup({ serve: { hang: true, ignoreTerm: true } });
    const first = orch.runBatch({ t: { id: "t", command: "serve" } });
    orch.killAll();
    await first.done;

    const second = orch.runBatch({ t: { id: "t", command: "other" } });
    const old = spawner.processFor("serve");
    old?.write("stale output from killed run\n");
    old?.exit(0);
    await sleep(10);

    expect(orch.registry.get("t")?.output).toBe("");
    expect(orch.registry.statusOf("t")).toBe("running");

    orch.killAll();
    await second.done;
  });

  it("aborts handler tasks that have no process", async () => {
    const { orch } = setup();
    const run = orch.runBatch({ a: { id: "a", handler: () => undefined } });

    await vi.waitFor(() => expect(orch.registry.statusOf("a")).toBe("running"));
    expect(orch.killAll()).toEqual(["a"]);
    expect((await run.done).reason).toBe("killed");
  });

  it("stops the refresh ticker", async () => {
    configure({ ui: { refreshMs: 5 } });
    const { orch } = setup();
    let ticks = 0;
    const run = orch.runBatch({ a: { id: "a", command: "serve" } }, { onTick: () => ticks++ });

    await vi.waitFor(() => expect(ticks).toBeGreaterThan(0));
    orch.killAll();
    await run.done;
    const after = ticks;
    await sleep(30);
    expect(ticks).toBe(after);
  });
});

describe("Orchestrator.snapshot", () => {
  it("reports elapsed time from the clock", async () => {
    let now = 1_000;
    const spawner = fakeSpawner();
    const orch = new Orchestrator({ spawn: spawner.spawn, clock: () => now });
    const run = orch.runBatch({ a: { id: "a", command: "serve", label: "Server" } });

    now = 1_250;
    const [snapshot] = orch.snapshot();
    expect(snapshot).toMatchObject({ id: "a", depth: 0, elapsedMs: 250 });
    expect(snapshot.state.status).toBe("running");

    orch.killAll();
    await run.done;
  });
});
