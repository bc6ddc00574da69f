import { describe, expect, it } from "vitest";
import type { TaskSnapshot } from "../src/orchestrator.js";
import type { TaskStatus } from "../src/tasks/types.js";
import { headerLine, orderForDisplay, renderStatus, taskLine } from "../src/ui/status.js";

function snap(
  id: string,
  status: TaskStatus,
  opts: { parent?: string; label?: string; icon?: string; depth?: number; elapsedMs?: number } = {},
): TaskSnapshot {
  return {
    id,
    state: {
      status,
      output: "",
      startTime: 0,
      dependsOn: [],
      isCallback: opts.parent !== undefined,
      parentTask: opts.parent,
    },
    definition: { id, label: opts.label, icon: opts.icon },
    depth: opts.depth ?? 0,
    elapsedMs: opts.elapsedMs ?? 0,
  };
}

describe("orderForDisplay", () => {
  it("places callback tasks under their parent chain", () => {
    const ordered = orderForDisplay([
      snap("build", "success"),
      snap("lint", "failed"),
      snap("report", "running", { parent: "lint" }),
      snap("notify", "success", { parent: "build" }),
      snap("page", "pending", { parent: "report" }),
    ]);
    expect(ordered.map((s) => s.id)).toEqual(["build", "notify", "lint", "report", "page"]);
  });

  it("keeps tasks whose parents loop back on each other", () => {
    const ordered = orderForDisplay([snap("a", "success", { parent: "b" }), snap("b", "success", { parent: "a" })]);
    expect(ordered.map((s) => s.id)).toEqual(["a", "b"]);
  });
});

describe("taskLine", () => {
  it("shows icon, label, status and elapsed seconds", () => {
    expect(taskLine(snap("build", "success", { label: "Build", icon: "*", elapsedMs: 1234 }))).toBe(
      "* Build ✓ Success (1.23s)",
    );
    expect(taskLine(snap("lint", "failed", { elapsedMs: 500 }))).toBe("lint ✗ Failed (0.50s)");
    expect(taskLine(snap("fmt", "skipped"))).toBe("fmt ○ Skipped");
  });

  it("indents callback tasks two spaces per level", () => {
    expect(taskLine(snap("deploy", "waiting", { depth: 2 }))).toBe("    deploy ◷ Waiting for dependencies...");
  });
});

describe("headerLine", () => {
  it("counts running tasks", () => {
    expect(headerLine([snap("a", "running"), snap("b", "running")], 1500)).toBe("Running 2 tasks... (1.50s)");
    expect(headerLine([snap("a", "running"), snap("b", "success")])).toBe("Running 1 task... (0.00s)");
  });

  it("summarizes a finished batch", () => {
    expect(headerLine([snap("a", "success"), snap("b", "aborted")], 2000)).toBe("✗ Some tasks failed (2.00s)");
    expect(headerLine([snap("a", "success"), snap("b", "skipped")])).toBe("✓ All tasks completed (0.00s)");
  });
});

describe("renderStatus", () => {
  it("returns the header then one line per visible task", () => {
    const lines = renderStatus(
      [snap("build", "success", { elapsedMs: 2000 }), snap("fmt", "skipped"), snap("notify", "running", { parent: "build", depth: 1 })],
      { hideSkipped: true, batchElapsedMs: 3000 },
    );
    expect(lines).toEqual(["Running 1 task... (3.00s)", "build ✓ Success (2.00s)", "  notify ▶ Running..."]);
  });
});
