#!/usr/bin/env node

import { Command } from "commander";
import { configure, getConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { Orchestrator, type TaskSnapshot } from "./orchestrator.js";
import { describeIssue, topologicalOrder, validateGraph } from "./planner/task-graph.js";
import { loadTaskFiles } from "./tasks/task-file.js";
import { expandBatchEntries } from "./tasks/templates.js";
import { renderStatus } from "./ui/status.js";
import { getLogLevel, setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});

const program = new Command();

program
  .name("taskweave")
  .description("Run a graph of shell tasks with dependencies and callbacks")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) {
    setLogLevel("debug");
  } else if (process.env.TASKWEAVE_LOG_LEVEL === undefined && getLogLevel() === "info") {
    // Status lines own stdout unless asked otherwise.
    setLogLevel("warn");
  }
});

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...(truncated)` : text;
}

/** Redraws the status block in place on a terminal; prints nothing elsewhere. */
function createStatusPrinter(): { draw: (lines: string[]) => void } {
  let drawn = 0;
  return {
    draw(lines) {
      if (!process.stdout.isTTY) return;
      if (drawn > 0) process.stdout.write(`\x1b[${drawn}A\x1b[J`);
      process.stdout.write(`${lines.join("\n")}\n`);
      drawn = lines.length;
    },
  };
}

// --- run ---
program
  .command("run")
  .description("Run the tasks defined in one or more JSON task files")
  .argument("<files...>", "Task files; later files override earlier ones")
  .option("--hide-skipped", "Do not list skipped tasks")
  .option("--timeout <ms>", "Default timeout for every command")
  .option("--cwd <dir>", "Default working directory for commands")
  .action(async (files: string[], opts: { hideSkipped?: boolean; timeout?: string; cwd?: string }) => {
    configure({
      ui: { hideSkipped: opts.hideSkipped ?? false },
      defaults: {
        cwd: opts.cwd,
        timeoutMs: opts.timeout !== undefined ? Number(opts.timeout) : undefined,
      },
    });

    const { tasks, templates } = await loadTaskFiles(files);
    const orch = new Orchestrator({ templates });
    const printer = createStatusPrinter();
    const startedAt = Date.now();
    const render = (snapshot: TaskSnapshot[]): string[] =>
      renderStatus(snapshot, { hideSkipped: getConfig().ui.hideSkipped, batchElapsedMs: Date.now() - startedAt });

    const run = orch.runBatch(tasks, {
      onWarning: (message) => console.error(`warning: ${message}`),
      onCallbackError: (taskId, err) => console.error(`callback of ${taskId} failed: ${errorMessage(err)}`),
      onTick: (snapshot) => printer.draw(render(snapshot)),
    });

    const onSigint = (): void => {
      const killed = orch.killAll();
      console.error(`\nAborted ${killed.length} running task(s)`);
    };
    process.once("SIGINT", onSigint);

    const summary = await run.done;
    process.off("SIGINT", onSigint);

    const snapshot = orch.snapshot();
    const lines = render(snapshot);
    if (process.stdout.isTTY) {
      printer.draw(lines);
    } else {
      console.log(lines.join("\n"));
    }

    const max = getConfig().limits.outputTruncation;
    for (const task of snapshot) {
      if (task.state.status !== "failed" && task.state.status !== "aborted") continue;
      console.log(`\n--- ${task.definition.label ?? task.id} output ---`);
      console.log(truncate(task.state.output, max));
    }

    for (const { id, waitingOn } of summary.blocked) {
      console.error(`${id} never ran: waiting on ${waitingOn.join(", ")}`);
    }

    console.log(`\nFinished in ${summary.durationMs.toFixed(0)}ms (${summary.reason})`);
    process.exitCode = summary.success ? 0 : 1;
  });

// --- check ---
program
  .command("check")
  .description("Report unknown dependencies, unknown callback targets and cycles")
  .argument("<files...>", "Task files")
  .action(async (files: string[]) => {
    const { tasks, templates } = await loadTaskFiles(files);
    const { definitions, rejected } = expandBatchEntries(tasks, templates);
    for (const { key, error } of rejected) {
      console.log(`[x] ${key}: ${error.message}`);
    }
    const issues = validateGraph(definitions, templates.names());
    for (const issue of issues) {
      console.log(`[x] ${describeIssue(issue)}`);
    }
    if (issues.length === 0 && rejected.length === 0) {
      console.log(`[+] ${definitions.length} tasks, no problems found`);
      return;
    }
    process.exitCode = 1;
  });

// --- list ---
program
  .command("list")
  .description("List tasks in dependency order")
  .argument("<files...>", "Task files")
  .action(async (files: string[]) => {
    const { tasks, templates } = await loadTaskFiles(files);
    const { definitions } = expandBatchEntries(tasks, templates);
    for (const task of topologicalOrder(definitions)) {
      const deps = task.dependsOn?.length ? ` <- ${task.dependsOn.join(", ")}` : "";
      console.log(`${task.id}${task.label ? ` (${task.label})` : ""}${deps}`);
    }
    const names = templates.names();
    if (names.length > 0) console.log(`\nTemplates: ${names.join(", ")}`);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
