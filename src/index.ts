// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { RunnerConfig, DeepPartial } from "./config.js";

// Errors
export { RunnerError, ValidationError, ConfigError, ParseError, errorMessage } from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export { parseOrThrow, checkDefinition, TaskDefinitionSchema, FileTaskSchema, TaskFileSchema } from "./schemas.js";
export type { FileTask, TaskFile } from "./schemas.js";

// Core
export { Orchestrator } from "./orchestrator.js";
export type {
  BatchRun,
  BatchSummary,
  OrchestratorOptions,
  RejectedTask,
  RunHooks,
  TaskSnapshot,
} from "./orchestrator.js";

// Tasks
export { TaskRegistry } from "./tasks/registry.js";
export type { Clock, Lineage, RegistryEvent, RegistryListener } from "./tasks/registry.js";
export { TemplateRegistry, cloneDefinition, expandBatchEntries, resolveTaskMap } from "./tasks/templates.js";
export type { ExtendableInput, ExtendableMap } from "./tasks/templates.js";
export { loadTaskFiles, parseTaskFile, resolveTaskFiles } from "./tasks/task-file.js";
export type { LoadedTasks } from "./tasks/task-file.js";
export { isTerminal, SATISFYING_STATUSES, TERMINAL_STATUSES } from "./tasks/types.js";
export type {
  CallbackFn,
  CommandSpec,
  FunctionResult,
  HandlerContext,
  HandlerReturn,
  TaskCallback,
  TaskDefinition,
  TaskEntry,
  TaskFunction,
  TaskHandler,
  TaskInput,
  TaskMap,
  TaskResult,
  TaskState,
  TaskStatus,
} from "./tasks/types.js";

// Execution
export { Executor } from "./executor/executor.js";
export type { ExecutorHooks, ExecutorOptions } from "./executor/executor.js";
export { ProcessManager, ABORT_NOTE, defaultSpawn } from "./executor/process-manager.js";
export type { ProcessManagerOptions } from "./executor/process-manager.js";
export { CallbackDispatcher } from "./executor/callbacks.js";
export type { CallbackDispatcherOptions } from "./executor/callbacks.js";
export { fromFunctionReturn, fromHandlerReturn } from "./executor/outcome.js";
export type { FinalOutcome, Outcome } from "./executor/outcome.js";
export type { CommandOptions, CommandResult, SpawnedProcess, SpawnFn, SpawnOptions } from "./executor/types.js";

// Planning
export { DependencyScheduler } from "./planner/scheduler.js";
export type { BlockedTask, DependencySchedulerOptions, SchedulerOutcome } from "./planner/scheduler.js";
export {
  callbackTargets,
  describeIssue,
  findCycle,
  topologicalOrder,
  unmetDependencies,
  validateGraph,
} from "./planner/task-graph.js";
export type { GraphIssue } from "./planner/task-graph.js";

// UI
export { renderStatus, orderForDisplay, headerLine, taskLine, STATUS_ICONS } from "./ui/status.js";
export type { RenderOptions } from "./ui/status.js";

// Utils
export { log, createLogger, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { Ticker } from "./utils/ticker.js";
