export {
  Suspension,
  createCheckpoint,
  fromCheckpointRecord,
  parseCheckpoint,
  serializeCheckpoint,
  suspend,
  toCheckpointRecord
} from "./checkpoint.js";
export { DEFAULT_MAX_ITERATIONS, compileGraph, lintGraph } from "./compiler.js";
export {
  CheckpointError,
  GraphDefinitionError,
  GraphValidationError,
  RunError,
  StateValidationError,
  errorMessage
} from "./errors.js";
export { resumeGraph, runGraph } from "./executor.js";
export { GraphDefinition } from "./graph.js";
export { StateSchema, defineStateSchema } from "./state.js";
export { END } from "./types.js";
export type { Checkpoint, CheckpointRecord, CreateCheckpointInput } from "./checkpoint.js";
export type { CompileOptions } from "./compiler.js";
export type { CheckpointErrorCode, FieldIssue, RunErrorCode } from "./errors.js";
export type { RunOptions, RunResult } from "./executor.js";
export type {
  CompiledNode,
  CompiledPlan,
  DiagnosticSeverity,
  EndMarker,
  EngineEvent,
  EngineEventType,
  FieldWrite,
  GraphDiagnostic,
  NodeContext,
  NodeFn,
  NodeOptions,
  NodeReturn,
  RouteFn,
  StateUpdate,
  SuspensionRequest
} from "./types.js";
