import type { GraphDiagnostic } from "./types.js";

export class GraphDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GraphDefinitionError";
  }
}

export class GraphValidationError extends Error {
  constructor(readonly diagnostics: GraphDiagnostic[]) {
    super(diagnostics.map((item) => `${item.rule}: ${item.message}`).join("; "));
    this.name = "GraphValidationError";
  }
}

export interface FieldIssue {
  field: string;
  message: string;
}

export class StateValidationError extends Error {
  constructor(
    message: string,
    readonly issues: FieldIssue[]
  ) {
    super(
      issues.length > 0
        ? `${message}: ${issues.map((issue) => `${issue.field} ${issue.message}`).join("; ")}`
        : message
    );
    this.name = "StateValidationError";
  }
}

export type RunErrorCode =
  | "NODE_EXECUTION_FAILED"
  | "NODE_TIMEOUT"
  | "ITERATION_LIMIT_EXCEEDED"
  | "ROUTING_ERROR"
  | "INVALID_UPDATE"
  | "SUSPENSION_NOT_ALLOWED"
  | "RUN_CANCELLED";

export class RunError extends Error {
  constructor(
    message: string,
    readonly code: RunErrorCode,
    readonly nodeName: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RunError";
  }
}

export type CheckpointErrorCode =
  | "CHECKPOINT_INVALID"
  | "CHECKPOINT_NOT_FOUND"
  | "CHECKPOINT_EXISTS"
  | "PLAN_MISMATCH";

export class CheckpointError extends Error {
  constructor(
    message: string,
    readonly code: CheckpointErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CheckpointError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
