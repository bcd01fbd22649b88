import { z } from "zod";

import {
  CheckpointError,
  StateValidationError,
  errorMessage,
  type Checkpoint
} from "@incident-responder/graph-engine";
import type { ResumeRunRequest, RunSummary, StartRunRequest } from "@incident-responder/shared-types";

import type { ApprovalDecision, IncidentRunResult, InvestigateOptions } from "../../../src/responder.js";

export interface ApiResponse {
  status: number;
  body: unknown;
}

/** The responder operations the routes call. */
export interface RunService {
  investigate(errorLog: string, options?: InvestigateOptions): Promise<IncidentRunResult>;
  resume(runId: string, decision: ApprovalDecision): Promise<IncidentRunResult>;
  pending(runId: string): Promise<Checkpoint | null>;
}

const startRunSchema = z.object({
  errorLog: z.string().trim().min(1).max(200_000),
  maxIterations: z.number().int().min(1).max(10).optional()
});

const resumeRunSchema = z.object({
  approved: z.boolean(),
  overrides: z
    .object({
      proposedSolution: z.string().optional(),
      proposedCommands: z.array(z.string()).optional(),
      pendingAction: z.string().optional()
    })
    .strict()
    .optional()
});

export function toRunSummary(result: IncidentRunResult): RunSummary {
  const base = { runId: result.runId, path: result.path, state: { ...result.state } };
  switch (result.status) {
    case "completed":
      return { ...base, status: "COMPLETED" };
    case "suspended":
      return { ...base, status: "SUSPENDED", pending: result.pending, checkpointNode: result.checkpoint.node };
    case "failed":
      return {
        ...base,
        status: "FAILED",
        error: { code: result.error.code, nodeName: result.error.nodeName, message: result.error.message }
      };
  }
}

function fail(status: number, error: string, extra: Record<string, unknown> = {}): ApiResponse {
  return { status, body: { error, ...extra } };
}

export function errorResponse(error: unknown): ApiResponse {
  if (error instanceof CheckpointError) {
    switch (error.code) {
      case "CHECKPOINT_NOT_FOUND":
        return fail(404, error.message, { code: error.code });
      case "CHECKPOINT_EXISTS":
      case "PLAN_MISMATCH":
        return fail(409, error.message, { code: error.code });
      case "CHECKPOINT_INVALID":
        return fail(400, error.message, { code: error.code });
    }
  }
  if (error instanceof StateValidationError) {
    return fail(400, error.message, { issues: error.issues });
  }
  return fail(500, errorMessage(error));
}

function runResponse(result: IncidentRunResult): ApiResponse {
  return { status: result.status === "suspended" ? 202 : 200, body: toRunSummary(result) };
}

export async function startRun(service: RunService, body: unknown): Promise<ApiResponse> {
  const input = startRunSchema.safeParse(body);
  if (!input.success) {
    return fail(400, input.error.message);
  }
  const request: StartRunRequest = input.data;
  try {
    return runResponse(
      await service.investigate(
        request.errorLog,
        request.maxIterations !== undefined ? { maxIterations: request.maxIterations } : {}
      )
    );
  } catch (error) {
    return errorResponse(error);
  }
}

export async function resumeRun(service: RunService, runId: string, body: unknown): Promise<ApiResponse> {
  const input = resumeRunSchema.safeParse(body);
  if (!input.success) {
    return fail(400, input.error.message);
  }
  const request: ResumeRunRequest = input.data;
  try {
    return runResponse(
      await service.resume(runId, {
        approved: request.approved,
        ...(request.overrides ? { overrides: request.overrides } : {})
      })
    );
  } catch (error) {
    return errorResponse(error);
  }
}

export async function getCheckpoint(service: RunService, runId: string): Promise<ApiResponse> {
  try {
    const checkpoint = await service.pending(runId);
    if (!checkpoint) {
      return fail(404, `No suspended run with id ${runId}`, { code: "CHECKPOINT_NOT_FOUND" });
    }
    return {
      status: 200,
      body: {
        runId: checkpoint.runId,
        node: checkpoint.node,
        reason: checkpoint.reason,
        pending: checkpoint.request,
        createdAt: checkpoint.createdAt
      }
    };
  } catch (error) {
    return errorResponse(error);
  }
}
