import { z } from "zod";

import { CheckpointError } from "./errors.js";
import { deepClone, toRecord } from "./state.js";
import type { StateUpdate, SuspensionRequest } from "./types.js";

/** Returned by a checkpointing node instead of (or along with) a plain update. */
export class Suspension<S> {
  constructor(
    readonly request: SuspensionRequest,
    readonly update?: StateUpdate<S>
  ) {}
}

export function suspend<S>(request: SuspensionRequest, update?: StateUpdate<S>): Suspension<S> {
  return new Suspension(request, update);
}

export interface Checkpoint {
  runId: string;
  plan: string;
  node: string;
  state: Record<string, unknown>;
  iterations: Record<string, number>;
  reason: string;
  request: SuspensionRequest;
  createdAt: string;
}

export interface CreateCheckpointInput<S extends object> {
  runId: string;
  plan: string;
  node: string;
  state: S;
  iterations: Record<string, number>;
  request: SuspensionRequest;
  now?: Date;
}

export function createCheckpoint<S extends object>(input: CreateCheckpointInput<S>): Checkpoint {
  return {
    runId: input.runId,
    plan: input.plan,
    node: input.node,
    state: deepClone(toRecord(input.state)),
    iterations: { ...input.iterations },
    reason: input.request.reason,
    request: deepClone(input.request),
    createdAt: (input.now ?? new Date()).toISOString()
  };
}

const CHECKPOINT_RECORD_VERSION = 1;

const checkpointRecordSchema = z.object({
  version: z.literal(CHECKPOINT_RECORD_VERSION),
  run_id: z.string().min(1),
  plan: z.string().min(1),
  current_node: z.string().min(1),
  state: z.record(z.unknown()),
  iterations: z.record(z.number().int().min(0)),
  reason: z.string().min(1),
  request: z.object({
    reason: z.string().min(1),
    description: z.string(),
    impact: z.record(z.unknown())
  }),
  created_at: z.string().datetime()
});

export type CheckpointRecord = z.infer<typeof checkpointRecordSchema>;

export function toCheckpointRecord(checkpoint: Checkpoint): CheckpointRecord {
  return {
    version: CHECKPOINT_RECORD_VERSION,
    run_id: checkpoint.runId,
    plan: checkpoint.plan,
    current_node: checkpoint.node,
    state: checkpoint.state,
    iterations: checkpoint.iterations,
    reason: checkpoint.reason,
    request: checkpoint.request,
    created_at: checkpoint.createdAt
  };
}

export function fromCheckpointRecord(value: unknown): Checkpoint {
  const parsed = checkpointRecordSchema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(record)"}: ${issue.message}`)
      .join("; ");
    throw new CheckpointError(`Invalid checkpoint record: ${detail}`, "CHECKPOINT_INVALID");
  }

  const record = parsed.data;
  return {
    runId: record.run_id,
    plan: record.plan,
    node: record.current_node,
    state: record.state,
    iterations: record.iterations,
    reason: record.reason,
    request: record.request,
    createdAt: record.created_at
  };
}

export function serializeCheckpoint(checkpoint: Checkpoint): string {
  return JSON.stringify(toCheckpointRecord(checkpoint));
}

export function parseCheckpoint(raw: string): Checkpoint {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new CheckpointError("Checkpoint is not valid JSON", "CHECKPOINT_INVALID", { cause: error });
  }
  return fromCheckpointRecord(value);
}
