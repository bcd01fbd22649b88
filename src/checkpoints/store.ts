import { CheckpointError, parseCheckpoint, serializeCheckpoint, type Checkpoint } from "@incident-responder/graph-engine";

/**
 * Holds suspended runs by run id. `save` never overwrites and `take` removes, so
 * a checkpoint is resumed at most once however many callers race for it.
 */
export interface CheckpointStore {
  save(checkpoint: Checkpoint): Promise<void>;
  get(runId: string): Promise<Checkpoint | null>;
  take(runId: string): Promise<Checkpoint | null>;
}

const RUN_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,127}$/;

export function assertRunId(runId: string): void {
  if (!RUN_ID_PATTERN.test(runId)) {
    throw new CheckpointError(`Invalid run id: ${JSON.stringify(runId)}`, "CHECKPOINT_INVALID");
  }
}

export function checkpointExists(runId: string): CheckpointError {
  return new CheckpointError(`A checkpoint for run ${runId} already exists`, "CHECKPOINT_EXISTS");
}

/** Keeps serialized records so stored checkpoints share nothing with the caller's objects. */
export class MemoryCheckpointStore implements CheckpointStore {
  private readonly records = new Map<string, string>();

  async save(checkpoint: Checkpoint): Promise<void> {
    assertRunId(checkpoint.runId);
    if (this.records.has(checkpoint.runId)) {
      throw checkpointExists(checkpoint.runId);
    }
    this.records.set(checkpoint.runId, serializeCheckpoint(checkpoint));
  }

  async get(runId: string): Promise<Checkpoint | null> {
    const raw = this.records.get(runId);
    return raw === undefined ? null : parseCheckpoint(raw);
  }

  async take(runId: string): Promise<Checkpoint | null> {
    const raw = this.records.get(runId);
    if (raw === undefined) {
      return null;
    }
    this.records.delete(runId);
    return parseCheckpoint(raw);
  }

  get size(): number {
    return this.records.size;
  }
}
