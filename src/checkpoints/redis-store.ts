import { checkpointKey } from "@incident-responder/shared-types";
import { parseCheckpoint, serializeCheckpoint, type Checkpoint } from "@incident-responder/graph-engine";

import { assertRunId, checkpointExists, type CheckpointStore } from "./store.js";

/** The commands the store issues; an ioredis client satisfies it. */
export interface RedisCheckpointClient {
  set(key: string, value: string, mode: "NX"): Promise<"OK" | null>;
  get(key: string): Promise<string | null>;
  getdel(key: string): Promise<string | null>;
}

export class RedisCheckpointStore implements CheckpointStore {
  constructor(private readonly redis: RedisCheckpointClient) {}

  async save(checkpoint: Checkpoint): Promise<void> {
    assertRunId(checkpoint.runId);
    const stored = await this.redis.set(checkpointKey(checkpoint.runId), serializeCheckpoint(checkpoint), "NX");
    if (stored !== "OK") {
      throw checkpointExists(checkpoint.runId);
    }
  }

  async get(runId: string): Promise<Checkpoint | null> {
    assertRunId(runId);
    const raw = await this.redis.get(checkpointKey(runId));
    return raw === null ? null : parseCheckpoint(raw);
  }

  async take(runId: string): Promise<Checkpoint | null> {
    assertRunId(runId);
    const raw = await this.redis.getdel(checkpointKey(runId));
    return raw === null ? null : parseCheckpoint(raw);
  }
}
