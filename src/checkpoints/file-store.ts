import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { parseCheckpoint, toCheckpointRecord, type Checkpoint } from "@incident-responder/graph-engine";

import { assertRunId, checkpointExists, type CheckpointStore } from "./store.js";

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * One `<runId>.json` file per suspended run. Creation uses the exclusive flag and
 * `take` claims the file with a rename before reading it, so two processes
 * sharing the directory cannot resume the same run.
 */
export class FileCheckpointStore implements CheckpointStore {
  constructor(readonly dir: string) {}

  private pathFor(runId: string): string {
    assertRunId(runId);
    return join(this.dir, `${runId}.json`);
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    const path = this.pathFor(checkpoint.runId);
    await mkdir(this.dir, { recursive: true });
    try {
      await writeFile(path, `${JSON.stringify(toCheckpointRecord(checkpoint), null, 2)}\n`, {
        encoding: "utf8",
        flag: "wx"
      });
    } catch (error) {
      if (hasCode(error, "EEXIST")) {
        throw checkpointExists(checkpoint.runId);
      }
      throw error;
    }
  }

  async get(runId: string): Promise<Checkpoint | null> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(runId), "utf8");
    } catch (error) {
      if (hasCode(error, "ENOENT")) {
        return null;
      }
      throw error;
    }
    return parseCheckpoint(raw);
  }

  async take(runId: string): Promise<Checkpoint | null> {
    const path = this.pathFor(runId);
    const claimed = `${path}.${randomUUID()}.taken`;
    try {
      await rename(path, claimed);
    } catch (error) {
      if (hasCode(error, "ENOENT")) {
        return null;
      }
      throw error;
    }
    try {
      return parseCheckpoint(await readFile(claimed, "utf8"));
    } finally {
      await unlink(claimed);
    }
  }
}
