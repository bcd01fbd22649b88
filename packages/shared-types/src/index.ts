export type RunStatus = "COMPLETED" | "SUSPENDED" | "FAILED";

export interface PendingDecision {
  reason: string;
  description: string;
  impact: Record<string, unknown>;
}

export interface RunFailure {
  code: string;
  nodeName: string;
  message: string;
}

export interface RunSummary {
  runId: string;
  status: RunStatus;
  path: string[];
  state: Record<string, unknown>;
  pending?: PendingDecision;
  checkpointNode?: string;
  error?: RunFailure;
}

export interface StartRunRequest {
  errorLog: string;
  maxIterations?: number;
}

/** State fields a reviewer may edit while approving or rejecting a run. */
export interface RunOverrides {
  proposedSolution?: string;
  proposedCommands?: string[];
  pendingAction?: string;
}

export interface ResumeRunRequest {
  approved: boolean;
  overrides?: RunOverrides;
}

export function checkpointKey(runId: string): string {
  return `incidents:checkpoint:${runId}`;
}

export function runEventChannel(runId: string): string {
  return `incidents:events:${runId}`;
}
