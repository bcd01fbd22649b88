import {
  CheckpointError,
  resumeGraph,
  runGraph,
  type Checkpoint,
  type CompiledPlan,
  type EngineEvent,
  type RunResult
} from "@incident-responder/graph-engine";

import type { CheckpointStore } from "./checkpoints/store.js";
import { compileIncidentGraph } from "./graph.js";
import { EXPLAIN_SYSTEM, explainPrompt } from "./nodes/prompts.js";
import type { IncidentCollaborators, ResearchPolicy } from "./nodes/index.js";
import type { IncidentState } from "./state.js";

export interface IncidentResponderOptions {
  collaborators: IncidentCollaborators;
  policy: ResearchPolicy;
  store: CheckpointStore;
  nodeTimeoutMs?: number;
  onEvent?: (event: EngineEvent) => Promise<void> | void;
}

export interface InvestigateOptions {
  runId?: string;
  maxIterations?: number;
  signal?: AbortSignal;
}

/** A person's answer to a pending approval, optionally correcting state fields. */
export interface ApprovalDecision {
  approved: boolean;
  overrides?: Partial<Omit<IncidentState, "approved">>;
}

export type IncidentRunResult = RunResult<IncidentState>;

export class IncidentResponder {
  readonly plan: CompiledPlan<IncidentState>;

  constructor(private readonly options: IncidentResponderOptions) {
    this.plan = compileIncidentGraph(options.collaborators, options.policy);
  }

  private runOptions(signal: AbortSignal | undefined, maxIterations: number | undefined) {
    return {
      ...(maxIterations !== undefined ? { maxIterations } : {}),
      ...(this.options.nodeTimeoutMs !== undefined ? { nodeTimeoutMs: this.options.nodeTimeoutMs } : {}),
      ...(signal ? { signal } : {}),
      ...(this.options.onEvent ? { onEvent: this.options.onEvent } : {})
    };
  }

  private async keep(result: IncidentRunResult): Promise<IncidentRunResult> {
    if (result.status === "suspended") {
      await this.options.store.save(result.checkpoint);
    }
    return result;
  }

  async investigate(errorLog: string, options: InvestigateOptions = {}): Promise<IncidentRunResult> {
    const maxIterations = options.maxIterations ?? this.options.policy.maxIterations;
    const result = await runGraph(
      this.plan,
      { errorLog, maxIterations },
      {
        ...this.runOptions(options.signal, maxIterations),
        ...(options.runId ? { runId: options.runId } : {})
      }
    );
    return this.keep(result);
  }

  /**
   * Resumes a suspended run with a decision. The checkpoint is removed from the
   * store first; when the decision itself is refused it is put back so the run
   * can still be decided.
   */
  async resume(runId: string, decision: ApprovalDecision, options: { signal?: AbortSignal } = {}): Promise<IncidentRunResult> {
    const checkpoint = await this.options.store.take(runId);
    if (!checkpoint) {
      throw new CheckpointError(`No suspended run with id ${runId}`, "CHECKPOINT_NOT_FOUND");
    }

    let result: IncidentRunResult;
    try {
      result = await resumeGraph(
        this.plan,
        checkpoint,
        { ...decision.overrides, approved: decision.approved },
        this.runOptions(options.signal, this.maxIterationsOf(checkpoint))
      );
    } catch (error) {
      await this.options.store.save(checkpoint);
      throw error;
    }
    return this.keep(result);
  }

  pending(runId: string): Promise<Checkpoint | null> {
    return this.options.store.get(runId);
  }

  /** Streams a prose explanation of the proposed fix. */
  explainSolution(state: Readonly<IncidentState>, signal?: AbortSignal): AsyncIterable<string> {
    return this.options.collaborators.model.stream({
      prompt: explainPrompt({
        errorSummary: state.errorSummary,
        proposedSolution: state.proposedSolution,
        confidence: state.solutionConfidence
      }),
      systemPrompt: EXPLAIN_SYSTEM,
      ...(signal ? { signal } : {})
    });
  }

  private maxIterationsOf(checkpoint: Checkpoint): number {
    const value = checkpoint.state.maxIterations;
    return typeof value === "number" ? value : this.options.policy.maxIterations;
  }
}
