import { randomUUID } from "node:crypto";

import { Suspension, createCheckpoint, type Checkpoint } from "./checkpoint.js";
import { CheckpointError, RunError, errorMessage } from "./errors.js";
import { snapshotState } from "./state.js";
import {
  END,
  type CompiledNode,
  type CompiledPlan,
  type EngineEvent,
  type EngineEventType,
  type NodeContext,
  type NodeReturn,
  type StateUpdate,
  type SuspensionRequest
} from "./types.js";

export interface RunOptions {
  runId?: string;
  /** Overrides the plan's iteration bound for nodes without their own. */
  maxIterations?: number;
  nodeTimeoutMs?: number;
  signal?: AbortSignal;
  onEvent?: (event: EngineEvent) => Promise<void> | void;
}

export type RunResult<S> =
  | { status: "completed"; runId: string; state: S; path: string[] }
  | {
      status: "suspended";
      runId: string;
      state: S;
      checkpoint: Checkpoint;
      pending: SuspensionRequest;
      path: string[];
    }
  | { status: "failed"; runId: string; state: S; error: RunError; path: string[] };

interface Cursor<S> {
  runId: string;
  node: string;
  state: S;
  iterations: Record<string, number>;
  resumed: boolean;
}

async function emit(
  options: RunOptions,
  runId: string,
  type: EngineEventType,
  nodeId?: string,
  payload?: Record<string, unknown>
): Promise<void> {
  await options.onEvent?.({
    type,
    runId,
    ...(nodeId !== undefined ? { nodeId } : {}),
    ...(payload !== undefined ? { payload } : {})
  });
}

function isSuspension<S>(value: NodeReturn<S>): value is Suspension<S> {
  return value instanceof Suspension;
}

function iterationLimit<S extends object>(plan: CompiledPlan<S>, node: CompiledNode<S>, options: RunOptions): number {
  return node.maxIterations ?? options.maxIterations ?? plan.maxIterations;
}

async function invokeNode<S extends object>(
  node: CompiledNode<S>,
  state: S,
  context: Omit<NodeContext, "signal">,
  options: RunOptions
): Promise<NodeReturn<S>> {
  // Aborted on timeout only. Run cancellation waits for the node to settle.
  const controller = new AbortController();
  const work = Promise.resolve().then(() =>
    node.run(snapshotState(state), { ...context, signal: controller.signal })
  );

  const timeoutMs = node.timeoutMs ?? options.nodeTimeoutMs;
  let timer: NodeJS.Timeout | undefined;
  try {
    if (timeoutMs === undefined) {
      return await work;
    }
    // Once the timeout has failed the node, a late settlement no longer affects the run.
    void work.catch(() => undefined);
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new RunError(
          `Node ${node.name} timed out after ${timeoutMs}ms`,
          "NODE_TIMEOUT",
          node.name
        );
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });
    return await Promise.race([work, timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

function selectNext<S extends object>(node: CompiledNode<S>, state: S): { to: string; outcome?: string } {
  const transition = node.transition;
  if (transition.kind === "static") {
    return { to: transition.to };
  }

  let outcome: unknown;
  try {
    outcome = transition.route(snapshotState(state));
  } catch (error) {
    throw new RunError(
      `Routing function of node ${node.name} threw: ${errorMessage(error)}`,
      "ROUTING_ERROR",
      node.name,
      { cause: error }
    );
  }

  const declared = Object.keys(transition.destinations);
  const destination =
    typeof outcome === "string" && Object.hasOwn(transition.destinations, outcome)
      ? transition.destinations[outcome]
      : undefined;
  if (typeof outcome !== "string" || destination === undefined) {
    throw new RunError(
      `Node ${node.name} routed to undeclared outcome "${String(outcome)}" (declared: ${declared.join(", ")})`,
      "ROUTING_ERROR",
      node.name
    );
  }
  return { to: destination, outcome };
}

async function drive<S extends object>(
  plan: CompiledPlan<S>,
  cursor: Cursor<S>,
  options: RunOptions
): Promise<RunResult<S>> {
  const { runId } = cursor;
  const iterations = { ...cursor.iterations };
  const path: string[] = [];
  let current = cursor.node;
  let state = cursor.state;
  let resumed = cursor.resumed;

  const fail = async (error: RunError): Promise<RunResult<S>> => {
    await emit(options, runId, "RunFailed", error.nodeName, { code: error.code, message: error.message });
    return { status: "failed", runId, state, error, path };
  };

  for (;;) {
    if (options.signal?.aborted) {
      return fail(new RunError(`Run ${runId} was cancelled before node ${current}`, "RUN_CANCELLED", current));
    }

    const node = plan.nodes.get(current);
    if (!node) {
      throw new Error(`Node not found: ${current}`);
    }

    if (!resumed) {
      const previous = iterations[current];
      if (previous === undefined) {
        iterations[current] = 0;
      } else {
        const count = previous + 1;
        const limit = iterationLimit(plan, node, options);
        if (count > limit) {
          return fail(
            new RunError(
              `Node ${current} exceeded its iteration limit of ${limit}`,
              "ITERATION_LIMIT_EXCEEDED",
              current
            )
          );
        }
        iterations[current] = count;
      }
    }

    const visit = (iterations[current] ?? 0) + 1;
    path.push(current);
    await emit(options, runId, "NodeStarted", current, { visit, resumed });

    let output: NodeReturn<S>;
    try {
      output = await invokeNode(node, state, { runId, nodeName: current, visit, resumed }, options);
    } catch (error) {
      const failure =
        error instanceof RunError
          ? error
          : new RunError(`Node ${current} failed: ${errorMessage(error)}`, "NODE_EXECUTION_FAILED", current, {
              cause: error
            });
      await emit(options, runId, "NodeFailed", current, { code: failure.code, message: failure.message });
      return fail(failure);
    }

    let suspension: Suspension<S> | null = null;
    let update: StateUpdate<S> | undefined;
    if (isSuspension(output)) {
      suspension = output;
      update = output.update;
    } else if (output) {
      update = output;
    }

    if (suspension && !node.checkpoint) {
      return fail(
        new RunError(
          `Node ${current} requested suspension but is not marked as a checkpoint`,
          "SUSPENSION_NOT_ALLOWED",
          current
        )
      );
    }

    if (update !== undefined) {
      try {
        state = plan.schema.apply(state, update);
      } catch (error) {
        return fail(
          new RunError(`Node ${current} returned an invalid update: ${errorMessage(error)}`, "INVALID_UPDATE", current, {
            cause: error
          })
        );
      }
    }
    await emit(options, runId, "NodeCompleted", current, { visit, suspended: suspension !== null });
    resumed = false;

    if (suspension) {
      const checkpoint = createCheckpoint({
        runId,
        plan: plan.name,
        node: current,
        state,
        iterations,
        request: suspension.request
      });
      await emit(options, runId, "RunSuspended", current, { reason: suspension.request.reason });
      return { status: "suspended", runId, state, checkpoint, pending: checkpoint.request, path };
    }

    let next: { to: string; outcome?: string };
    try {
      next = selectNext(node, state);
    } catch (error) {
      if (error instanceof RunError) {
        return fail(error);
      }
      throw error;
    }
    await emit(options, runId, "EdgeSelected", current, {
      to: next.to,
      ...(next.outcome !== undefined ? { outcome: next.outcome } : {})
    });

    if (next.to === END) {
      await emit(options, runId, "RunCompleted", current, { steps: path.length });
      return { status: "completed", runId, state, path };
    }
    current = next.to;
  }
}

export async function runGraph<S extends object>(
  plan: CompiledPlan<S>,
  initialState: Partial<S> = {},
  options: RunOptions = {}
): Promise<RunResult<S>> {
  const state = plan.schema.create(initialState);
  const runId = options.runId ?? randomUUID();
  await emit(options, runId, "RunStarted", plan.start, { plan: plan.name });
  return drive(plan, { runId, node: plan.start, state, iterations: {}, resumed: false }, options);
}

/**
 * Re-enters the suspended node with the external decision merged into the
 * checkpointed state. The re-entry continues the suspended visit, so it does
 * not count against the node's iteration limit.
 */
export async function resumeGraph<S extends object>(
  plan: CompiledPlan<S>,
  checkpoint: Checkpoint,
  decision: StateUpdate<S>,
  options: Omit<RunOptions, "runId"> = {}
): Promise<RunResult<S>> {
  if (checkpoint.plan !== plan.name) {
    throw new CheckpointError(
      `Checkpoint ${checkpoint.runId} belongs to plan ${checkpoint.plan}, not ${plan.name}`,
      "PLAN_MISMATCH"
    );
  }
  const node = plan.nodes.get(checkpoint.node);
  if (!node || !node.checkpoint) {
    throw new CheckpointError(
      `Checkpoint ${checkpoint.runId} points at ${checkpoint.node}, which is not a checkpoint node of ${plan.name}`,
      "CHECKPOINT_INVALID"
    );
  }

  let restored: S;
  try {
    restored = plan.schema.parse(checkpoint.state, "Invalid checkpoint state");
  } catch (error) {
    throw new CheckpointError(errorMessage(error), "CHECKPOINT_INVALID", { cause: error });
  }
  const state = plan.schema.apply(restored, decision);

  await emit(options, checkpoint.runId, "RunResumed", checkpoint.node, { reason: checkpoint.reason });
  return drive(
    plan,
    {
      runId: checkpoint.runId,
      node: checkpoint.node,
      state,
      iterations: { ...checkpoint.iterations },
      resumed: true
    },
    options
  );
}
