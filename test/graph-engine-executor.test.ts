import { describe, expect, it } from "vitest";
import { z } from "zod";

import {
  CheckpointError,
  END,
  GraphDefinition,
  RunError,
  defineStateSchema,
  parseCheckpoint,
  resumeGraph,
  runGraph,
  serializeCheckpoint,
  suspend,
  type EngineEventType,
  type RunResult
} from "../packages/graph-engine/src/index.js";

const schema = defineStateSchema({
  input: z.string(),
  label: z.string().default("none"),
  count: z.number().int().min(0).default(0),
  approved: z.boolean().nullable().default(null),
  log: z.array(z.string()).default([])
});

type Counter = ReturnType<typeof schema.create>;

function graph(name: string) {
  return new GraphDefinition(name, schema);
}

function suspended<S>(result: RunResult<S>) {
  if (result.status !== "suspended") {
    throw new Error(`expected a suspended run, got ${result.status}`);
  }
  return result;
}

function failed<S>(result: RunResult<S>) {
  if (result.status !== "failed") {
    throw new Error(`expected a failed run, got ${result.status}`);
  }
  return result;
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function approvalGraph(name: string, seen: Array<boolean | null> = []) {
  return graph(name)
    .addNode(
      "gate",
      (state) => {
        seen.push(state.approved);
        if (state.approved === null) {
          return suspend<Counter>(
            { reason: "awaiting_approval", description: "needs sign-off", impact: { count: state.count } },
            { label: "waiting" }
          );
        }
        return { label: state.approved ? "approved" : "rejected" };
      },
      { checkpoint: true }
    )
    .addNode("after", (state) => ({ count: state.count + 1 }))
    .setStart("gate")
    .addEdge("gate", "after")
    .addEdge("after", END);
}

describe("executor", () => {
  it("runs a two-node graph in one node execution and keeps untouched fields", async () => {
    const events: EngineEventType[] = [];
    const plan = graph("scenario-a").addNode("start", () => ({ label: "started" })).setStart("start").addEdge("start", END).compile();

    const result = await runGraph(plan, { input: "hello", count: 4 }, { onEvent: (event) => void events.push(event.type) });

    expect(result.status).toBe("completed");
    expect(result.path).toEqual(["start"]);
    expect(result.state).toEqual({ input: "hello", label: "started", count: 4, approved: null, log: [] });
    expect(events).toEqual(["RunStarted", "NodeStarted", "NodeCompleted", "EdgeSelected", "RunCompleted"]);
  });

  it("stops a loop that exceeds its iteration bound after max + 1 executions", async () => {
    const executions = { a: 0, b: 0 };
    const plan = graph("scenario-b")
      .addNode("a", (state) => {
        executions.a += 1;
        return { count: state.count + 1 };
      })
      .addNode("b", () => {
        executions.b += 1;
      })
      .setStart("a")
      .addEdge("a", "b")
      .addConditionalEdge<"again" | "done">("b", () => "again", { again: "a", done: END })
      .compile({ maxIterations: 2 });

    const result = failed(await runGraph(plan, { input: "loop" }));

    expect(result.error.code).toBe("ITERATION_LIMIT_EXCEEDED");
    expect(result.error.nodeName).toBe("a");
    expect(executions).toEqual({ a: 3, b: 3 });
    expect(result.state.count).toBe(3);
    expect(result.path).toEqual(["a", "b", "a", "b", "a", "b"]);
  });

  it("lets a node bound its own revisits", async () => {
    let runs = 0;
    const plan = graph("node-bound")
      .addNode(
        "spin",
        () => {
          runs += 1;
        },
        { maxIterations: 0 }
      )
      .setStart("spin")
      .addConditionalEdge<"again">("spin", () => "again", { again: "spin" })
      .compile({ maxIterations: 5 });

    const result = failed(await runGraph(plan, { input: "x" }));
    expect(result.error.code).toBe("ITERATION_LIMIT_EXCEEDED");
    expect(runs).toBe(1);
  });

  it("suspends at a checkpoint node and re-enters it on resume", async () => {
    const seen: Array<boolean | null> = [];
    const plan = approvalGraph("scenario-c", seen).compile();

    const paused = suspended(await runGraph(plan, { input: "deploy" }));
    expect(paused.checkpoint.node).toBe("gate");
    expect(paused.checkpoint.reason).toBe("awaiting_approval");
    expect(paused.pending).toEqual({ reason: "awaiting_approval", description: "needs sign-off", impact: { count: 0 } });
    expect(paused.state.label).toBe("waiting");

    const resumed = await resumeGraph(plan, paused.checkpoint, { approved: true });
    expect(resumed.status).toBe("completed");
    expect(resumed.state).toMatchObject({ approved: true, label: "approved", count: 1 });
    expect(resumed.path).toEqual(["gate", "after"]);
    expect(seen).toEqual([null, true]);
  });

  it("continues a resumed run the same way as an uninterrupted one", async () => {
    const plan = approvalGraph("round-trip").compile();

    const direct = await runGraph(plan, { input: "deploy", approved: false });
    const paused = suspended(await runGraph(plan, { input: "deploy" }));
    const restored = parseCheckpoint(serializeCheckpoint(paused.checkpoint));
    const resumed = await resumeGraph(plan, restored, { approved: false });

    expect(resumed.status).toBe(direct.status);
    expect(resumed.state).toEqual(direct.state);
  });

  it("does not count the resumed visit against the iteration bound", async () => {
    const plan = approvalGraph("no-revisits").compile({ maxIterations: 0 });
    const paused = suspended(await runGraph(plan, { input: "deploy" }));

    const resumed = await resumeGraph(plan, paused.checkpoint, { approved: true });
    expect(resumed.status).toBe("completed");
  });

  it("refuses checkpoints from another plan and invalid decisions", async () => {
    const paused = suspended(await runGraph(approvalGraph("first").compile(), { input: "deploy" }));

    await expect(resumeGraph(approvalGraph("second").compile(), paused.checkpoint, { approved: true })).rejects.toMatchObject({
      name: "CheckpointError",
      code: "PLAN_MISMATCH"
    });
    await expect(resumeGraph(approvalGraph("first").compile(), paused.checkpoint, { count: -1 })).rejects.toThrow(
      "Invalid state update"
    );
  });

  it("rejects a checkpoint whose node is not a checkpoint node", async () => {
    const plan = approvalGraph("bad-node").compile();
    const paused = suspended(await runGraph(plan, { input: "deploy" }));

    await expect(resumeGraph(plan, { ...paused.checkpoint, node: "after" }, { approved: true })).rejects.toBeInstanceOf(
      CheckpointError
    );
  });

  it("fails when a node that is not a checkpoint asks to suspend", async () => {
    const plan = graph("no-checkpoint")
      .addNode("a", () => suspend<Counter>({ reason: "wait", description: "", impact: {} }))
      .setStart("a")
      .addEdge("a", END)
      .compile();

    const result = failed(await runGraph(plan, { input: "x" }));
    expect(result.error.code).toBe("SUSPENSION_NOT_ALLOWED");
    expect(result.error.nodeName).toBe("a");
  });

  it("reports an undeclared routing outcome as a routing error", async () => {
    const destinations: Record<string, string> = { known: END };
    const plan = graph("bad-route")
      .addNode("a", () => ({ label: "unknown" }))
      .setStart("a")
      .addConditionalEdge<string>("a", (state) => state.label, destinations)
      .compile();

    const result = failed(await runGraph(plan, { input: "x" }));
    expect(result.error).toBeInstanceOf(RunError);
    expect(result.error.code).toBe("ROUTING_ERROR");
    expect(result.error.message).toBe('Node a routed to undeclared outcome "unknown" (declared: known)');
    expect(result.state.label).toBe("unknown");
  });

  it("reports a throwing routing function as a routing error", async () => {
    const boom = new Error("no route");
    const plan = graph("throwing-route")
      .addNode("a", () => undefined)
      .setStart("a")
      .addConditionalEdge<"end">(
        "a",
        () => {
          throw boom;
        },
        { end: END }
      )
      .compile();

    const result = failed(await runGraph(plan, { input: "x" }));
    expect(result.error.code).toBe("ROUTING_ERROR");
    expect(result.error.cause).toBe(boom);
  });

  it("turns a thrown node error into a failed result with the last committed state", async () => {
    const boom = new Error("model unavailable");
    const plan = graph("node-error")
      .addNode("a", () => ({ label: "a-done" }))
      .addNode("b", () => {
        throw boom;
      })
      .setStart("a")
      .addEdge("a", "b")
      .addEdge("b", END)
      .compile();

    const result = failed(await runGraph(plan, { input: "x" }));
    expect(result.error.code).toBe("NODE_EXECUTION_FAILED");
    expect(result.error.nodeName).toBe("b");
    expect(result.error.cause).toBe(boom);
    expect(result.state.label).toBe("a-done");
  });

  it("fails an update that breaks the state schema", async () => {
    const plan = graph("bad-update")
      .addNode("a", () => ({ count: -1 }))
      .setStart("a")
      .addEdge("a", END)
      .compile();

    const result = failed(await runGraph(plan, { input: "x" }));
    expect(result.error.code).toBe("INVALID_UPDATE");
    expect(result.state.count).toBe(0);
  });

  it("does not let a node mutate the state it receives", async () => {
    const plan = graph("frozen")
      .addNode("a", (state) => {
        state.log.push("sneaky");
      })
      .setStart("a")
      .addEdge("a", END)
      .compile();

    const result = failed(await runGraph(plan, { input: "x" }));
    expect(result.error.code).toBe("NODE_EXECUTION_FAILED");
    expect(result.state.log).toEqual([]);
  });

  it("times out a slow node and aborts its signal", async () => {
    let abortedBy: unknown;
    const plan = graph("timeout")
      .addNode(
        "slow",
        (_state, { signal }) =>
          new Promise<void>(() => {
            signal.addEventListener("abort", () => {
              abortedBy = signal.reason;
            });
          }),
        { timeoutMs: 20 }
      )
      .setStart("slow")
      .addEdge("slow", END)
      .compile();

    const result = failed(await runGraph(plan, { input: "x" }));
    expect(result.error.code).toBe("NODE_TIMEOUT");
    expect(result.error.message).toBe("Node slow timed out after 20ms");
    expect(abortedBy).toBe(result.error);
  });

  it("stops between nodes once cancelled, keeping the in-flight node's update", async () => {
    const controller = new AbortController();
    let reachedB = false;
    const plan = graph("cancel")
      .addNode("a", () => {
        controller.abort();
        return { label: "a-done" };
      })
      .addNode("b", () => {
        reachedB = true;
      })
      .setStart("a")
      .addEdge("a", "b")
      .addEdge("b", END)
      .compile();

    const result = failed(await runGraph(plan, { input: "x" }, { signal: controller.signal }));
    expect(result.error.code).toBe("RUN_CANCELLED");
    expect(result.error.nodeName).toBe("b");
    expect(result.state.label).toBe("a-done");
    expect(reachedB).toBe(false);
  });

  it("lets a node that watches its signal finish when the run is cancelled", async () => {
    const controller = new AbortController();
    let nodeAborted = false;
    const plan = graph("cancel-signal")
      .addNode(
        "a",
        (_state, { signal }) =>
          new Promise<{ label: string }>((resolve, reject) => {
            const timer = setTimeout(() => resolve({ label: "a-done" }), 50);
            signal.addEventListener("abort", () => {
              nodeAborted = true;
              clearTimeout(timer);
              reject(new Error("aborted"));
            });
          })
      )
      .addNode("b", () => undefined)
      .setStart("a")
      .addEdge("a", "b")
      .addEdge("b", END)
      .compile();

    setTimeout(() => controller.abort(), 5);
    const result = failed(await runGraph(plan, { input: "x" }, { signal: controller.signal }));

    expect(result.error.code).toBe("RUN_CANCELLED");
    expect(result.error.nodeName).toBe("b");
    expect(result.state.label).toBe("a-done");
    expect(result.path).toEqual(["a"]);
    expect(nodeAborted).toBe(false);
  });

  it("keeps concurrent runs of one plan isolated", async () => {
    const plan = graph("isolation")
      .addNode("record", async (state) => {
        await delay(state.input === "first" ? 15 : 1);
        return { log: [...state.log, state.input] };
      })
      .addNode("count", (state) => ({ count: state.log.length }))
      .setStart("record")
      .addEdge("record", "count")
      .addEdge("count", END)
      .compile();

    const [first, second] = await Promise.all([
      runGraph(plan, { input: "first" }, { runId: "run-1" }),
      runGraph(plan, { input: "second" }, { runId: "run-2" })
    ]);

    expect(first.runId).toBe("run-1");
    expect(first.state.log).toEqual(["first"]);
    expect(second.state.log).toEqual(["second"]);
    expect(first.state.count).toBe(1);
    expect(second.state.count).toBe(1);
  });

  it("lets a listener error reach the caller", async () => {
    const plan = graph("listener").addNode("a", () => undefined).setStart("a").addEdge("a", END).compile();

    await expect(
      runGraph(
        plan,
        { input: "x" },
        {
          onEvent: (event) => {
            if (event.type === "NodeCompleted") {
              throw new Error("sink down");
            }
          }
        }
      )
    ).rejects.toThrow("sink down");
  });
});
