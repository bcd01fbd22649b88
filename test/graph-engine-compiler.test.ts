import { describe, expect, it } from "vitest";
import { z } from "zod";

import {
  END,
  GraphDefinition,
  GraphDefinitionError,
  GraphValidationError,
  defineStateSchema,
  lintGraph,
  type GraphDiagnostic
} from "../packages/graph-engine/src/index.js";

const schema = defineStateSchema({
  input: z.string().default(""),
  done: z.boolean().default(false)
});

function graph(name = "test") {
  return new GraphDefinition(name, schema);
}

const noop = () => undefined;

function compileErrors(definition: GraphDefinition<ReturnType<typeof schema.create>>): GraphDiagnostic[] {
  try {
    definition.compile();
  } catch (error) {
    if (error instanceof GraphValidationError) {
      return error.diagnostics;
    }
    throw error;
  }
  throw new Error("expected compilation to fail");
}

function rules(diagnostics: GraphDiagnostic[]): string[] {
  return diagnostics.map((item) => item.rule);
}

describe("graph compiler", () => {
  it("compiles a linear graph into a frozen plan", () => {
    const plan = graph("linear").addNode("a", noop).addNode("b", noop).setStart("a").addEdge("a", "b").addEdge("b", END).compile();

    expect(Object.isFrozen(plan)).toBe(true);
    expect(plan.name).toBe("linear");
    expect(plan.start).toBe("a");
    expect([...plan.nodes.keys()]).toEqual(["a", "b"]);
    expect(plan.maxIterations).toBe(3);
    expect(plan.nodes.get("a")?.transition).toEqual({ kind: "static", to: "b" });
  });

  it("hands out plan nodes through a read-only table", () => {
    const plan = graph("sealed").addNode("a", noop).setStart("a").addEdge("a", END).compile();

    expect(plan.nodes).not.toBeInstanceOf(Map);
    expect(Reflect.get(plan.nodes, "set")).toBeUndefined();
    expect(Reflect.get(plan.nodes, "delete")).toBeUndefined();
    expect(Object.isFrozen(plan.nodes)).toBe(true);
    expect(Object.isFrozen(plan.nodes.get("a"))).toBe(true);
    expect(plan.nodes.size).toBe(1);
    expect(plan.nodes.has("a")).toBe(true);
    expect([...plan.nodes].map(([name]) => name)).toEqual(["a"]);
  });

  it("rejects a node that cannot be reached from start", () => {
    const diagnostics = compileErrors(
      graph().addNode("a", noop).addNode("orphan", noop).setStart("a").addEdge("a", END).addEdge("orphan", END)
    );
    expect(diagnostics).toEqual([
      { rule: "reachability", severity: "ERROR", message: "Node orphan is unreachable from start", nodeId: "orphan" }
    ]);
  });

  it("rejects edges to undeclared nodes", () => {
    const diagnostics = compileErrors(graph().addNode("a", noop).setStart("a").addEdge("a", "ghost"));
    expect(diagnostics).toContainEqual({
      rule: "edge_target_exists",
      severity: "ERROR",
      message: "Edge target ghost is not a declared node",
      edge: { from: "a", to: "ghost" }
    });
  });

  it("rejects conditional destinations that are not declared", () => {
    const diagnostics = compileErrors(
      graph()
        .addNode("a", noop)
        .setStart("a")
        .addConditionalEdge<"stay" | "leave">("a", () => "leave", { stay: "a", leave: "exit" })
    );
    expect(rules(diagnostics)).toContain("edge_target_exists");
  });

  it("requires exactly one start node", () => {
    expect(rules(compileErrors(graph().addNode("a", noop).addEdge("a", END)))).toEqual(["start_node"]);
    expect(
      rules(compileErrors(graph().addNode("a", noop).addNode("b", noop).setStart("a").setStart("b").addEdge("a", END).addEdge("b", END)))
    ).toContain("start_node");
  });

  it("rejects duplicate and reserved node names", () => {
    const duplicate = compileErrors(graph().addNode("a", noop).addNode("a", noop).setStart("a").addEdge("a", END));
    expect(rules(duplicate)).toContain("node_unique");

    const reserved = compileErrors(graph().addNode(END, noop).setStart(END));
    expect(rules(reserved)).toContain("node_name_reserved");
  });

  it("requires exactly one outgoing path per node", () => {
    const none = compileErrors(graph().addNode("a", noop).setStart("a"));
    expect(none).toContainEqual({
      rule: "outgoing_path",
      severity: "ERROR",
      message: "Node a has no outgoing edge",
      nodeId: "a"
    });

    const twice = compileErrors(
      graph()
        .addNode("a", noop)
        .setStart("a")
        .addEdge("a", END)
        .addConditionalEdge<"end">("a", () => "end", { end: END })
    );
    expect(rules(twice)).toEqual(["outgoing_path"]);
  });

  it("validates node options and the iteration bound", () => {
    const badOptions = compileErrors(graph().addNode("a", noop, { timeoutMs: 0, maxIterations: -1 }).setStart("a").addEdge("a", END));
    expect(rules(badOptions)).toEqual(["node_options", "node_options"]);

    expect(() => graph().addNode("a", noop).setStart("a").addEdge("a", END).compile({ maxIterations: 1.5 })).toThrow(
      "max_iterations: maxIterations must be a non-negative integer; got 1.5"
    );
  });

  it("warns when no path reaches the terminal marker", () => {
    const definition = graph().addNode("a", noop).addNode("b", noop).setStart("a").addEdge("a", "b").addEdge("b", "a");
    expect(lintGraph(definition)).toEqual([
      {
        rule: "terminal_reachable",
        severity: "WARNING",
        message: "No path from start reaches the terminal marker"
      }
    ]);
    expect(() => definition.compile()).not.toThrow();
  });

  it("seals the definition once compiled", () => {
    const definition = graph().addNode("a", noop).setStart("a").addEdge("a", END);
    definition.compile();

    expect(definition.compiled).toBe(true);
    expect(() => definition.addNode("b", noop)).toThrow(GraphDefinitionError);
    expect(() => definition.compile()).toThrow("compiled_once: Graph test has already been compiled");
  });
});
