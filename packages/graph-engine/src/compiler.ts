import { GraphValidationError } from "./errors.js";
import type { GraphDefinition } from "./graph.js";
import {
  END,
  type CompiledNode,
  type CompiledPlan,
  type EdgeEntry,
  type GraphDiagnostic,
  type Transition
} from "./types.js";

export const DEFAULT_MAX_ITERATIONS = 3;

export interface CompileOptions {
  /** Re-visits allowed per node within one run unless the node overrides it. */
  maxIterations?: number;
}

function edgeTargets<S>(edge: EdgeEntry<S>): string[] {
  return edge.kind === "static" ? [edge.to] : Object.values(edge.destinations);
}

function lintNodes<S extends object>(graph: GraphDefinition<S>, diagnostics: GraphDiagnostic[]): void {
  const seen = new Set<string>();
  for (const node of graph.nodes) {
    if (!node.name.trim() || node.name === END) {
      diagnostics.push({
        rule: "node_name_reserved",
        severity: "ERROR",
        message: node.name ? `Node name ${node.name} is reserved for the terminal marker` : "Node name must not be empty",
        nodeId: node.name
      });
    }
    if (seen.has(node.name)) {
      diagnostics.push({
        rule: "node_unique",
        severity: "ERROR",
        message: `Node ${node.name} is declared more than once`,
        nodeId: node.name
      });
    }
    seen.add(node.name);

    const { maxIterations, timeoutMs } = node.options;
    if (maxIterations !== undefined && (!Number.isInteger(maxIterations) || maxIterations < 0)) {
      diagnostics.push({
        rule: "node_options",
        severity: "ERROR",
        message: `Node ${node.name} maxIterations must be a non-negative integer`,
        nodeId: node.name
      });
    }
    if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0)) {
      diagnostics.push({
        rule: "node_options",
        severity: "ERROR",
        message: `Node ${node.name} timeoutMs must be a positive number`,
        nodeId: node.name
      });
    }
  }
}

function lintStart<S extends object>(graph: GraphDefinition<S>, diagnostics: GraphDiagnostic[]): void {
  if (graph.starts.length !== 1) {
    diagnostics.push({
      rule: "start_node",
      severity: "ERROR",
      message: `Graph must have exactly one start node; found ${graph.starts.length}`
    });
    return;
  }
  const start = graph.starts[0] ?? "";
  if (!graph.nodes.some((node) => node.name === start)) {
    diagnostics.push({
      rule: "start_node",
      severity: "ERROR",
      message: `Start node ${start} is not declared`,
      nodeId: start
    });
  }
}

function lintEdges<S extends object>(graph: GraphDefinition<S>, diagnostics: GraphDiagnostic[]): void {
  const declared = new Set(graph.nodes.map((node) => node.name));

  for (const edge of graph.edges) {
    if (!declared.has(edge.from)) {
      diagnostics.push({
        rule: "edge_source_exists",
        severity: "ERROR",
        message: `Edge source ${edge.from} is not a declared node`,
        nodeId: edge.from
      });
    }

    if (edge.kind === "conditional") {
      const outcomes = Object.entries(edge.destinations);
      if (outcomes.length === 0) {
        diagnostics.push({
          rule: "outcome_destination",
          severity: "ERROR",
          message: `Conditional edge from ${edge.from} declares no outcomes`,
          nodeId: edge.from
        });
      }
      for (const [outcome, destination] of outcomes) {
        if (typeof destination !== "string" || destination.length === 0) {
          diagnostics.push({
            rule: "outcome_destination",
            severity: "ERROR",
            message: `Outcome ${outcome} of conditional edge from ${edge.from} has no destination`,
            nodeId: edge.from
          });
        }
      }
    }

    for (const target of edgeTargets(edge)) {
      if (typeof target === "string" && target.length > 0 && target !== END && !declared.has(target)) {
        diagnostics.push({
          rule: "edge_target_exists",
          severity: "ERROR",
          message: `Edge target ${target} is not a declared node`,
          edge: { from: edge.from, to: target }
        });
      }
    }
  }

  for (const name of declared) {
    const outgoing = graph.edges.filter((edge) => edge.from === name).length;
    if (outgoing !== 1) {
      diagnostics.push({
        rule: "outgoing_path",
        severity: "ERROR",
        message:
          outgoing === 0
            ? `Node ${name} has no outgoing edge`
            : `Node ${name} has ${outgoing} outgoing edges; exactly one edge or conditional edge is allowed`,
        nodeId: name
      });
    }
  }
}

function lintReachability<S extends object>(graph: GraphDefinition<S>, diagnostics: GraphDiagnostic[]): void {
  const start = graph.starts[0];
  if (graph.starts.length !== 1 || !start) {
    return;
  }

  const visited = new Set<string>();
  const queue = [start];
  while (queue.length > 0) {
    const nodeId = queue.shift() ?? "";
    if (!nodeId || visited.has(nodeId)) {
      continue;
    }
    visited.add(nodeId);
    if (nodeId === END) {
      continue;
    }
    for (const edge of graph.edges) {
      if (edge.from !== nodeId) {
        continue;
      }
      for (const target of edgeTargets(edge)) {
        if (!visited.has(target)) {
          queue.push(target);
        }
      }
    }
  }

  const reported = new Set<string>();
  for (const node of graph.nodes) {
    if (!visited.has(node.name) && !reported.has(node.name)) {
      reported.add(node.name);
      diagnostics.push({
        rule: "reachability",
        severity: "ERROR",
        message: `Node ${node.name} is unreachable from start`,
        nodeId: node.name
      });
    }
  }

  if (!visited.has(END)) {
    diagnostics.push({
      rule: "terminal_reachable",
      severity: "WARNING",
      message: "No path from start reaches the terminal marker"
    });
  }
}

export function lintGraph<S extends object>(graph: GraphDefinition<S>): GraphDiagnostic[] {
  const diagnostics: GraphDiagnostic[] = [];
  lintNodes(graph, diagnostics);
  lintStart(graph, diagnostics);
  lintEdges(graph, diagnostics);
  lintReachability(graph, diagnostics);
  return diagnostics;
}

function toTransition<S>(edge: EdgeEntry<S>): Transition<S> {
  if (edge.kind === "static") {
    return { kind: "static", to: edge.to };
  }
  return {
    kind: "conditional",
    route: edge.route,
    destinations: Object.freeze({ ...edge.destinations })
  };
}

/** Read-only view of a plan's nodes. The backing map is never handed out. */
class NodeTable<S> implements ReadonlyMap<string, CompiledNode<S>> {
  private readonly table: Map<string, CompiledNode<S>>;

  constructor(nodes: Iterable<[string, CompiledNode<S>]>) {
    this.table = new Map(nodes);
    Object.freeze(this);
  }

  get size(): number {
    return this.table.size;
  }

  get(name: string): CompiledNode<S> | undefined {
    return this.table.get(name);
  }

  has(name: string): boolean {
    return this.table.has(name);
  }

  forEach(callback: (node: CompiledNode<S>, name: string, table: ReadonlyMap<string, CompiledNode<S>>) => void): void {
    for (const [name, node] of this.table) {
      callback(node, name, this);
    }
  }

  entries() {
    return this.table.entries();
  }

  keys() {
    return this.table.keys();
  }

  values() {
    return this.table.values();
  }

  [Symbol.iterator]() {
    return this.table.entries();
  }
}

export function compileGraph<S extends object>(
  graph: GraphDefinition<S>,
  options: CompileOptions = {}
): CompiledPlan<S> {
  if (graph.compiled) {
    throw new GraphValidationError([
      {
        rule: "compiled_once",
        severity: "ERROR",
        message: `Graph ${graph.name} has already been compiled`
      }
    ]);
  }

  const diagnostics = lintGraph(graph);
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  if (!Number.isInteger(maxIterations) || maxIterations < 0) {
    diagnostics.push({
      rule: "max_iterations",
      severity: "ERROR",
      message: `maxIterations must be a non-negative integer; got ${maxIterations}`
    });
  }

  const errors = diagnostics.filter((item) => item.severity === "ERROR");
  if (errors.length > 0) {
    throw new GraphValidationError(errors);
  }

  const nodes = new Map<string, CompiledNode<S>>();
  for (const entry of graph.nodes) {
    const edge = graph.edges.find((candidate) => candidate.from === entry.name);
    if (!edge) {
      throw new Error(`Node ${entry.name} lost its outgoing edge during compilation`);
    }
    nodes.set(
      entry.name,
      Object.freeze({
        name: entry.name,
        run: entry.run,
        checkpoint: entry.options.checkpoint ?? false,
        ...(entry.options.timeoutMs !== undefined ? { timeoutMs: entry.options.timeoutMs } : {}),
        ...(entry.options.maxIterations !== undefined ? { maxIterations: entry.options.maxIterations } : {}),
        transition: toTransition(edge)
      })
    );
  }

  return Object.freeze({
    name: graph.name,
    start: graph.starts[0] ?? "",
    nodes: new NodeTable(nodes),
    schema: graph.schema,
    maxIterations
  });
}
