import type { Suspension } from "./checkpoint.js";
import type { StateSchema } from "./state.js";

export const END = "__end__";
export type EndMarker = typeof END;

export type FieldWrite<S> = {
  [K in keyof S & string]: readonly [K, S[K]];
}[keyof S & string];

/**
 * A node's state update: either a partial record or an ordered list of field
 * writes. The list form lets a node's output be checked for a field written twice.
 */
export type StateUpdate<S> = Partial<S> | readonly FieldWrite<S>[];

export interface SuspensionRequest {
  reason: string;
  description: string;
  impact: Record<string, unknown>;
}

export interface NodeContext {
  runId: string;
  nodeName: string;
  visit: number;
  resumed: boolean;
  signal: AbortSignal;
}

export type NodeReturn<S> = StateUpdate<S> | Suspension<S> | void;

export type NodeFn<S> = (
  state: Readonly<S>,
  context: NodeContext
) => Promise<NodeReturn<S>> | NodeReturn<S>;

export type RouteFn<S, O extends string> = (state: Readonly<S>) => O;

export interface NodeOptions {
  checkpoint?: boolean;
  timeoutMs?: number;
  maxIterations?: number;
}

export type EdgeEntry<S> =
  | { kind: "static"; from: string; to: string }
  | {
      kind: "conditional";
      from: string;
      route: RouteFn<S, string>;
      destinations: Readonly<Record<string, string>>;
    };

export interface NodeEntry<S> {
  name: string;
  run: NodeFn<S>;
  options: NodeOptions;
}

export type Transition<S> =
  | { kind: "static"; to: string }
  | {
      kind: "conditional";
      route: RouteFn<S, string>;
      destinations: Readonly<Record<string, string>>;
    };

export interface CompiledNode<S> {
  name: string;
  run: NodeFn<S>;
  checkpoint: boolean;
  timeoutMs?: number;
  maxIterations?: number;
  transition: Transition<S>;
}

export interface CompiledPlan<S extends object> {
  readonly name: string;
  readonly start: string;
  readonly nodes: ReadonlyMap<string, CompiledNode<S>>;
  readonly schema: StateSchema<S>;
  readonly maxIterations: number;
}

export type DiagnosticSeverity = "ERROR" | "WARNING";

export interface GraphDiagnostic {
  rule: string;
  severity: DiagnosticSeverity;
  message: string;
  nodeId?: string;
  edge?: { from: string; to: string };
}

export type EngineEventType =
  | "RunStarted"
  | "RunResumed"
  | "NodeStarted"
  | "NodeCompleted"
  | "NodeFailed"
  | "EdgeSelected"
  | "RunSuspended"
  | "RunCompleted"
  | "RunFailed";

export interface EngineEvent {
  type: EngineEventType;
  runId: string;
  nodeId?: string;
  payload?: Record<string, unknown>;
}
