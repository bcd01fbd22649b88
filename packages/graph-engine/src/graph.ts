import { compileGraph, type CompileOptions } from "./compiler.js";
import { GraphDefinitionError } from "./errors.js";
import type { StateSchema } from "./state.js";
import type {
  CompiledPlan,
  EdgeEntry,
  NodeEntry,
  NodeFn,
  NodeOptions,
  RouteFn
} from "./types.js";

/**
 * Builder for a workflow graph. Problems such as dangling edges or unreachable
 * nodes are reported by `compile`, which sees the whole graph at once.
 */
export class GraphDefinition<S extends object> {
  private readonly nodeEntries: NodeEntry<S>[] = [];
  private readonly edgeEntries: EdgeEntry<S>[] = [];
  private readonly startEntries: string[] = [];
  private sealed = false;

  constructor(
    readonly name: string,
    readonly schema: StateSchema<S>
  ) {}

  get nodes(): readonly NodeEntry<S>[] {
    return this.nodeEntries;
  }

  get edges(): readonly EdgeEntry<S>[] {
    return this.edgeEntries;
  }

  get starts(): readonly string[] {
    return this.startEntries;
  }

  get compiled(): boolean {
    return this.sealed;
  }

  addNode(name: string, run: NodeFn<S>, options: NodeOptions = {}): this {
    this.assertMutable();
    this.nodeEntries.push({ name, run, options: { ...options } });
    return this;
  }

  addEdge(from: string, to: string): this {
    this.assertMutable();
    this.edgeEntries.push({ kind: "static", from, to });
    return this;
  }

  addConditionalEdge<O extends string>(
    from: string,
    route: RouteFn<S, O>,
    destinations: Readonly<Record<O, string>>
  ): this {
    this.assertMutable();
    this.edgeEntries.push({
      kind: "conditional",
      from,
      route,
      destinations: { ...destinations }
    });
    return this;
  }

  setStart(name: string): this {
    this.assertMutable();
    this.startEntries.push(name);
    return this;
  }

  compile(options: CompileOptions = {}): CompiledPlan<S> {
    const plan = compileGraph(this, options);
    this.sealed = true;
    return plan;
  }

  private assertMutable(): void {
    if (this.sealed) {
      throw new GraphDefinitionError(`Graph ${this.name} is compiled and can no longer be changed`);
    }
  }
}
