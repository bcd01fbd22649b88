import { z } from "zod";

import { StateValidationError, type FieldIssue } from "./errors.js";
import type { FieldWrite, StateUpdate } from "./types.js";

export function deepClone<T>(value: T): T {
  return JSON.parse(JSON.stringify(value)) as T;
}

export function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

function isWriteList<S>(update: StateUpdate<S>): update is readonly FieldWrite<S>[] {
  return Array.isArray(update);
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Paths of values that would not survive a JSON round trip. */
function nonJsonPaths(value: unknown, path: string, found: string[]): void {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      found.push(path);
    }
    return;
  }
  if (Array.isArray(value)) {
    value.forEach((item: unknown, index) => nonJsonPaths(item, `${path}.${index}`, found));
    return;
  }
  if (typeof value === "object" && isPlainObject(value)) {
    for (const [key, item] of Object.entries(value)) {
      // Absent optional fields; JSON drops them the same way.
      if (item !== undefined) {
        nonJsonPaths(item, path ? `${path}.${key}` : key, found);
      }
    }
    return;
  }
  found.push(path);
}

function issuesFromZod(error: z.ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "(state)",
    message: issue.message
  }));
}

/**
 * Fixed set of typed fields shared by every node of a run.
 *
 * Containers are plain objects produced by `create` and `apply`; neither
 * operation mutates its input. Field values are checked against the declared
 * zod types on every merge, and fields missing from the caller's initial values
 * take the schema defaults. Values must be JSON data (no dates, maps or
 * non-finite numbers) so that snapshots and checkpoints carry them unchanged.
 */
export class StateSchema<S extends object> {
  readonly fields: readonly string[];

  constructor(
    private readonly schema: z.ZodType<S, z.ZodTypeDef, unknown>,
    fields: readonly string[]
  ) {
    this.fields = Object.freeze([...fields]);
  }

  hasField(field: string): boolean {
    return this.fields.includes(field);
  }

  create(initial: Partial<S> = {}): S {
    const values = toRecord(initial);
    const unknownFields = Object.keys(values).filter((field) => !this.hasField(field));
    if (unknownFields.length > 0) {
      throw new StateValidationError(
        "Initial state contains undeclared fields",
        unknownFields.map((field) => ({ field, message: "is not declared in the state schema" }))
      );
    }
    return this.parse(values, "Invalid initial state");
  }

  parse(value: unknown, message = "Invalid state"): S {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      throw new StateValidationError(message, issuesFromZod(result.error));
    }
    const unsupported: string[] = [];
    nonJsonPaths(result.data, "", unsupported);
    if (unsupported.length > 0) {
      throw new StateValidationError(
        message,
        unsupported.map((field) => ({ field: field || "(state)", message: "must hold only JSON values" }))
      );
    }
    return result.data;
  }

  /** Flattens an update into ordered writes, rejecting undeclared and repeated fields. */
  writes(update: StateUpdate<S>): Array<[string, unknown]> {
    const entries: Array<[string, unknown]> = isWriteList(update)
      ? update.map(([field, value]): [string, unknown] => [field, value])
      : Object.entries(update);

    const issues: FieldIssue[] = [];
    const seen = new Set<string>();
    const writes: Array<[string, unknown]> = [];
    for (const [field, value] of entries) {
      if (value === undefined) {
        continue;
      }
      if (!this.hasField(field)) {
        issues.push({ field, message: "is not declared in the state schema" });
        continue;
      }
      if (seen.has(field)) {
        issues.push({ field, message: "is written more than once in a single update" });
        continue;
      }
      seen.add(field);
      writes.push([field, value]);
    }

    if (issues.length > 0) {
      throw new StateValidationError("Invalid state update", issues);
    }
    return writes;
  }

  apply(state: S, update: StateUpdate<S>): S {
    const writes = this.writes(update);
    if (writes.length === 0) {
      return state;
    }
    const merged = toRecord(state);
    for (const [field, value] of writes) {
      merged[field] = value;
    }
    return this.parse(merged, "Invalid state update");
  }
}

export function defineStateSchema<T extends z.ZodRawShape>(
  shape: T
): StateSchema<z.infer<z.ZodObject<T, "strict">>> {
  return new StateSchema(z.object(shape).strict(), Object.keys(shape));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/** Deep-frozen copy handed to nodes and routing functions. */
export function snapshotState<S extends object>(state: S): Readonly<S> {
  return deepFreeze(deepClone(state));
}
