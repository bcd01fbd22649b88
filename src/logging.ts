import type { EngineEvent } from "@incident-responder/graph-engine";

export type LineWriter = (line: string) => void;

function field(payload: Record<string, unknown> | undefined, key: string): string {
  const value = payload?.[key];
  return value === undefined || value === null ? "" : String(value);
}

export function formatEvent(event: EngineEvent): string {
  const { payload } = event;
  const node = event.nodeId ?? "-";
  switch (event.type) {
    case "RunStarted":
      return `run started at ${node} (plan ${field(payload, "plan")})`;
    case "RunResumed":
      return `run resumed at ${node} (${field(payload, "reason")})`;
    case "NodeStarted":
      return `node ${node} started (visit ${field(payload, "visit")}${payload?.resumed === true ? ", resumed" : ""})`;
    case "NodeCompleted":
      return payload?.suspended === true ? `node ${node} suspended` : `node ${node} completed`;
    case "NodeFailed":
      return `node ${node} failed: ${field(payload, "code")} ${field(payload, "message")}`;
    case "EdgeSelected": {
      const outcome = field(payload, "outcome");
      return `edge ${node} -> ${field(payload, "to")}${outcome ? ` (${outcome})` : ""}`;
    }
    case "RunSuspended":
      return `run suspended at ${node}: ${field(payload, "reason")}`;
    case "RunCompleted":
      return `run completed after ${field(payload, "steps")} steps`;
    case "RunFailed":
      return `run failed at ${node}: ${field(payload, "code")} ${field(payload, "message")}`;
  }
}

/** Renders engine events as `[<run id prefix>] <message>` lines. */
export function createEventLogger(write: LineWriter): (event: EngineEvent) => void {
  return (event) => {
    write(`[${event.runId.slice(0, 8)}] ${formatEvent(event)}\n`);
  };
}

export const stdoutLine: LineWriter = (line) => {
  process.stdout.write(line);
};

export const stderrLine: LineWriter = (line) => {
  process.stderr.write(line);
};
