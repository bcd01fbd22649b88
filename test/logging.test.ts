import { describe, expect, it } from "vitest";

import type { EngineEvent } from "@incident-responder/graph-engine";

import { createEventLogger, formatEvent } from "../src/logging.js";

const cases: Array<[EngineEvent, string]> = [
  [{ type: "NodeStarted", runId: "r", nodeId: "research", payload: { visit: 2, resumed: false } }, "node research started (visit 2)"],
  [{ type: "NodeStarted", runId: "r", nodeId: "approval", payload: { visit: 1, resumed: true } }, "node approval started (visit 1, resumed)"],
  [{ type: "NodeCompleted", runId: "r", nodeId: "approval", payload: { suspended: true } }, "node approval suspended"],
  [{ type: "EdgeSelected", runId: "r", nodeId: "solve", payload: { to: "research", outcome: "refine" } }, "edge solve -> research (refine)"],
  [{ type: "EdgeSelected", runId: "r", nodeId: "diagnose", payload: { to: "research" } }, "edge diagnose -> research"],
  [{ type: "RunCompleted", runId: "r", nodeId: "solve", payload: { steps: 4 } }, "run completed after 4 steps"],
  [
    { type: "RunFailed", runId: "r", nodeId: "solve", payload: { code: "NODE_TIMEOUT", message: "too slow" } },
    "run failed at solve: NODE_TIMEOUT too slow"
  ]
];

describe("event log lines", () => {
  it.each(cases)("formats %o", (event, line) => {
    expect(formatEvent(event)).toBe(line);
  });

  it("prefixes lines with the start of the run id", () => {
    const lines: string[] = [];
    const log = createEventLogger((line) => lines.push(line));

    log({ type: "RunStarted", runId: "0123456789abcdef", nodeId: "diagnose", payload: { plan: "incident-responder" } });

    expect(lines).toEqual(["[01234567] run started at diagnose (plan incident-responder)\n"]);
  });
});
