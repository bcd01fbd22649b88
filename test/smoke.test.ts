import { describe, expect, it } from "vitest";

import { INCIDENT_PLAN, runtimeInfo } from "../src/index.js";

describe("runtime info", () => {
  it("names the service, its plan and its LLM runtime", () => {
    expect(runtimeInfo.name).toBe("incident-responder");
    expect(runtimeInfo.plan).toBe(INCIDENT_PLAN);
    expect(runtimeInfo.llmRuntime).toBe("@mariozechner/pi-ai");
  });
});
