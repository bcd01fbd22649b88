import { INCIDENT_PLAN } from "./graph.js";

export interface ResponderRuntimeInfo {
  name: string;
  plan: string;
  llmRuntime: string;
}

export const runtimeInfo: ResponderRuntimeInfo = {
  name: "incident-responder",
  plan: INCIDENT_PLAN,
  llmRuntime: "@mariozechner/pi-ai"
};

export * from "./checkpoints/index.js";
export * from "./config.js";
export * from "./graph.js";
export * from "./llm/language-model.js";
export * from "./llm/models.js";
export * from "./logging.js";
export * from "./nodes/index.js";
export * from "./report.js";
export * from "./responder.js";
export * from "./state.js";
export * from "./tools/file-reader.js";
export * from "./tools/search.js";
