import type { NodeFn } from "@incident-responder/graph-engine";

import type { LanguageModel } from "../llm/language-model.js";
import type { IncidentState } from "../state.js";
import type { CodeFiles } from "../tools/file-reader.js";
import type { SearchClient } from "../tools/search.js";

/** Everything the incident nodes reach outside the run state. */
export interface IncidentCollaborators {
  model: LanguageModel;
  search: SearchClient;
  files: CodeFiles;
  /** Progress lines for humans; the engine's events cover the machine-readable side. */
  log?: (line: string) => void;
}

export type IncidentNode = NodeFn<IncidentState>;
