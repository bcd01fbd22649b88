import { z } from "zod";

import { DIAGNOSE_SYSTEM, diagnosePrompt } from "./prompts.js";
import { lenient, parseJsonResponse, parseLabeledFields, splitList } from "./parse.js";
import type { IncidentCollaborators, IncidentNode } from "./collaborators.js";

export const MAX_SEARCH_QUERIES = 5;

export interface Diagnosis {
  errorType: string;
  errorSummary: string;
  affectedComponents: string[];
  searchQueries: string[];
  filesToCheck: string[];
}

const diagnosisSchema = z.object({
  error_type: lenient.text("unknown"),
  error_summary: lenient.text("N/A"),
  affected_components: lenient.textList(),
  search_keywords: lenient.textList(),
  files_to_check: lenient.textList()
});

export function readDiagnosis(response: string): Diagnosis {
  const json = parseJsonResponse(response);
  if (Object.keys(json).length > 0) {
    const parsed = diagnosisSchema.parse(json);
    return {
      errorType: parsed.error_type || "unknown",
      errorSummary: parsed.error_summary,
      affectedComponents: parsed.affected_components,
      searchQueries: parsed.search_keywords,
      filesToCheck: parsed.files_to_check
    };
  }

  const fields = parseLabeledFields(response, [
    "ERROR_TYPE",
    "ERROR_SUMMARY",
    "AFFECTED_COMPONENTS",
    "SEARCH_QUERIES",
    "FILES_TO_CHECK"
  ]);
  return {
    errorType: fields.error_type || "unknown",
    errorSummary: fields.error_summary || "N/A",
    affectedComponents: splitList(fields.affected_components ?? ""),
    searchQueries: splitList(fields.search_queries ?? ""),
    filesToCheck: splitList(fields.files_to_check ?? "")
  };
}

export function createDiagnoseNode({ model, log }: IncidentCollaborators): IncidentNode {
  return async (state, { signal }) => {
    const response = await model.generate({
      prompt: diagnosePrompt(state.errorLog),
      systemPrompt: DIAGNOSE_SYSTEM,
      signal
    });
    const diagnosis = readDiagnosis(response);
    log?.(`diagnosis: ${diagnosis.errorType}: ${diagnosis.errorSummary}`);

    return {
      errorType: diagnosis.errorType,
      errorSummary: diagnosis.errorSummary,
      affectedComponents: diagnosis.affectedComponents,
      searchQueries: diagnosis.searchQueries.slice(0, MAX_SEARCH_QUERIES),
      filesToCheck: diagnosis.filesToCheck,
      messages: [...state.messages, `[Diagnose] ${response}`],
      status: "researching"
    };
  };
}
