import { z } from "zod";

import { errorMessage } from "@incident-responder/graph-engine";

import { searchTechnical } from "../tools/search.js";
import { RESEARCH_SYSTEM, researchPrompt } from "./prompts.js";
import { lenient, parseJsonResponse, parseLabeledFields } from "./parse.js";
import type { IncidentCollaborators, IncidentNode } from "./collaborators.js";

export interface ResearchSummary {
  findings: string[];
  needsMoreResearch: boolean;
  refinedQuery: string;
}

const researchSchema = z.object({
  relevant_solutions: z
    .array(
      z.object({
        solution_summary: lenient.text(),
        source_url: lenient.text("unknown"),
        confidence: lenient.text("unknown")
      })
    )
    .catch([]),
  common_patterns: lenient.textList(),
  warnings: lenient.textList(),
  needs_more_research: lenient.flag(),
  refined_query: lenient.nullableText()
});

export function readResearch(response: string): ResearchSummary {
  const json = parseJsonResponse(response);
  if (Object.keys(json).length > 0) {
    const parsed = researchSchema.parse(json);
    const solutions = parsed.relevant_solutions
      .map((item) => `- ${item.solution_summary} (Source: ${item.source_url}, Confidence: ${item.confidence})`)
      .join("\n");
    return {
      findings: [
        `Solutions:\n${solutions}`,
        `Common patterns: ${parsed.common_patterns.join(", ")}`,
        `Warnings: ${parsed.warnings.join(", ")}`
      ],
      needsMoreResearch: parsed.needs_more_research,
      refinedQuery: parsed.refined_query?.trim() ?? ""
    };
  }

  const fields = parseLabeledFields(response, [
    "RELEVANT_FINDINGS",
    "COMMON_SOLUTIONS",
    "NEED_MORE_RESEARCH",
    "REFINED_QUERY"
  ]);
  return {
    findings: [fields.relevant_findings ?? "", fields.common_solutions ?? ""],
    needsMoreResearch: fields.need_more_research?.toLowerCase() === "yes",
    refinedQuery: fields.refined_query ?? ""
  };
}

/**
 * Searches every pending query, has the model distil the results, and either
 * stays in the research loop with a refined query or hands over to the audit.
 */
export function createResearchNode({ model, search, log }: IncidentCollaborators): IncidentNode {
  return async (state, { signal }) => {
    const results: string[] = [];
    for (const query of state.searchQueries) {
      try {
        for (const hit of await searchTechnical(search, query, { maxResults: 5, signal })) {
          results.push(`[${hit.title}](${hit.url})\n${hit.content}`);
        }
      } catch (error) {
        // The model still sees which searches failed.
        log?.(`search failed for "${query}": ${errorMessage(error)}`);
        results.push(`Search for '${query}' failed: ${errorMessage(error)}`);
      }
    }
    const searchResults = results.length > 0 ? results.join("\n\n---\n\n") : "No search results found.";

    const response = await model.generate({
      prompt: researchPrompt({
        errorSummary: state.errorSummary,
        errorType: state.errorType,
        searchResults
      }),
      systemPrompt: RESEARCH_SYSTEM,
      signal
    });
    const summary = readResearch(response);

    const iterations = state.iterations + 1;
    const researchFindings = [...state.researchFindings, ...summary.findings];
    const messages = [...state.messages, `[Research] ${response}`];

    if (summary.needsMoreResearch && summary.refinedQuery && iterations < state.maxIterations) {
      log?.(`refining research (iteration ${iterations}/${state.maxIterations}): ${summary.refinedQuery}`);
      return {
        researchFindings,
        searchQueries: [summary.refinedQuery],
        iterations,
        messages,
        status: "researching"
      };
    }

    log?.(`research complete after ${iterations} iteration(s)`);
    return {
      researchFindings,
      relevantDocs: [searchResults],
      iterations,
      messages,
      status: "auditing"
    };
  };
}
