import type { IncidentState } from "../state.js";

export interface ResearchPolicy {
  /** Default research passes per investigation when the caller gives none. */
  maxIterations: number;
  /** Solutions below this confidence go back to research while passes remain. */
  confidenceThreshold: number;
}

export const DEFAULT_RESEARCH_POLICY: ResearchPolicy = {
  maxIterations: 3,
  confidenceThreshold: 0.3
};

export type ResearchOutcome = "research" | "audit";
export type SolutionOutcome = "refine" | "approve" | "end";

export function routeAfterResearch(state: Readonly<IncidentState>): ResearchOutcome {
  return state.status === "researching" && state.iterations < state.maxIterations ? "research" : "audit";
}

export function createSolutionRouter(policy: ResearchPolicy): (state: Readonly<IncidentState>) => SolutionOutcome {
  return (state) => {
    if (state.solutionConfidence < policy.confidenceThreshold && state.iterations < state.maxIterations) {
      return "refine";
    }
    return state.needsHumanApproval ? "approve" : "end";
  };
}
