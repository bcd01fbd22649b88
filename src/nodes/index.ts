export { approvalNode, APPROVAL_REASON } from "./approval.js";
export { createAuditNode, FILES_PER_PATTERN, NO_CODE_FOUND } from "./audit.js";
export { createDiagnoseNode, readDiagnosis, MAX_SEARCH_QUERIES } from "./diagnose.js";
export { parseJsonResponse, parseLabeledFields, splitList } from "./parse.js";
export { createResearchNode, readResearch } from "./research.js";
export { createSolutionRouter, DEFAULT_RESEARCH_POLICY, routeAfterResearch } from "./routing.js";
export { createSolveNode, formatCodeChanges, readSolution, FALLBACK_CONFIDENCE } from "./solve.js";
export type { IncidentCollaborators, IncidentNode } from "./collaborators.js";
export type { Diagnosis } from "./diagnose.js";
export type { ResearchSummary } from "./research.js";
export type { ResearchOutcome, ResearchPolicy, SolutionOutcome } from "./routing.js";
export type { FileChange, Solution } from "./solve.js";
