import { END, GraphDefinition, type CompiledPlan } from "@incident-responder/graph-engine";

import {
  approvalNode,
  createAuditNode,
  createDiagnoseNode,
  createResearchNode,
  createSolutionRouter,
  createSolveNode,
  routeAfterResearch,
  type IncidentCollaborators,
  type ResearchPolicy
} from "./nodes/index.js";
import { incidentStateSchema, type IncidentState } from "./state.js";

export const INCIDENT_PLAN = "incident-responder";

export const INCIDENT_NODES = {
  diagnose: "diagnose",
  research: "research",
  audit: "audit",
  solve: "solve",
  approval: "approval"
} as const;

/**
 * diagnose -> research (loops while refining) -> audit -> solve, then back to
 * research for a low-confidence solution, to approval when sign-off is needed,
 * or to the end.
 */
export function createIncidentGraph(
  collaborators: IncidentCollaborators,
  policy: ResearchPolicy
): GraphDefinition<IncidentState> {
  const { diagnose, research, audit, solve, approval } = INCIDENT_NODES;
  return new GraphDefinition(INCIDENT_PLAN, incidentStateSchema)
    .addNode(diagnose, createDiagnoseNode(collaborators))
    .addNode(research, createResearchNode(collaborators))
    .addNode(audit, createAuditNode(collaborators))
    .addNode(solve, createSolveNode(collaborators))
    .addNode(approval, approvalNode, { checkpoint: true })
    .setStart(diagnose)
    .addEdge(diagnose, research)
    .addConditionalEdge(research, routeAfterResearch, { research, audit })
    .addEdge(audit, solve)
    .addConditionalEdge(solve, createSolutionRouter(policy), {
      refine: research,
      approve: approval,
      end: END
    })
    .addEdge(approval, END);
}

export function compileIncidentGraph(
  collaborators: IncidentCollaborators,
  policy: ResearchPolicy
): CompiledPlan<IncidentState> {
  return createIncidentGraph(collaborators, policy).compile({ maxIterations: policy.maxIterations });
}
