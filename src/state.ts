import { z } from "zod";

import { defineStateSchema } from "@incident-responder/graph-engine";

export const INCIDENT_STATUSES = [
  "investigating",
  "researching",
  "auditing",
  "solving",
  "awaiting_approval",
  "complete",
  "rejected",
  "failed"
] as const;

export type IncidentStatus = (typeof INCIDENT_STATUSES)[number];

export const DEFAULT_MAX_ITERATIONS = 3;

const textList = () => z.array(z.string()).default([]);

export const incidentStateSchema = defineStateSchema({
  errorLog: z.string(),
  errorType: z.string().default("unknown"),
  errorSummary: z.string().default(""),
  affectedComponents: textList(),
  searchQueries: textList(),
  researchFindings: textList(),
  relevantDocs: textList(),
  filesToCheck: textList(),
  codeContext: z.string().default(""),
  proposedSolution: z.string().default(""),
  solutionConfidence: z.number().min(0).max(1).default(0),
  solutionSteps: textList(),
  codeChanges: z.string().default(""),
  proposedCommands: textList(),
  changedFiles: textList(),
  iterations: z.number().int().min(0).default(0),
  maxIterations: z.number().int().min(1).default(DEFAULT_MAX_ITERATIONS),
  needsHumanApproval: z.boolean().default(false),
  pendingAction: z.string().default(""),
  approved: z.boolean().nullable().default(null),
  messages: textList(),
  status: z.enum(INCIDENT_STATUSES).default("investigating")
});

export type IncidentState = ReturnType<typeof incidentStateSchema.create>;

export function createInitialState(errorLog: string, maxIterations = DEFAULT_MAX_ITERATIONS): IncidentState {
  return incidentStateSchema.create({ errorLog, maxIterations });
}
