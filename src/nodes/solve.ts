import { z } from "zod";

import { SOLVE_SYSTEM, solvePrompt } from "./prompts.js";
import { lenient, parseJsonResponse, parseLabeledFields } from "./parse.js";
import type { IncidentCollaborators, IncidentNode } from "./collaborators.js";

export interface FileChange {
  filePath: string;
  description: string;
  before: string;
  after: string;
}

export interface Solution {
  proposedSolution: string;
  confidence: number;
  steps: string[];
  commands: string[];
  fileChanges: FileChange[];
  codeChanges: string;
  requiresApproval: boolean;
  approvalReason: string;
  prevention: string;
  verification: string;
  rootCause: string;
}

/** Used when the model does not state a usable confidence. */
export const FALLBACK_CONFIDENCE = 0.5;

const solutionSchema = z.object({
  root_cause: lenient.text(),
  solution_summary: lenient.text(),
  confidence_score: lenient.score(FALLBACK_CONFIDENCE),
  step_by_step: lenient.textList(),
  executable_commands: lenient.textList(),
  file_changes: z
    .array(
      z.object({
        file_path: lenient.text("unknown"),
        description: lenient.text(),
        before: lenient.text(),
        after: lenient.text()
      })
    )
    .catch([]),
  requires_approval: lenient.flag(),
  approval_reason: lenient.nullableText(),
  prevention: lenient.text(),
  verification: lenient.text()
});

function formatSolution(solution: Omit<Solution, "proposedSolution" | "codeChanges">, summary: string): string {
  const lines = [solution.rootCause, "", summary, ""];
  if (solution.steps.length > 0) {
    lines.push("Steps:", ...solution.steps.map((step, index) => `  ${index + 1}. ${step}`), "");
  }
  if (solution.commands.length > 0) {
    lines.push("Commands to run:", ...solution.commands.map((command) => `  $ ${command}`), "");
  }
  if (solution.fileChanges.length > 0) {
    lines.push(
      "File changes:",
      ...solution.fileChanges.map((change) => `  - ${change.filePath}: ${change.description}`),
      ""
    );
  }
  if (solution.prevention) {
    lines.push(`Prevention: ${solution.prevention}`);
  }
  if (solution.verification) {
    lines.push(`Verification: ${solution.verification}`);
  }
  return lines.join("\n");
}

/** Before/after blocks for every change that carries both snippets. */
export function formatCodeChanges(changes: readonly FileChange[]): string {
  return changes
    .filter((change) => change.before && change.after)
    .flatMap((change) => [`File: ${change.filePath}`, `Before:\n${change.before}`, `After:\n${change.after}`, "---"])
    .join("\n");
}

function readLabeledSolution(response: string): Solution {
  const fields = parseLabeledFields(response, [
    "DIAGNOSIS_SUMMARY",
    "SOLUTION_CONFIDENCE",
    "PROPOSED_SOLUTION",
    "STEP_BY_STEP",
    "CODE_CHANGES",
    "COMMANDS_TO_RUN",
    "REQUIRES_APPROVAL",
    "APPROVAL_REASON",
    "PREVENTION",
    "VERIFICATION"
  ]);
  const confidence = Number.parseFloat(fields.solution_confidence ?? "");
  const steps = [...(fields.step_by_step ?? "").matchAll(/\d+\.\s*(.+)/g)].map((match) => (match[1] ?? "").trim());
  const commands = (fields.commands_to_run ?? "")
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("```"));

  return {
    proposedSolution: fields.proposed_solution || response,
    confidence: Number.isFinite(confidence) ? Math.min(1, Math.max(0, confidence)) : FALLBACK_CONFIDENCE,
    steps,
    commands,
    fileChanges: [],
    codeChanges: fields.code_changes ?? "",
    requiresApproval: fields.requires_approval?.toLowerCase() === "yes",
    approvalReason: fields.approval_reason ?? "",
    prevention: fields.prevention ?? "",
    verification: fields.verification ?? "",
    rootCause: fields.diagnosis_summary ?? ""
  };
}

export function readSolution(response: string): Solution {
  const json = parseJsonResponse(response);
  if (Object.keys(json).length === 0) {
    return readLabeledSolution(response);
  }

  const parsed = solutionSchema.parse(json);
  const solution = {
    confidence: parsed.confidence_score,
    steps: parsed.step_by_step,
    commands: parsed.executable_commands,
    fileChanges: parsed.file_changes.map((change) => ({
      filePath: change.file_path,
      description: change.description,
      before: change.before,
      after: change.after
    })),
    requiresApproval: parsed.requires_approval,
    approvalReason: parsed.approval_reason ?? "",
    prevention: parsed.prevention,
    verification: parsed.verification,
    rootCause: parsed.root_cause
  };
  return {
    ...solution,
    proposedSolution: formatSolution(solution, parsed.solution_summary),
    codeChanges: formatCodeChanges(solution.fileChanges)
  };
}

export function createSolveNode({ model, log }: IncidentCollaborators): IncidentNode {
  return async (state, { signal }) => {
    const response = await model.generate({
      prompt: solvePrompt({
        errorSummary: state.errorSummary,
        errorType: state.errorType,
        researchFindings: state.researchFindings.join("\n"),
        codeAnalysis: state.codeContext || "No code analysis available"
      }),
      systemPrompt: SOLVE_SYSTEM,
      signal
    });
    const solution = readSolution(response);
    log?.(
      `solution confidence ${Math.round(solution.confidence * 100)}%${solution.requiresApproval ? ", approval required" : ""}`
    );

    return {
      proposedSolution: solution.proposedSolution,
      solutionConfidence: solution.confidence,
      solutionSteps: solution.steps,
      codeChanges: solution.codeChanges,
      proposedCommands: solution.commands,
      changedFiles: solution.fileChanges.map((change) => change.filePath),
      needsHumanApproval: solution.requiresApproval,
      pendingAction: solution.approvalReason,
      messages: [...state.messages, `[Solve] ${response}`],
      status: solution.requiresApproval ? "awaiting_approval" : "complete"
    };
  };
}
