import type { IncidentState } from "./state.js";

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

function approvalLine(state: Readonly<IncidentState>): string {
  if (state.approved === true) {
    return "Approved";
  }
  if (state.approved === false) {
    return "Rejected";
  }
  return "Pending";
}

export function renderReport(state: Readonly<IncidentState>): string {
  const lines = [
    "# Incident Investigation Report",
    "",
    "## Error Summary",
    `**Type:** ${state.errorType}`,
    `**Status:** ${state.status}`,
    `**Confidence:** ${percent(state.solutionConfidence)}`,
    `**Iterations:** ${state.iterations}`,
    "",
    "## Original Error",
    "```",
    state.errorLog,
    "```",
    "",
    "## Diagnosis",
    state.errorSummary || "N/A",
    "",
    "## Affected Components",
    state.affectedComponents.length > 0 ? state.affectedComponents.join(", ") : "N/A",
    "",
    "## Proposed Solution",
    state.proposedSolution || "N/A",
    "",
    "## Implementation Steps",
    ...state.solutionSteps.map((step, index) => `${index + 1}. ${step}`)
  ];

  if (state.proposedCommands.length > 0) {
    lines.push("", "## Commands", "```bash", ...state.proposedCommands, "```");
  }
  if (state.codeChanges) {
    lines.push("", "## Code Changes", "```", state.codeChanges, "```");
  }
  if (state.needsHumanApproval) {
    lines.push(
      "",
      "## Requires Human Approval",
      state.pendingAction || "No details provided",
      "",
      `**Decision:** ${approvalLine(state)}`
    );
  }
  return `${lines.join("\n")}\n`;
}

const RULE = "=".repeat(60);
const SUBRULE = "-".repeat(40);

export function renderSummary(state: Readonly<IncidentState>): string {
  const lines = [
    RULE,
    "INVESTIGATION SUMMARY",
    RULE,
    `Error Type: ${state.errorType}`,
    `Summary: ${state.errorSummary || "N/A"}`,
    `Research Iterations: ${state.iterations}`,
    `Solution Confidence: ${percent(state.solutionConfidence)}`,
    `Status: ${state.status}`,
    SUBRULE,
    "PROPOSED SOLUTION",
    SUBRULE,
    state.proposedSolution || "No solution generated"
  ];
  if (state.solutionSteps.length > 0) {
    lines.push(SUBRULE, "STEPS TO IMPLEMENT", SUBRULE, ...state.solutionSteps.map((step, index) => `  ${index + 1}. ${step}`));
  }
  if (state.codeChanges) {
    lines.push(SUBRULE, "CODE CHANGES", SUBRULE, state.codeChanges);
  }
  if (state.needsHumanApproval) {
    lines.push(SUBRULE, `HUMAN APPROVAL: ${approvalLine(state)}`, `Reason: ${state.pendingAction || "No details"}`);
  }
  lines.push(RULE);
  return `${lines.join("\n")}\n`;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `incident_report_YYYYMMDD_HHMMSS.md` in UTC. */
export function reportFileName(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `incident_report_${day}_${time}.md`;
}
