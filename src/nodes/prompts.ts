export const DIAGNOSE_SYSTEM = `You are a site reliability engineer who diagnoses production failures from error logs and stack traces.
You know databases, container platforms, cloud services, web frameworks, message queues, networking and authentication systems.
Be concrete and name the components involved.`;

export function diagnosePrompt(errorLog: string): string {
  return `Diagnose the following error log.

ERROR LOG:
\`\`\`
${errorLog}
\`\`\`

Answer with a single JSON object and nothing else:
{
  "error_type": "database | network | authentication | configuration | code_bug | dependency | resource_exhaustion | permission | timeout | unknown",
  "error_summary": "one paragraph in plain English",
  "affected_components": ["component", "..."],
  "search_keywords": ["2-3 specific queries for documentation or Q&A sites"],
  "files_to_check": ["file names or patterns such as docker-compose.yml"],
  "severity": "low | medium | high | critical"
}`;
}

export const RESEARCH_SYSTEM = `You are a technical researcher. You read search results and extract the fixes that actually solve the problem.
Prefer official documentation over forum posts and note caveats that come with a fix.`;

export function researchPrompt(input: { errorSummary: string; errorType: string; searchResults: string }): string {
  return `Extract what helps fix this error from the search results.

ERROR SUMMARY:
${input.errorSummary}

ERROR TYPE: ${input.errorType}

SEARCH RESULTS:
${input.searchResults}

Answer with a single JSON object and nothing else:
{
  "relevant_solutions": [
    { "solution_summary": "what to do", "source_url": "where it came from", "confidence": "low | medium | high" }
  ],
  "common_patterns": ["fixes that recur across sources"],
  "warnings": ["pitfalls to avoid"],
  "needs_more_research": false,
  "refined_query": "a narrower query when more research is needed, otherwise null"
}`;
}

export const AUDIT_SYSTEM = `You are a senior code reviewer doing root cause analysis.
Look for wrong configuration values, logic bugs, missing error handling, leaked resources and incompatible components.`;

export function auditPrompt(input: {
  errorSummary: string;
  errorType: string;
  researchFindings: string;
  codeContext: string;
}): string {
  return `Examine these files in the context of the error under investigation.

ERROR SUMMARY:
${input.errorSummary}

ERROR TYPE: ${input.errorType}

RESEARCH FINDINGS:
${input.researchFindings}

CODE FILES:
${input.codeContext}

Report:
LIKELY_CAUSE: the most likely cause given the code and the error
PROBLEMATIC_SECTIONS: the specific lines or sections involved
MISSING_ELEMENTS: error handling, configuration or logic that is missing`;
}

export const SOLVE_SYSTEM = `You are a senior DevOps engineer who proposes safe, specific fixes.
Warn before anything destructive and say whether the fix needs downtime or a rollback plan.`;

export function solvePrompt(input: {
  errorSummary: string;
  errorType: string;
  researchFindings: string;
  codeAnalysis: string;
}): string {
  return `Propose a fix based on the whole investigation.

ERROR SUMMARY:
${input.errorSummary}

ERROR TYPE: ${input.errorType}

RESEARCH FINDINGS:
${input.researchFindings}

CODE ANALYSIS:
${input.codeAnalysis}

Answer with a single JSON object and nothing else:
{
  "root_cause": "one paragraph",
  "solution_summary": "what needs to be done",
  "confidence_score": 0.0,
  "step_by_step": ["first step", "second step"],
  "executable_commands": ["shell commands to run"],
  "file_changes": [
    { "file_path": "path", "description": "what changes", "before": "old snippet", "after": "new snippet" }
  ],
  "requires_approval": false,
  "approval_reason": "what needs sign-off and why, or null",
  "prevention": "how to avoid a repeat",
  "verification": "how to confirm the fix"
}`;
}

export const EXPLAIN_SYSTEM = `You explain incident fixes to on-call engineers in clear prose without repeating raw logs.`;

export function explainPrompt(input: { errorSummary: string; proposedSolution: string; confidence: number }): string {
  return `Explain the following fix to an engineer who was paged for this incident.
Cover what went wrong, why the fix addresses it and what to watch afterwards.

ERROR SUMMARY:
${input.errorSummary}

PROPOSED FIX (confidence ${Math.round(input.confidence * 100)}%):
${input.proposedSolution}`;
}
