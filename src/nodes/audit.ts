import { errorMessage } from "@incident-responder/graph-engine";

import { formatFileContent } from "../tools/file-reader.js";
import { AUDIT_SYSTEM, auditPrompt } from "./prompts.js";
import type { IncidentCollaborators, IncidentNode } from "./collaborators.js";

export const FILES_PER_PATTERN = 2;
export const NO_CODE_FOUND = "No relevant code files found or accessible.";

export function createAuditNode({ model, files, log }: IncidentCollaborators): IncidentNode {
  return async (state, { signal }) => {
    const sections: string[] = [];
    const problems: string[] = [];

    for (const pattern of state.filesToCheck) {
      let matches: string[];
      try {
        matches = await files.findFiles([pattern, `*${pattern}*`]);
      } catch (error) {
        problems.push(`Could not search for ${pattern}: ${errorMessage(error)}`);
        continue;
      }
      for (const match of matches.slice(0, FILES_PER_PATTERN)) {
        try {
          sections.push(formatFileContent(await files.readFile(match)));
          log?.(`read ${match}`);
        } catch (error) {
          problems.push(`Could not read ${match}: ${errorMessage(error)}`);
        }
      }
    }

    for (const problem of problems) {
      log?.(problem);
    }
    const codeContext = [sections.length > 0 ? sections.join("\n\n") : NO_CODE_FOUND, ...problems].join("\n\n");

    const response = await model.generate({
      prompt: auditPrompt({
        errorSummary: state.errorSummary,
        errorType: state.errorType,
        researchFindings: state.researchFindings.join("\n"),
        codeContext
      }),
      systemPrompt: AUDIT_SYSTEM,
      signal
    });

    return {
      codeContext: `${codeContext}\n\n[Analysis]\n${response}`,
      messages: [...state.messages, `[Audit] ${response}`],
      status: "solving"
    };
  };
}
