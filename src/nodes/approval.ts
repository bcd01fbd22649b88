import { suspend, type NodeReturn } from "@incident-responder/graph-engine";

import type { IncidentState } from "../state.js";
import type { IncidentNode } from "./collaborators.js";

export const APPROVAL_REASON = "awaiting_approval";

/**
 * Holds the run until a person decides on the proposed fix. The decision arrives
 * as `approved` when the run is resumed.
 */
export const approvalNode: IncidentNode = (state): NodeReturn<IncidentState> => {
  if (state.approved === null) {
    return suspend<IncidentState>(
      {
        reason: APPROVAL_REASON,
        description: state.pendingAction || "The proposed solution needs sign-off before it is applied.",
        impact: {
          errorType: state.errorType,
          confidence: state.solutionConfidence,
          commands: [...state.proposedCommands],
          files: [...state.changedFiles]
        }
      },
      {
        status: "awaiting_approval",
        messages: [...state.messages, "[System] Awaiting human approval"]
      }
    );
  }

  if (state.approved) {
    return {
      status: "complete",
      messages: [...state.messages, "[System] Solution approved"]
    };
  }
  return {
    status: "rejected",
    messages: [...state.messages, "[System] Solution rejected"]
  };
};
