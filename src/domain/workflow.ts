import { InvalidTransitionError, MissingRequiredFieldError } from "./errors";
import { Phase1Selected, Phase2Accepted, Phase2Pending, Phase2Rejected, StatusLabel, WorkflowState } from "./model";

export const phase1Decisions = ["selected_for_interview", "rejected"] as const;
export type Phase1Decision = (typeof phase1Decisions)[number];

export const phase2Decisions = ["accepted", "rejected"] as const;
export type Phase2Decision = (typeof phase2Decisions)[number];

export type WorkflowPhase = 1 | 2;

export interface Phase1DecisionInput {
  decision: Phase1Decision;
  interviewDate?: string;
  rejectionReason?: string;
}

export interface Phase2DecisionInput {
  decision: Phase2Decision;
  workStartDate?: string;
  rejectionReason?: string;
}

export type WorkflowTransition =
  | { phase: 1; decision: Phase1Decision }
  | { phase: 2; decision: Phase2Decision };

const blankToUndefined = (value?: string): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const initialWorkflowState = (): WorkflowState => ({
  phase: "phase1",
  phase1: { status: "pending" }
});

export const parsePhase1Decision = (value: string): Phase1Decision => {
  const match = phase1Decisions.find((decision) => decision === value);
  if (!match) {
    throw new InvalidTransitionError(
      `Unknown phase 1 decision "${value}". Expected one of: ${phase1Decisions.join(", ")}.`
    );
  }

  return match;
};

export const parsePhase2Decision = (value: string): Phase2Decision => {
  const match = phase2Decisions.find((decision) => decision === value);
  if (!match) {
    throw new InvalidTransitionError(
      `Unknown phase 2 decision "${value}". Expected one of: ${phase2Decisions.join(", ")}.`
    );
  }

  return match;
};

export const parseWorkflowPhase = (value: number): WorkflowPhase => {
  if (value !== 1 && value !== 2) {
    throw new InvalidTransitionError(`Unknown workflow phase ${value}. Expected 1 or 2.`);
  }

  return value;
};

export const applyPhase1Decision = (state: WorkflowState, input: Phase1DecisionInput, now: string): WorkflowState => {
  if (state.phase1.status !== "pending") {
    throw new InvalidTransitionError(`Phase 1 was already decided (${state.phase1.status}).`);
  }

  if (input.decision === "selected_for_interview") {
    const interviewDate = blankToUndefined(input.interviewDate);
    if (!interviewDate) {
      throw new MissingRequiredFieldError("interviewDate");
    }

    return {
      phase: "phase1",
      phase1: { status: "selected_for_interview", decidedAt: now, interviewDate },
      phase2: { status: "pending" }
    };
  }

  return {
    phase: "completed",
    phase1: { status: "rejected", decidedAt: now, rejectionReason: blankToUndefined(input.rejectionReason) }
  };
};

export const applyPhase2Decision = (state: WorkflowState, input: Phase2DecisionInput, now: string): WorkflowState => {
  if (!("phase2" in state)) {
    throw new InvalidTransitionError(
      `Phase 2 requires a candidate selected for interview (phase 1 is ${state.phase1.status}).`
    );
  }

  if (state.phase2.status !== "pending") {
    throw new InvalidTransitionError(`Phase 2 was already decided (${state.phase2.status}).`);
  }

  if (input.decision === "accepted") {
    return {
      phase: "completed",
      phase1: state.phase1,
      phase2: { status: "accepted", decidedAt: now, workStartDate: blankToUndefined(input.workStartDate) }
    };
  }

  return {
    phase: "completed",
    phase1: state.phase1,
    phase2: { status: "rejected", decidedAt: now, rejectionReason: blankToUndefined(input.rejectionReason) }
  };
};

export const selectedPhase1 = (state: WorkflowState): Phase1Selected | undefined =>
  state.phase1.status === "selected_for_interview" ? state.phase1 : undefined;

export const phase2Of = (state: WorkflowState): Phase2Pending | Phase2Accepted | Phase2Rejected | undefined =>
  "phase2" in state ? state.phase2 : undefined;

export const deriveStatusLabel = (state: WorkflowState): StatusLabel => {
  if (state.phase1.status === "pending") {
    return "en attente";
  }

  if (state.phase1.status === "rejected") {
    return "rejetée";
  }

  const phase2 = phase2Of(state);
  if (phase2?.status === "accepted") {
    return "acceptée";
  }

  if (phase2?.status === "rejected") {
    return "rejetée";
  }

  return "interview programmé";
};

// Phase-2 rejection reuses the single reason field and wins over the phase-1 one.
export const currentRejectionReason = (state: WorkflowState): string | undefined => {
  const phase2 = phase2Of(state);
  if (phase2?.status === "rejected") {
    return phase2.rejectionReason;
  }

  return state.phase1.status === "rejected" ? state.phase1.rejectionReason : undefined;
};
