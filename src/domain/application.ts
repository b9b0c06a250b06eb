import { Application, ApplicationTarget, CandidateProfile } from "./model";
import { deriveStatusLabel, initialWorkflowState } from "./workflow";

export interface CreateApplicationInput {
  target: ApplicationTarget;
  candidate: CandidateProfile;
  staffNotes?: string;
}

export const buildNewApplication = (id: number, input: CreateApplicationInput, now: string): Application => {
  const workflow = initialWorkflowState();

  return {
    id,
    target: input.target,
    candidate: input.candidate,
    staffNotes: input.staffNotes,
    workflow,
    notifications: { phase1Sent: false, phase2Sent: false },
    documents: { interviewInvitation: {}, acceptanceLetter: {} },
    status: deriveStatusLabel(workflow),
    submittedAt: now,
    updatedAt: now,
    version: 1
  };
};
