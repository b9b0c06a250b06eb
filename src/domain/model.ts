export const languages = ["fr", "ar"] as const;
export type Language = (typeof languages)[number];

export const documentTypes = ["convocation", "acceptation"] as const;
export type DocumentType = (typeof documentTypes)[number];

export type StatusLabel = "en attente" | "interview programmé" | "acceptée" | "rejetée";
export type VerificationStatus = "valide" | "revoquee";

export interface CandidateProfile {
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  address: string;
  country?: string;
  region?: string;
  gender?: string;
  birthPlace?: string;
  birthDate?: string;
  nationality?: string;
  maritalStatus?: string;
  educationLevel?: string;
  specialization?: string;
  languages?: Record<string, string>;
}

export type ApplicationTarget =
  | { kind: "job"; jobId: number; jobTitle: string }
  | { kind: "spontaneous"; jobTitle: string; selectedJobTitle?: string };

export interface Phase1Pending {
  status: "pending";
}

export interface Phase1Selected {
  status: "selected_for_interview";
  decidedAt: string;
  interviewDate: string;
}

export interface Phase1Rejected {
  status: "rejected";
  decidedAt: string;
  rejectionReason?: string;
}

export interface Phase2Pending {
  status: "pending";
}

export interface Phase2Accepted {
  status: "accepted";
  decidedAt: string;
  workStartDate?: string;
}

export interface Phase2Rejected {
  status: "rejected";
  decidedAt: string;
  rejectionReason?: string;
}

// phase2 only exists once phase 1 selected the candidate for an interview.
export type WorkflowState =
  | { phase: "phase1"; phase1: Phase1Pending }
  | { phase: "phase1"; phase1: Phase1Selected; phase2: Phase2Pending }
  | { phase: "completed"; phase1: Phase1Rejected }
  | { phase: "completed"; phase1: Phase1Selected; phase2: Phase2Accepted | Phase2Rejected };

export type LanguageArtifacts = Partial<Record<Language, string>>;

export interface ApplicationDocuments {
  interviewInvitation: LanguageArtifacts;
  acceptanceLetter: LanguageArtifacts;
}

export interface Application {
  id: number;
  target: ApplicationTarget;
  candidate: CandidateProfile;
  staffNotes?: string;
  workflow: WorkflowState;
  interviewNotes?: string;
  notifications: {
    phase1Sent: boolean;
    phase2Sent: boolean;
  };
  documents: ApplicationDocuments;
  status: StatusLabel;
  submittedAt: string;
  updatedAt: string;
  version: number;
}

export interface VerificationRecord {
  verificationCode: string;
  applicationId: number;
  documentType: DocumentType;
  candidateName: string;
  jobTitle: string;
  issueDate: string;
  pdfPath: string;
  languages: Language[];
  artifacts: LanguageArtifacts;
  status: VerificationStatus;
  createdAt: string;
}

export const candidateFullName = (application: Pick<Application, "candidate">): string =>
  `${application.candidate.firstName} ${application.candidate.lastName}`;

export const effectiveJobTitle = (application: Pick<Application, "target">): string =>
  application.target.kind === "spontaneous"
    ? application.target.selectedJobTitle ?? application.target.jobTitle
    : application.target.jobTitle;

export const documentSlot = (documentType: DocumentType): keyof ApplicationDocuments =>
  documentType === "convocation" ? "interviewInvitation" : "acceptanceLetter";
