import { CandidateProfile, DocumentType, Language } from "../domain/model";
import { formatFileTimestamp } from "./dates";

const folders: Record<DocumentType, string> = {
  convocation: "convocations",
  acceptation: "acceptances"
};

const prefixes: Record<DocumentType, string> = {
  convocation: "Convocation_Entretien",
  acceptation: "Lettre_Acceptation"
};

export const cleanNameForFile = (value: string): string =>
  value
    .replace(/[^\p{L}\p{N}_\s-]/gu, "")
    .trim()
    .replace(/[-\s]+/g, "_");

export interface StorageKeyInput {
  documentType: DocumentType;
  candidate: Pick<CandidateProfile, "firstName" | "lastName">;
  applicationId: number;
  issuedAt: Date;
  timeZone: string;
  language: Language;
  verificationCode: string;
}

// The verification code keeps keys of two issuances in the same second apart.
export const buildDocumentStorageKey = (input: StorageKeyInput): string => {
  const name = cleanNameForFile(`${input.candidate.firstName} ${input.candidate.lastName}`) || "candidat";
  const suffix = input.language === "fr" ? "" : `_${input.language}`;
  const stamp = formatFileTimestamp(input.issuedAt, input.timeZone);

  return `${folders[input.documentType]}/${prefixes[input.documentType]}_${name}_${input.applicationId}_${stamp}_${input.verificationCode}${suffix}.pdf`;
};

export const fileNameOf = (storageKey: string): string => storageKey.slice(storageKey.lastIndexOf("/") + 1);
