import { OrganizationProfile } from "../config";
import { Application, DocumentType, effectiveJobTitle, Language } from "../domain/model";
import { splitDisplayDate } from "./dates";
import texts from "./texts.json";

interface SharedTexts {
  issued: string;
  title: string;
  attention: string;
  greeting: string;
  addressLabel: string;
  closing: string;
  signature: string;
  hrTeam: string;
  verificationText: string;
  verificationCode: string;
}

interface InvitationTexts extends SharedTexts {
  companySubtitle: string;
  intro1: string;
  intro2: string;
  convocation: string;
  pleasePresent: string;
  dateLabel: string;
  timeLabel: string;
  positionLabel: string;
  toConfirm: string;
  instructions: string;
}

interface AcceptanceTexts extends SharedTexts {
  welcome: string;
  subject: string;
  acceptance1: string;
  acceptance2: string;
  integration: string;
  startDateLabel: string;
  phoneLabel: string;
  emailLabel: string;
}

const catalog: {
  convocation: Record<Language, InvitationTexts>;
  acceptation: Record<Language, AcceptanceTexts>;
} = texts;

export type LayoutBlock =
  | { kind: "paragraph"; text: string; emphasis?: boolean }
  | { kind: "table"; rows: Array<[string, string]> };

export interface DocumentLayout {
  documentType: DocumentType;
  language: Language;
  direction: "ltr" | "rtl";
  align: "justify" | "right";
  issuedLine: string;
  heading: string;
  subheading: string;
  title: string;
  recipient: string[];
  subject?: string;
  salutation: string;
  blocks: LayoutBlock[];
  signature: string[];
  verificationCode: string;
  verificationUrl: string;
  verificationNote: string;
  codeLine: string;
}

export interface LayoutInput {
  documentType: DocumentType;
  application: Application;
  language: Language;
  verificationCode: string;
  baseUrl: string;
  issueDate: string;
  organization: OrganizationProfile;
  interviewDate?: string;
  workStartDate?: string;
}

export const buildVerificationUrl = (baseUrl: string, verificationCode: string): string =>
  `${baseUrl.replace(/\/+$/, "")}/verify/${verificationCode}`;

// Right-to-left documents show the value first and the label second.
const labelled = (rtl: boolean, label: string, value: string): [string, string] =>
  rtl ? [value, label] : [label, value];

const joinLabelled = (rtl: boolean, label: string, value: string): string =>
  rtl ? `${value} : ${label}` : `${label} : ${value}`;

export const buildDocumentLayout = (input: LayoutInput): DocumentLayout => {
  const { application, language, verificationCode, organization } = input;
  const rtl = language === "ar";
  const { candidate } = application;
  const jobTitle = effectiveJobTitle(application);
  const orgName = rtl ? organization.nameAr : organization.name;
  const orgAddress = rtl ? organization.addressAr : organization.address;
  const shared: SharedTexts = catalog[input.documentType][language];

  const recipient = [
    shared.attention,
    `${candidate.firstName} ${candidate.lastName}`,
    candidate.email,
    candidate.phone,
    candidate.address
  ];
  const salutation = rtl ? `${candidate.lastName} ${shared.greeting}،` : `${shared.greeting} ${candidate.lastName},`;

  const common: Omit<DocumentLayout, "issuedLine" | "heading" | "subheading" | "subject" | "blocks"> = {
    documentType: input.documentType,
    language,
    direction: rtl ? "rtl" : "ltr",
    align: rtl ? "right" : "justify",
    title: shared.title,
    recipient,
    salutation,
    signature: [shared.signature, shared.hrTeam],
    verificationCode,
    verificationUrl: buildVerificationUrl(input.baseUrl, verificationCode),
    verificationNote: shared.verificationText,
    codeLine: joinLabelled(rtl, shared.verificationCode, verificationCode)
  };

  if (input.documentType === "convocation") {
    const t = catalog.convocation[language];
    const when = splitDisplayDate(input.interviewDate ?? "");

    return {
      ...common,
      issuedLine: `${t.issued} ${input.issueDate}`,
      heading: orgName,
      subheading: t.companySubtitle,
      blocks: [
        { kind: "paragraph", text: `${t.intro1} ${jobTitle}, ${t.intro2}` },
        { kind: "paragraph", text: `${t.convocation} ${t.pleasePresent}` },
        {
          kind: "table",
          rows: [
            labelled(rtl, t.dateLabel, when.day),
            labelled(rtl, t.timeLabel, when.time ?? t.toConfirm),
            labelled(rtl, t.addressLabel, orgAddress),
            labelled(rtl, t.positionLabel, jobTitle)
          ]
        },
        { kind: "paragraph", text: t.instructions, emphasis: true },
        { kind: "paragraph", text: t.closing }
      ]
    };
  }

  const t = catalog.acceptation[language];
  const blocks: LayoutBlock[] = [
    { kind: "paragraph", text: `${t.acceptance1} ${jobTitle} ${t.acceptance2}` },
    { kind: "paragraph", text: t.integration }
  ];

  if (input.workStartDate) {
    blocks.push({
      kind: "paragraph",
      text: joinLabelled(rtl, t.startDateLabel, splitDisplayDate(input.workStartDate).day),
      emphasis: true
    });
  }

  blocks.push(
    {
      kind: "table",
      rows: [
        labelled(rtl, t.phoneLabel, organization.phone),
        labelled(rtl, t.emailLabel, organization.email),
        labelled(rtl, t.addressLabel, orgAddress)
      ]
    },
    { kind: "paragraph", text: t.closing }
  );

  return {
    ...common,
    issuedLine: `${orgName}, ${t.issued} ${input.issueDate}`,
    heading: orgName,
    subheading: t.welcome,
    subject: `${t.subject} - ${jobTitle}`,
    blocks
  };
};
