import { splitDisplayDate } from "../documents/dates";
import { Application, candidateFullName, effectiveJobTitle } from "../domain/model";
import { Phase1Decision, Phase2Decision } from "../domain/workflow";

export type NotificationRequest =
  | { phase: 1; decision: Phase1Decision; interviewDate?: string; rejectionReason?: string; hasDocument: boolean }
  | { phase: 2; decision: Phase2Decision; rejectionReason?: string; hasDocument: boolean };

export interface NotificationDraft {
  emailSubject: string;
  emailBody: string;
  whatsappMessage: string;
  emailLink: string;
  whatsappLink: string;
}

export interface NotificationComposerOptions {
  organizationName: string;
  whatsappCountryCode: string;
}

interface Messages {
  emailSubject: string;
  emailBody: string;
  whatsappMessage: string;
}

interface TemplateContext {
  name: string;
  jobTitle: string;
  org: string;
}

export const formatPhoneForWhatsapp = (phone: string, countryCode: string): string => {
  const cleaned = phone.replace(/[\s\-()]/g, "");

  if (cleaned.startsWith("+")) {
    return cleaned.slice(1);
  }

  if (cleaned.startsWith("0")) {
    return `${countryCode}${cleaned.slice(1)}`;
  }

  return cleaned.startsWith(countryCode) ? cleaned : `${countryCode}${cleaned}`;
};

export const buildEmailLink = (to: string, subject: string, body: string): string =>
  `mailto:${to}?subject=${encodeURIComponent(subject)}&body=${encodeURIComponent(body)}`;

export const buildWhatsappLink = (phone: string, message: string): string =>
  `https://wa.me/${phone}?text=${encodeURIComponent(message)}`;

const displayInterviewDate = (raw: string | undefined): string => {
  if (!raw) {
    return "une date à confirmer";
  }

  const { day, time } = splitDisplayDate(raw);
  return time ? `${day} à ${time}` : day;
};

const signature = (org: string): string => `Cordialement,\nL'équipe de recrutement\n${org}`;

const phase1Selected = (ctx: TemplateContext, interviewDate: string, hasDocument: boolean): Messages => {
  const emailNote = hasDocument
    ? "\nIMPORTANT : Vous trouverez en pièce jointe votre CONVOCATION OFFICIELLE.\n" +
      "Ce document est OBLIGATOIRE pour accéder à nos locaux. Veuillez le présenter à l'accueil le jour de l'entretien.\n"
    : "";
  const whatsappNote = hasDocument
    ? "\n\nIMPORTANT : Vous recevrez également par email votre CONVOCATION OFFICIELLE (PDF).\n" +
      "Ce document est OBLIGATOIRE pour accéder à nos locaux le jour de l'entretien."
    : "";

  return {
    emailSubject: `Félicitations ${ctx.name} - Entretien pour ${ctx.jobTitle}`,
    emailBody: [
      `Bonjour ${ctx.name},`,
      `Nous avons le plaisir de vous informer que votre candidature pour le poste de ${ctx.jobTitle} a retenu notre attention.`,
      `Nous souhaitons vous rencontrer pour un entretien qui aura lieu le ${interviewDate}.${emailNote}`,
      "Merci de confirmer votre présence en répondant à ce message.",
      signature(ctx.org)
    ].join("\n\n"),
    whatsappMessage: [
      `Bonjour ${ctx.name},`,
      `Félicitations ! Votre candidature pour le poste de ${ctx.jobTitle} a été retenue.`,
      `Nous souhaitons vous rencontrer pour un entretien le ${interviewDate}.${whatsappNote}`,
      "Merci de confirmer votre présence.",
      `Cordialement,\nL'équipe ${ctx.org}`
    ].join("\n\n")
  };
};

const phase1Rejected = (ctx: TemplateContext, reason?: string): Messages => ({
  emailSubject: `Candidature pour ${ctx.jobTitle}`,
  emailBody: [
    `Bonjour ${ctx.name},`,
    `Nous vous remercions pour l'intérêt que vous portez à notre entreprise et pour votre candidature au poste de ${ctx.jobTitle}.`,
    "Après avoir étudié attentivement votre profil, nous sommes au regret de vous informer que nous ne pouvons pas donner suite à votre candidature pour ce poste.",
    reason ? `Raison : ${reason}` : "Cette décision ne remet pas en question vos qualités professionnelles.",
    "Nous conservons votre candidature et n'hésiterons pas à vous recontacter si une opportunité correspondant à votre profil se présente.",
    signature(ctx.org)
  ].join("\n\n"),
  whatsappMessage: [
    `Bonjour ${ctx.name},`,
    `Nous vous remercions pour votre candidature au poste de ${ctx.jobTitle}.`,
    "Après étude de votre profil, nous ne pouvons malheureusement pas donner suite à votre candidature pour ce poste.",
    `Cordialement,\nL'équipe ${ctx.org}`
  ].join("\n\n")
});

const phase2Accepted = (ctx: TemplateContext): Messages => ({
  emailSubject: `Bienvenue dans l'équipe ${ctx.org} - ${ctx.jobTitle}`,
  emailBody: [
    `Bonjour ${ctx.name},`,
    `Suite à votre entretien, nous avons le plaisir de vous proposer le poste de ${ctx.jobTitle} au sein de notre entreprise.`,
    "Nous prendrons contact avec vous très prochainement pour discuter des détails de votre intégration (date de début, contrat, etc.).",
    signature(ctx.org)
  ].join("\n\n"),
  whatsappMessage: [
    `Bonjour ${ctx.name},`,
    `Excellente nouvelle ! Nous sommes ravis de vous proposer le poste de ${ctx.jobTitle} au sein de ${ctx.org}.`,
    "Nous prendrons contact avec vous très prochainement pour finaliser les détails.",
    `Cordialement,\nL'équipe ${ctx.org}`
  ].join("\n\n")
});

const phase2Rejected = (ctx: TemplateContext, reason?: string): Messages => ({
  emailSubject: `Suite à votre entretien - ${ctx.jobTitle}`,
  emailBody: [
    `Bonjour ${ctx.name},`,
    `Nous vous remercions d'avoir pris le temps de participer à l'entretien pour le poste de ${ctx.jobTitle}.`,
    "Après mûre réflexion, nous avons décidé de poursuivre avec un autre candidat dont le profil correspond davantage aux besoins du poste.",
    reason ? `Retour : ${reason}` : "Nous avons apprécié notre échange et tenons à souligner vos qualités professionnelles.",
    signature(ctx.org)
  ].join("\n\n"),
  whatsappMessage: [
    `Bonjour ${ctx.name},`,
    `Merci d'avoir participé à l'entretien pour le poste de ${ctx.jobTitle}.`,
    "Après réflexion, nous avons décidé de poursuivre avec un autre candidat.",
    `Cordialement,\nL'équipe ${ctx.org}`
  ].join("\n\n")
});

/** Drafts the French email and WhatsApp messages staff send after a decision. Nothing is sent. */
export class NotificationComposer {
  constructor(private readonly options: NotificationComposerOptions) {}

  compose(application: Application, request: NotificationRequest): NotificationDraft {
    const ctx: TemplateContext = {
      name: candidateFullName(application),
      jobTitle: effectiveJobTitle(application),
      org: this.options.organizationName
    };

    let messages: Messages;
    if (request.phase === 1) {
      messages =
        request.decision === "selected_for_interview"
          ? phase1Selected(ctx, displayInterviewDate(request.interviewDate), request.hasDocument)
          : phase1Rejected(ctx, request.rejectionReason);
    } else {
      messages =
        request.decision === "accepted" ? phase2Accepted(ctx) : phase2Rejected(ctx, request.rejectionReason);
    }

    const phone = formatPhoneForWhatsapp(application.candidate.phone, this.options.whatsappCountryCode);

    return {
      ...messages,
      emailLink: buildEmailLink(application.candidate.email, messages.emailSubject, messages.emailBody),
      whatsappLink: buildWhatsappLink(phone, messages.whatsappMessage)
    };
  }
}
