import { describe, expect, it } from "vitest";
import { buildNewApplication } from "../src/domain/application";
import { formatPhoneForWhatsapp, NotificationComposer } from "../src/notifications/notificationComposer";
import { candidate } from "./support";

const application = buildNewApplication(
  9,
  { target: { kind: "job", jobId: 7, jobTitle: "Comptable" }, candidate },
  "2025-10-01T00:00:00.000Z"
);

const composer = new NotificationComposer({ organizationName: "Test Employer", whatsappCountryCode: "269" });

describe("formatPhoneForWhatsapp", () => {
  it("normalizes local and international numbers", () => {
    expect(formatPhoneForWhatsapp("033 12-34 (56)", "269")).toBe("26933123456");
    expect(formatPhoneForWhatsapp("+269 321 00 00", "269")).toBe("2693210000");
    expect(formatPhoneForWhatsapp("321 00 00", "269")).toBe("2693210000");
    expect(formatPhoneForWhatsapp("2693210000", "269")).toBe("2693210000");
  });
});

describe("NotificationComposer", () => {
  it("drafts the interview invitation with links", () => {
    const draft = composer.compose(application, {
      phase: 1,
      decision: "selected_for_interview",
      interviewDate: "2025-11-01T10:00",
      hasDocument: true
    });

    expect(draft.emailSubject).toBe("Félicitations Amina Said - Entretien pour Comptable");
    expect(draft.emailBody).toContain("un entretien qui aura lieu le 01/11/2025 à 10:00.");
    expect(draft.emailBody).toContain("votre CONVOCATION OFFICIELLE.");
    expect(draft.emailLink).toBe(
      "mailto:amina.said@example.com?subject=F%C3%A9licitations%20Amina%20Said%20-%20Entretien%20pour%20Comptable" +
        `&body=${encodeURIComponent(draft.emailBody)}`
    );
    expect(draft.whatsappLink).toBe(`https://wa.me/26933123456?text=${encodeURIComponent(draft.whatsappMessage)}`);
  });

  it("falls back to a neutral sentence without a rejection reason", () => {
    const draft = composer.compose(application, { phase: 1, decision: "rejected", hasDocument: false });

    expect(draft.emailSubject).toBe("Candidature pour Comptable");
    expect(draft.emailBody).toContain("Cette décision ne remet pas en question vos qualités professionnelles.");
  });

  it("drafts phase 2 outcomes", () => {
    const accepted = composer.compose(application, { phase: 2, decision: "accepted", hasDocument: true });
    const rejected = composer.compose(application, {
      phase: 2,
      decision: "rejected",
      rejectionReason: "Experience",
      hasDocument: false
    });

    expect(accepted.emailSubject).toBe("Bienvenue dans l'équipe Test Employer - Comptable");
    expect(accepted.whatsappMessage.split("\n\n")[0]).toBe("Bonjour Amina Said,");
    expect(rejected.emailSubject).toBe("Suite à votre entretien - Comptable");
    expect(rejected.emailBody).toContain("Retour : Experience");
  });
});
