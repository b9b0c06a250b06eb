import { describe, expect, it } from "vitest";
import { DocumentIssuer } from "../src/documents/documentIssuer";
import { PdfKitDocumentRenderer } from "../src/documents/pdfRenderer";
import { InMemoryDocumentStorage } from "../src/documents/storage";
import { buildNewApplication } from "../src/domain/application";
import { DocumentGenerationError, InvalidTransitionError } from "../src/domain/errors";
import { Application, VerificationRecord } from "../src/domain/model";
import { applyPhase1Decision, applyPhase2Decision } from "../src/domain/workflow";
import { InMemoryVerificationLedger } from "../src/repositories/inMemoryVerificationLedger";
import { VerificationCodeFactory } from "../src/verification/codeGenerator";
import { extractVerificationCode, VerificationService } from "../src/verification/verificationService";
import { BASE_URL, candidate, FIXED_NOW, organization, RecordingRenderer, TIME_ZONE } from "./support";

const pending: Application = buildNewApplication(
  5,
  { target: { kind: "job", jobId: 7, jobTitle: "Comptable" }, candidate },
  "2025-10-01T00:00:00.000Z"
);

const selected: Application = {
  ...pending,
  workflow: applyPhase1Decision(
    pending.workflow,
    { decision: "selected_for_interview", interviewDate: "2025-11-01T10:00" },
    "2025-10-20T08:00:00.000Z"
  )
};

const accepted: Application = {
  ...selected,
  workflow: applyPhase2Decision(selected.workflow, { decision: "accepted" }, "2025-11-02T08:00:00.000Z")
};

class BrokenLedger extends InMemoryVerificationLedger {
  async record(_entry: VerificationRecord): Promise<void> {
    throw new Error("ledger offline");
  }
}

// Says every code is free, so the collision only shows at insert time.
class RacingLedger extends InMemoryVerificationLedger {
  async exists(_verificationCode: string): Promise<boolean> {
    return false;
  }
}

/** Reads the info Subject, written either inline or as an indirect string object. */
const pdfSubject = (pdf: Buffer | undefined): string | undefined => {
  const text = pdf?.toString("latin1") ?? "";
  const inline = /\/Subject \(([^)]*)\)/.exec(text);
  if (inline) {
    return inline[1];
  }

  const reference = /\/Subject (\d+) 0 R/.exec(text);
  if (!reference) {
    return undefined;
  }

  return new RegExp(`(?:^|\\n)${reference[1]} 0 obj\\s*\\(([^)]*)\\)`).exec(text)?.[1];
};

const setup = (ledger = new InMemoryVerificationLedger()) => {
  const renderer = new RecordingRenderer();
  const storage = new InMemoryDocumentStorage();
  const issuer = new DocumentIssuer(new VerificationCodeFactory(ledger), ledger, renderer, storage, {
    baseUrl: BASE_URL,
    timeZone: TIME_ZONE,
    organization,
    languages: ["fr", "ar"],
    clock: () => FIXED_NOW
  });

  return { ledger, renderer, storage, issuer };
};

describe("DocumentIssuer", () => {
  it("issues both languages under one shared verification code", async () => {
    const { ledger, renderer, storage, issuer } = setup();

    const result = await issuer.issueInterviewInvitation(selected);
    const code = result.record?.verificationCode ?? "";

    const artifacts = {
      fr: `convocations/Convocation_Entretien_Amina_Said_5_20251020_113000_${code}.pdf`,
      ar: `convocations/Convocation_Entretien_Amina_Said_5_20251020_113000_${code}_ar.pdf`
    };

    expect(code).toMatch(/^[0-9A-F]{16}$/);
    expect(result.artifacts).toEqual(artifacts);
    expect(result.failures).toEqual([]);
    expect(result.record).toEqual({
      verificationCode: code,
      applicationId: 5,
      documentType: "convocation",
      candidateName: "Amina Said",
      jobTitle: "Comptable",
      issueDate: "20/10/2025",
      pdfPath: artifacts.fr,
      languages: ["fr", "ar"],
      artifacts,
      status: "valide",
      createdAt: "2025-10-20T08:30:00.000Z"
    });
    expect(renderer.layouts.map((layout) => layout.verificationCode)).toEqual([code, code]);
    expect(storage.keys()).toHaveLength(2);
    await expect(ledger.findByCode(code)).resolves.toEqual(result.record);
  });

  it("refuses an invitation before the candidate is selected, without side effects", async () => {
    const { ledger, renderer, storage, issuer } = setup();

    await expect(issuer.issueInterviewInvitation(pending)).rejects.toThrow(InvalidTransitionError);
    expect(renderer.layouts).toHaveLength(0);
    expect(storage.keys()).toEqual([]);
    await expect(ledger.listByApplication(5)).resolves.toEqual([]);
  });

  it("refuses an acceptance letter before phase 2 acceptance", async () => {
    const { issuer } = setup();

    await expect(issuer.issueAcceptanceLetter(selected)).rejects.toThrow(
      "Application 5 must be accepted in phase 2 before an acceptance letter is issued."
    );
  });

  it("keeps the languages that rendered when another one fails", async () => {
    const { renderer, issuer } = setup();
    renderer.failFor.add("ar");

    const result = await issuer.issueAcceptanceLetter(accepted);

    expect(Object.keys(result.artifacts)).toEqual(["fr"]);
    expect(result.record?.languages).toEqual(["fr"]);
    expect(result.record?.documentType).toBe("acceptation");
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]).toBeInstanceOf(DocumentGenerationError);
    expect(result.failures[0].language).toBe("ar");
    expect(result.failures[0].message).toBe(
      "Could not generate the ar acceptation for application 5: no glyphs for ar"
    );
  });

  it("records nothing when no language could be stored", async () => {
    const { ledger, renderer, issuer } = setup();
    renderer.failFor.add("fr");
    renderer.failFor.add("ar");

    const result = await issuer.issueInterviewInvitation(selected);

    expect(result.record).toBeUndefined();
    expect(result.failures.map((failure) => failure.language)).toEqual(["fr", "ar"]);
    await expect(ledger.listByApplication(5)).resolves.toEqual([]);
  });

  it("keeps the files of two issuances in the same second apart", async () => {
    const { ledger, storage, issuer } = setup();

    const first = await issuer.issueInterviewInvitation(selected);
    const second = await issuer.issueInterviewInvitation(selected);
    const records = await ledger.listByApplication(5);

    expect(records).toHaveLength(2);
    expect(storage.keys()).toHaveLength(4);
    expect(second.artifacts.fr).not.toBe(first.artifacts.fr);
    for (const record of records) {
      for (const key of Object.values(record.artifacts)) {
        const content = await storage.get(key ?? "");
        expect(content?.toString()).toBe(`%PDF-test ${BASE_URL}/verify/${record.verificationCode}`);
      }
    }
  });

  it("issues under a fresh code when the ledger reports the first one as taken", async () => {
    const ledger = new RacingLedger();
    await ledger.record({
      verificationCode: "AAAAAAAAAAAAAAAA",
      applicationId: 9,
      documentType: "convocation",
      candidateName: "Other Person",
      jobTitle: "Comptable",
      issueDate: "19/10/2025",
      pdfPath: "convocations/other.pdf",
      languages: ["fr"],
      artifacts: { fr: "convocations/other.pdf" },
      status: "valide",
      createdAt: "2025-10-19T08:30:00.000Z"
    });
    const scripted = ["AAAAAAAAAAAAAAAA", "BBBBBBBBBBBBBBBB"];
    const codes = new VerificationCodeFactory(ledger, () => scripted.shift() ?? "CCCCCCCCCCCCCCCC");
    const renderer = new RecordingRenderer();
    const storage = new InMemoryDocumentStorage();
    const issuer = new DocumentIssuer(codes, ledger, renderer, storage, {
      baseUrl: BASE_URL,
      timeZone: TIME_ZONE,
      organization,
      languages: ["fr", "ar"],
      clock: () => FIXED_NOW
    });

    const result = await issuer.issueInterviewInvitation(selected);

    expect(result.record?.verificationCode).toBe("BBBBBBBBBBBBBBBB");
    expect(renderer.layouts.map((layout) => layout.verificationCode)).toEqual([
      "AAAAAAAAAAAAAAAA",
      "AAAAAAAAAAAAAAAA",
      "BBBBBBBBBBBBBBBB",
      "BBBBBBBBBBBBBBBB"
    ]);
    expect(storage.keys().sort()).toEqual([
      "convocations/Convocation_Entretien_Amina_Said_5_20251020_113000_BBBBBBBBBBBBBBBB.pdf",
      "convocations/Convocation_Entretien_Amina_Said_5_20251020_113000_BBBBBBBBBBBBBBBB_ar.pdf"
    ]);
    await expect(ledger.findByCode("AAAAAAAAAAAAAAAA")).resolves.toMatchObject({ applicationId: 9 });
  });

  it("reports a ledger failure as a document generation failure", async () => {
    const { issuer } = setup(new BrokenLedger());

    const issuing = issuer.issueInterviewInvitation(selected);

    await expect(issuing).rejects.toBeInstanceOf(DocumentGenerationError);
    await expect(issuing).rejects.toThrow(/verification record could not be saved: ledger offline$/);
  });

  it("embeds the same code in the rendered PDF, the ledger and the lookup", async () => {
    const ledger = new InMemoryVerificationLedger();
    const storage = new InMemoryDocumentStorage();
    const issuer = new DocumentIssuer(new VerificationCodeFactory(ledger), ledger, new PdfKitDocumentRenderer(), storage, {
      baseUrl: BASE_URL,
      timeZone: TIME_ZONE,
      organization,
      languages: ["fr"],
      clock: () => FIXED_NOW
    });

    const result = await issuer.issueInterviewInvitation(selected);
    const code = result.record?.verificationCode ?? "";
    const pdf = await storage.get(result.artifacts.fr ?? "");
    const subject = pdfSubject(pdf);
    const lookup = await new VerificationService(ledger).lookup(code);

    expect(pdf?.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(subject).toBe(`${BASE_URL}/verify/${code}`);
    expect(extractVerificationCode(subject ?? "")).toBe(code);
    expect(lookup.found && lookup.record.applicationId).toBe(5);
  });

  it("fails only the Arabic variant when no Arabic font is configured", async () => {
    const ledger = new InMemoryVerificationLedger();
    const issuer = new DocumentIssuer(
      new VerificationCodeFactory(ledger),
      ledger,
      new PdfKitDocumentRenderer(),
      new InMemoryDocumentStorage(),
      { baseUrl: BASE_URL, timeZone: TIME_ZONE, organization, languages: ["fr", "ar"], clock: () => FIXED_NOW }
    );

    const result = await issuer.issueInterviewInvitation(selected);

    expect(result.record?.languages).toEqual(["fr"]);
    expect(result.failures[0].message).toBe(
      "Could not generate the ar convocation for application 5: No font with Arabic glyphs is configured (ARABIC_FONT_PATH)."
    );
  });
});
