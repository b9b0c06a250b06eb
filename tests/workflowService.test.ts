import { describe, expect, it, vi } from "vitest";
import {
  ConcurrentModificationError,
  ForbiddenError,
  InvalidTransitionError,
  MissingRequiredFieldError,
  NotFoundError
} from "../src/domain/errors";
import { Application } from "../src/domain/model";
import { candidate, createHarness, Harness, staff, submitJobApplication } from "./support";

const INTERVIEW = { decision: "selected_for_interview", interviewDate: "2025-11-01T10:00" } as const;

const selectCandidate = async (harness: Harness, applicationId: number) =>
  harness.workflow.decidePhase1(staff(), applicationId, INTERVIEW);

// Fields a flag flip or a regeneration is allowed to touch.
const withoutBookkeeping = ({ version: _v, updatedAt: _u, notifications: _n, documents: _d, ...rest }: Application) =>
  rest;

describe("WorkflowService scenarios", () => {
  it("selects application 42 for interview and issues a verifiable invitation", async () => {
    const harness = createHarness({ firstId: 42 });
    const submitted = await submitJobApplication(harness);
    expect(submitted.id).toBe(42);

    const outcome = await selectCandidate(harness, 42);
    const records = await harness.ledger.listByApplication(42);
    const code = records[0].verificationCode;

    expect(outcome.transition).toEqual({ phase: 1, decision: "selected_for_interview" });
    expect(outcome.application.workflow.phase1.status).toBe("selected_for_interview");
    expect(outcome.application.status).toBe("interview programmé");
    expect(outcome.application.documents.interviewInvitation).toEqual({
      fr: `convocations/Convocation_Entretien_Amina_Said_42_20251020_113000_${code}.pdf`,
      ar: `convocations/Convocation_Entretien_Amina_Said_42_20251020_113000_${code}_ar.pdf`
    });
    expect(outcome.application.version).toBe(3);
    expect(outcome.documentWarnings).toEqual([]);
    expect(records).toHaveLength(1);
    expect(records[0].languages).toEqual(["fr", "ar"]);

    const lookup = await harness.verification.lookup(records[0].verificationCode.toLowerCase());
    expect(lookup).toEqual({ found: true, record: records[0] });
  });

  it("accepts application 42 after the interview and issues an acceptance letter", async () => {
    const harness = createHarness({ firstId: 42 });
    await submitJobApplication(harness);
    await selectCandidate(harness, 42);

    const outcome = await harness.workflow.decidePhase2(staff(), 42, {
      decision: "accepted",
      workStartDate: "2025-12-01",
      interviewNotes: "Strong numeracy"
    });
    const records = await harness.ledger.listByApplication(42);

    expect(outcome.application.workflow).toMatchObject({
      phase: "completed",
      phase2: { status: "accepted", workStartDate: "2025-12-01" }
    });
    expect(outcome.application.status).toBe("acceptée");
    expect(outcome.application.interviewNotes).toBe("Strong numeracy");
    expect(records.map((record) => record.documentType)).toEqual(["convocation", "acceptation"]);
    expect(outcome.issuance?.record?.verificationCode).toBe(records[1].verificationCode);
  });

  it("rejects application 43 in phase 1 without issuing any document", async () => {
    const harness = createHarness({ firstId: 43 });
    await submitJobApplication(harness);

    const outcome = await harness.workflow.decidePhase1(staff(), 43, {
      decision: "rejected",
      rejectionReason: "Profile mismatch"
    });

    expect(outcome.application.status).toBe("rejetée");
    expect(outcome.application.workflow.phase).toBe("completed");
    expect(outcome.issuance).toBeUndefined();
    expect(harness.renderer.layouts).toEqual([]);
    await expect(harness.ledger.listByApplication(43)).resolves.toEqual([]);
    expect(outcome.notification.emailBody).toContain("Raison : Profile mismatch");
  });

  it("answers not found for an unknown code", async () => {
    const harness = createHarness();

    await expect(harness.verification.lookup("DOESNOTEXIST1234")).resolves.toEqual({
      found: false,
      verificationCode: "DOESNOTEXIST1234"
    });
  });

  it("refuses a phase 2 decision after a phase 1 rejection and changes nothing", async () => {
    const harness = createHarness({ firstId: 43 });
    await submitJobApplication(harness);
    await harness.workflow.decidePhase1(staff(), 43, { decision: "rejected" });
    const before = await harness.repository.findById(43);

    await expect(harness.workflow.decidePhase2(staff(), 43, { decision: "accepted" })).rejects.toThrow(
      InvalidTransitionError
    );
    await expect(harness.repository.findById(43)).resolves.toEqual(before);
  });

  it("refuses a phase 2 decision while phase 1 is pending", async () => {
    const harness = createHarness();
    const application = await submitJobApplication(harness);

    await expect(harness.workflow.decidePhase2(staff(), application.id, { decision: "rejected" })).rejects.toThrow(
      InvalidTransitionError
    );
  });
});

describe("WorkflowService decisions", () => {
  it("commits the transition even when every document variant fails", async () => {
    const harness = createHarness();
    const application = await submitJobApplication(harness);
    harness.renderer.failFor.add("fr");
    harness.renderer.failFor.add("ar");

    const outcome = await selectCandidate(harness, application.id);

    expect(outcome.application.status).toBe("interview programmé");
    expect(outcome.application.documents.interviewInvitation).toEqual({});
    expect(outcome.documentWarnings.map((warning) => [warning.error, warning.language])).toEqual([
      ["DocumentGenerationFailure", "fr"],
      ["DocumentGenerationFailure", "ar"]
    ]);
    expect(outcome.notification.emailBody).not.toContain("CONVOCATION OFFICIELLE");
    await expect(harness.repository.findById(application.id)).resolves.toMatchObject({ status: "interview programmé" });
  });

  it("validates the interview date before writing anything", async () => {
    const harness = createHarness();
    const application = await submitJobApplication(harness);

    await expect(
      harness.workflow.decidePhase1(staff(), application.id, { decision: "selected_for_interview" })
    ).rejects.toThrow(MissingRequiredFieldError);
    await expect(harness.repository.findById(application.id)).resolves.toMatchObject({ version: 1 });
  });

  it("stores the job title chosen for a spontaneous application", async () => {
    const harness = createHarness();
    const application = await harness.applications.submit({ candidate });

    const outcome = await harness.workflow.decidePhase1(staff(), application.id, {
      ...INTERVIEW,
      selectedJobTitle: " Caissier "
    });

    expect(outcome.application.target).toEqual({
      kind: "spontaneous",
      jobTitle: "Candidature spontanée",
      selectedJobTitle: "Caissier"
    });
    expect(outcome.issuance?.record?.jobTitle).toBe("Caissier");
  });

  it("serializes concurrent decisions on the same application", async () => {
    const harness = createHarness();
    const application = await submitJobApplication(harness);

    const results = await Promise.allSettled([
      selectCandidate(harness, application.id),
      harness.workflow.decidePhase1(staff(), application.id, { decision: "rejected" })
    ]);

    expect(results.map((result) => result.status)).toEqual(["fulfilled", "rejected"]);
    const failed = results[1];
    expect(failed.status === "rejected" && failed.reason).toBeInstanceOf(InvalidTransitionError);
  });

  it("turns a stale write into a concurrent modification error", async () => {
    const harness = createHarness();
    const application = await submitJobApplication(harness);
    await harness.repository.save(application, application.version);

    await expect(harness.repository.save(application, application.version)).rejects.toThrow(
      ConcurrentModificationError
    );
  });

  it("checks the actor's permissions", async () => {
    const harness = createHarness();
    const application = await submitJobApplication(harness);

    await expect(harness.applications.delete(staff("recruteur"), application.id)).rejects.toThrow(
      new ForbiddenError("Role recruteur is not allowed to delete application.")
    );
    await expect(selectCandidate(harness, application.id)).resolves.toBeDefined();
  });
});

describe("markNotificationSent", () => {
  it("only flips the flag of the given phase", async () => {
    const harness = createHarness();
    const application = await submitJobApplication(harness);
    const decided = (await selectCandidate(harness, application.id)).application;

    const updated = await harness.workflow.markNotificationSent(staff(), application.id, 1);

    expect(updated.notifications).toEqual({ phase1Sent: true, phase2Sent: false });
    expect(updated.documents).toEqual(decided.documents);
    expect(withoutBookkeeping(updated)).toEqual(withoutBookkeeping(decided));

    const again = await harness.workflow.markNotificationSent(staff(), application.id, 2);
    expect(again.notifications).toEqual({ phase1Sent: true, phase2Sent: true });
  });
});

describe("document regeneration", () => {
  it("issues a new code and keeps earlier ones valid", async () => {
    const harness = createHarness();
    const application = await submitJobApplication(harness);
    const first = await selectCandidate(harness, application.id);
    const firstCode = first.issuance?.record?.verificationCode ?? "";

    const regenerated = await harness.workflow.regenerateDocument(staff(), application.id, "convocation");
    const secondCode = regenerated.issuance.record?.verificationCode ?? "";

    expect(secondCode).not.toBe(firstCode);
    expect(withoutBookkeeping(regenerated.application)).toEqual(withoutBookkeeping(first.application));
    await expect(harness.verification.lookup(firstCode)).resolves.toEqual({
      found: true,
      record: first.issuance?.record
    });
    await expect(harness.verification.lookup(secondCode)).resolves.toMatchObject({ found: true });

    const firstFile = await harness.storage.get(first.issuance?.record?.pdfPath ?? "");
    const secondFile = await harness.storage.get(regenerated.issuance.record?.pdfPath ?? "");
    expect(firstFile?.toString()).toBe(`%PDF-test https://jobs.example.test/verify/${firstCode}`);
    expect(secondFile?.toString()).toBe(`%PDF-test https://jobs.example.test/verify/${secondCode}`);
  });

  it("recovers after a degraded decision", async () => {
    const harness = createHarness();
    const application = await submitJobApplication(harness);
    harness.renderer.failFor.add("fr");
    harness.renderer.failFor.add("ar");
    await selectCandidate(harness, application.id);
    harness.renderer.failFor.clear();

    const regenerated = await harness.workflow.regenerateDocument(staff(), application.id, "convocation");

    expect(Object.keys(regenerated.application.documents.interviewInvitation)).toEqual(["fr", "ar"]);
    expect(regenerated.documentWarnings).toEqual([]);
  });

  it("runs queued issuance once per request id", async () => {
    const harness = createHarness();
    const application = await submitJobApplication(harness);
    await selectCandidate(harness, application.id);

    const job = await harness.workflow.enqueueDocumentIssuance(staff(), application.id, "convocation", "req-1");
    const repeat = await harness.workflow.enqueueDocumentIssuance(staff(), application.id, "convocation", "req-1");

    expect(repeat.id).toBe(job.id);
    await vi.waitFor(async () => {
      const snapshot = await harness.workflow.getDocumentJob(staff(), "req-1");
      expect(snapshot.status).toBe("COMPLETED");
    });
    await expect(harness.ledger.listByApplication(application.id)).resolves.toHaveLength(2);
  });

  it("marks a queued job failed when the precondition does not hold", async () => {
    const harness = createHarness();
    const application = await submitJobApplication(harness);

    await harness.workflow.enqueueDocumentIssuance(staff(), application.id, "acceptation", "req-2");

    await vi.waitFor(async () => {
      const snapshot = await harness.workflow.getDocumentJob(staff(), "req-2");
      expect(snapshot.status).toBe("FAILED");
      expect(snapshot.error).toBe(
        `Application ${application.id} must be accepted in phase 2 before an acceptance letter is issued.`
      );
    });
  });
});

describe("stored documents", () => {
  it("serves the stored artifact by language", async () => {
    const harness = createHarness({ firstId: 42 });
    await submitJobApplication(harness);
    await selectCandidate(harness, 42);

    const [record] = await harness.ledger.listByApplication(42);

    const document = await harness.workflow.getDocument(staff("recruteur"), 42, "convocation", "ar");

    expect(document.fileName).toBe(`Convocation_Entretien_Amina_Said_42_20251020_113000_${record.verificationCode}_ar.pdf`);
    expect(document.content.toString()).toBe(`%PDF-test https://jobs.example.test/verify/${record.verificationCode}`);
    await expect(harness.workflow.getDocument(staff(), 42, "acceptation", "fr")).rejects.toThrow(NotFoundError);
  });

  it("deletes files, verification records and then the application", async () => {
    const harness = createHarness({ firstId: 42 });
    await submitJobApplication(harness);
    await selectCandidate(harness, 42);

    const summary = await harness.applications.delete(staff("admin"), 42);

    expect(summary).toEqual({ applicationId: 42, removedDocuments: 2, removedVerificationRecords: 1 });
    expect(harness.storage.keys()).toEqual([]);
    await expect(harness.ledger.listByApplication(42)).resolves.toEqual([]);
    await expect(harness.repository.findById(42)).resolves.toBeUndefined();
  });

  it("also deletes every language of documents that were regenerated since", async () => {
    const harness = createHarness({ firstId: 42 });
    await submitJobApplication(harness);
    await selectCandidate(harness, 42);
    await harness.workflow.regenerateDocument(staff(), 42, "convocation");
    expect(harness.storage.keys()).toHaveLength(4);

    const summary = await harness.applications.delete(staff("admin"), 42);

    expect(summary).toEqual({ applicationId: 42, removedDocuments: 4, removedVerificationRecords: 2 });
    expect(harness.storage.keys()).toEqual([]);
  });
});
