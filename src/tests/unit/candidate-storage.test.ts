import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { after, before, describe, it } from "node:test";
import { createNoopLogger } from "../../config/logger";
import { buildFallbackQuestionSet } from "../../intake/question-set.guard";
import { PersistenceFailure } from "../../shared/errors";
import { CandidateProfile } from "../../shared/types/candidate.types";
import { CandidateStorageService, hashContact } from "../../storage/candidate-storage.service";

const profile: CandidateProfile = {
  fullName: "Jane Doe",
  email: "jane@example.com",
  phone: "5550100199",
  yearsExperience: 4,
  desiredPositions: ["Backend Engineer"],
  currentLocation: "Lisbon",
  techStack: { programming_languages: ["Go"], frameworks: [], databases: [], tools: [] },
  consentToStore: true,
};

describe("CandidateStorageService", () => {
  let dataDir = "";

  before(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), "intake-storage-"));
  });

  after(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it("skips storage without consent", async () => {
    const service = new CandidateStorageService(dataDir, createNoopLogger());
    assert.equal(await service.store({ ...profile, consentToStore: false }), null);
  });

  it("appends a record with hashed contact details and question topics", async () => {
    const service = new CandidateStorageService(
      dataDir,
      createNoopLogger(),
      () => new Date("2026-01-02T03:04:05.000Z"),
      () => "candidate_fixed",
    );
    const id = await service.store(profile, buildFallbackQuestionSet(profile.techStack));
    assert.equal(id, "candidate_fixed");

    const lines = (await readFile(path.join(dataDir, "candidates.jsonl"), "utf-8")).trim().split("\n");
    const record: unknown = JSON.parse(lines[lines.length - 1] ?? "");
    assert.deepEqual(record, {
      timestamp: "2026-01-02T03:04:05.000Z",
      candidate_id: "candidate_fixed",
      full_name: "Jane Doe",
      email_hash: hashContact("jane@example.com"),
      phone_hash: hashContact("5550100199"),
      years_experience: 4,
      desired_positions: ["Backend Engineer"],
      current_location: "Lisbon",
      tech_stack: { programming_languages: ["Go"], frameworks: [], databases: [], tools: [] },
      language_preference: null,
      questions: [
        {
          topic: "Go",
          questions: [
            "Describe your experience with Go.",
            "What are the key features of Go?",
            "How do you debug issues in Go?",
            "Give an example project using Go.",
          ],
        },
      ],
    });
    assert.equal(hashContact("jane@example.com").length, 64);
    assert.notEqual(hashContact("jane@example.com"), "jane@example.com");
  });

  it("appends a new record on every store call", async () => {
    const appendDir = await mkdtemp(path.join(os.tmpdir(), "intake-append-"));
    const ids = ["candidate_first", "candidate_second"];
    const service = new CandidateStorageService(appendDir, createNoopLogger(), undefined, () => ids.shift() ?? "");
    await service.store({ ...profile, techStack: undefined });
    await service.store(profile);

    const lines = (await readFile(path.join(appendDir, "candidates.jsonl"), "utf-8")).trim().split("\n");
    assert.equal(lines.length, 2);
    const last: unknown = JSON.parse(lines[1] ?? "");
    assert.ok(typeof last === "object" && last !== null && "candidate_id" in last && "tech_stack" in last);
    assert.equal(last.candidate_id, "candidate_second");
    assert.deepEqual(last.tech_stack, profile.techStack);
    await rm(appendDir, { recursive: true, force: true });
  });

  it("wraps write errors in PersistenceFailure", async () => {
    const blocker = path.join(dataDir, "blocker");
    await writeFile(blocker, "not a directory", "utf-8");
    const service = new CandidateStorageService(path.join(blocker, "nested"), createNoopLogger());
    await assert.rejects(service.store(profile), PersistenceFailure);
  });
});
