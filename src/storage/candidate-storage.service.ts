import { createHash, randomUUID } from "node:crypto";
import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { Logger } from "../config/logger";
import { CandidateStore } from "../intake/intake.ports";
import { PersistenceFailure, errorMessage } from "../shared/errors";
import { CandidateProfile, TechStack } from "../shared/types/candidate.types";
import { QuestionSet } from "../shared/types/question-set.types";

export interface StoredCandidateRecord {
  timestamp: string;
  candidate_id: string;
  full_name: string | null;
  email_hash: string | null;
  phone_hash: string | null;
  years_experience: number | null;
  desired_positions: string[];
  current_location: string | null;
  tech_stack: TechStack | null;
  language_preference: string | null;
  questions: Array<{ topic: string; questions: string[] }>;
}

export const CANDIDATES_FILE = "candidates.jsonl";

export function hashContact(value: string): string {
  return createHash("sha256").update(value).digest("hex");
}

export class CandidateStorageService implements CandidateStore {
  private readonly filePath: string;

  constructor(
    dataDir: string,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
    private readonly generateId: () => string = () => `candidate_${randomUUID()}`,
  ) {
    this.filePath = path.resolve(dataDir, CANDIDATES_FILE);
  }

  async store(profile: CandidateProfile, questionSet?: QuestionSet): Promise<string | null> {
    if (!profile.consentToStore) {
      this.logger.debug("candidate.store.skipped_no_consent");
      return null;
    }

    const record = buildStoredRecord(profile, questionSet, this.generateId(), this.now());
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, `${JSON.stringify(record)}\n`, "utf-8");
    } catch (error) {
      this.logger.error("candidate.store.failed", { error: errorMessage(error) });
      throw new PersistenceFailure(`Failed to store candidate: ${errorMessage(error)}`);
    }

    this.logger.info("candidate.store.completed", {
      candidate_id: record.candidate_id,
      full_name: record.full_name,
      years_experience: record.years_experience,
      topics: record.questions.length,
    });
    return record.candidate_id;
  }
}

export function buildStoredRecord(
  profile: CandidateProfile,
  questionSet: QuestionSet | undefined,
  candidateId: string,
  now: Date,
): StoredCandidateRecord {
  return {
    timestamp: now.toISOString(),
    candidate_id: candidateId,
    full_name: profile.fullName ?? null,
    email_hash: profile.email ? hashContact(profile.email) : null,
    phone_hash: profile.phone ? hashContact(profile.phone) : null,
    years_experience: profile.yearsExperience ?? null,
    desired_positions: [...(profile.desiredPositions ?? [])],
    current_location: profile.currentLocation ?? null,
    tech_stack: profile.techStack ?? null,
    language_preference: profile.languagePreference ?? null,
    questions: (questionSet?.topics ?? []).map((topic) => ({
      topic: topic.topic,
      questions: [...topic.questions],
    })),
  };
}
