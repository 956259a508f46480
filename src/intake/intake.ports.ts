import {
  CandidateProfile,
  ExtractedProfileFields,
  TechStack,
} from "../shared/types/candidate.types";
import { QuestionSet } from "../shared/types/question-set.types";
import { ConversationStep, ConversationTurn, SentimentLabel } from "../shared/types/state.types";
import { RetryPolicy } from "../ai/llm.safe";

export interface ProfileExtractor {
  /** Throws ExtractionFailure or RateLimitExceeded. `{}` means nothing found. */
  extract(message: string, step: ConversationStep): Promise<ExtractedProfileFields>;
}

export interface QuestionGenerator {
  /** Never throws; falls back to the deterministic set. */
  generate(techStack: TechStack | undefined): Promise<QuestionSet>;
}

export interface AssistantReplyInput {
  history: ReadonlyArray<ConversationTurn>;
  profile: CandidateProfile;
  message: string;
  missingFields: ReadonlyArray<string>;
}

export interface ReplyComposer {
  compose(input: AssistantReplyInput): Promise<string>;
}

export interface SentimentClassifier {
  classify(message: string): Promise<SentimentLabel>;
}

export interface CandidateStore {
  /** Resolves null without consent; rejects with PersistenceFailure on write errors. */
  store(profile: CandidateProfile, questionSet?: QuestionSet): Promise<string | null>;
}

export interface AdapterCallSettings {
  timeoutMs?: number;
  retry?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}
