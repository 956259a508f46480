import { CandidateProfile } from "./candidate.types";
import { QuestionCursor, QuestionSet } from "./question-set.types";

export type ConversationStep =
  | "greeting"
  | "collect_info"
  | "collect_experience"
  | "collect_positions"
  | "collect_location"
  | "collect_tech_stack"
  | "generate_questions"
  | "ask_questions"
  | "conclusion";

export type SentimentLabel = "positive" | "neutral" | "negative";

export interface ConversationTurn {
  readonly user: string;
  readonly assistant: string;
  readonly step: ConversationStep;
  readonly sentiment?: SentimentLabel;
  readonly at: string;
}

export interface IntakeSession {
  sessionId: string;
  step: ConversationStep;
  profile: CandidateProfile;
  history: ConversationTurn[];
  questionSet?: QuestionSet;
  cursor: QuestionCursor;
  errorCount: number;
  storedCandidateId?: string;
  /** Profile and questions as of the last successful store. */
  storedFingerprint?: string;
  createdAt: string;
  lastActivityAt?: string;
}
