import {
  STEP_PROMPTS,
  answerTruncatedWarning,
  emptyMessageReply,
  extractionFailedMessage,
  firstQuestionMessage,
  messageTooLongMessage,
  nextQuestionSameTopicMessage,
  nextTopicMessage,
  noQuestionsMessage,
  rateLimitedMessage,
  saveFailedMessage,
  sessionResetAfterErrorsMessage,
} from "../chat/messages";
import { Logger, logContext } from "../config/logger";
import { mergeProfile, sanitizeProfileUpdate } from "../profiles/profile-merge";
import { RateLimitExceeded, errorMessage } from "../shared/errors";
import { ExtractedProfileFields } from "../shared/types/candidate.types";
import { ConversationStep, IntakeSession, SentimentLabel } from "../shared/types/state.types";
import { containsExitKeyword } from "../shared/utils/exit-keywords";
import { transitionSession } from "../state/state-machine";
import { createIntakeSession } from "../state/state.service";
import { incompletePrompt, isStepComplete, missingProfileFields } from "../state/step-rules";
import { nextStep } from "../state/transition-rules";
import { supplementExtraction } from "./extraction-fallbacks";
import {
  CandidateStore,
  ProfileExtractor,
  QuestionGenerator,
  ReplyComposer,
  SentimentClassifier,
} from "./intake.ports";
import { advanceCursor, currentQuestion, currentTopic, initialCursor } from "./question-cursor";

export interface IntakeEngineDeps {
  extractor: ProfileExtractor;
  questionGenerator: QuestionGenerator;
  replyComposer: ReplyComposer;
  sentimentClassifier: SentimentClassifier;
  candidateStore: CandidateStore;
  logger: Logger;
}

export interface IntakeEngineOptions {
  maxConsecutiveErrors: number;
  maxMessageLength: number;
  maxAnswerLength: number;
  now?: () => Date;
  currentYear?: () => number;
}

export interface TurnOutcome {
  session: IntakeSession;
  reply: string;
  warnings: string[];
  candidateId?: string;
}

interface TurnState {
  reply: string;
  warnings: string[];
  candidateId?: string;
}

/**
 * Applies one user message to a working copy of a session. The caller owns
 * the copy and commits it only when the returned promise resolves.
 */
export class IntakeEngine {
  private readonly now: () => Date;
  private readonly currentYear: () => number;

  constructor(
    private readonly deps: IntakeEngineDeps,
    private readonly options: IntakeEngineOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.currentYear = options.currentYear ?? (() => this.now().getFullYear());
  }

  /** Emits the greeting and moves a fresh session into contact collection. */
  start(session: IntakeSession): TurnOutcome {
    transitionSession(session, "collect_info");
    session.lastActivityAt = this.now().toISOString();
    return {
      session,
      reply: `${STEP_PROMPTS.greeting}\n\n${STEP_PROMPTS.collect_info}`,
      warnings: [],
    };
  }

  async handleTurn(session: IntakeSession, text: string): Promise<TurnOutcome> {
    const message = text.trim();
    if (!message) {
      return { session, reply: emptyMessageReply(), warnings: [] };
    }

    const receivedAt = session.step;
    const sentiment = await this.deps.sentimentClassifier.classify(message);
    logContext(
      this.deps.logger,
      "debug",
      "intake.turn.received",
      { session_id: session.sessionId, step: receivedAt },
      { sentiment, length: message.length },
    );

    let working = session;
    let state: TurnState;
    if (containsExitKeyword(message)) {
      state = await this.exit(working);
    } else {
      const outcome = await this.dispatch(working, message);
      working = outcome.session;
      state = outcome.state;
    }

    this.recordTurn(working, message, state.reply, receivedAt, sentiment);
    logContext(
      this.deps.logger,
      "info",
      "intake.turn.completed",
      { session_id: working.sessionId, step: working.step },
      { from_step: receivedAt, warnings: state.warnings.length, error_count: working.errorCount },
    );

    const outcome: TurnOutcome = { session: working, reply: state.reply, warnings: state.warnings };
    if (state.candidateId) {
      outcome.candidateId = state.candidateId;
    }
    return outcome;
  }

  /**
   * Stores a consented profile. A store is skipped when neither the profile
   * nor the questions changed since the last one. Write failures are reported
   * as a warning and leave the session untouched.
   */
  async persist(session: IntakeSession): Promise<TurnState> {
    const state: TurnState = { reply: "", warnings: [] };
    const fingerprint = storeFingerprint(session);
    if (session.storedCandidateId && session.storedFingerprint === fingerprint) {
      state.candidateId = session.storedCandidateId;
      return state;
    }
    try {
      const candidateId = await this.deps.candidateStore.store(session.profile, session.questionSet);
      if (candidateId) {
        session.storedCandidateId = candidateId;
        session.storedFingerprint = fingerprint;
        state.candidateId = candidateId;
      }
    } catch (error) {
      logContext(
        this.deps.logger,
        "error",
        "intake.persist.failed",
        { session_id: session.sessionId, step: session.step, ok: false, error_code: "persistence_failure" },
        { error: errorMessage(error) },
      );
      state.warnings.push(saveFailedMessage());
    }
    return state;
  }

  private async dispatch(
    session: IntakeSession,
    message: string,
  ): Promise<{ session: IntakeSession; state: TurnState }> {
    switch (session.step) {
      case "greeting":
        transitionSession(session, "collect_info");
        return this.collect(session, message);
      case "collect_info":
      case "collect_experience":
      case "collect_positions":
      case "collect_location":
      case "collect_tech_stack":
        return this.collect(session, message);
      case "generate_questions":
        return { session, state: await this.startQuestions(session) };
      case "ask_questions":
        return { session, state: await this.answer(session, message) };
      case "conclusion":
        return { session, state: await this.freeReply(session, message) };
    }
  }

  private async collect(
    session: IntakeSession,
    message: string,
  ): Promise<{ session: IntakeSession; state: TurnState }> {
    const step = session.step;
    if (message.length > this.options.maxMessageLength) {
      const reply = messageTooLongMessage(this.options.maxMessageLength);
      return this.recordFailure(session, reply, "message_too_long");
    }

    let extracted: ExtractedProfileFields;
    try {
      extracted = await this.deps.extractor.extract(message, step);
    } catch (error) {
      if (error instanceof RateLimitExceeded) {
        logContext(this.deps.logger, "warn", "intake.extraction.rate_limited", {
          session_id: session.sessionId,
          step,
          ok: false,
          error_code: "rate_limit_exceeded",
        });
        return { session, state: { reply: rateLimitedMessage(), warnings: [] } };
      }
      logContext(
        this.deps.logger,
        "warn",
        "intake.extraction.failed",
        { session_id: session.sessionId, step, ok: false, error_code: "extraction_failure" },
        { error: errorMessage(error) },
      );
      return this.recordFailure(
        session,
        `${extractionFailedMessage()}\n\n${incompletePrompt(step, session.profile)}`,
        "extraction_failure",
      );
    }

    session.errorCount = 0;
    const supplemented = supplementExtraction(extracted, message, step, this.currentYear());
    const { update, rejections } = sanitizeProfileUpdate(supplemented);
    session.profile = mergeProfile(session.profile, update);
    const warnings = rejections.map((rejection) => rejection.message);
    if (rejections.length) {
      logContext(
        this.deps.logger,
        "info",
        "intake.validation.rejected",
        { session_id: session.sessionId, step },
        { fields: rejections.map((rejection) => rejection.field) },
      );
    }

    if (!isStepComplete(step, session.profile)) {
      return { session, state: { reply: incompletePrompt(step, session.profile), warnings } };
    }

    const next = nextStep(step);
    transitionSession(session, next);
    if (next === "generate_questions") {
      const state = await this.startQuestions(session);
      return { session, state: { ...state, warnings: [...warnings, ...state.warnings] } };
    }
    return { session, state: { reply: STEP_PROMPTS[next], warnings } };
  }

  private recordFailure(
    session: IntakeSession,
    reply: string,
    errorCode: string,
  ): { session: IntakeSession; state: TurnState } {
    session.errorCount += 1;
    if (session.errorCount <= this.options.maxConsecutiveErrors) {
      return { session, state: { reply, warnings: [] } };
    }

    logContext(
      this.deps.logger,
      "warn",
      "intake.session.reset_after_errors",
      { session_id: session.sessionId, step: session.step, ok: false, error_code: errorCode },
      { error_count: session.errorCount },
    );
    const fresh = createIntakeSession(session.sessionId, this.now());
    fresh.createdAt = session.createdAt;
    fresh.profile.consentToStore = session.profile.consentToStore;
    transitionSession(fresh, "collect_info");
    return { session: fresh, state: { reply: sessionResetAfterErrorsMessage(), warnings: [] } };
  }

  private async startQuestions(session: IntakeSession): Promise<TurnState> {
    const set = await this.deps.questionGenerator.generate(session.profile.techStack);
    session.questionSet = set;
    session.cursor = initialCursor();
    transitionSession(session, "ask_questions");
    logContext(
      this.deps.logger,
      "info",
      "intake.questions.ready",
      { session_id: session.sessionId, step: session.step },
      { source: set.source, topics: set.topics.length },
    );

    const topic = currentTopic(set, session.cursor);
    const question = currentQuestion(set, session.cursor);
    if (!topic || !question) {
      return this.conclude(session, noQuestionsMessage());
    }
    return { reply: firstQuestionMessage(topic.topic, question), warnings: [] };
  }

  private async answer(session: IntakeSession, message: string): Promise<TurnState> {
    const set = session.questionSet;
    if (!set) {
      return this.startQuestions(session);
    }

    const warnings: string[] = [];
    if (message.length > this.options.maxAnswerLength) {
      warnings.push(answerTruncatedWarning());
    }

    const advance = advanceCursor(set, session.cursor);
    session.cursor = advance.cursor;
    if (advance.exhausted) {
      const state = await this.conclude(session, STEP_PROMPTS.conclusion);
      return { ...state, warnings: [...warnings, ...state.warnings] };
    }

    const topic = currentTopic(set, session.cursor);
    const question = currentQuestion(set, session.cursor);
    if (!topic || !question) {
      const state = await this.conclude(session, STEP_PROMPTS.conclusion);
      return { ...state, warnings: [...warnings, ...state.warnings] };
    }
    const reply = advance.topicChanged
      ? nextTopicMessage(advance.previousTopic, topic.topic, question)
      : nextQuestionSameTopicMessage(topic.topic, question);
    return { reply, warnings };
  }

  private async exit(session: IntakeSession): Promise<TurnState> {
    logContext(this.deps.logger, "info", "intake.exit.requested", {
      session_id: session.sessionId,
      step: session.step,
    });
    return this.conclude(session, STEP_PROMPTS.conclusion);
  }

  private async conclude(session: IntakeSession, reply: string): Promise<TurnState> {
    if (session.step !== "conclusion") {
      transitionSession(session, "conclusion");
    }
    const persisted = await this.persist(session);
    const state: TurnState = { reply, warnings: persisted.warnings };
    if (persisted.candidateId) {
      state.candidateId = persisted.candidateId;
    }
    return state;
  }

  private async freeReply(session: IntakeSession, message: string): Promise<TurnState> {
    const reply = await this.deps.replyComposer.compose({
      history: [...session.history],
      profile: session.profile,
      message,
      missingFields: missingProfileFields(session.profile),
    });
    return { reply, warnings: [] };
  }

  private recordTurn(
    session: IntakeSession,
    message: string,
    reply: string,
    step: ConversationStep,
    sentiment: SentimentLabel,
  ): void {
    const at = this.now().toISOString();
    session.history.push({
      user: message.slice(0, this.options.maxAnswerLength),
      assistant: reply,
      step,
      sentiment,
      at,
    });
    session.lastActivityAt = at;
  }
}

function storeFingerprint(session: IntakeSession): string {
  return JSON.stringify({ profile: session.profile, topics: session.questionSet?.topics ?? [] });
}
