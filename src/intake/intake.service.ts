import { notSavedWithoutConsentMessage, saveFailedMessage, savedMessage } from "../chat/messages";
import { Logger } from "../config/logger";
import { SessionNotFound } from "../shared/errors";
import { ConversationStep, IntakeSession } from "../shared/types/state.types";
import { TechStack } from "../shared/types/candidate.types";
import { StateService } from "../state/state.service";
import { progressFor } from "../state/step-rules";
import { IntakeEngine } from "./intake.engine";

export interface StartResult {
  sessionId: string;
  reply: string;
  step: ConversationStep;
  progress: number;
}

export interface MessageResult {
  reply: string;
  step: ConversationStep;
  progress: number;
  warnings: string[];
  candidateId?: string;
}

export interface SaveResult {
  saved: boolean;
  candidateId?: string;
  message: string;
}

export interface SessionSnapshot {
  sessionId: string;
  step: ConversationStep;
  progress: number;
  profile: {
    fullName: string | null;
    email: string | null;
    phone: string | null;
    yearsExperience: number | null;
    desiredPositions: string[];
    currentLocation: string | null;
    techStack: TechStack | null;
    languagePreference: string | null;
    consentToStore: boolean;
  };
  errorCount: number;
  turns: number;
  questionTopics: string[];
  storedCandidateId: string | null;
  createdAt: string;
  lastActivityAt: string | null;
}

/**
 * Session boundary: loads a working copy, runs the engine under the
 * session's lock and commits the result only when the turn completes.
 */
export class IntakeService {
  constructor(
    private readonly stateService: StateService,
    private readonly engine: IntakeEngine,
    private readonly logger: Logger,
  ) {}

  start(): StartResult {
    const session = this.stateService.create();
    const outcome = this.engine.start(session);
    this.stateService.commit(outcome.session);
    this.logger.info("intake.session.started", { session_id: session.sessionId });
    return {
      sessionId: session.sessionId,
      reply: outcome.reply,
      step: outcome.session.step,
      progress: progressFor(outcome.session.step),
    };
  }

  handleMessage(sessionId: string, text: string): Promise<MessageResult> {
    return this.stateService.runExclusive(sessionId, async () => {
      const session = this.load(sessionId);
      const outcome = await this.engine.handleTurn(session, text);
      this.stateService.commit(outcome.session);
      const result: MessageResult = {
        reply: outcome.reply,
        step: outcome.session.step,
        progress: progressFor(outcome.session.step),
        warnings: outcome.warnings,
      };
      if (outcome.candidateId) {
        result.candidateId = outcome.candidateId;
      }
      return result;
    });
  }

  setConsent(sessionId: string, consent: boolean): Promise<SessionSnapshot> {
    return this.stateService.runExclusive(sessionId, async () => {
      const session = this.load(sessionId);
      session.profile.consentToStore = consent;
      this.stateService.commit(session);
      this.logger.info("intake.consent.updated", { session_id: sessionId, consent });
      return toSnapshot(session);
    });
  }

  save(sessionId: string): Promise<SaveResult> {
    return this.stateService.runExclusive(sessionId, async () => {
      const session = this.load(sessionId);
      if (!session.profile.consentToStore) {
        return { saved: false, message: notSavedWithoutConsentMessage() };
      }
      const persisted = await this.engine.persist(session);
      if (!persisted.candidateId) {
        return { saved: false, message: saveFailedMessage() };
      }
      this.stateService.commit(session);
      return { saved: true, candidateId: persisted.candidateId, message: savedMessage() };
    });
  }

  reset(sessionId: string): Promise<StartResult> {
    return this.stateService.runExclusive(sessionId, async () => {
      this.load(sessionId);
      const fresh = this.stateService.reset(sessionId);
      const outcome = this.engine.start(fresh);
      this.stateService.commit(outcome.session);
      this.logger.info("intake.session.reset", { session_id: sessionId });
      return {
        sessionId,
        reply: outcome.reply,
        step: outcome.session.step,
        progress: progressFor(outcome.session.step),
      };
    });
  }

  snapshot(sessionId: string): SessionSnapshot {
    return toSnapshot(this.load(sessionId));
  }

  private load(sessionId: string): IntakeSession {
    const session = this.stateService.getSession(sessionId);
    if (!session) {
      throw new SessionNotFound(sessionId);
    }
    return session;
  }
}

export function toSnapshot(session: IntakeSession): SessionSnapshot {
  const profile = session.profile;
  return {
    sessionId: session.sessionId,
    step: session.step,
    progress: progressFor(session.step),
    profile: {
      fullName: profile.fullName ?? null,
      email: profile.email ?? null,
      phone: profile.phone ? maskPhone(profile.phone) : null,
      yearsExperience: profile.yearsExperience ?? null,
      desiredPositions: [...(profile.desiredPositions ?? [])],
      currentLocation: profile.currentLocation ?? null,
      techStack: profile.techStack ?? null,
      languagePreference: profile.languagePreference ?? null,
      consentToStore: profile.consentToStore,
    },
    errorCount: session.errorCount,
    turns: session.history.length,
    questionTopics: (session.questionSet?.topics ?? []).map((topic) => topic.topic),
    storedCandidateId: session.storedCandidateId ?? null,
    createdAt: session.createdAt,
    lastActivityAt: session.lastActivityAt ?? null,
  };
}

/** Keeps the last four digits; every other digit becomes `*`. */
export function maskPhone(phone: string): string {
  const totalDigits = phone.replace(/\D/g, "").length;
  let seen = 0;
  return phone.replace(/\d/g, (digit) => {
    seen += 1;
    return seen > totalDigits - 4 ? digit : "*";
  });
}
