import { randomUUID } from "node:crypto";
import { cloneCandidateProfile, createEmptyCandidateProfile } from "../profiles/profile.schemas";
import { IntakeSession } from "../shared/types/state.types";

export function createIntakeSession(sessionId: string, now: Date): IntakeSession {
  return {
    sessionId,
    step: "greeting",
    profile: createEmptyCandidateProfile(),
    history: [],
    cursor: { topicIndex: 0, questionIndex: 0 },
    errorCount: 0,
    createdAt: now.toISOString(),
  };
}

/** Working copy for one turn. Question sets are frozen and shared. */
export function cloneIntakeSession(session: IntakeSession): IntakeSession {
  const clone: IntakeSession = {
    ...session,
    profile: cloneCandidateProfile(session.profile),
    history: [...session.history],
    cursor: { ...session.cursor },
  };
  return clone;
}

export class StateService {
  private readonly sessions = new Map<string, IntakeSession>();
  private readonly queues = new Map<string, Promise<void>>();

  constructor(
    private readonly now: () => Date = () => new Date(),
    private readonly generateId: () => string = randomUUID,
  ) {}

  create(): IntakeSession {
    const session = createIntakeSession(this.generateId(), this.now());
    this.sessions.set(session.sessionId, session);
    return cloneIntakeSession(session);
  }

  getSession(sessionId: string): IntakeSession | null {
    const session = this.sessions.get(sessionId);
    return session ? cloneIntakeSession(session) : null;
  }

  commit(session: IntakeSession): IntakeSession {
    if (!this.sessions.has(session.sessionId)) {
      throw new Error(`Session not found: ${session.sessionId}`);
    }
    this.sessions.set(session.sessionId, session);
    return session;
  }

  reset(sessionId: string): IntakeSession {
    const existing = this.sessions.get(sessionId);
    if (!existing) {
      throw new Error(`Session not found: ${sessionId}`);
    }
    const fresh = createIntakeSession(sessionId, this.now());
    fresh.createdAt = existing.createdAt;
    this.sessions.set(sessionId, fresh);
    return cloneIntakeSession(fresh);
  }

  /** Drops sessions idle for longer than `maxIdleMs` that have no turn in flight. */
  evictIdle(maxIdleMs: number): string[] {
    const cutoff = this.now().getTime() - maxIdleMs;
    const evicted: string[] = [];
    for (const [sessionId, session] of this.sessions) {
      if (this.queues.has(sessionId)) {
        continue;
      }
      const lastSeen = Date.parse(session.lastActivityAt ?? session.createdAt);
      if (lastSeen < cutoff) {
        this.sessions.delete(sessionId);
        evicted.push(sessionId);
      }
    }
    return evicted;
  }

  /**
   * Runs `task` after every earlier task for the same session has settled.
   * A rejected task does not block the queue.
   */
  runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.queues.set(sessionId, tail);
    void tail.then(() => {
      if (this.queues.get(sessionId) === tail) {
        this.queues.delete(sessionId);
      }
    });
    return result;
  }
}
