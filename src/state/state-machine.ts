import { ConversationStep, IntakeSession } from "../shared/types/state.types";
import { isAllowedTransition } from "./transition-rules";

export function assertTransition(from: ConversationStep, to: ConversationStep): void {
  if (!isAllowedTransition(from, to)) {
    throw new Error(`Invalid transition from ${from} to ${to}`);
  }
}

export function transitionSession(session: IntakeSession, to: ConversationStep): void {
  assertTransition(session.step, to);
  session.step = to;
}
