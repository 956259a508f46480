import { ConversationStep } from "../shared/types/state.types";

export const STEP_ORDER: ReadonlyArray<ConversationStep> = [
  "greeting",
  "collect_info",
  "collect_experience",
  "collect_positions",
  "collect_location",
  "collect_tech_stack",
  "generate_questions",
  "ask_questions",
  "conclusion",
];

// Every step may jump to conclusion (exit keyword) or back to greeting (reset).
const transitionRules: Record<ConversationStep, ConversationStep[]> = {
  greeting: ["collect_info", "conclusion", "greeting"],
  collect_info: ["collect_experience", "conclusion", "greeting"],
  collect_experience: ["collect_positions", "conclusion", "greeting"],
  collect_positions: ["collect_location", "conclusion", "greeting"],
  collect_location: ["collect_tech_stack", "conclusion", "greeting"],
  collect_tech_stack: ["generate_questions", "conclusion", "greeting"],
  generate_questions: ["ask_questions", "conclusion", "greeting"],
  ask_questions: ["conclusion", "greeting"],
  conclusion: ["greeting"],
};

export function isAllowedTransition(from: ConversationStep, to: ConversationStep): boolean {
  return transitionRules[from].includes(to);
}

export function nextStep(step: ConversationStep): ConversationStep {
  const index = STEP_ORDER.indexOf(step);
  return STEP_ORDER[Math.min(index + 1, STEP_ORDER.length - 1)] ?? "conclusion";
}
