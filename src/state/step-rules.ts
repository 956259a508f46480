import { hasTechItems } from "../profiles/profile.schemas";
import { CandidateProfile } from "../shared/types/candidate.types";
import { ConversationStep } from "../shared/types/state.types";
import {
  STEP_PROMPTS,
  experienceRepromptMessage,
  locationRepromptMessage,
  missingContactInfoMessage,
  positionsRepromptMessage,
  techStackRepromptMessage,
} from "../chat/messages";

const STEP_PROGRESS: Record<ConversationStep, number> = {
  greeting: 0,
  collect_info: 10,
  collect_experience: 25,
  collect_positions: 40,
  collect_location: 55,
  collect_tech_stack: 70,
  generate_questions: 85,
  ask_questions: 95,
  conclusion: 100,
};

export function progressFor(step: ConversationStep): number {
  return STEP_PROGRESS[step];
}

export function missingInfoParts(profile: CandidateProfile): string[] {
  const parts: string[] = [];
  if (!profile.fullName) {
    parts.push("full name");
  }
  if (!profile.email) {
    parts.push("email address");
  }
  if (!profile.phone) {
    parts.push("phone number");
  }
  return parts;
}

/**
 * Completion predicate for the collection steps. Non-collection steps are
 * driven by the engine directly and report complete here.
 */
export function isStepComplete(step: ConversationStep, profile: CandidateProfile): boolean {
  switch (step) {
    case "collect_info":
      return missingInfoParts(profile).length === 0;
    case "collect_experience":
      return typeof profile.yearsExperience === "number";
    case "collect_positions":
      return (profile.desiredPositions?.length ?? 0) > 0;
    case "collect_location":
      return Boolean(profile.currentLocation);
    case "collect_tech_stack":
      return hasTechItems(profile.techStack);
    default:
      return true;
  }
}

export function incompletePrompt(step: ConversationStep, profile: CandidateProfile): string {
  switch (step) {
    case "collect_info": {
      const missing = missingInfoParts(profile);
      return missing.length === 3 ? STEP_PROMPTS.collect_info : missingContactInfoMessage(missing);
    }
    case "collect_experience":
      return experienceRepromptMessage();
    case "collect_positions":
      return positionsRepromptMessage();
    case "collect_location":
      return locationRepromptMessage();
    case "collect_tech_stack":
      return techStackRepromptMessage();
    default:
      return STEP_PROMPTS[step];
  }
}

/** Profile fields still missing, in collection order. Fed to the reply prompt. */
export function missingProfileFields(profile: CandidateProfile): string[] {
  const fields: string[] = [];
  if (!profile.fullName) {
    fields.push("full_name");
  }
  if (!profile.email) {
    fields.push("email");
  }
  if (!profile.phone) {
    fields.push("phone");
  }
  if (typeof profile.yearsExperience !== "number") {
    fields.push("years_experience");
  }
  if (!profile.desiredPositions?.length) {
    fields.push("desired_positions");
  }
  if (!profile.currentLocation) {
    fields.push("current_location");
  }
  if (!hasTechItems(profile.techStack)) {
    fields.push("tech_stack");
  }
  return fields;
}
