import { hasTechItems } from "../profiles/profile.schemas";
import { extractYearsExperience } from "../profiles/parsers/experience.parser";
import { extractTechStack } from "../profiles/parsers/tech-stack.parser";
import { ExtractedProfileFields } from "../shared/types/candidate.types";
import { ConversationStep } from "../shared/types/state.types";

/**
 * Fills gaps the language model left for the field the current step asks
 * for. A derived experience of 0 means nothing was found and is not applied;
 * an explicit 0 from the model survives unless the text yields a larger total.
 */
export function supplementExtraction(
  fields: ExtractedProfileFields,
  message: string,
  step: ConversationStep,
  currentYear: number = new Date().getFullYear(),
): ExtractedProfileFields {
  const output: ExtractedProfileFields = { ...fields };

  if (step === "collect_experience" && isMissingExperience(fields.yearsExperience)) {
    const years = extractYearsExperience(message, currentYear);
    if (years > 0) {
      output.yearsExperience = String(years);
    }
  }

  if (step === "collect_tech_stack" && !hasTechItems(fields.techStack)) {
    const detected = extractTechStack(message);
    if (hasTechItems(detected)) {
      output.techStack = detected;
    }
  }

  return output;
}

function isMissingExperience(value: string | undefined): boolean {
  if (value === undefined) {
    return true;
  }
  const trimmed = value.trim();
  return !trimmed || Number(trimmed) === 0;
}
