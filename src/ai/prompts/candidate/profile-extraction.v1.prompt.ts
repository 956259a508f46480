import { ConversationStep } from "../../../shared/types/state.types";

export const PROFILE_EXTRACTION_V1_PROMPT = `You convert one free-form chat message into a JSON patch for a candidate record.

Return STRICT JSON only.
No markdown.
No commentary.

Allowed keys:
- full_name: string
- email: string
- phone: string
- years_experience: number
- desired_positions: array of strings
- current_location: string
- tech_stack: object with keys programming_languages, frameworks, databases, tools, each an array of strings
- language_preference: string

Rules:
- Extract only information that is explicitly stated in the message.
- Never infer or guess values.
- years_experience: use explicit mentions of years of experience, internships or work duration. If the message is a resume, use the total years of experience it states.
- desired_positions: job titles the candidate is interested in.
- current_location: city, state or country.
- tech_stack: put every mentioned technology in the matching category.
- Do not react to conversation-ending words.
- Omit keys you cannot extract with confidence.
- If nothing can be extracted, return {}.`;

export function buildProfileExtractionV1Prompt(input: {
  message: string;
  step?: ConversationStep;
}): string {
  return [
    PROFILE_EXTRACTION_V1_PROMPT,
    "",
    "Runtime context:",
    JSON.stringify(
      {
        current_step: input.step ?? null,
        message: input.message.slice(0, 6000),
      },
      null,
      2,
    ),
  ].join("\n");
}
