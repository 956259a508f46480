export const TECHNICAL_QUESTIONS_V1_PROMPT = `You prepare technical screening questions for a candidate.

Return STRICT JSON only.
No markdown.
No commentary.

Output JSON:
{
  "questions": [
    { "topic": "<technology>", "questions": ["q1", "q2", "q3"] }
  ]
}

Rules:
- One topic per technology in the tech stack.
- Exactly 3 concise questions per technology.
- Questions test practical, hands-on proficiency.
- One objective per question.`;

export function buildTechnicalQuestionsV1Prompt(input: { techStackJson: string }): string {
  return [TECHNICAL_QUESTIONS_V1_PROMPT, "", "Tech stack JSON:", input.techStackJson].join("\n");
}
