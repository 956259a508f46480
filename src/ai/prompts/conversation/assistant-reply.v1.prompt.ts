export const ASSISTANT_REPLY_V1_PROMPT = `Write the assistant's next chat reply.

You must:
- Ask for missing fields, one small batch at a time.
- Keep the reply under 120 words.
- Gently steer back if the candidate goes off topic.
- If the screening is finished, thank the candidate and outline next steps.
- Answer in the candidate's language when it is not English.
- Return plain text only.`;

export function buildAssistantReplyV1Prompt(input: {
  history: string;
  candidateJson: string;
  message: string;
  missingFields: ReadonlyArray<string>;
}): string {
  return [
    ASSISTANT_REPLY_V1_PROMPT,
    "",
    "Conversation so far:",
    input.history || "(empty)",
    "",
    "Current candidate record (partial):",
    input.candidateJson,
    "",
    "Last user message:",
    input.message,
    "",
    `Missing fields: ${input.missingFields.length ? input.missingFields.join(", ") : "none"}`,
  ].join("\n");
}
