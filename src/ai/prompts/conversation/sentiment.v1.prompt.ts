export const SENTIMENT_V1_PROMPT = `Classify the sentiment of the candidate message as one of: positive, neutral, negative.
Output only the label.`;

export function buildSentimentV1Prompt(input: { message: string }): string {
  return [SENTIMENT_V1_PROMPT, "", "Message:", input.message.slice(0, 2000)].join("\n");
}
