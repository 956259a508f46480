import { ConversationStep } from "../shared/types/state.types";

/** Lead-in text emitted when a step is entered. */
export const STEP_PROMPTS: Record<ConversationStep, string> = {
  greeting:
    "Hello! I'm your hiring assistant. I'll collect your basic details and tech stack, then ask a few tailored technical questions. You can type 'bye' to finish anytime.",
  collect_info: "Could you please share your full name, email address, and phone number?",
  collect_experience: "Thank you! Now, could you please share your years of experience in the industry?",
  collect_positions: "Great! What position(s) are you interested in?",
  collect_location: "Thank you! What is your current location?",
  collect_tech_stack:
    "Please list your technical stack including programming languages, frameworks, databases, and tools.",
  generate_questions:
    "I'm preparing some technical questions based on your tech stack. This will take just a moment.",
  ask_questions: "I have some technical questions for you. Let's start with the first technology.",
  conclusion: "Thank you for completing the screening! We'll review your details and reach out about next steps.",
};

export function missingContactInfoMessage(missingParts: ReadonlyArray<string>): string {
  return `Thank you! I still need your ${missingParts.join(", ")}. Could you please provide that?`;
}

export function experienceRepromptMessage(): string {
  return "Could you please share your years of experience in the industry? You can provide a summary of your work history if that's easier.";
}

export function positionsRepromptMessage(): string {
  return "What position(s) are you interested in?";
}

export function locationRepromptMessage(): string {
  return "What is your current location?";
}

export function techStackRepromptMessage(): string {
  return STEP_PROMPTS.collect_tech_stack;
}

export function firstQuestionMessage(topic: string, question: string): string {
  return `I have prepared some technical questions for you. Let's start with **${topic}**: ${question}`;
}

export function nextQuestionSameTopicMessage(topic: string, question: string): string {
  return `Thank you! Next question about **${topic}**: ${question}`;
}

export function nextTopicMessage(previousTopic: string, topic: string, question: string): string {
  return `Thank you for your answer about ${previousTopic}! Now let's talk about **${topic}**: ${question}`;
}

export function extractionFailedMessage(): string {
  return "I'm sorry, I couldn't process that. Please try again.";
}

export function sessionResetAfterErrorsMessage(): string {
  return `Too many errors occurred, so let's start over.\n\n${STEP_PROMPTS.greeting}\n\n${STEP_PROMPTS.collect_info}`;
}

export function messageTooLongMessage(maxLength: number): string {
  return `That message is too long. Please keep it under ${maxLength} characters.`;
}

export function answerTruncatedWarning(): string {
  return "Your answer was truncated due to length limitations.";
}

export function emptyMessageReply(): string {
  return "Please type a message to continue.";
}

export function rateLimitedMessage(): string {
  return "I'm receiving too many requests right now. Please try again in a moment.";
}

export function assistantReplyFallbackMessage(): string {
  return "I'm sorry, I'm having trouble responding right now. Please try again.";
}

export function savedMessage(): string {
  return "Your details were stored securely.";
}

export function notSavedWithoutConsentMessage(): string {
  return "Not saved (no consent). Enable consent to allow storage.";
}

export function saveFailedMessage(): string {
  return "Sorry, your details could not be saved.";
}

export function noQuestionsMessage(): string {
  return "I don't have any questions to ask right now.";
}
