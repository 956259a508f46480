import { TECH_CATEGORIES, TechStack } from "../shared/types/candidate.types";
import { QuestionSet, QuestionTopic } from "../shared/types/question-set.types";

export const MAX_FALLBACK_TOPICS = 5;
export const MAX_GENERATED_TOPICS = 10;
export const MAX_QUESTIONS_PER_TOPIC = 5;

const GENERIC_TOPIC = "Your Experience";
const GENERIC_QUESTIONS: ReadonlyArray<string> = [
  "Describe your most challenging project.",
  "How do you approach learning new technologies?",
  "What's your experience with team collaboration?",
  "How do you ensure code quality?",
];

function templateQuestions(technology: string): string[] {
  return [
    `Describe your experience with ${technology}.`,
    `What are the key features of ${technology}?`,
    `How do you debug issues in ${technology}?`,
    `Give an example project using ${technology}.`,
  ];
}

/** Category order, first occurrence wins. */
export function flattenTechStack(techStack: Partial<TechStack> | undefined): string[] {
  const output: string[] = [];
  const seen = new Set<string>();
  for (const category of TECH_CATEGORIES) {
    for (const item of techStack?.[category] ?? []) {
      const trimmed = item.trim();
      if (!trimmed || seen.has(trimmed)) {
        continue;
      }
      seen.add(trimmed);
      output.push(trimmed);
    }
  }
  return output;
}

export function buildFallbackQuestionSet(techStack: Partial<TechStack> | undefined): QuestionSet {
  const technologies = flattenTechStack(techStack).slice(0, MAX_FALLBACK_TOPICS);
  if (technologies.length === 0) {
    return freezeQuestionSet({
      source: "fallback",
      topics: [{ topic: GENERIC_TOPIC, questions: [...GENERIC_QUESTIONS] }],
    });
  }
  return freezeQuestionSet({
    source: "fallback",
    topics: technologies.map((technology) => ({
      topic: technology,
      questions: templateQuestions(technology),
    })),
  });
}

/**
 * Accepts `{ questions: [{ topic, questions: [...] }] }` as produced by the
 * generation prompt. Returns null when no usable topic survives.
 */
export function normalizeGeneratedQuestionSet(raw: unknown): QuestionSet | null {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return null;
  }
  const entries: unknown = "questions" in raw ? raw.questions : undefined;
  if (!Array.isArray(entries)) {
    return null;
  }

  const topics: QuestionTopic[] = [];
  for (const entry of entries) {
    const topic = normalizeTopic(entry);
    if (topic) {
      topics.push(topic);
    }
    if (topics.length >= MAX_GENERATED_TOPICS) {
      break;
    }
  }
  if (topics.length === 0) {
    return null;
  }
  return freezeQuestionSet({ source: "llm", topics });
}

function normalizeTopic(entry: unknown): QuestionTopic | null {
  if (typeof entry !== "object" || entry === null) {
    return null;
  }
  const topicRaw: unknown = "topic" in entry ? entry.topic : undefined;
  const questionsRaw: unknown = "questions" in entry ? entry.questions : undefined;
  if (typeof topicRaw !== "string" || !topicRaw.trim() || !Array.isArray(questionsRaw)) {
    return null;
  }
  const questions = questionsRaw
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .slice(0, MAX_QUESTIONS_PER_TOPIC);
  if (questions.length === 0) {
    return null;
  }
  return { topic: topicRaw.trim(), questions };
}

function freezeQuestionSet(set: QuestionSet): QuestionSet {
  const topics = set.topics.map((topic) =>
    Object.freeze({
      topic: topic.topic,
      questions: Object.freeze([...topic.questions]),
    }),
  );
  return Object.freeze({
    source: set.source,
    topics: Object.freeze(topics),
  });
}
