import { QuestionCursor, QuestionSet, QuestionTopic } from "../shared/types/question-set.types";

export interface CursorAdvance {
  cursor: QuestionCursor;
  previousTopic: string;
  exhausted: boolean;
  topicChanged: boolean;
}

export function initialCursor(): QuestionCursor {
  return { topicIndex: 0, questionIndex: 0 };
}

export function isCursorExhausted(set: QuestionSet, cursor: QuestionCursor): boolean {
  return cursor.topicIndex >= set.topics.length;
}

export function currentTopic(set: QuestionSet, cursor: QuestionCursor): QuestionTopic | null {
  return set.topics[cursor.topicIndex] ?? null;
}

export function currentQuestion(set: QuestionSet, cursor: QuestionCursor): string | null {
  return currentTopic(set, cursor)?.questions[cursor.questionIndex] ?? null;
}

/**
 * Moves past the question that was just answered. `previousTopic` is the
 * topic the answer belonged to; the new position may be exhausted.
 */
export function advanceCursor(set: QuestionSet, cursor: QuestionCursor): CursorAdvance {
  const topic = currentTopic(set, cursor);
  if (!topic) {
    return { cursor: { ...cursor }, previousTopic: "", exhausted: true, topicChanged: false };
  }

  let topicIndex = cursor.topicIndex;
  let questionIndex = cursor.questionIndex + 1;
  if (questionIndex >= topic.questions.length) {
    questionIndex = 0;
    topicIndex += 1;
  }
  const next = { topicIndex, questionIndex };
  return {
    cursor: next,
    previousTopic: topic.topic,
    exhausted: isCursorExhausted(set, next),
    topicChanged: topicIndex !== cursor.topicIndex,
  };
}
