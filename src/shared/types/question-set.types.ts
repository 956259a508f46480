export interface QuestionTopic {
  readonly topic: string;
  readonly questions: ReadonlyArray<string>;
}

export type QuestionSetSource = "llm" | "fallback";

export interface QuestionSet {
  readonly source: QuestionSetSource;
  readonly topics: ReadonlyArray<QuestionTopic>;
}

export interface QuestionCursor {
  topicIndex: number;
  questionIndex: number;
}
