import techKeywords from "./tech-keywords.json";
import { TECH_CATEGORIES, TechStack } from "../../shared/types/candidate.types";
import { createEmptyTechStack } from "../profile.schemas";

const KEYWORD_MATCHERS: ReadonlyArray<{ category: keyof TechStack; keyword: string; pattern: RegExp }> =
  TECH_CATEGORIES.flatMap((category) =>
    techKeywords[category].map((keyword) => ({
      category,
      keyword,
      pattern: new RegExp(`(?<![\\w+#.])${escapeRegExp(keyword)}(?![\\w+#])`, "i"),
    })),
  );

/**
 * Keyword scan used when the language model returns no tech stack.
 * Matches whole tokens only, so "java" does not fire inside "javascript".
 */
export function extractTechStack(text: string): TechStack {
  const result = createEmptyTechStack();
  for (const matcher of KEYWORD_MATCHERS) {
    if (matcher.pattern.test(text)) {
      result[matcher.category].push(matcher.keyword);
    }
  }
  return result;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
