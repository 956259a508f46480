export const EXIT_KEYWORDS: ReadonlySet<string> = new Set(["exit", "quit", "bye", "goodbye", "stop", "end"]);

export function containsExitKeyword(text: string): boolean {
  const words = (text || "").trim().toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
  return words.some((word) => EXIT_KEYWORDS.has(word));
}
