import { TextStats } from "../types";

export function computeTextStats(text: string, minTextChars: number, keywords: readonly string[]): TextStats {
  const compact = text.replace(/\s+/g, " ").trim();
  const lower = compact.toLowerCase();
  const words = compact === "" ? 0 : compact.split(" ").length;

  return {
    characters: compact.length,
    words,
    hasText: compact.length >= minTextChars,
    matchedKeywords: keywords.filter((keyword) => keyword.trim() !== "" && lower.includes(keyword.toLowerCase())),
  };
}

export function containsAnyTerm(text: string, terms: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return terms.some((term) => term.trim() !== "" && lower.includes(term.toLowerCase()));
}
