import type { Section, TaskDescriptor } from "../types.js";

const WORD_CHAR = "[\\p{L}\\p{N}_]";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Case-insensitive whole-word matcher: "test" matches "a test run" but not
 * "latest". Edges are checked with lookarounds rather than \b so keywords
 * that end in punctuation ("c++") still match.
 */
export function keywordPattern(keyword: string): RegExp {
  return new RegExp(`(?<!${WORD_CHAR})${escapeRegExp(keyword)}(?!${WORD_CHAR})`, "iu");
}

export interface KeywordMatcher {
  hasExcluded(text: string): boolean;
  hasIncluded(text: string): boolean;
}

function compile(keywords: readonly string[]): RegExp[] {
  return keywords
    .map((k) => k.trim())
    .filter((k) => k.length > 0)
    .map(keywordPattern);
}

export function createKeywordMatcher(task: Pick<TaskDescriptor, "includeKeywords" | "excludeKeywords">): KeywordMatcher {
  const include = compile(task.includeKeywords);
  const exclude = compile(task.excludeKeywords);
  return {
    hasExcluded: (text) => exclude.some((re) => re.test(text)),
    hasIncluded: (text) => include.length === 0 || include.some((re) => re.test(text)),
  };
}

export function sectionText(section: Pick<Section, "title" | "body">): string {
  return `${section.title} ${section.body}`;
}

export function isCompliant(section: Section, matcher: KeywordMatcher): boolean {
  const text = sectionText(section);
  return !matcher.hasExcluded(text) && matcher.hasIncluded(text);
}
