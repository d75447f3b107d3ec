import { type KeywordMatching, tokenize } from "../util/tokens";
import type { PatternLibrary } from "./pattern-library";

const matchesTokenRun = (contextTokens: readonly string[], keywordTokens: readonly string[]) => {
  if (keywordTokens.length === 0) return false;

  for (let i = 0; i + keywordTokens.length <= contextTokens.length; i++) {
    if (keywordTokens.every((keyword, j) => contextTokens[i + j].startsWith(keyword))) {
      return true;
    }
  }
  return false;
};

/**
 * First configured category with a keyword in the context, or undefined.
 *
 * In "token" mode a keyword is a word stem: it matches a word that starts with
 * it (multi-word keywords match consecutive words), never the middle of a word.
 */
export const categorize = (
  context: string,
  library: PatternLibrary,
  mode: KeywordMatching = library.categoryMatching,
): string | undefined => {
  if (mode === "substring") {
    const haystack = context.toLowerCase();
    const hit = library.categoryKeywords.find(([, keywords]) =>
      keywords.some((keyword) => haystack.includes(keyword.toLowerCase())),
    );
    return hit?.[0];
  }

  const contextTokens = tokenize(context);
  const hit = library.categoryKeywords.find(([, keywords]) =>
    keywords.some((keyword) => matchesTokenRun(contextTokens, tokenize(keyword))),
  );
  return hit?.[0];
};
