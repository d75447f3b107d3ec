export type KeywordMatching = "substring" | "token";

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

export const splitWords = (text: string): string[] => text.split(/\s+/).filter(Boolean);

export const normalizeToken = (token: string): string =>
  token.toLowerCase().replace(EDGE_PUNCTUATION, "");

/** Lower-cased whitespace tokens with edge punctuation removed; empty tokens are dropped. */
export const tokenize = (text: string): string[] =>
  splitWords(text).map(normalizeToken).filter(Boolean);
