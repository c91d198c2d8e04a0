/**
 * Term overlap between a query and chunk text, used to promote chunks that
 * share the query's vocabulary even when their embedding score is middling.
 */

const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "can", "did", "do", "does",
  "for", "from", "how", "in", "is", "it", "of", "on", "or", "that", "the",
  "this", "to", "was", "what", "when", "where", "which", "who", "why", "with",
]);

/**
 * Lowercased terms of at least two characters. snake_case identifiers also
 * contribute their parts.
 */
export function tokenize(text: string): string[] {
  const tokens = text
    .toLowerCase()
    .split(/[\s\-.,;:!?()[\]{}"'`<>/\\|@#$%^&*+=~]+/)
    .filter((t) => t.length > 0);

  const expanded: string[] = [];
  for (const token of tokens) {
    expanded.push(token);
    if (token.includes("_")) {
      expanded.push(...token.split("_").filter((p) => p.length > 0));
    }
  }
  return [...new Set(expanded)].filter((t) => t.length >= 2);
}

export function queryTerms(query: string): string[] {
  return tokenize(query).filter((t) => !STOPWORDS.has(t));
}

/** Fraction of query terms present in the text, in [0, 1]. */
export function keywordOverlap(terms: string[], text: string): number {
  if (terms.length === 0) return 0;
  const vocabulary = new Set(tokenize(text));
  const matched = terms.filter((t) => vocabulary.has(t)).length;
  return matched / terms.length;
}
