/**
 * Feature Matching
 *
 * Token-overlap heuristic behind each matrix cell: a feature is reduced to
 * content tokens (English words or 2-8 CJK ideographs, generic words removed,
 * synonyms appended) and a text scores the fraction of those tokens it
 * contains.
 *
 * @module analyzer/feature-matching
 */

import type { MatrixConfig } from "../config-schemas";
import type { MatrixLabel } from "../types";
import type { MatrixLexicon } from "./lexicon";

const TOKEN_PATTERN = /[A-Za-z][A-Za-z0-9_-]{1,30}|[\u4e00-\u9fff]{2,8}/g;

export function roundTo(value: number, places = 3): number {
  const factor = Math.pow(10, places);
  return Math.round(value * factor) / factor;
}

export function tokenizeFeature(text: string, lexicon: MatrixLexicon): string[] {
  const out: string[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const token = match[0].toLowerCase();
    if (lexicon.generic.has(token)) continue;
    out.push(token);
    out.push(...(lexicon.synonyms.get(token) ?? []));
  }
  return [...new Set(out)];
}

/**
 * Fraction of tokens found (substring) in an already lower-cased text.
 */
export function scoreTokensInText(tokens: readonly string[], lowerText: string): number {
  if (tokens.length === 0 || !lowerText) return 0;
  const hits = tokens.filter((t) => lowerText.includes(t)).length;
  return hits / tokens.length;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function labelForScore(
  score: number,
  cfg: Pick<MatrixConfig, "yesThreshold" | "partialThreshold">,
): MatrixLabel {
  if (score >= cfg.yesThreshold) return "YES";
  if (score >= cfg.partialThreshold) return "PARTIAL";
  return "NO";
}

/**
 * Windows of ±`window` chars around token occurrences, whitespace
 * collapsed, without duplicates, at most `maxSnippets`.
 */
export function extractSnippets(
  text: string,
  tokens: readonly string[],
  maxSnippets: number,
  window: number,
): string[] {
  const snippets: string[] = [];
  if (!text || maxSnippets <= 0) return snippets;

  // Search the original text so match offsets index it directly
  for (const token of tokens) {
    if (!token) continue;
    const pattern = new RegExp(escapeRegExp(token), "gi");
    for (let match = pattern.exec(text); match; match = pattern.exec(text)) {
      const start = Math.max(0, match.index - window);
      const end = Math.min(text.length, match.index + match[0].length + window);
      const snippet = text.slice(start, end).replace(/\s+/g, " ").trim();
      if (snippet && !snippets.includes(snippet)) {
        snippets.push(snippet);
        if (snippets.length >= maxSnippets) return snippets;
      }
    }
  }
  return snippets;
}
