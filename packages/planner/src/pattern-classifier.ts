/**
 * Pattern Classifier — Pick the execution pattern for a query and file set
 *
 * Scoring, per catalog pattern:
 * - +2 for each intent keyword found (case-insensitive substring) in the query
 * - +1 for each distinct input file extension listed in the pattern's hints
 *
 * Highest score wins. Ties go to the lower complexity score, then to
 * catalog declaration order. Nothing above zero → the default pattern.
 *
 * Pure: the result depends only on (query, files).
 */

import { extname } from 'path';
import { PATTERN_CATALOG, getDefaultPattern, catalogIndex } from './pattern-catalog.js';
import type { Pattern, PatternMatch } from './types.js';

const KEYWORD_WEIGHT = 2;
const EXTENSION_WEIGHT = 1;

/**
 * Lower-cased extension with its leading dot, or '' when there is none.
 */
export function fileExtension(file: string): string {
  return extname(file).toLowerCase();
}

/**
 * Score one pattern against a query and its input files.
 */
export function scorePattern(pattern: Pattern, query: string, files: readonly string[]): PatternMatch {
  const lowerQuery = query.toLowerCase();

  const matchedKeywords = pattern.intentKeywords.filter(kw => lowerQuery.includes(kw.toLowerCase()));

  const extensions = new Set(files.map(fileExtension).filter(ext => ext !== ''));
  const matchedExtensions = [...extensions].filter(ext => pattern.fileTypeHints.includes(ext));

  return {
    pattern,
    score: matchedKeywords.length * KEYWORD_WEIGHT + matchedExtensions.length * EXTENSION_WEIGHT,
    matchedKeywords,
    matchedExtensions,
  };
}

/**
 * Score every catalog pattern, ranked best first using the same
 * tie-breaking rules as classify().
 */
export function scorePatterns(query: string, files: readonly string[]): PatternMatch[] {
  return PATTERN_CATALOG
    .map(pattern => scorePattern(pattern, query, files))
    .sort(compareMatches);
}

/**
 * Classify a query into a pattern. Never fails: with no signal at all
 * the default (simple Q&A) pattern is returned.
 */
export function classify(query: string, files: readonly string[]): Pattern {
  const [best] = scorePatterns(query, files);
  if (!best || best.score <= 0) {
    return getDefaultPattern();
  }
  return best.pattern;
}

function compareMatches(a: PatternMatch, b: PatternMatch): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.pattern.complexityScore !== b.pattern.complexityScore) {
    return a.pattern.complexityScore - b.pattern.complexityScore;
  }
  return catalogIndex(a.pattern.type) - catalogIndex(b.pattern.type);
}
