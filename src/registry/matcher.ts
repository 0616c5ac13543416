/**
 * Skill Matchers - Rank registry entries against a task description
 */

import type { MatchOptions, SkillMatch, SkillRegistryEntry } from './types.js';
import { logger } from '../base/utils/logger.js';
import { isVerboseDebugEnabled } from '../base/utils/debug.js';

/**
 * Pluggable ranking strategy
 *
 * Implementations return matches ordered by descending score. An empty
 * result means no skill applies.
 */
export interface Matcher {
  readonly name: string;
  rank(
    intent: string,
    entries: readonly SkillRegistryEntry[],
    options?: MatchOptions
  ): SkillMatch[] | Promise<SkillMatch[]>;
}

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'how', 'i',
  'in', 'into', 'is', 'it', 'me', 'my', 'of', 'on', 'or', 'our', 'that', 'the',
  'this', 'to', 'use', 'we', 'what', 'when', 'with', 'you', 'your', 'need',
]);

const NAME_WEIGHT = 2;
const DESCRIPTION_WEIGHT = 1;
const MIN_PREFIX = 4;

/**
 * Lower-case words, split on non-alphanumerics, stop-words dropped
 */
export function tokenize(text: string): string[] {
  const terms = text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((term) => term.length > 0 && !STOP_WORDS.has(term));
  return [...new Set(terms)];
}

function commonPrefixLength(a: string, b: string): number {
  const max = Math.min(a.length, b.length);
  let i = 0;
  while (i < max && a[i] === b[i]) i++;
  return i;
}

/**
 * Exact match, or a shared prefix of at least four characters
 * ("testing" ~ "tests", "observability" ~ "observe")
 */
export function termsMatch(a: string, b: string): boolean {
  return a === b || commonPrefixLength(a, b) >= MIN_PREFIX;
}

/**
 * Deterministic keyword overlap matcher
 *
 * Each intent term scores 2 when it hits the skill name and 1 when it
 * hits the description. The total is divided by the best possible score.
 */
export class KeywordMatcher implements Matcher {
  readonly name = 'keyword';

  constructor(private readonly defaults: Required<MatchOptions> = { limit: 5, minScore: 0 }) {}

  rank(
    intent: string,
    entries: readonly SkillRegistryEntry[],
    options: MatchOptions = {}
  ): SkillMatch[] {
    const limit = options.limit ?? this.defaults.limit;
    const minScore = options.minScore ?? this.defaults.minScore;
    const intentTerms = tokenize(intent);

    if (intentTerms.length === 0 || limit <= 0) {
      return [];
    }

    const best = intentTerms.length * (NAME_WEIGHT + DESCRIPTION_WEIGHT);
    const matches: SkillMatch[] = [];

    for (const entry of entries) {
      const nameTerms = tokenize(entry.name);
      const descriptionTerms = tokenize(entry.description);
      const matchedTerms: string[] = [];
      let total = 0;

      for (const term of intentTerms) {
        const nameHit = nameTerms.some((candidate) => termsMatch(term, candidate));
        const descriptionHit = descriptionTerms.some((candidate) => termsMatch(term, candidate));

        if (nameHit) total += NAME_WEIGHT;
        if (descriptionHit) total += DESCRIPTION_WEIGHT;
        if (nameHit || descriptionHit) matchedTerms.push(term);
      }

      const score = total / best;
      if (score > 0 && score >= minScore) {
        matches.push({ name: entry.name, score, matchedTerms });
      }
    }

    // Array.prototype.sort is stable: ties keep registry order
    matches.sort((a, b) => b.score - a.score);

    if (isVerboseDebugEnabled('matcher')) {
      logger.debug(
        'matcher',
        'Ranked skills',
        {
          intent,
          candidates: matches.map((match) => `${match.name}:${match.score.toFixed(2)}`),
        },
        2
      );
    }

    return matches.slice(0, limit);
  }
}
