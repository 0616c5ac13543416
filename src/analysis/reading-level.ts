/**
 * Reading Level Analysis - Reading time and complexity of markdown documents
 *
 * Lines are classified as prose, code blocks, headers, list items or
 * table rows. Each class is read at its own speed (words per minute).
 */

import technicalTerms from './technical-terms.json';

export const READING_SPEEDS = {
  text: 250,
  code: 100,
  data: 180,
  lists: 300,
  headers: 400,
} as const;

const DATA_LANGUAGES = new Set(['json', 'yaml', 'yml']);
const SIMPLE_CODE_LANGUAGES = new Set(['json', 'yaml', 'yml', 'http']);

export const READING_LEVELS = ['Beginner', 'Intermediate', 'Advanced'] as const;
export type ReadingLevel = (typeof READING_LEVELS)[number];

export type FleschInterpretation =
  | 'Very Easy'
  | 'Easy'
  | 'Fairly Easy'
  | 'Fairly Difficult'
  | 'Difficult'
  | 'Very Difficult';

export interface CodeBlock {
  language: string;
  content: string;
  wordCount: number;
}

export interface ContentBreakdown {
  text: string[];
  codeBlocks: CodeBlock[];
  headers: string[];
  lists: string[];
  tables: string[];
}

export interface ReadingTime {
  totalMinutes: number;
  breakdown: {
    text: number;
    code: number;
    other: number;
  };
}

export interface ComplexityMetrics {
  totalWords: number;
  sentences: number;
  avgWordsPerSentence: number;
  /** Percentage of distinct technical terms per word */
  technicalDensity: number;
  technicalTerms: string[];
  fleschScore: number;
  gradeLevel: number;
  codeBlocks: number;
  /** A code block in something other than JSON, YAML or HTTP */
  hasComplexCode: boolean;
}

export interface ReadingAssessment {
  level: ReadingLevel;
  reasoning: string[];
  fleschInterpretation: FleschInterpretation;
}

export interface DocumentAnalysis {
  /** Label for reports (skill name or reference path) */
  name: string;
  readingTime: ReadingTime;
  complexity: ComplexityMetrics;
  readingLevel: ReadingAssessment;
}

export interface AnalysisSummary {
  totalDocuments: number;
  distributionByLevel: Partial<Record<ReadingLevel, number>>;
  averages: {
    readingTime: number;
    gradeLevel: number;
    technicalDensity: number;
  };
  mostComplex: Array<{ name: string; gradeLevel: number; level: ReadingLevel }>;
  longestReads: Array<{ name: string; minutes: number; level: ReadingLevel }>;
}

const round1 = (value: number): number => Math.round(value * 10) / 10;

export function countWords(text: string): number {
  return text.match(/\b\w+\b/g)?.length ?? 0;
}

/**
 * Vowel groups per word, minus a silent trailing "e", at least one
 */
export function countSyllables(text: string): number {
  const words = text.toLowerCase().match(/\b[a-z]+\b/g) ?? [];
  return words.reduce((count, word) => {
    let syllables = word.match(/[aeiouy]+/g)?.length ?? 0;
    if (word.endsWith('e')) syllables--;
    return count + Math.max(1, syllables);
  }, 0);
}

export function parseContent(content: string): ContentBreakdown {
  const breakdown: ContentBreakdown = {
    text: [],
    codeBlocks: [],
    headers: [],
    lists: [],
    tables: [],
  };

  let block: { language: string; lines: string[] } | null = null;

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    if (trimmed.startsWith('```')) {
      if (block) {
        const blockContent = block.lines.map((codeLine) => `${codeLine}\n`).join('');
        breakdown.codeBlocks.push({
          language: block.language,
          content: blockContent,
          wordCount: countWords(blockContent),
        });
        block = null;
      } else {
        block = { language: trimmed.slice(3).trim().toLowerCase(), lines: [] };
      }
      continue;
    }

    if (block) {
      block.lines.push(line);
      continue;
    }

    if (trimmed.startsWith('#')) {
      breakdown.headers.push(trimmed);
    } else if (/^[-*+]\s/.test(trimmed) || /^\d+\.\s/.test(trimmed)) {
      breakdown.lists.push(trimmed);
    } else if (trimmed.includes('|')) {
      breakdown.tables.push(trimmed);
    } else if (trimmed.length > 0) {
      breakdown.text.push(trimmed);
    }
  }

  return breakdown;
}

export function calculateReadingTime(breakdown: ContentBreakdown): ReadingTime {
  const textWords = countWords(breakdown.text.join(' '));
  const listWords = countWords(breakdown.lists.join(' '));
  const headerWords = countWords(breakdown.headers.join(' '));
  const tableWords = countWords(breakdown.tables.join(' '));
  const codeWords = breakdown.codeBlocks.reduce((sum, block) => sum + block.wordCount, 0);

  let minutes = textWords / READING_SPEEDS.text;
  for (const block of breakdown.codeBlocks) {
    const speed = DATA_LANGUAGES.has(block.language) ? READING_SPEEDS.data : READING_SPEEDS.code;
    minutes += block.wordCount / speed;
  }
  minutes += listWords / READING_SPEEDS.lists;
  minutes += headerWords / READING_SPEEDS.headers;
  minutes += tableWords / ((READING_SPEEDS.text + READING_SPEEDS.lists) / 2);

  return {
    totalMinutes: Math.ceil(minutes),
    breakdown: {
      text: Math.ceil(textWords / READING_SPEEDS.text),
      code: Math.ceil(codeWords / READING_SPEEDS.code),
      other: Math.ceil((listWords + headerWords + tableWords) / READING_SPEEDS.lists),
    },
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const TERM_PATTERNS: ReadonlyArray<[string, RegExp]> = technicalTerms.map((term): [string, RegExp] => [
  term,
  new RegExp(`\\b${escapeRegExp(term.toLowerCase())}\\b`),
]);

/**
 * Technical terms that occur in the text as whole words
 */
export function findTechnicalTerms(text: string): string[] {
  const lower = text.toLowerCase();
  return TERM_PATTERNS.filter(([, pattern]) => pattern.test(lower)).map(([term]) => term);
}

export function calculateComplexity(breakdown: ContentBreakdown): ComplexityMetrics {
  const allText = [...breakdown.text, ...breakdown.lists, ...breakdown.headers].join(' ').toLowerCase();

  const totalWords = countWords(allText);
  const sentences = allText.split(/[.!?]+/).filter((sentence) => sentence.trim().length > 0).length;
  const terms = findTechnicalTerms(allText);
  const syllables = countSyllables(allText);

  const hasText = totalWords > 0 && sentences > 0;
  const wordsPerSentence = hasText ? totalWords / sentences : 0;
  const syllablesPerWord = hasText ? syllables / totalWords : 0;

  return {
    totalWords,
    sentences,
    avgWordsPerSentence: round1(wordsPerSentence),
    technicalDensity: totalWords > 0 ? round1((terms.length / totalWords) * 100) : 0,
    technicalTerms: terms,
    fleschScore: hasText ? round1(206.835 - 1.015 * wordsPerSentence - 84.6 * syllablesPerWord) : 0,
    gradeLevel: hasText ? round1(0.39 * wordsPerSentence + 11.8 * syllablesPerWord - 15.59) : 0,
    codeBlocks: breakdown.codeBlocks.length,
    hasComplexCode: breakdown.codeBlocks.some((block) => !SIMPLE_CODE_LANGUAGES.has(block.language)),
  };
}

function escalate(level: ReadingLevel): ReadingLevel {
  const index = READING_LEVELS.indexOf(level);
  return READING_LEVELS[Math.min(index + 1, READING_LEVELS.length - 1)];
}

export function interpretFleschScore(score: number): FleschInterpretation {
  if (score >= 70) return 'Very Easy';
  if (score >= 60) return 'Easy';
  if (score >= 50) return 'Fairly Easy';
  if (score >= 30) return 'Fairly Difficult';
  if (score >= 10) return 'Difficult';
  return 'Very Difficult';
}

export function determineReadingLevel(complexity: ComplexityMetrics): ReadingAssessment {
  let level: ReadingLevel;
  const reasoning: string[] = [];

  if (complexity.gradeLevel <= 12) {
    level = 'Beginner';
    reasoning.push('accessible language');
  } else if (complexity.gradeLevel <= 16) {
    level = 'Intermediate';
    reasoning.push('moderate complexity');
  } else {
    level = 'Advanced';
    reasoning.push('complex language');
  }

  if (complexity.technicalDensity > 20) {
    level = escalate(level);
    reasoning.push('high technical density');
  } else if (complexity.technicalDensity < 10) {
    reasoning.push('low technical density');
  }

  if (complexity.hasComplexCode) {
    level = escalate(level);
    reasoning.push('complex code examples');
  }

  if (complexity.avgWordsPerSentence > 20) {
    level = escalate(level);
    reasoning.push('long sentences');
  }

  return {
    level,
    reasoning,
    fleschInterpretation: interpretFleschScore(complexity.fleschScore),
  };
}

/**
 * Analyze one markdown document
 */
export function analyzeDocument(content: string, name: string = 'document'): DocumentAnalysis {
  const breakdown = parseContent(content);
  const complexity = calculateComplexity(breakdown);

  return {
    name,
    readingTime: calculateReadingTime(breakdown),
    complexity,
    readingLevel: determineReadingLevel(complexity),
  };
}

const ADVANCED_TERMS = new Set(['hateoas', 'oauth', 'jwt', 'circuit breaker', 'reactive']);

/**
 * Background a reader needs, by level and by the terms the document uses
 */
export function suggestPrerequisites(level: ReadingLevel, terms: readonly string[]): string {
  if (level === 'Beginner') {
    return 'Basic HTTP knowledge';
  }
  if (level === 'Intermediate') {
    return terms.some((term) => ADVANCED_TERMS.has(term))
      ? 'HTTP fundamentals, basic API experience'
      : 'Basic REST API knowledge';
  }
  return 'Strong API background, experience with complex systems';
}

const TOPIC_BY_TERM = new Map<string, string>([
  ['oauth', 'Authentication'],
  ['jwt', 'Authentication'],
  ['cors', 'Security'],
  ['hateoas', 'REST'],
  ['pagination', 'Data'],
  ['reactive', 'Architecture'],
  ['streaming', 'Architecture'],
  ['microservice', 'Architecture'],
  ['openapi', 'Documentation'],
  ['cache', 'Performance'],
  ['cdn', 'Performance'],
  ['contract testing', 'Quality'],
  ['actuator', 'Observability'],
  ['prometheus', 'Observability'],
  ['tracing', 'Observability'],
  ['telemetry', 'Observability'],
]);

const MAX_TOPICS = 3;

/**
 * Up to three topics in order of the terms found; "API Design" when none map
 */
export function extractKeyTopics(terms: readonly string[]): string[] {
  const topics = new Set<string>();
  for (const term of terms) {
    const topic = TOPIC_BY_TERM.get(term);
    if (topic) topics.add(topic);
  }
  return topics.size > 0 ? [...topics].slice(0, MAX_TOPICS) : ['API Design'];
}

/**
 * Markdown blockquote summarizing reading time, level and complexity
 */
export function formatReadingGuide(analysis: DocumentAnalysis): string {
  const { complexity, readingLevel, readingTime } = analysis;
  const minutes = readingTime.totalMinutes;
  const timeText = minutes === 1 ? '1 minute' : `${minutes} minutes`;

  return [
    '> **Reading Guide**',
    '>',
    `> **Reading Time:** ${timeText} | **Level:** ${readingLevel.level}`,
    '>',
    `> **Prerequisites:** ${suggestPrerequisites(readingLevel.level, complexity.technicalTerms)}  `,
    `> **Key Topics:** ${extractKeyTopics(complexity.technicalTerms).join(', ')}`,
    '>',
    `> **Complexity:** ${complexity.gradeLevel.toFixed(1)} grade level • ` +
      `${complexity.technicalDensity.toFixed(1)}% technical density • ` +
      readingLevel.fleschInterpretation.toLowerCase(),
  ].join('\n');
}

/**
 * Editing suggestions for hard-to-read documents
 */
export function suggestImprovements(analysis: DocumentAnalysis): string[] {
  const { complexity, readingLevel } = analysis;
  const suggestions: string[] = [];

  if (complexity.gradeLevel > 16) {
    suggestions.push('Consider breaking long sentences into shorter ones');
  }
  if (complexity.avgWordsPerSentence > 20) {
    suggestions.push('Average sentence length is high - consider shorter sentences');
  }
  if (complexity.technicalDensity > 25) {
    suggestions.push('High technical density - consider adding explanations for technical terms');
  }
  if (complexity.totalWords > 0 && complexity.fleschScore < 30) {
    suggestions.push('Text is difficult to read - consider simplifying language');
  }
  if (readingLevel.level === 'Advanced' && complexity.codeBlocks > 10) {
    suggestions.push('Many code examples - consider consolidating or moving to an appendix');
  }

  return suggestions;
}

export function summarizeAnalyses(analyses: readonly DocumentAnalysis[]): AnalysisSummary {
  const total = analyses.length;
  const distributionByLevel: Partial<Record<ReadingLevel, number>> = {};

  for (const analysis of analyses) {
    const level = analysis.readingLevel.level;
    distributionByLevel[level] = (distributionByLevel[level] ?? 0) + 1;
  }

  const average = (pick: (analysis: DocumentAnalysis) => number): number =>
    total > 0 ? round1(analyses.reduce((sum, analysis) => sum + pick(analysis), 0) / total) : 0;

  const mostComplex = [...analyses]
    .sort((a, b) => b.complexity.gradeLevel - a.complexity.gradeLevel)
    .slice(0, 5)
    .map((analysis) => ({
      name: analysis.name,
      gradeLevel: analysis.complexity.gradeLevel,
      level: analysis.readingLevel.level,
    }));

  const longestReads = [...analyses]
    .sort((a, b) => b.readingTime.totalMinutes - a.readingTime.totalMinutes)
    .slice(0, 5)
    .map((analysis) => ({
      name: analysis.name,
      minutes: analysis.readingTime.totalMinutes,
      level: analysis.readingLevel.level,
    }));

  return {
    totalDocuments: total,
    distributionByLevel,
    averages: {
      readingTime: average((analysis) => analysis.readingTime.totalMinutes),
      gradeLevel: average((analysis) => analysis.complexity.gradeLevel),
      technicalDensity: average((analysis) => analysis.complexity.technicalDensity),
    },
    mostComplex,
    longestReads,
  };
}
