import type { RawFeedEntry } from '../types';
import lexicon from './quality-lexicon.json';

const TITLE_MIN_LENGTH = 10;
const TITLE_MAX_LENGTH = 500;
const CONTENT_MAX_LENGTH = 50000;
const HIGH_QUALITY_THRESHOLD = 0.6;
const WORDS_PER_MINUTE = 200;

const ASCII_PUNCTUATION = new Set('!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~');
const COMMON_ENGLISH = new Set(lexicon.commonEnglishWords);
const STOP_WORDS = new Set(lexicon.stopWords);

const CONTENT_TYPE_NAMES = [
  'breaking-news',
  'analysis',
  'opinion',
  'sports',
  'business',
  'technology',
  'politics',
  'health',
] as const;

export type ContentType = (typeof CONTENT_TYPE_NAMES)[number] | 'general';

const CONTENT_TYPE_PATTERNS: Array<{ type: ContentType; patterns: RegExp[] }> = CONTENT_TYPE_NAMES.map((type) => ({
  type,
  patterns: lexicon.contentTypes[type].map((word) => new RegExp(`\\b${word}\\b`)),
}));

const CLICKBAIT_PATTERNS = [
  /\b(you won't believe|shocking|amazing|incredible)\b/i,
  /\b\d+\s+(things|ways|reasons|secrets)\b/i,
  /\bthis\s+will\s+(shock|amaze|surprise)\b/i,
];

const INFORMATION_PATTERNS = [
  /\b\d{4}\b/g,
  /\b\d+%/g,
  /\$\d+\b/g,
  /\b[A-Z][a-z]+\s+[A-Z][a-z]+\b/g,
  /\b(said|according to|reported|announced)\b/g,
];

export interface EntryValidation {
  valid: boolean;
  reasons: string[];
}

export interface QualityFactors {
  languageScore: number;
  readability: number;
  structureScore: number;
  titleScore: number;
  informationDensity: number;
}

export interface QualityAssessment {
  overallScore: number;
  isHighQuality: boolean;
  factors: QualityFactors;
  recommendations: string[];
}

/**
 * Metadata merged into every stored article
 */
export interface EnrichedMetadata {
  wordCount: number;
  characterCount: number;
  estimatedReadMinutes: number;
  contentType: ContentType;
  topicKeywords: string[];
  quality: QualityAssessment;
}

export function isStopWord(word: string): boolean {
  return STOP_WORDS.has(word.toLowerCase());
}

function wordsOf(text: string): string[] {
  return text.match(/\b\w+\b/g) ?? [];
}

function sentencesOf(text: string): string[] {
  return text.split(/[.!?]+/);
}

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname.length > 0;
  } catch {
    return false;
  }
}

function countMatching(text: string, predicate: (char: string) => boolean): number {
  let count = 0;
  for (const char of text) {
    if (predicate(char)) count++;
  }
  return count;
}

/**
 * True when a long body repeats itself: one sentence more than three times,
 * or two sentences opening with the same five words.
 */
export function isRepetitive(content: string): boolean {
  if (content.length < 100) return false;

  const sentences = sentencesOf(content);
  if (sentences.length < 3) return false;

  const meaningful = sentences.map((s) => s.trim().toLowerCase()).filter((s) => s.length > 10);

  const counts = new Map<string, number>();
  for (const sentence of meaningful) {
    counts.set(sentence, (counts.get(sentence) ?? 0) + 1);
  }
  if ([...counts.values()].some((count) => count > 3)) return true;

  const openings = new Set<string>();
  for (const sentence of meaningful) {
    const key = sentence.split(/\s+/).slice(0, 5).join(' ');
    if (openings.has(key)) return true;
    openings.add(key);
  }
  return false;
}

export function detectSpam(title: string, content: string): string[] {
  const reasons: string[] = [];

  if (title.length > 0) {
    const capsRatio = countMatching(title, (c) => /\p{Lu}/u.test(c)) / title.length;
    if (capsRatio > 0.7) reasons.push('Excessive capitalization in title');

    const punctuationRatio = countMatching(title, (c) => ASCII_PUNCTUATION.has(c)) / title.length;
    if (punctuationRatio > 0.3) reasons.push('Excessive punctuation in title');
  }

  if (isRepetitive(content)) reasons.push('Repetitive content detected');

  const combined = `${title} ${content}`.toLowerCase();
  const promotional = lexicon.promotionalPhrases.find((phrase) => combined.includes(phrase));
  if (promotional) reasons.push(`Promotional content detected: '${promotional}'`);

  return reasons;
}

/**
 * Gate applied before an entry is stored. The minimum body length is
 * enforced earlier by the feed fetcher.
 */
export function validateEntry(entry: Pick<RawFeedEntry, 'title' | 'content' | 'url'>): EntryValidation {
  const reasons: string[] = [];
  const title = entry.title.trim();
  const content = entry.content.trim();

  if (title.length < TITLE_MIN_LENGTH) {
    reasons.push(`Title too short: ${title.length} < ${TITLE_MIN_LENGTH}`);
  } else if (title.length > TITLE_MAX_LENGTH) {
    reasons.push(`Title too long: ${title.length} > ${TITLE_MAX_LENGTH}`);
  }

  if (content.length > CONTENT_MAX_LENGTH) {
    reasons.push(`Content too long: ${content.length} > ${CONTENT_MAX_LENGTH}`);
  }

  if (!isHttpUrl(entry.url)) {
    reasons.push('Invalid URL format');
  }

  reasons.push(...detectSpam(title, content));
  return { valid: reasons.length === 0, reasons };
}

export function languageScore(content: string): number {
  if (!content) return 0;
  const words = wordsOf(content.toLowerCase());
  if (words.length < 10) return 0.5;

  const ratio = words.filter((word) => COMMON_ENGLISH.has(word)).length / words.length;
  return ratio >= 0.3 ? Math.min(ratio * 2, 1) : 0.3;
}

/** 0-100; peaks around 17.5 words per sentence and 5 letters per word */
export function readability(content: string): number {
  const sentences = sentencesOf(content)
    .map((s) => s.trim())
    .filter((s) => s.length > 5);
  const words = wordsOf(content);
  if (sentences.length === 0 || words.length === 0) return 0;

  const avgSentenceLength = words.length / sentences.length;
  const avgWordLength = words.reduce((sum, word) => sum + word.length, 0) / words.length;

  const sentenceScore = Math.max(0, 100 - Math.abs(avgSentenceLength - 17.5) * 2);
  const wordScore = Math.max(0, 100 - Math.abs(avgWordLength - 5) * 10);
  return Math.max(Math.min((sentenceScore + wordScore) / 2, 100), 0);
}

export function structureScore(content: string): number {
  if (!content) return 0;
  let score = 1;

  if (content.split('\n\n').length < 2) score *= 0.8;

  const lengths = sentencesOf(content)
    .filter((s) => s.trim().length > 5)
    .map((s) => s.split(/\s+/).filter(Boolean).length);
  if (lengths.length > 0) {
    score *= Math.min((new Set(lengths).size / lengths.length) * 2, 1);
  }

  const punctuationKinds = new Set([...content].filter((c) => '.!?,:;'.includes(c)));
  if (punctuationKinds.size >= 3) {
    score *= 1.1;
  } else if (punctuationKinds.size < 2) {
    score *= 0.9;
  }

  return Math.min(score, 1);
}

export function titleScore(title: string, content: string): number {
  if (!title || !content) return 0;
  let score = 1;

  const titleWordCount = title.split(/\s+/).filter(Boolean).length;
  if (titleWordCount < 5) {
    score *= 0.7;
  } else if (titleWordCount > 15) {
    score *= 0.8;
  }

  const titleWords = new Set(wordsOf(title.toLowerCase()));
  const leadWords = new Set(wordsOf(content.toLowerCase().substring(0, 500)));
  const shared = [...titleWords].filter((word) => leadWords.has(word)).length;
  score *= titleWords.size > 0 && shared / titleWords.size >= 0.3 ? 1.1 : 0.9;

  if (CLICKBAIT_PATTERNS.some((pattern) => pattern.test(title))) score *= 0.8;

  return Math.min(score, 1);
}

/** Facts per hundred words, where five or more scores 1 */
export function informationDensity(content: string): number {
  const words = wordsOf(content);
  if (words.length === 0) return 0;

  const facts = INFORMATION_PATTERNS.reduce((sum, pattern) => sum + (content.match(pattern)?.length ?? 0), 0);
  return Math.min(((facts / words.length) * 100) / 5, 1);
}

function recommendationsFor(factors: QualityFactors): string[] {
  const recommendations: string[] = [];
  if (factors.languageScore < 0.7) recommendations.push('Consider improving language clarity and grammar');
  if (factors.readability < 50) recommendations.push('Improve readability by using shorter sentences and simpler words');
  if (factors.structureScore < 0.7) recommendations.push('Enhance content structure with better paragraph organization');
  if (factors.titleScore < 0.7) recommendations.push('Consider a more descriptive and relevant title');
  if (factors.informationDensity < 0.5) recommendations.push('Add more specific details, facts, or supporting information');
  return recommendations;
}

export function assessQuality(title: string, content: string): QualityAssessment {
  const factors: QualityFactors = {
    languageScore: languageScore(content),
    readability: readability(content),
    structureScore: structureScore(content),
    titleScore: titleScore(title, content),
    informationDensity: informationDensity(content),
  };

  const score =
    factors.languageScore *
    Math.min(factors.readability / 100, 1) *
    factors.structureScore *
    factors.titleScore *
    factors.informationDensity;

  return {
    overallScore: Math.round(score * 1000) / 1000,
    isHighQuality: score >= HIGH_QUALITY_THRESHOLD,
    factors,
    recommendations: recommendationsFor(factors),
  };
}

export function classifyContentType(title: string, content: string): ContentType {
  const combined = `${title} ${content}`.toLowerCase();
  const match = CONTENT_TYPE_PATTERNS.find(({ patterns }) => patterns.some((pattern) => pattern.test(combined)));
  return match ? match.type : 'general';
}

/**
 * Most frequent non-stop words of four letters or more, ties in order of
 * first appearance.
 */
export function extractTopicKeywords(content: string, max = 10): string[] {
  const words = content.toLowerCase().match(/\b[a-z]{3,}\b/g) ?? [];
  const counts = new Map<string, number>();
  for (const word of words) {
    if (word.length > 3 && !STOP_WORDS.has(word)) {
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, max)
    .map(([word]) => word);
}

export function enrichMetadata(entry: Pick<RawFeedEntry, 'title' | 'content'>): EnrichedMetadata {
  const wordCount = wordsOf(entry.content).length;
  return {
    wordCount,
    characterCount: entry.content.length,
    estimatedReadMinutes: Math.max(1, Math.floor(wordCount / WORDS_PER_MINUTE)),
    contentType: classifyContentType(entry.title, entry.content),
    topicKeywords: extractTopicKeywords(entry.content),
    quality: assessQuality(entry.title, entry.content),
  };
}
