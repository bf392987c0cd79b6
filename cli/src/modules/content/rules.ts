import fs from 'node:fs';
import path from 'node:path';
import { getLogger } from '../../utils/logger.js';

export interface ContentRules {
  trendingKeywords: readonly string[];
  trendingHashtags: readonly string[];
  ctaPhrases: readonly string[];
  ctaSentence: string;
}

export interface SentimentLexicon {
  positive: ReadonlySet<string>;
  negative: ReadonlySet<string>;
}

export interface PolarityLexicon {
  words: ReadonlyMap<string, number>;
  intensifiers: ReadonlyMap<string, number>;
  negators: ReadonlySet<string>;
}

export interface ContentData {
  rules: ContentRules;
  sentimentLexicon: SentimentLexicon;
  polarityLexicon: PolarityLexicon;
  corrections: ReadonlyMap<string, string>;
}

export const DEFAULT_CONTENT_RULES: ContentRules = Object.freeze({
  trendingKeywords: Object.freeze(['AI', 'Automation', 'Digital', 'Marketing', 'Innovation', 'Technology']),
  trendingHashtags: Object.freeze(['#AI', '#Marketing', '#Innovation', '#Digital', '#Automation', '#Tech']),
  ctaPhrases: Object.freeze(['follow', 'subscribe', 'learn more', 'click', 'visit', 'try', 'join', 'buy', 'shop']),
  ctaSentence: 'Learn more and join the movement!',
});

const DEFAULT_POSITIVE_WORDS = ['great', 'good', 'love', 'amazing', 'excellent', 'nice', 'wow', 'super', 'fantastic', 'awesome', 'happy'];
const DEFAULT_NEGATIVE_WORDS = ['bad', 'hate', 'poor', 'terrible', 'worst', 'boring', 'awful', 'angry', 'sad', 'disappointing'];

const cache = new Map<string, ContentData>();

function readJson(filePath: string): Record<string, unknown> | null {
  const log = getLogger();
  if (!fs.existsSync(filePath)) {
    log.warn({ filePath }, 'Data file missing, using defaults');
    return null;
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${filePath} must contain a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function stringList(raw: Record<string, unknown> | null, key: string, fallback: readonly string[]): readonly string[] {
  const value = raw?.[key];
  if (value === undefined) return fallback;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new Error(`"${key}" must be an array of strings`);
  }
  return Object.freeze([...value]);
}

function numberMap(raw: Record<string, unknown> | null, key: string): ReadonlyMap<string, number> {
  const value = raw?.[key];
  const map = new Map<string, number>();
  if (value === undefined || value === null) return map;
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new Error(`"${key}" must be an object of numbers`);
  }
  for (const [word, score] of Object.entries(value)) {
    if (typeof score !== 'number') throw new Error(`"${key}.${word}" must be a number`);
    map.set(word.toLowerCase(), score);
  }
  return map;
}

function stringMap(raw: Record<string, unknown> | null): ReadonlyMap<string, string> {
  const map = new Map<string, string>();
  for (const [from, to] of Object.entries(raw ?? {})) {
    if (typeof to !== 'string') throw new Error(`correction for "${from}" must be a string`);
    map.set(from.toLowerCase(), to);
  }
  return map;
}

export function parseContentRules(raw: Record<string, unknown> | null): ContentRules {
  const sentence = raw?.ctaSentence;
  let ctaSentence = DEFAULT_CONTENT_RULES.ctaSentence;
  if (sentence !== undefined) {
    if (typeof sentence !== 'string') throw new Error('"ctaSentence" must be a string');
    ctaSentence = sentence;
  }
  return Object.freeze({
    trendingKeywords: stringList(raw, 'trendingKeywords', DEFAULT_CONTENT_RULES.trendingKeywords),
    trendingHashtags: stringList(raw, 'trendingHashtags', DEFAULT_CONTENT_RULES.trendingHashtags),
    ctaPhrases: stringList(raw, 'ctaPhrases', DEFAULT_CONTENT_RULES.ctaPhrases).map(p => p.toLowerCase()),
    ctaSentence,
  });
}

export function createSentimentLexicon(positive: Iterable<string>, negative: Iterable<string>): SentimentLexicon {
  const lower = (words: Iterable<string>) => new Set([...words].map(w => w.toLowerCase()));
  return Object.freeze({ positive: lower(positive), negative: lower(negative) });
}

export function createPolarityLexicon(
  words: Record<string, number>,
  intensifiers: Record<string, number> = {},
  negators: readonly string[] = [],
): PolarityLexicon {
  return Object.freeze({
    words: numberMap({ words }, 'words'),
    intensifiers: numberMap({ intensifiers }, 'intensifiers'),
    negators: new Set(negators.map(n => n.toLowerCase())),
  });
}

/**
 * Load content rules, lexicons and spelling corrections from the data
 * directory. Loaded once per directory and frozen.
 */
export function loadContentData(dataDir: string): ContentData {
  const cached = cache.get(dataDir);
  if (cached) return cached;

  const log = getLogger();
  const rulesRaw = readJson(path.join(dataDir, 'content-rules.json'));
  const sentimentRaw = readJson(path.join(dataDir, 'sentiment-lexicon.json'));
  const polarityRaw = readJson(path.join(dataDir, 'polarity-lexicon.json'));
  const correctionsRaw = readJson(path.join(dataDir, 'corrections.json'));

  const data: ContentData = Object.freeze({
    rules: parseContentRules(rulesRaw),
    sentimentLexicon: createSentimentLexicon(
      stringList(sentimentRaw, 'positive', DEFAULT_POSITIVE_WORDS),
      stringList(sentimentRaw, 'negative', DEFAULT_NEGATIVE_WORDS),
    ),
    polarityLexicon: Object.freeze({
      words: numberMap(polarityRaw, 'words'),
      intensifiers: numberMap(polarityRaw, 'intensifiers'),
      negators: new Set(stringList(polarityRaw, 'negators', []).map(n => n.toLowerCase())),
    }),
    corrections: stringMap(correctionsRaw),
  });

  log.debug(
    {
      keywords: data.rules.trendingKeywords.length,
      polarityWords: data.polarityLexicon.words.size,
      corrections: data.corrections.size,
    },
    'Content data loaded',
  );

  cache.set(dataDir, data);
  return data;
}
