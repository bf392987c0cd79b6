import { describe, expect, it } from 'vitest';
import { DEFAULT_CONTENT_RULES } from '../content/rules.js';
import { containsCallToAction } from './call-to-action.js';
import { extractHashtags, keywordToHashtag } from './hashtags.js';
import { averageSentenceLength, calculateReadability } from './readability.js';
import { calculateTrendRelevance } from './trend-relevance.js';

const { trendingKeywords, ctaPhrases } = DEFAULT_CONTENT_RULES;

describe('extractHashtags', () => {
  it('returns tags in first-occurrence order with duplicates', () => {
    expect(extractHashtags('hi #A #b #A')).toEqual(['#A', '#b', '#A']);
  });

  it('stops a tag at the first non-word character', () => {
    expect(extractHashtags('Launch #AI-first and #growth_hacks!')).toEqual(['#AI', '#growth_hacks']);
  });

  it('keeps accented letters inside a tag', () => {
    expect(extractHashtags('Fresh #café menu #résumé tips #año2025')).toEqual(['#café', '#résumé', '#año2025']);
  });

  it('returns an empty list for non-string input', () => {
    expect(extractHashtags(null)).toEqual([]);
    expect(extractHashtags('no tags here')).toEqual([]);
  });
});

describe('keywordToHashtag', () => {
  it('drops non-word characters', () => {
    expect(keywordToHashtag('Machine Learning')).toBe('#MachineLearning');
    expect(keywordToHashtag('e-commerce')).toBe('#ecommerce');
    expect(keywordToHashtag('!!')).toBeNull();
    expect(keywordToHashtag('Café Culture')).toBe('#CaféCulture');
  });
});

describe('calculateReadability', () => {
  it('rates short sentences as Easy', () => {
    expect(averageSentenceLength('Short one. Another short one!')).toBe(2.5);
    expect(calculateReadability('Short one. Another short one!')).toBe('Easy');
  });

  it('rates 13-20 word sentences as Medium', () => {
    const sentence = Array.from({ length: 15 }, () => 'word').join(' ') + '.';
    expect(calculateReadability(sentence)).toBe('Medium');
  });

  it('rates long unpunctuated text as Complex', () => {
    const text = Array.from({ length: 25 }, () => 'word').join(' ');
    expect(calculateReadability(text)).toBe('Complex');
  });

  it('treats empty text as a single empty sentence', () => {
    expect(averageSentenceLength('')).toBe(0);
    expect(calculateReadability('...')).toBe('Easy');
  });
});

describe('calculateTrendRelevance', () => {
  it('returns the fraction of keywords present', () => {
    expect(calculateTrendRelevance('AI and marketing automation', trendingKeywords)).toBe(0.5);
  });

  it('matches substrings case-insensitively', () => {
    // "said" contains "ai"
    expect(calculateTrendRelevance('They said so', trendingKeywords)).toBe(0.17);
  });

  it('returns 0 for empty text or an empty keyword list', () => {
    expect(calculateTrendRelevance('', trendingKeywords)).toBe(0);
    expect(calculateTrendRelevance('AI', [])).toBe(0);
  });
});

describe('containsCallToAction', () => {
  it('detects phrases case-insensitively', () => {
    expect(containsCallToAction('Try it today', ctaPhrases)).toBe(true);
    expect(containsCallToAction('LEARN MORE at our site', ctaPhrases)).toBe(true);
    expect(containsCallToAction('Read the docs', ctaPhrases)).toBe(false);
  });
});
