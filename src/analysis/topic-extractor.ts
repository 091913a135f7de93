/**
 * Topic / Theme Extractor
 *
 * Best-effort keyword clustering, not semantic understanding. Captions are
 * reduced to stop-word-filtered keyword sets, keywords are ranked by how many
 * posts mention them, and themes are grown greedily around the strongest
 * keywords from the ones they co-occur with.
 */

import stopWords from '../data/stop-words.json';
import type { KeywordStat, ScoredPost, TopicDocument, TopicTheme } from './types';

export interface TopicThemeOptions {
  maxThemes?: number;
  maxKeywords?: number;
  minKeywordFrequency?: number;
  minCooccurrence?: number;
  maxKeywordsPerTheme?: number;
}

const STOP_WORDS = new Set<string>(stopWords);

const DEFAULT_THEME_OPTIONS: Required<TopicThemeOptions> = {
  maxThemes: 5,
  maxKeywords: 15,
  minKeywordFrequency: 2,
  minCooccurrence: 2,
  maxKeywordsPerTheme: 4,
};

/**
 * Unique, sorted keywords of a caption: no hashtags, mentions, URLs, digits or
 * stop words, and nothing shorter than four letters.
 */
export function extractKeywords(caption: string): string[] {
  const cleaned = caption
    .replace(/https?:\/\/\S+/gi, ' ')
    .replace(/[#@][\p{L}\p{N}_]+/gu, ' ')
    .replace(/['’]/g, '')
    .replace(/[^\p{L}\s]/gu, ' ')
    .toLowerCase();

  const words = cleaned.split(/\s+/).filter((word) => word.length > 3 && !STOP_WORDS.has(word));
  return [...new Set(words)].sort();
}

export function buildTopicDocuments(posts: readonly ScoredPost[]): readonly TopicDocument[] {
  const documents: TopicDocument[] = [];

  for (const post of posts) {
    const keywords = extractKeywords(post.captionText);
    if (keywords.length === 0) continue;
    documents.push(
      Object.freeze({
        postId: post.id,
        keywords: Object.freeze(keywords),
        engagementRate: post.engagementRate,
      })
    );
  }

  return Object.freeze(documents);
}

/**
 * Keywords ordered by post frequency, then total engagement, then spelling.
 */
export function rankKeywords(documents: readonly TopicDocument[]): readonly KeywordStat[] {
  const totals = new Map<string, { postCount: number; engagementSum: number }>();

  for (const document of documents) {
    for (const keyword of document.keywords) {
      const current = totals.get(keyword) ?? { postCount: 0, engagementSum: 0 };
      current.postCount += 1;
      current.engagementSum += document.engagementRate;
      totals.set(keyword, current);
    }
  }

  const ranked = [...totals.entries()]
    .map(([keyword, total]) => Object.freeze({ keyword, postCount: total.postCount, engagementSum: total.engagementSum }))
    .sort((a, b) => {
      if (a.postCount !== b.postCount) return b.postCount - a.postCount;
      if (a.engagementSum !== b.engagementSum) return b.engagementSum - a.engagementSum;
      return a.keyword < b.keyword ? -1 : a.keyword > b.keyword ? 1 : 0;
    });

  return Object.freeze(ranked);
}

export function extractTopicThemes(
  documents: readonly TopicDocument[],
  options: TopicThemeOptions = {}
): readonly TopicTheme[] {
  const opts = { ...DEFAULT_THEME_OPTIONS, ...options };

  const candidates = rankKeywords(documents)
    .filter((stat) => stat.postCount >= opts.minKeywordFrequency)
    .slice(0, opts.maxKeywords)
    .map((stat) => stat.keyword);

  const keywordSets = documents.map((document) => new Set(document.keywords));
  const cooccurrence = (a: string, b: string) => keywordSets.filter((set) => set.has(a) && set.has(b)).length;

  const assigned = new Set<string>();
  const themes: TopicTheme[] = [];

  for (const seed of candidates) {
    if (themes.length >= opts.maxThemes) break;
    if (assigned.has(seed)) continue;
    assigned.add(seed);

    const members = [seed];
    const companions = candidates
      .filter((keyword) => !assigned.has(keyword))
      .map((keyword) => ({ keyword, together: cooccurrence(seed, keyword) }))
      .filter((companion) => companion.together >= opts.minCooccurrence)
      .sort((a, b) => b.together - a.together);

    for (const companion of companions) {
      if (members.length >= opts.maxKeywordsPerTheme) break;
      members.push(companion.keyword);
      assigned.add(companion.keyword);
    }

    const covered = documents.filter((document) => document.keywords.some((keyword) => members.includes(keyword)));
    const engagementSum = covered.reduce((sum, document) => sum + document.engagementRate, 0);

    themes.push(
      Object.freeze({
        label: members.slice(0, 3).join(' / '),
        keywords: Object.freeze(members),
        postCount: covered.length,
        meanEngagementRate: covered.length > 0 ? engagementSum / covered.length : 0,
      })
    );
  }

  return Object.freeze(themes);
}
