/**
 * Hook Extractor
 *
 * A hook is the opening phrase of a caption. We cut it at the first sentence
 * boundary inside `maxLength` characters and classify it with keyword rules.
 * The rules are heuristics, so classification follows a fixed priority order
 * and the first matching category wins:
 *
 *   statistic > question > story-opener > how-to > listicle > bold-claim > other
 *
 * e.g. "Did you know 90% of people fail at this?" is a statistic, not a
 * question, because it carries a number followed by "%".
 */

import hookCues from '../data/hook-cues.json';
import type { HookCategory, HookCategoryStat, HookPattern, HookStarter, ScoredPost } from './types';

export const DEFAULT_HOOK_MAX_LENGTH = 100;

export const HOOK_CATEGORY_PRIORITY: readonly HookCategory[] = Object.freeze([
  'statistic',
  'question',
  'story-opener',
  'how-to',
  'listicle',
  'bold-claim',
  'other',
]);

const SENTENCE_END = new Set(['.', '!', '?', ':', '…']);

const STATISTIC_PATTERN = new RegExp(
  [
    '[$€£]\\s?\\d[\\d,.]*',
    '\\d[\\d,.]*\\s?%',
    '\\d[\\d,.]*\\s?(?:percent|x|k|m|b|million|billion|thousand|seconds?|secs?|minutes?|mins?|hours?|hrs?|days?|weeks?|months?|years?|yrs?|kg|lbs?)\\b',
  ].join('|'),
  'i'
);
const STORY_SUBJECT = /^(?:i|my|we|our)\b/i;
const LISTICLE_PATTERN = /^\d+\s+\p{L}/u;
const LEADING_DECORATION = /^[^\p{L}\p{N}$€£#]+/u;
const TRAILING_DECORATION = /[\s\p{Extended_Pictographic}\uFE0F\u200D]+$/u;

const PAST_TENSE_VERBS = new Set(hookCues.pastTenseVerbs);
const FALSE_PAST_TENSE = new Set(hookCues.falsePastTense);

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Leading sentence of a caption, bounded to `maxLength` characters. Falls
 * back to a hard cut when no boundary appears inside the bound.
 */
export function extractHook(caption: string, maxLength: number = DEFAULT_HOOK_MAX_LENGTH): string {
  const text = caption.trim();
  if (!text) return '';

  const limit = Math.min(text.length, maxLength);

  for (let i = 0; i < limit; i++) {
    const char = text[i];

    if (char === '\n' || char === '\r') {
      const line = text.slice(0, i).trim();
      if (line) return line;
      continue;
    }

    if (SENTENCE_END.has(char)) {
      const next = text[i + 1];
      if (next === undefined || /\s/.test(next)) {
        return text.slice(0, i + 1).trim();
      }
    }
  }

  let cut = limit;
  if (cut < text.length && isHighSurrogate(text.charCodeAt(cut - 1))) {
    cut -= 1;
  }
  return text.slice(0, cut).trim();
}

function hasPastTenseCue(text: string): boolean {
  const words = text.toLowerCase().match(/[a-z']+/g) ?? [];
  return words.slice(1).some((word) => {
    if (PAST_TENSE_VERBS.has(word)) return true;
    return word.length > 4 && word.endsWith('ed') && !FALSE_PAST_TENSE.has(word);
  });
}

function containsCue(lower: string, cue: string): boolean {
  const index = lower.indexOf(cue);
  if (index < 0) return false;
  const before = index === 0 ? ' ' : lower[index - 1];
  const after = lower[index + cue.length] ?? ' ';
  return !/[a-z0-9]/.test(before) && !/[a-z0-9]/.test(after);
}

export function classifyHook(hookText: string): HookCategory {
  const text = hookText.trim().replace(LEADING_DECORATION, '');
  if (!text) return 'other';

  const lower = text.toLowerCase();
  const tail = text.replace(TRAILING_DECORATION, '');

  if (STATISTIC_PATTERN.test(text)) return 'statistic';
  if (tail.endsWith('?')) return 'question';
  if (STORY_SUBJECT.test(text) && hasPastTenseCue(text)) return 'story-opener';
  if (
    hookCues.howToPrefixes.some((prefix) => lower.startsWith(prefix)) ||
    hookCues.howToMarkers.some((marker) => lower.includes(marker))
  ) {
    return 'how-to';
  }
  if (LISTICLE_PATTERN.test(text)) return 'listicle';
  if (tail.endsWith('!') || hookCues.boldClaimCues.some((cue) => containsCue(lower, cue))) {
    return 'bold-claim';
  }
  return 'other';
}

/**
 * One HookPattern per post with a non-empty hook, in input order.
 */
export function extractHookPatterns(
  posts: readonly ScoredPost[],
  maxLength: number = DEFAULT_HOOK_MAX_LENGTH
): readonly HookPattern[] {
  const patterns: HookPattern[] = [];

  for (const post of posts) {
    const hookText = extractHook(post.captionText, maxLength);
    if (!hookText) continue;
    patterns.push(
      Object.freeze({
        postId: post.id,
        competitorHandle: post.competitorHandle,
        hookText,
        hookCategory: classifyHook(hookText),
        engagementRate: post.engagementRate,
      })
    );
  }

  return Object.freeze(patterns);
}

function compareCategoryStats(a: HookCategoryStat, b: HookCategoryStat): number {
  if (a.meanEngagementRate !== b.meanEngagementRate) return b.meanEngagementRate - a.meanEngagementRate;
  if (a.count !== b.count) return b.count - a.count;
  return HOOK_CATEGORY_PRIORITY.indexOf(a.category) - HOOK_CATEGORY_PRIORITY.indexOf(b.category);
}

/**
 * Merge category stats by summing counts and engagement, then recompute the
 * means. Used both per competitor and across competitors, so the result is
 * always weighted by post count.
 */
export function combineHookCategoryStats(stats: readonly Pick<HookCategoryStat, 'category' | 'count' | 'engagementSum'>[]): readonly HookCategoryStat[] {
  const totals = new Map<HookCategory, { count: number; engagementSum: number }>();

  for (const stat of stats) {
    const current = totals.get(stat.category) ?? { count: 0, engagementSum: 0 };
    current.count += stat.count;
    current.engagementSum += stat.engagementSum;
    totals.set(stat.category, current);
  }

  const combined = [...totals.entries()]
    .filter(([, total]) => total.count > 0)
    .map(([category, total]) =>
      Object.freeze({
        category,
        count: total.count,
        engagementSum: total.engagementSum,
        meanEngagementRate: total.engagementSum / total.count,
      })
    );

  return Object.freeze(combined.sort(compareCategoryStats));
}

export function summarizeHookCategories(patterns: readonly HookPattern[]): readonly HookCategoryStat[] {
  return combineHookCategoryStats(
    patterns.map((pattern) => ({ category: pattern.hookCategory, count: 1, engagementSum: pattern.engagementRate }))
  );
}

/**
 * Group hooks by their first three words and keep the starters that show up
 * more than once, best average engagement first.
 */
export function findCommonHookStarters(patterns: readonly HookPattern[], limit = 10): readonly HookStarter[] {
  const starters = new Map<string, { count: number; engagementSum: number; examples: string[] }>();

  for (const pattern of patterns) {
    const words = pattern.hookText.toLowerCase().split(/\s+/).filter(Boolean).slice(0, 3);
    if (words.length < 2) continue;

    const starter = words.join(' ');
    const entry = starters.get(starter) ?? { count: 0, engagementSum: 0, examples: [] };
    entry.count += 1;
    entry.engagementSum += pattern.engagementRate;
    if (entry.examples.length < 3) entry.examples.push(pattern.hookText);
    starters.set(starter, entry);
  }

  const common = [...starters.entries()]
    .filter(([, entry]) => entry.count > 1)
    .map(([starter, entry]) =>
      Object.freeze({
        starter,
        count: entry.count,
        engagementSum: entry.engagementSum,
        avgEngagementRate: entry.engagementSum / entry.count,
        examples: Object.freeze([...entry.examples]),
      })
    )
    .sort((a, b) => {
      if (a.avgEngagementRate !== b.avgEngagementRate) return b.avgEngagementRate - a.avgEngagementRate;
      if (a.count !== b.count) return b.count - a.count;
      return a.starter < b.starter ? -1 : a.starter > b.starter ? 1 : 0;
    });

  return Object.freeze(common.slice(0, limit));
}
