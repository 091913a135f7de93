import { z } from 'zod';
import type { Platform } from '../analysis/engine';
import type { InsightPayload } from '../analysis/insight-formatter';
import { silentLogger, type Logger } from '../utils/logger';
import type { TextGenerator } from './openai';
import { CONTENT_IDEAS_SYSTEM, buildContentIdeasPrompt } from './prompts/contentIdeas';

export interface ContentIdeas {
  topic_ideas: string[];
  hook_ideas: string[];
  strategy_insights: string[];
}

export interface ContentIdeasResult {
  ideas: ContentIdeas;
  source: 'model' | 'fallback';
}

const ideaList = z.array(z.string().trim().min(1)).min(1);

// models sometimes keep the platform's own word for the topic list
const ModelIdeasSchema = z
  .object({
    topic_ideas: ideaList.optional(),
    reel_ideas: ideaList.optional(),
    tweet_ideas: ideaList.optional(),
    hook_ideas: ideaList,
    strategy_insights: ideaList,
  })
  .transform((raw, ctx) => {
    const topics = raw.topic_ideas ?? raw.reel_ideas ?? raw.tweet_ideas;
    if (!topics) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'topic_ideas is required', path: ['topic_ideas'] });
      return z.NEVER;
    }
    return { topic_ideas: topics, hook_ideas: raw.hook_ideas, strategy_insights: raw.strategy_insights };
  });

const GENERIC_TOPIC_IDEAS = [
  'The worst advice you have received in your niche, and what to do instead',
  'Unpopular opinion: most productivity advice is procrastination in disguise',
  'The skill that changed everything for you and why nobody teaches it',
  'A behind-the-scenes look at how you plan a week of content',
  'Things you wish you knew before starting out',
];

const HOOK_FORMULAS = [
  'Unpopular opinion:',
  'Hot take:',
  'The harsh truth about',
  'What nobody tells you about',
  'I wish someone told me',
  'Stop doing this if you want to',
  "Here's what I learned after",
  'The biggest lie about',
  'Why everyone gets this wrong:',
  'This changed everything for me:',
  'How to',
  '3 mistakes that',
  'The uncomfortable truth:',
  'Did you know',
  'Stop believing that',
];

const GENERIC_STRATEGY = [
  'Questions and bold takes drive comments; open with one',
  'Personal stories resonate more than generic advice',
  'Reply to comments within the first hour to extend reach',
];

/**
 * Pull the first JSON object out of a model response, tolerating markdown
 * fences and chatter around it.
 */
export function extractJsonObject(text: string): unknown {
  const unfenced = text.replace(/```(?:json)?/gi, '');
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  try {
    return JSON.parse(unfenced.slice(start, end + 1));
  } catch {
    return null;
  }
}

export function parseContentIdeas(text: string): ContentIdeas | null {
  const parsed = ModelIdeasSchema.safeParse(extractJsonObject(text));
  return parsed.success ? parsed.data : null;
}

/**
 * Deterministic ideas built from the strongest patterns, used whenever the
 * model is disabled, fails or answers with something unparsable.
 */
export function buildFallbackIdeas(payload: InsightPayload | null): ContentIdeas {
  const themes = payload ? payload.patterns.topicThemes.slice(0, 3).map((theme) => theme.theme) : [];
  const hashtags = payload ? payload.patterns.topHashtags.slice(0, 2).map((tag) => tag.hashtag) : [];
  const starters = payload ? payload.patterns.commonHookStarters.slice(0, 5).map((starter) => starter.starter) : [];

  const strategy: string[] = [];
  if (payload) {
    const { bestDays, bestHours, bestDurations, hookCategories } = payload.patterns;
    if (hookCategories.length > 0) {
      strategy.push(`Lead with ${hookCategories[0].category} hooks; they average the highest engagement`);
    }
    if (bestDays.length > 0 && bestHours.length > 0) {
      strategy.push(`Post on ${bestDays.join('/')} around ${bestHours.map((hour) => `${hour}:00`).join('/')}`);
    }
    if (bestDurations.length > 0) {
      strategy.push(`Keep videos in the ${bestDurations.join('/')} range`);
    }
  }

  return {
    topic_ideas: [
      ...themes.map((theme) => `${theme}: the mistakes everyone makes`),
      ...hashtags.map((hashtag) => `Hot take: ${hashtag} content is overrated. Here's why...`),
      ...GENERIC_TOPIC_IDEAS,
    ],
    hook_ideas: [...new Set([...starters.map((starter) => `${starter}...`), ...HOOK_FORMULAS])].slice(0, 15),
    strategy_insights: [...strategy, ...GENERIC_STRATEGY].slice(0, 5),
  };
}

export interface GenerateContentIdeasOptions {
  platform?: Platform;
  logger?: Logger;
}

export async function generateContentIdeas(
  payload: InsightPayload | null,
  generate: TextGenerator | null,
  options: GenerateContentIdeasOptions = {}
): Promise<ContentIdeasResult> {
  const log = options.logger ?? silentLogger;
  const fallback = (): ContentIdeasResult => ({ ideas: buildFallbackIdeas(payload), source: 'fallback' });

  if (!payload) {
    log.warn('[ContentIdeas] No insight payload, using fallback ideas');
    return fallback();
  }
  if (!generate) {
    log.info('[ContentIdeas] Generation disabled, using fallback ideas');
    return fallback();
  }

  let response: string;
  try {
    response = await generate(CONTENT_IDEAS_SYSTEM, buildContentIdeasPrompt(payload, options.platform));
  } catch (error) {
    log.warn('[ContentIdeas] Model call failed, using fallback ideas', error instanceof Error ? error.message : error);
    return fallback();
  }

  const ideas = parseContentIdeas(response);
  if (!ideas) {
    log.warn('[ContentIdeas] Could not parse model response as JSON, using fallback ideas');
    return fallback();
  }

  return { ideas, source: 'model' };
}
