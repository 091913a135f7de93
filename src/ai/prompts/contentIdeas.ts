import type { Platform } from '../../analysis/engine';
import type { InsightPayload } from '../../analysis/insight-formatter';

const FORMAT_LABEL: Record<Platform, string> = {
  instagram: 'reel',
  twitter: 'tweet',
};

export const CONTENT_IDEAS_SYSTEM = `You are a short-form content strategist. You study what is working for competitor accounts and turn those patterns into original content ideas.

Rules:
- Ground every idea in the analysis you are given (hooks, topics, hashtags, timing)
- Never copy a competitor caption; adapt the pattern instead
- Respond with a single JSON object and nothing else`;

function percent(value: number): string {
  return `${value.toFixed(2)}%`;
}

export function buildContentIdeasPrompt(payload: InsightPayload, platform: Platform = 'instagram'): string {
  const format = FORMAT_LABEL[platform];
  const { analysisSummary, patterns } = payload;

  const exemplars = payload.exemplars
    .map((exemplar) => `- [${exemplar.category}] "${exemplar.hook}" (@${exemplar.competitor}, ${percent(exemplar.engagementRate)})`)
    .join('\n');

  return `Based on this ${platform} competitor analysis, generate content ideas.

ANALYSIS SUMMARY:
- Competitors analyzed: ${analysisSummary.competitorsAnalyzed} (${analysisSummary.competitorHandles.map((handle) => `@${handle}`).join(', ')})
- Total ${format}s analyzed: ${analysisSummary.totalReelsAnalyzed}
- Average engagement rate: ${percent(analysisSummary.avgEngagementRate)}
- Top hashtags: ${patterns.topHashtags.map((tag) => tag.hashtag).join(', ') || 'none'}
- Topic themes: ${patterns.topicThemes.map((theme) => theme.theme).join('; ') || 'none'}
- Best hook styles: ${patterns.hookCategories.map((stat) => `${stat.category} (${percent(stat.avgEngagementRate)}, n=${stat.count})`).join(', ')}
- Common hook starters: ${patterns.commonHookStarters.slice(0, 5).map((starter) => `"${starter.starter}"`).join(', ') || 'none'}
- Best days: ${patterns.bestDays.join(', ') || 'unknown'}; best hours: ${patterns.bestHours.join(', ') || 'unknown'}${patterns.lowConfidenceTiming ? ' (low confidence)' : ''}
- Best durations: ${patterns.bestDurations.join(', ') || 'unknown'}; best caption lengths: ${patterns.bestCaptionLengths.join(', ') || 'unknown'}
- What top performers share: ${patterns.engagementCharacteristics.join('; ') || 'nothing notable'}

BEST HOOK PER STYLE:
${exemplars}

TOP PERFORMING CONTENT:
${JSON.stringify(payload.topPerformingContent, null, 2)}

Please generate:
1. topic_ideas: 10 ${format} concepts built on the topics competitors succeed with, in varied formats
2. hook_ideas: 15 hook formulas adapted from the best performing hook styles and starters
3. strategy_insights: 5 recommendations on timing, length, hashtags and engagement

Return JSON with keys "topic_ideas", "hook_ideas" and "strategy_insights", each an array of strings.`;
}
