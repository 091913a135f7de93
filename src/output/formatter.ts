import fs from 'fs';
import path from 'path';
import type { ContentIdeas } from '../ai/content-ideas';
import type { AnalysisReport } from '../analysis/report-builder';
import { logger } from '../utils/logger';

export interface FinalDeliverable extends AnalysisReport {
  content_ideas: ContentIdeas;
}

export interface SavedOutputs {
  jsonPath: string;
  markdownPath: string;
}

export function formatOutput(report: AnalysisReport, contentIdeas: ContentIdeas): FinalDeliverable {
  return { ...report, content_ideas: contentIdeas };
}

export function saveOutputs(deliverable: FinalDeliverable, outputDir: string): SavedOutputs {
  fs.mkdirSync(outputDir, { recursive: true });
  const timestamp = deliverable.analysis_summary.analysis_date.split('T')[0];
  const platform = deliverable.analysis_summary.platform;

  const jsonPath = path.join(outputDir, `${platform}-analysis-${timestamp}.json`);
  fs.writeFileSync(jsonPath, JSON.stringify(deliverable, null, 2));
  logger.success(`Saved: ${jsonPath}`);

  const markdownPath = path.join(outputDir, `${platform}-summary-${timestamp}.md`);
  fs.writeFileSync(markdownPath, generateSummaryMarkdown(deliverable));
  logger.success(`Saved: ${markdownPath}`);

  return { jsonPath, markdownPath };
}

function pct(value: number): string {
  return `${value.toFixed(2)}%`;
}

export function generateSummaryMarkdown(deliverable: FinalDeliverable): string {
  const summary = deliverable.analysis_summary;
  const patterns = deliverable.patterns_analysis;

  let md = `# Competitor Pattern Report (${summary.platform})\n\n`;
  md += `**Generated:** ${summary.analysis_date}\n`;
  md += `**Competitors analyzed:** ${summary.competitors_analyzed} | **Posts analyzed:** ${summary.total_reels_analyzed}\n`;
  md += `**Average engagement rate:** ${pct(patterns.avg_engagement_rate)}\n\n`;

  if (summary.warnings.length > 0) {
    md += `## Warnings\n\n`;
    for (const warning of summary.warnings) {
      md += `- \`${warning.code}\` ${warning.message}\n`;
    }
    md += `\n`;
  }

  md += `## Competitors\n\n`;
  md += `| Handle | Posts | Avg engagement |\n|---|---|---|\n`;
  for (const [handle, data] of Object.entries(deliverable.competitor_data)) {
    md += `| @${handle} | ${data.reels_count} | ${pct(data.avg_engagement_rate)} |\n`;
  }
  md += `\n`;

  md += `## Top Hooks\n\n`;
  for (const hook of patterns.hook_patterns.top_performing_hooks) {
    md += `- **${hook.category}** "${hook.hook}" (@${hook.competitor}, ${pct(hook.engagement_rate)})\n`;
  }
  md += `\n`;

  md += `## Timing\n\n`;
  md += `- Best days: ${patterns.posting_patterns.best_days.join(', ') || 'n/a'}\n`;
  md += `- Best hours: ${patterns.posting_patterns.best_hours.join(', ') || 'n/a'}`;
  md += patterns.posting_patterns.best_is_low_confidence ? ' (low confidence)\n' : '\n';
  md += `- Best duration: ${patterns.optimal_duration.best.join(', ') || 'n/a'}\n\n`;

  md += `## Top Hashtags\n\n`;
  md += patterns.top_hashtags.map((tag) => `${tag.hashtag} (${tag.frequency})`).join(', ') || 'None';
  md += `\n\n`;

  md += `## Topic Themes\n\n`;
  for (const theme of patterns.topic_themes) {
    md += `- ${theme.theme} (${theme.post_count} posts, ${pct(theme.avg_engagement_rate)})\n`;
  }
  md += `\n`;

  md += `## Content Ideas\n\n### Topics\n\n`;
  md += deliverable.content_ideas.topic_ideas.map((idea) => `- ${idea}`).join('\n');
  md += `\n\n### Hooks\n\n`;
  md += deliverable.content_ideas.hook_ideas.map((idea) => `- ${idea}`).join('\n');
  md += `\n\n### Strategy\n\n`;
  md += deliverable.content_ideas.strategy_insights.map((idea) => `- ${idea}`).join('\n');
  md += `\n`;

  return md;
}
