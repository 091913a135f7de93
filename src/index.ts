#!/usr/bin/env node
import { ConfigurationError } from './analysis/errors';
import { runPatternEngine } from './analysis/engine';
import { resolveRunConfig } from './analysis/run-config';
import { generateContentIdeas } from './ai/content-ideas';
import { createOpenRouterClient, createTextGenerator, type TextGenerator } from './ai/openai';
import { loadConfig, requireCredential, toRunConfigInput, type AppConfig } from './config';
import { MIN_ANALYZABLE_COMPETITORS, resolveCompetitors } from './discovery/competitor-discovery';
import { formatOutput, saveOutputs } from './output/formatter';
import { collectCompetitorPosts } from './scrapers/competitor-posts';
import { loadSampleData } from './scrapers/sample-data';
import { Cache } from './utils/cache';
import { logger } from './utils/logger';
import { RateLimiter } from './utils/rateLimiter';

export * from './analysis';

export interface CliFlags {
  sample: boolean;
  ai: boolean;
  refresh: boolean;
}

export function parseFlags(argv: readonly string[]): CliFlags {
  return {
    sample: argv.includes('--sample'),
    ai: !argv.includes('--no-ai'),
    refresh: argv.includes('--refresh'),
  };
}

/**
 * The model client when generation is on. Runs before any scraping so a
 * missing key fails the run up front.
 */
export function prepareGenerator(config: AppConfig, flags: CliFlags): TextGenerator | null {
  if (!flags.ai) return null;
  const apiKey = requireCredential(config.openRouter.apiKey, 'OPENROUTER_API_KEY');
  const client = createOpenRouterClient(config.openRouter, apiKey);
  return createTextGenerator(client, { model: config.openRouter.model });
}

async function main(): Promise<void> {
  const flags = parseFlags(process.argv.slice(2));
  const config = loadConfig();
  const runConfig = resolveRunConfig(toRunConfigInput(config));
  const generator = prepareGenerator(config, flags);
  const startTime = Date.now();
  const totalSteps = 4;

  console.log('\n');
  console.log('╔════════════════════════════════════════════════════════════╗');
  console.log('║          🎬 Reel Pattern Analyzer - Competitor Edition       ║');
  console.log('╚════════════════════════════════════════════════════════════╝');
  console.log(`  Platform: ${config.platform}${flags.sample ? ' (sample data)' : ''}`);
  console.log(`  Generation: ${flags.ai ? config.openRouter.model : 'disabled'}\n`);

  logger.step(1, totalSteps, 'Collecting competitor posts');
  let postsByCompetitor: Record<string, unknown[]>;
  let competitors: string[];

  if (flags.sample) {
    postsByCompetitor = loadSampleData();
    competitors = Object.keys(postsByCompetitor);
  } else {
    const selection = resolveCompetitors({ runConfig, userUsername: config.userUsername, logger });
    competitors = selection.competitors;

    if (competitors.length < MIN_ANALYZABLE_COMPETITORS) {
      throw new ConfigurationError([
        `COMPETITORS: need at least ${MIN_ANALYZABLE_COMPETITORS} competitors, got ${competitors.length}. ` +
          'Add handles to COMPETITORS or set USER_USERNAME for auto-discovery',
      ]);
    }
    logger.info(`Analyzing ${competitors.length} competitors: ${competitors.join(', ')}`);
    postsByCompetitor = await collectCompetitorPosts(competitors, {
      platform: config.platform,
      apifyToken: config.apifyToken,
      reelsPerCompetitor: runConfig.reelsPerCompetitor,
      cache: new Cache(config.cacheHours, config.cacheDir),
      rateLimiter: new RateLimiter(config.scrapeBaseDelayMs, config.scrapeStepDelayMs),
      refresh: flags.refresh,
    });
  }

  logger.step(2, totalSteps, 'Extracting patterns');
  const result = runPatternEngine(
    {
      config: { ...toRunConfigInput(config), competitorUsernames: competitors },
      postsByCompetitor,
    },
    { platform: config.platform, logger }
  );
  logger.success(
    `Analyzed ${result.aggregate.totalReelsAnalyzed} posts from ${result.aggregate.competitorsAnalyzed} competitors`
  );

  logger.step(3, totalSteps, 'Generating content ideas');
  const { ideas, source } = await generateContentIdeas(result.payload, generator, {
    platform: config.platform,
    logger,
  });
  logger.info(`Content ideas source: ${source}`);

  logger.step(4, totalSteps, 'Saving outputs');
  const saved = saveOutputs(formatOutput(result.report, ideas), config.outputDir);

  const elapsedSeconds = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log('\n');
  console.log('╔════════════════════════════════════════════════════════════╗');
  console.log('║                    ✅ ANALYSIS COMPLETE                    ║');
  console.log('╚════════════════════════════════════════════════════════════╝');
  console.log(`  Total time: ${elapsedSeconds}s`);
  console.log(`  Report: ${saved.jsonPath}`);
  console.log(`  Summary: ${saved.markdownPath}\n`);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Analysis failed', error);
    process.exitCode = 1;
  });
}
