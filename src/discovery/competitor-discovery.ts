/**
 * Competitor discovery
 *
 * Heuristic only: the user's handle is matched against niche keywords and the
 * matching niche's seed accounts top up the manual list. There is no
 * follower-graph lookup.
 */

import seeds from '../data/discovery-seeds.json';
import { normalizeHandle, type RunConfig } from '../analysis/run-config';
import { silentLogger, type Logger } from '../utils/logger';

export const MAX_COMPETITORS = 15;
export const MIN_ANALYZABLE_COMPETITORS = 3;

export interface CompetitorSelectionOptions {
  runConfig: Pick<RunConfig, 'competitorUsernames' | 'autoDiscoverCompetitors' | 'minCompetitors'>;
  userUsername: string;
  logger?: Logger;
}

export interface CompetitorSelection {
  competitors: string[];
  discovered: string[];
}

function unique(handles: readonly string[]): string[] {
  return [...new Set(handles.map(normalizeHandle).filter(Boolean))];
}

/**
 * Seed accounts for the niche the handle looks like it belongs to, followed
 * by the general creator accounts. Never returns the user themself.
 */
export function discoverCompetitors(userUsername: string, limit: number): string[] {
  const user = normalizeHandle(userUsername);
  const niche = seeds.niches.find((candidate) => candidate.keywords.some((keyword) => user.includes(keyword)));
  const pool = niche ? [...niche.handles, ...seeds.general] : seeds.general;

  return unique(pool)
    .filter((handle) => handle !== user)
    .slice(0, Math.max(0, limit));
}

/**
 * Manual handles from the run config first, in the order given. Discovery only runs when it is
 * enabled, a user handle is known and the manual list is short; it asks for
 * twice the shortfall. The result never exceeds MAX_COMPETITORS.
 */
export function resolveCompetitors(options: CompetitorSelectionOptions): CompetitorSelection {
  const log = options.logger ?? silentLogger;
  const user = normalizeHandle(options.userUsername);
  const { competitorUsernames, autoDiscoverCompetitors, minCompetitors } = options.runConfig;
  const manual = unique(competitorUsernames).filter((handle) => handle !== user);

  let discovered: string[] = [];
  if (autoDiscoverCompetitors && user && manual.length < minCompetitors) {
    const shortfall = minCompetitors - manual.length;
    discovered = discoverCompetitors(user, shortfall * 2).filter((handle) => !manual.includes(handle));
    log.info(`[Discovery] Found ${discovered.length} candidate competitors for @${user}`);
  }

  const competitors = [...manual, ...discovered].slice(0, MAX_COMPETITORS);
  return { competitors, discovered: discovered.filter((handle) => competitors.includes(handle)) };
}
