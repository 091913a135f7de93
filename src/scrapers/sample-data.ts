import sampleReels from '../data/sample-reels.json';
import { logger } from '../utils/logger';

/**
 * Bundled demo dataset, in the mixed raw shapes the Instagram and X actors
 * return. Used by `--sample` runs and tests so nothing hits the network.
 */
export function loadSampleData(): Record<string, unknown[]> {
  const data: Record<string, unknown[]> = {};
  for (const [handle, records] of Object.entries(sampleReels)) {
    data[handle] = [...records];
  }
  logger.info(`[Sample] Loaded ${Object.keys(data).length} competitors from the bundled dataset`);
  return data;
}
