import { logger } from './logger';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Progressive pacing between scraper calls. Call `i` (0-based) waits
 * `baseDelayMs + i * stepDelayMs` first, except call 0 which goes out
 * immediately: 0s, 7s, 9s, 11s... with the defaults.
 */
export class RateLimiter {
  private callCount = 0;

  constructor(
    private baseDelayMs: number,
    private stepDelayMs: number,
    private pause: (ms: number) => Promise<void> = sleep
  ) {}

  nextDelayMs(): number {
    if (this.callCount === 0) return 0;
    return this.baseDelayMs + this.callCount * this.stepDelayMs;
  }

  async wait(): Promise<void> {
    const delayMs = this.nextDelayMs();
    this.callCount++;
    if (delayMs <= 0) return;

    logger.waiting(Math.round(delayMs / 1000));
    await this.pause(delayMs);
  }
}
