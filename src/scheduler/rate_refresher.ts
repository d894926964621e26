/**
 * Background refresh of the tracked currency pairs.
 *
 * One startup delay, then a cycle per interval. A failed cycle is retried
 * with exponential backoff (initial, 2x, 4x, ...) up to maxRetries times;
 * after that the refresher waits for the next interval. Stopping is observed
 * during every wait; an updateAll already in flight runs to completion.
 */

import { createChildLogger } from '@/utils/logger';
import { abortableDelay, type Delay } from '@/utils/delay';
import { describeError } from '@/providers/types';
import type { ExchangeRateResolver } from '@/market/exchange_rate_resolver';
import type { CurrencyPair, RateRefreshSummary } from '@/types/market';

const logger = createChildLogger('rate_refresher');

export type RefresherState = 'idle' | 'refreshing' | 'stopped';

export interface RateRefresherOptions {
  resolver: Pick<ExchangeRateResolver, 'updateAll'>;
  pairs: readonly CurrencyPair[];
  startupDelayMs: number;
  intervalMs: number;
  maxRetries: number;
  initialBackoffMs: number;
  delay?: Delay;
  clock?: () => number;
}

export interface RefreshOutcome {
  finishedAt: number;
  attempts: number;
  summary: RateRefreshSummary | null;
  error: string | null;
}

export class RateRefresher {
  private readonly delay: Delay;
  private readonly clock: () => number;
  private readonly controller = new AbortController();
  private state: RefresherState = 'idle';
  private loop: Promise<void> | null = null;
  private lastOutcome: RefreshOutcome | null = null;

  constructor(private readonly options: RateRefresherOptions) {
    this.delay = options.delay ?? abortableDelay;
    this.clock = options.clock ?? Date.now;
  }

  getState(): RefresherState {
    return this.state;
  }

  getLastOutcome(): RefreshOutcome | null {
    return this.lastOutcome;
  }

  /**
   * Starts the loop. The returned promise settles once the loop has stopped.
   */
  start(signal?: AbortSignal): Promise<void> {
    if (this.loop) {
      return this.loop;
    }
    if (signal) {
      if (signal.aborted) {
        this.controller.abort();
      } else {
        signal.addEventListener('abort', () => this.controller.abort(), { once: true });
      }
    }
    this.loop = this.run();
    return this.loop;
  }

  async stop(): Promise<void> {
    this.controller.abort();
    if (this.loop) {
      await this.loop;
    } else {
      this.state = 'stopped';
    }
  }

  private async run(): Promise<void> {
    const { signal } = this.controller;
    logger.info(
      { startupDelayMs: this.options.startupDelayMs, intervalMs: this.options.intervalMs },
      'Rate refresher started'
    );

    try {
      if (!(await this.delay(this.options.startupDelayMs, signal))) {
        return;
      }

      while (!signal.aborted) {
        await this.runCycle(signal);
        if (signal.aborted || !(await this.delay(this.options.intervalMs, signal))) {
          return;
        }
      }
    } finally {
      this.state = 'stopped';
      logger.info('Rate refresher stopped');
    }
  }

  /**
   * One refresh with retries. Never throws; the outcome is recorded.
   */
  async runCycle(signal: AbortSignal = this.controller.signal): Promise<RefreshOutcome> {
    const { maxRetries, initialBackoffMs, pairs, resolver } = this.options;
    let lastError = 'not attempted';
    let attempts = 0;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      attempts++;
      this.state = 'refreshing';
      try {
        const summary = await resolver.updateAll(pairs);
        this.state = 'idle';
        return this.record({ finishedAt: this.clock(), attempts, summary, error: null });
      } catch (error) {
        this.state = 'idle';
        lastError = describeError(error);
      }

      if (attempt === maxRetries) {
        break;
      }

      const backoffMs = initialBackoffMs * Math.pow(2, attempt);
      logger.warn({ attempt: attempts, backoffMs, error: lastError }, 'Rate refresh failed, backing off');
      if (!(await this.delay(backoffMs, signal))) {
        logger.info('Rate refresh retry cancelled');
        return this.record({ finishedAt: this.clock(), attempts, summary: null, error: lastError });
      }
    }

    logger.error({ attempts, error: lastError }, 'Rate refresh gave up until next cycle');
    return this.record({ finishedAt: this.clock(), attempts, summary: null, error: lastError });
  }

  private record(outcome: RefreshOutcome): RefreshOutcome {
    this.lastOutcome = outcome;
    return outcome;
  }
}
