import type { CurrencyCode } from '@/types/portfolio';
import type { RateRefreshSummary } from '@/types/market';

export class NoRateAvailableError extends Error {
  constructor(
    public from: CurrencyCode,
    public to: CurrencyCode,
    public reason: string
  ) {
    super(`No exchange rate available for ${from}->${to}: ${reason}`);
    this.name = 'NoRateAvailableError';
  }
}

export class RateRefreshError extends Error {
  constructor(public summary: RateRefreshSummary) {
    super(
      `Rate refresh failed for all ${summary.failed.length} pair(s): ` +
        summary.failed.map((f) => `${f.from}${f.to}`).join(', ')
    );
    this.name = 'RateRefreshError';
  }
}

export class InvalidPriceRangeError extends Error {
  constructor(
    public startDate: string,
    public endDate: string,
    reason = `start ${startDate} is after end ${endDate}`
  ) {
    super(`Invalid price range: ${reason}`);
    this.name = 'InvalidPriceRangeError';
  }
}
