/**
 * Quote chart API response (validated against quote_chart.v1)
 */

export type NullableSeries = Array<number | null>;

export interface ChartMeta {
  symbol?: string;
  currency?: string | null;
  exchangeName?: string;
  regularMarketPrice?: number;
  regularMarketTime?: number;
}

export interface ChartQuoteIndicator {
  open?: NullableSeries;
  high?: NullableSeries;
  low?: NullableSeries;
  close?: NullableSeries;
  volume?: NullableSeries;
}

export interface ChartResultPayload {
  meta: ChartMeta;
  timestamp?: number[];
  indicators?: {
    quote?: ChartQuoteIndicator[];
  };
}

export interface QuoteChartResponse {
  chart: {
    result: ChartResultPayload[] | null;
    error?: { code?: string; description?: string } | null;
  };
}
