/**
 * Rate table API response (validated against rate_table.v1)
 */

export interface RateTableResponse {
  amount?: number;
  base: string;
  date?: string;
  rates: Record<string, number>;
}
