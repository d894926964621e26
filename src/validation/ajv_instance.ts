/**
 * Ajv validation instance with schema validators
 * Provider payloads and cached views must validate before use.
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema, type SchemaName } from './schema_loader';
import type { RateTableResponse } from '@/providers/frankfurter/types';
import type { QuoteChartResponse } from '@/providers/yahoo/types';
import type { DashboardView } from '@/types/dashboard';

const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

addFormats(ajv);

let rateTableValidator: ValidateFunction<RateTableResponse> | null = null;
let quoteChartValidator: ValidateFunction<QuoteChartResponse> | null = null;
let dashboardViewValidator: ValidateFunction<DashboardView> | null = null;

function compile<T>(name: SchemaName): ValidateFunction<T> {
  return ajv.compile<T>(loadSchema(name));
}

export function getRateTableValidator(): ValidateFunction<RateTableResponse> {
  if (!rateTableValidator) {
    rateTableValidator = compile<RateTableResponse>('rate_table.v1');
  }
  return rateTableValidator;
}

export function getQuoteChartValidator(): ValidateFunction<QuoteChartResponse> {
  if (!quoteChartValidator) {
    quoteChartValidator = compile<QuoteChartResponse>('quote_chart.v1');
  }
  return quoteChartValidator;
}

export function getDashboardViewValidator(): ValidateFunction<DashboardView> {
  if (!dashboardViewValidator) {
    dashboardViewValidator = compile<DashboardView>('dashboard_view.v1');
  }
  return dashboardViewValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateRateTable(data: unknown): ValidationResult<RateTableResponse> {
  return runValidator(getRateTableValidator(), data);
}

export function validateQuoteChart(data: unknown): ValidationResult<QuoteChartResponse> {
  return runValidator(getQuoteChartValidator(), data);
}

export function validateDashboardView(data: unknown): ValidationResult<DashboardView> {
  return runValidator(getDashboardViewValidator(), data);
}
