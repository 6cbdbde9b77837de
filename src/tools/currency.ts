// ============================================================================
// Currency Conversion
// ============================================================================
// Converts an amount between two currencies using the Frankfurter rates API
// (or any endpoint answering `?from=X&to=Y` with `{ rates, date }`).
// ============================================================================

import { z } from 'zod';
import { getJson } from '../lib/http.js';
import { ToolFault, describeError } from '../errors.js';
import { log } from '../config.js';

// ============================================================================
// Types
// ============================================================================

export interface ConvertInput {
  source_currency: string;
  destination_currency: string;
  amount: number;
}

export interface ConversionQuote {
  from: string;
  to: string;
  amount: number;
  rate: number;
  converted: number;
  date: string | null;
}

export interface CurrencyDeps {
  apiUrl: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export const UNSUPPORTED_CONVERSION_MESSAGE = 'Invalid currency code or unsupported conversion.';

const RatesResponseSchema = z.object({
  rates: z.record(z.unknown()).optional(),
  date: z.unknown(),
});

// ============================================================================
// Rounding
// ============================================================================

/**
 * Round to `digits` fractional digits, half away from zero, working on the
 * shortest decimal representation of `value` rather than its binary
 * expansion: roundTo(2.00025, 4) === 2.0003, roundTo(9.200000000000001, 4) === 9.2.
 */
export function roundTo(value: number, digits: number): number {
  if (!Number.isFinite(value) || value === 0) return value;

  const [mantissa, exponent = '0'] = String(Math.abs(value)).split('e');
  const shifted = Number(`${mantissa}e${Number(exponent) + digits}`);
  const [roundedMantissa, roundedExponent = '0'] = String(Math.round(shifted)).split('e');

  return Math.sign(value) * Number(`${roundedMantissa}e${Number(roundedExponent) - digits}`);
}

// ============================================================================
// Conversion
// ============================================================================

export function normalizeCurrencyCode(code: string): string {
  return code.trim().toUpperCase();
}

export async function convert(
  input: ConvertInput,
  deps: CurrencyDeps
): Promise<ConversionQuote | ToolFault> {
  const from = normalizeCurrencyCode(input.source_currency);
  const to = normalizeCurrencyCode(input.destination_currency);

  let raw: unknown;
  try {
    raw = await getJson(deps.apiUrl, { from, to }, {
      timeoutMs: deps.timeoutMs,
      signal: deps.signal,
    });
  } catch (err) {
    const cause = describeError(err);
    log(`Currency: request ${from}->${to} failed: ${cause}`);
    return new ToolFault('UpstreamUnavailable', `API request failed: ${cause}`, { cause });
  }

  const body = RatesResponseSchema.safeParse(raw);
  const rate = body.success ? body.data.rates?.[to] : undefined;
  if (typeof rate !== 'number' || !Number.isFinite(rate) || rate <= 0) {
    return new ToolFault('UpstreamDataMissing', UNSUPPORTED_CONVERSION_MESSAGE);
  }

  const date = body.success && typeof body.data.date === 'string' ? body.data.date : null;

  return {
    from,
    to,
    amount: input.amount,
    rate,
    converted: roundTo(rate * input.amount, 4),
    date,
  };
}
