// ============================================================================
// Currency Domain Tools
// ============================================================================

import { z } from 'zod';
import { ToolDescriptor } from '../types.js';
import { defineTool, numeric, toolError, toolSuccess } from '../shared/index.js';
import { isToolFault } from '../../errors.js';
import type { Config } from '../../config.js';
import { convert } from '../currency.js';

export type CurrencyToolConfig = Pick<Config, 'currencyApiUrl' | 'requestTimeoutMs'>;

export function currencyTools(config: CurrencyToolConfig): ToolDescriptor[] {
  const exchangeRateTool = defineTool({
    name: 'get_exchange_rate',
    title: 'Exchange Rate',
    description:
      'Convert an amount from one currency to another at the latest published rate. ' +
      'Currency codes are ISO 4217 (e.g. USD, EUR) and are case-insensitive.',
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      openWorldHint: true,
    },
    params: {
      source_currency: z.string().describe('Currency to convert from (e.g. "USD")'),
      destination_currency: z.string().describe('Currency to convert to (e.g. "EUR")'),
      amount: numeric(z.number().finite().nonnegative())
        .default(1)
        .describe('Amount of source currency to convert (default: 1)'),
    },
    handler: async (args, ctx) => {
      const result = await convert(args, {
        apiUrl: config.currencyApiUrl,
        timeoutMs: config.requestTimeoutMs,
        signal: ctx.signal,
      });
      return isToolFault(result) ? toolError(result) : toolSuccess(result);
    },
  });

  return [exchangeRateTool];
}
