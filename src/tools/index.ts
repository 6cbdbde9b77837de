// ============================================================================
// Tools Aggregator
// ============================================================================
// Central list of every tool. Each transport exposes this same list through
// the kernel; nothing is re-implemented per entry point.
// ============================================================================

import { ToolDescriptor } from './types.js';
import type { Config } from '../config.js';
import type { CatalogStore } from '../lib/catalog.js';
import { echoTools } from './echo/index.js';
import { currencyTools } from './currency/index.js';
import { weatherTools } from './weather/index.js';
import { productTools } from './products/index.js';

export interface ToolDeps {
  config: Config;
  /** null when the product store is not configured */
  store: CatalogStore | null;
}

export function getAllTools(deps: ToolDeps): ToolDescriptor[] {
  const { config, store } = deps;

  return [
    ...echoTools,
    ...currencyTools(config),
    ...weatherTools(config),
    ...productTools({ store, mediaConcurrency: config.mediaConcurrency }),
  ];
}

export function getToolNames(tools: ToolDescriptor[]): string[] {
  return tools.map(t => t.definition.name);
}
