// ============================================================================
// Product Domain Tools
// ============================================================================
// Product lookups backed by the catalog store. When no store is configured
// the tool stays listed but answers with StoreUnavailable.
// ============================================================================

import { z } from 'zod';
import { ToolDescriptor } from '../types.js';
import { defineTool, optionalString, toolError, toolSuccess } from '../shared/index.js';
import { ToolFault, isToolFault } from '../../errors.js';
import type { CatalogStore } from '../../lib/catalog.js';
import { listProducts } from '../products.js';

export const STORE_NOT_CONFIGURED_MESSAGE =
  'Product store not configured. Set SUPABASE_URL and SUPABASE_KEY.';

export interface ProductToolDeps {
  store: CatalogStore | null;
  mediaConcurrency: number;
}

export function productTools(deps: ProductToolDeps): ToolDescriptor[] {
  const productInfoTool = defineTool({
    name: 'get_product_info',
    title: 'Product Info',
    description:
      'Fetch the products owned by a user, each with its description, price, image paths and video paths. ' +
      'Optionally filter by a case-insensitive substring of the product name.',
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      openWorldHint: true,
    },
    params: {
      user_id: z.string().describe('Owner of the products'),
      name: optionalString().describe('Only return products whose name contains this text (case-insensitive)'),
    },
    handler: async (args, ctx) => {
      if (!deps.store) {
        return toolError(new ToolFault('StoreUnavailable', STORE_NOT_CONFIGURED_MESSAGE));
      }

      const result = await listProducts(args, {
        store: deps.store,
        mediaConcurrency: deps.mediaConcurrency,
        signal: ctx.signal,
      });
      return isToolFault(result) ? toolError(result) : toolSuccess(result);
    },
  });

  return [productInfoTool];
}
