// ============================================================================
// Product Aggregation
// ============================================================================
// Joins a user's products with their media rows. A failing media query only
// empties that product's media; a failing product query fails the call.
// ============================================================================

import { mapWithConcurrency } from '../lib/concurrency.js';
import {
  CatalogStore,
  MEDIA_TYPE,
  MediaRow,
  ProductId,
  ProductRow,
} from '../lib/catalog.js';
import { ToolFault, describeError } from '../errors.js';
import { log, warn } from '../config.js';

// ============================================================================
// Types
// ============================================================================

export interface ListProductsInput {
  user_id: string;
  name?: string;
}

export interface Product {
  id: ProductId;
  name: string | null;
  description: string;
  price: number | string;
  images: string[];
  videos: string[];
}

export interface ProductDeps {
  store: CatalogStore;
  mediaConcurrency: number;
  signal?: AbortSignal;
}

export interface MediaPartition {
  images: string[];
  videos: string[];
}

export const DEFAULT_DESCRIPTION = 'No description';
export const DEFAULT_PRICE = 'N/A';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Split media rows into image and video paths, keeping row order.
 * Rows with any other type are dropped.
 */
export function partitionMedia(rows: readonly MediaRow[]): MediaPartition {
  const images: string[] = [];
  const videos: string[] = [];

  for (const row of rows) {
    if (row.type === MEDIA_TYPE.image) {
      images.push(row.path);
    } else if (row.type === MEDIA_TYPE.video) {
      videos.push(row.path);
    }
  }

  return { images, videos };
}

export function toProduct(row: ProductRow, media: MediaPartition): Product {
  return {
    id: row.id,
    name: row.name,
    description: row.description ?? DEFAULT_DESCRIPTION,
    price: row.price ?? DEFAULT_PRICE,
    images: media.images,
    videos: media.videos,
  };
}

function cancelled(): ToolFault {
  return new ToolFault('Cancelled', 'Request cancelled');
}

// ============================================================================
// Aggregation
// ============================================================================

async function loadMedia(row: ProductRow, deps: ProductDeps): Promise<MediaPartition> {
  try {
    return partitionMedia(await deps.store.findMedia(row.id, deps.signal));
  } catch (err) {
    if (deps.signal?.aborted) {
      throw err;
    }
    warn(`Products: media lookup failed for product ${row.id}: ${describeError(err)}`);
    return { images: [], videos: [] };
  }
}

export async function listProducts(
  input: ListProductsInput,
  deps: ProductDeps
): Promise<Product[] | ToolFault> {
  let rows: ProductRow[];
  try {
    rows = await deps.store.findProducts(input.user_id, input.name || undefined, deps.signal);
  } catch (err) {
    if (deps.signal?.aborted) {
      return cancelled();
    }
    const cause = describeError(err);
    log(`Products: product query failed for user ${input.user_id}: ${cause}`);
    return new ToolFault('StoreUnavailable', `Error retrieving product info: ${cause}`, { cause });
  }

  if (rows.length === 0) {
    return [];
  }

  log(`Products: ${rows.length} product(s) for user ${input.user_id}, loading media`);

  try {
    return await mapWithConcurrency(rows, deps.mediaConcurrency, async (row) =>
      toProduct(row, await loadMedia(row, deps))
    );
  } catch {
    // loadMedia only rethrows once the caller has cancelled
    return cancelled();
  }
}
