/**
 * Supabase Catalog Store
 *
 * Reads products and their media from a Supabase (PostgREST) project.
 * Credentials come from configuration and are handed to the constructor;
 * nothing here reads the environment.
 *
 * Tables:
 *   products       - id, user_id, name, description, price
 *   product_media  - product_id, path, type (0 = image, 1 = video)
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import WebSocket from 'ws';
import { z } from 'zod';
import { log, warn } from '../config.js';
import type { SupabaseConfig } from '../config.js';
import { withRequestScope, type RequestScope } from './abort.js';
import { describeError } from '../errors.js';
import {
  CatalogStore,
  MediaRow,
  ProductId,
  ProductRow,
  StoreQueryError,
} from './catalog.js';

// ============================================================================
// Row Schemas
// ============================================================================

const ProductRowSchema = z.object({
  id: z.union([z.string(), z.number()]),
  name: z.string().nullish().transform((name) => name ?? null),
  description: z.string().nullish(),
  price: z.union([z.number(), z.string()]).nullish(),
});

const MediaRowSchema = z.object({
  path: z.string(),
  type: z.number(),
});

// ============================================================================
// Client
// ============================================================================

export function isSupabaseConfigured(config: SupabaseConfig): boolean {
  return !!(config.url && config.key);
}

export interface SupabaseClientOptions {
  /** Replaces global fetch for every PostgREST call */
  fetch?: typeof fetch;
}

/**
 * Create a Supabase client from configuration, or null when the URL or key
 * is missing. Node 20 has no global WebSocket, so the realtime client is
 * handed the `ws` implementation.
 */
export function createSupabaseClient(
  config: SupabaseConfig,
  options: SupabaseClientOptions = {}
): SupabaseClient | null {
  if (!config.url || !config.key) {
    return null;
  }

  log('[Supabase] Initializing client');
  return createClient(config.url, config.key, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
    realtime: { transport: WebSocket },
    ...(options.fetch ? { global: { fetch: options.fetch } } : {}),
  });
}

/**
 * Build the catalog store from configuration. Returns null when the store is
 * not configured or the client cannot be created; get_product_info then
 * answers StoreUnavailable.
 */
export function createCatalogStore(
  config: SupabaseConfig,
  timeoutMs: number,
  options: SupabaseClientOptions = {}
): SupabaseCatalogStore | null {
  let client: SupabaseClient | null;
  try {
    client = createSupabaseClient(config, options);
  } catch (err) {
    warn(`[Supabase] Client could not be created: ${describeError(err)}`);
    return null;
  }

  if (!client) {
    return null;
  }

  return new SupabaseCatalogStore(client, {
    productsTable: config.productsTable,
    mediaTable: config.mediaTable,
    timeoutMs,
  });
}

// ============================================================================
// Error Helpers
// ============================================================================

export function formatSupabaseError(error: { message: string; code?: string }): string {
  return error.code ? `${error.message} (${error.code})` : error.message;
}

function queryFailure(
  scope: RequestScope,
  timeoutMs: number,
  error: { message: string; code?: string }
): StoreQueryError {
  switch (scope.reason()) {
    case 'timeout':
      return new StoreQueryError(`Query timed out after ${timeoutMs}ms`);
    case 'cancelled':
      return new StoreQueryError('Query cancelled');
    default:
      return new StoreQueryError(formatSupabaseError(error), error.code);
  }
}

/**
 * Escape LIKE metacharacters so the filter matches literally, then wrap it
 * for an unanchored substring match. PostgREST reads `*` as `%` and offers no
 * escape for it; findProducts narrows those matches itself.
 */
export function containsPattern(text: string): string {
  return `%${text.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

// ============================================================================
// Store
// ============================================================================

export interface SupabaseCatalogOptions {
  productsTable: string;
  mediaTable: string;
  timeoutMs: number;
}

export class SupabaseCatalogStore implements CatalogStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly options: SupabaseCatalogOptions
  ) {}

  async findProducts(
    userId: string,
    nameFilter: string | undefined,
    signal?: AbortSignal
  ): Promise<ProductRow[]> {
    const { productsTable, timeoutMs } = this.options;

    return withRequestScope(timeoutMs, signal, async (scope) => {
      let query = this.client
        .from(productsTable)
        .select('*')
        .eq('user_id', userId);

      if (nameFilter) {
        query = query.ilike('name', containsPattern(nameFilter));
      }

      const { data, error } = await query.abortSignal(scope.signal);
      if (error) {
        throw queryFailure(scope, timeoutMs, error);
      }

      const rows: ProductRow[] = [];
      for (const raw of z.array(z.unknown()).parse(data ?? [])) {
        const row = ProductRowSchema.safeParse(raw);
        if (row.success) {
          rows.push(row.data);
        } else {
          const issue = row.error.issues[0];
          warn(`[Supabase] Skipping malformed row in ${productsTable}: ${issue.path.join('.')}: ${issue.message}`);
        }
      }

      if (nameFilter?.includes('*')) {
        const needle = nameFilter.toLowerCase();
        return rows.filter((row) => row.name?.toLowerCase().includes(needle));
      }
      return rows;
    });
  }

  async findMedia(productId: ProductId, signal?: AbortSignal): Promise<MediaRow[]> {
    const { mediaTable, timeoutMs } = this.options;

    return withRequestScope(timeoutMs, signal, async (scope) => {
      const { data, error } = await this.client
        .from(mediaTable)
        .select('path, type')
        .eq('product_id', productId)
        .abortSignal(scope.signal);

      if (error) {
        throw queryFailure(scope, timeoutMs, error);
      }

      const rows: MediaRow[] = [];
      for (const raw of z.array(z.unknown()).parse(data ?? [])) {
        const row = MediaRowSchema.safeParse(raw);
        if (row.success) {
          rows.push(row.data);
        }
      }
      return rows;
    });
  }
}
