// ============================================================================
// Catalog Store Contract
// ============================================================================
// The product aggregation only talks to this interface. The Supabase-backed
// implementation lives in ./supabase.ts; tests use an in-memory fake.
// ============================================================================

export type ProductId = string | number;

export interface ProductRow {
  id: ProductId;
  /** NULL in the store is passed through */
  name: string | null;
  description?: string | null;
  price?: number | string | null;
}

export const MEDIA_TYPE = {
  image: 0,
  video: 1,
} as const;

export interface MediaRow {
  product_id?: ProductId;
  path: string;
  type: number;
}

export interface CatalogStore {
  /**
   * Products owned by `userId`, in store order. When `nameFilter` is given,
   * only names containing it (case-insensitive) are returned.
   */
  findProducts(userId: string, nameFilter: string | undefined, signal?: AbortSignal): Promise<ProductRow[]>;
  /** Media rows whose foreign key is `productId`, in store order. */
  findMedia(productId: ProductId, signal?: AbortSignal): Promise<MediaRow[]>;
}

export class StoreQueryError extends Error {
  readonly code?: string;

  constructor(message: string, code?: string) {
    super(message);
    this.name = 'StoreQueryError';
    this.code = code;
  }
}
