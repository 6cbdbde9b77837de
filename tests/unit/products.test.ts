import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  DEFAULT_DESCRIPTION,
  DEFAULT_PRICE,
  listProducts,
  partitionMedia,
} from '../../src/tools/products.js';
import { STORE_NOT_CONFIGURED_MESSAGE, productTools } from '../../src/tools/products/index.js';
import { StoreQueryError } from '../../src/lib/catalog.js';
import { isToolFault } from '../../src/errors.js';
import { createTestContext, type TestContext } from '../utils/test-context.js';
import { FakeCatalogStore } from '../utils/fake-catalog.js';
import { resultJson } from '../utils/results.js';
import { catalogRows } from '../fixtures/payloads.js';
import '../utils/matchers.js';

describe('Products', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    ctx.cleanup();
  });

  describe('partitionMedia', () => {
    it('should split by type in row order and drop unknown types', () => {
      expect(
        partitionMedia([
          { path: 'a.jpg', type: 0 },
          { path: 'b.mp4', type: 1 },
          { path: 'c.jpg', type: 0 },
          { path: 'd.glb', type: 7 },
        ])
      ).toEqual({ images: ['a.jpg', 'c.jpg'], videos: ['b.mp4'] });
    });

    it('should keep and drop the same paths in any row order', () => {
      const rows = [
        { path: 'a.jpg', type: 0 },
        { path: 'b.mp4', type: 1 },
        { path: 'c.jpg', type: 0 },
        { path: 'd.glb', type: 7 },
      ];
      const permutations = (items: typeof rows): Array<typeof rows> =>
        items.length <= 1
          ? [items]
          : items.flatMap((item, i) =>
              permutations([...items.slice(0, i), ...items.slice(i + 1)]).map((rest) => [item, ...rest])
            );

      const orders = permutations(rows);
      expect(orders).toHaveLength(24);

      for (const order of orders) {
        const { images, videos } = partitionMedia(order);
        expect([...images].sort()).toEqual(['a.jpg', 'c.jpg']);
        expect(videos).toEqual(['b.mp4']);
        expect(images).toEqual(order.filter((r) => r.type === 0).map((r) => r.path));
      }
    });
  });

  describe('listProducts', () => {
    it('should join each product with its media', async () => {
      const store = new FakeCatalogStore(catalogRows);

      const result = await listProducts({ user_id: 'u-1' }, { store, mediaConcurrency: 4 });

      expect(result).toEqual([
        {
          id: 1,
          name: 'Blue Mug',
          description: 'Ceramic, 350ml',
          price: 12.5,
          images: ['mugs/blue-front.jpg', 'mugs/blue-side.jpg'],
          videos: ['mugs/blue-spin.mp4'],
        },
        {
          id: 2,
          name: 'Red Mug',
          description: DEFAULT_DESCRIPTION,
          price: DEFAULT_PRICE,
          images: ['mugs/red.jpg'],
          videos: [],
        },
        {
          id: 3,
          name: 'Poster',
          description: 'No description',
          price: 'N/A',
          images: [],
          videos: [],
        },
      ]);
    });

    it('should keep a product whose name is NULL next to the others', async () => {
      const store = new FakeCatalogStore({
        products: [
          { id: 1, user_id: 'u-5', name: 'Mug' },
          { id: 2, user_id: 'u-5', name: null },
        ],
      });

      const result = await listProducts({ user_id: 'u-5' }, { store, mediaConcurrency: 4 });

      expect(result).toEqual([
        { id: 1, name: 'Mug', description: 'No description', price: 'N/A', images: [], videos: [] },
        { id: 2, name: null, description: 'No description', price: 'N/A', images: [], videos: [] },
      ]);
    });

    it('should pass the name filter to the store', async () => {
      const store = new FakeCatalogStore(catalogRows);

      const result = await listProducts(
        { user_id: 'u-1', name: 'red' },
        { store, mediaConcurrency: 4 }
      );

      expect(store.productQueries).toEqual([{ userId: 'u-1', nameFilter: 'red' }]);
      expect(Array.isArray(result) && result.map((p) => p.name)).toEqual(['Red Mug']);
    });

    it('should treat an empty name filter as no filter', async () => {
      const store = new FakeCatalogStore(catalogRows);

      await listProducts({ user_id: 'u-1', name: '' }, { store, mediaConcurrency: 4 });

      expect(store.productQueries).toEqual([{ userId: 'u-1', nameFilter: undefined }]);
    });

    it('should return an empty list without media lookups', async () => {
      const store = new FakeCatalogStore(catalogRows);

      const result = await listProducts({ user_id: 'nobody' }, { store, mediaConcurrency: 4 });

      expect(result).toEqual([]);
      expect(store.mediaQueries).toEqual([]);
    });

    it('should empty only the media of a product whose lookup fails', async () => {
      const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
      const store = new FakeCatalogStore({ ...catalogRows, failingMedia: [2] });

      const result = await listProducts(
        { user_id: 'u-1', name: 'mug' },
        { store, mediaConcurrency: 4 }
      );

      expect(result).toEqual([
        {
          id: 1,
          name: 'Blue Mug',
          description: 'Ceramic, 350ml',
          price: 12.5,
          images: ['mugs/blue-front.jpg', 'mugs/blue-side.jpg'],
          videos: ['mugs/blue-spin.mp4'],
        },
        {
          id: 2,
          name: 'Red Mug',
          description: 'No description',
          price: 'N/A',
          images: [],
          videos: [],
        },
      ]);
      expect(stderr).toHaveBeenCalledWith(
        '[toolbox-mcp] WARN Products: media lookup failed for product 2: media query failed for 2'
      );
    });

    it('should keep store order when media lookups finish out of order', async () => {
      const store = new FakeCatalogStore({
        ...catalogRows,
        mediaDelayMs: { '1': 30, '2': 0, '3': 10 },
      });

      const result = await listProducts({ user_id: 'u-1' }, { store, mediaConcurrency: 4 });

      expect(Array.isArray(result) && result.map((p) => p.id)).toEqual([1, 2, 3]);
    });

    it('should cap concurrent media lookups', async () => {
      const products = Array.from({ length: 6 }, (_, i) => ({
        id: `p-${i}`,
        user_id: 'u-9',
        name: `Item ${i}`,
      }));
      const store = new FakeCatalogStore({
        products,
        mediaDelayMs: Object.fromEntries(products.map((p) => [p.id, 5])),
      });

      const result = await listProducts({ user_id: 'u-9' }, { store, mediaConcurrency: 2 });

      expect(Array.isArray(result) && result.length).toBe(6);
      expect(store.mediaQueries).toHaveLength(6);
      expect(store.maxInFlightMedia).toBe(2);
    });

    it('should fail the call when the product query fails', async () => {
      const store = new FakeCatalogStore({
        productError: new StoreQueryError('relation "products" does not exist (42P01)', '42P01'),
      });

      const result = await listProducts({ user_id: 'u-1' }, { store, mediaConcurrency: 4 });

      expect(isToolFault(result) && result.toJSON()).toEqual({
        error: 'Error retrieving product info: relation "products" does not exist (42P01)',
        kind: 'StoreUnavailable',
        cause: 'relation "products" does not exist (42P01)',
      });
    });

    it('should report Cancelled when the caller aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const store = new FakeCatalogStore({ productError: new StoreQueryError('Query cancelled') });

      const result = await listProducts(
        { user_id: 'u-1' },
        { store, mediaConcurrency: 4, signal: controller.signal }
      );

      expect(isToolFault(result) && result.kind).toBe('Cancelled');
    });
  });

  describe('get_product_info tool', () => {
    it('should answer StoreUnavailable when no store is configured', async () => {
      const [tool] = productTools({ store: null, mediaConcurrency: 4 });

      const result = await tool.bind({ user_id: 'u-1' })({});

      expect(result).toBeToolFault('StoreUnavailable');
      expect(resultJson(result)).toEqual({
        error: STORE_NOT_CONFIGURED_MESSAGE,
        kind: 'StoreUnavailable',
      });
    });

    it('should treat a null name as absent', async () => {
      const store = new FakeCatalogStore(catalogRows);
      const [tool] = productTools({ store, mediaConcurrency: 4 });

      const result = await tool.bind({ user_id: 'u-2', name: null })({});

      expect(store.productQueries).toEqual([{ userId: 'u-2', nameFilter: undefined }]);
      expect(resultJson(result)).toEqual([
        {
          id: 4,
          name: 'Green Mug',
          description: 'Not yours',
          price: 9,
          images: ['mugs/green.jpg'],
          videos: [],
        },
      ]);
    });

    it('should require user_id', () => {
      const [tool] = productTools({ store: null, mediaConcurrency: 4 });

      expect(() => tool.bind({ name: 'mug' })).toThrow(
        'Invalid arguments for get_product_info: user_id: Required'
      );
    });
  });
});
