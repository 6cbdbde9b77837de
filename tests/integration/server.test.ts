import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { createKernel } from '../../src/kernel.js';
import { getAllTools } from '../../src/tools/index.js';
import { getConfig } from '../../src/config.js';
import { createTestContext, type TestContext } from '../utils/test-context.js';
import { createTestMcpClient, type TestMcpClient } from '../utils/mcp-test-client.js';
import { FakeCatalogStore } from '../utils/fake-catalog.js';
import { calledUrl, jsonResponse, stubFetch } from '../utils/fetch-stub.js';
import { resultJson, resultText } from '../utils/results.js';
import { catalogRows, forecastPayloads, ratesPayloads } from '../fixtures/payloads.js';
import '../utils/matchers.js';

describe('MCP Server Integration', () => {
  let ctx: TestContext;
  let mcp: TestMcpClient;
  let store: FakeCatalogStore;

  beforeEach(async () => {
    ctx = createTestContext();
    process.env.TOOLBOX_CURRENCY_API_URL = 'http://rates.test/latest';
    process.env.TOOLBOX_WEATHER_API_URL = 'http://weather.test/v1/forecast';

    store = new FakeCatalogStore(catalogRows);
    const kernel = createKernel(getAllTools({ config: getConfig(), store }));
    mcp = await createTestMcpClient(kernel);
  });

  afterEach(async () => {
    await mcp.close();
    ctx.cleanup();
  });

  describe('tools/list', () => {
    it('should list every tool in order with a description', async () => {
      const tools = await mcp.listTools();

      expect(tools.map((t) => t.name)).toEqual([
        'echo',
        'get_exchange_rate',
        'get_weather',
        'get_product_info',
      ]);
      for (const tool of tools) {
        expect(tool.description).toBeTruthy();
      }
    });

    it('should advertise required parameters', async () => {
      const { tools } = await mcp.client.listTools();
      const required = Object.fromEntries(tools.map((t) => [t.name, t.inputSchema.required ?? []]));

      expect(required).toEqual({
        echo: ['text'],
        get_exchange_rate: ['source_currency', 'destination_currency'],
        get_weather: ['latitude', 'longitude'],
        get_product_info: ['user_id'],
      });
    });
  });

  describe('tools/call', () => {
    it('should echo text, including the empty string', async () => {
      expect(resultText(await mcp.callTool('echo', { text: 'hello' }))).toBe('hello');
      expect(resultText(await mcp.callTool('echo', { text: '' }))).toBe('');
    });

    it('should echo JSON and quote characters verbatim over the protocol', async () => {
      const text = '{"error":"x"} "quoted" \\ \n \u{1F375}';

      const result = await mcp.callTool('echo', { text });

      expect(result.isError).toBeFalsy();
      expect(resultText(result)).toBe(text);
    });

    it('should convert currency', async () => {
      const fetchMock = stubFetch();
      fetchMock.mockResolvedValue(jsonResponse(ratesPayloads.usdToEur));

      const result = await mcp.callTool('get_exchange_rate', {
        source_currency: 'usd',
        destination_currency: 'eur',
        amount: 10,
      });

      expect(result.isError).toBeFalsy();
      expect(resultJson(result)).toEqual({
        from: 'USD',
        to: 'EUR',
        amount: 10,
        rate: 0.92,
        converted: 9.2,
        date: '2024-01-01',
      });
      expect(calledUrl(fetchMock).origin).toBe('http://rates.test');
    });

    it('should report current weather', async () => {
      stubFetch().mockResolvedValue(jsonResponse(forecastPayloads.berlin));

      const result = await mcp.callTool('get_weather', { latitude: 52.52, longitude: 13.41 });

      expect(resultJson(result)).toEqual({
        temperature: 3.4,
        windspeed: 11.2,
        winddirection: 250,
        weathercode: 3,
        time: '2024-01-01T12:00',
      });
    });

    it('should fetch products with media', async () => {
      const result = await mcp.callTool('get_product_info', { user_id: 'u-1', name: 'blue' });

      expect(resultJson(result)).toEqual([
        {
          id: 1,
          name: 'Blue Mug',
          description: 'Ceramic, 350ml',
          price: 12.5,
          images: ['mugs/blue-front.jpg', 'mugs/blue-side.jpg'],
          videos: ['mugs/blue-spin.mp4'],
        },
      ]);
      expect(store.productQueries).toEqual([{ userId: 'u-1', nameFilter: 'blue' }]);
    });

    it('should return upstream failures as error results', async () => {
      stubFetch().mockRejectedValue(new TypeError('fetch failed'));

      const result = await mcp.callTool('get_exchange_rate', {
        source_currency: 'USD',
        destination_currency: 'EUR',
      });

      expect(result).toBeToolFault('UpstreamUnavailable');
      expect(resultJson(result)).toEqual({
        error: 'API request failed: fetch failed',
        kind: 'UpstreamUnavailable',
        cause: 'fetch failed',
      });
    });

    it('should reject an unknown tool as invalid params', async () => {
      await expect(mcp.callTool('nope', {})).rejects.toMatchObject({
        code: ErrorCode.InvalidParams,
        message: expect.stringContaining('Unknown tool: nope'),
        data: { error: 'Unknown tool: nope', kind: 'UnknownTool' },
      });
    });

    it('should reject invalid arguments as invalid params', async () => {
      await expect(mcp.callTool('get_weather', { latitude: 'north' })).rejects.toMatchObject({
        code: ErrorCode.InvalidParams,
        data: { kind: 'InvalidArguments', fields: ['latitude', 'longitude'] },
      });
    });
  });
});
