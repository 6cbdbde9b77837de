#!/usr/bin/env node

import { getConfig, log, warn, PKG } from './config.js';
import { createKernel } from './kernel.js';
import { getAllTools, getToolNames } from './tools/index.js';
import { createCatalogStore } from './lib/supabase.js';
import { parseHttpArgs } from './httpServer.js';
import { HttpAdapter, StdioAdapter, type TransportAdapter } from './transports/index.js';
import { describeError } from './errors.js';

const config = getConfig();

log(`Starting ${PKG.name} v${PKG.version}`);
log(`Environment: ${config.env}`);

const store = createCatalogStore(config.supabase, config.requestTimeoutMs);

if (!store) {
  warn('Product store unavailable; get_product_info will report StoreUnavailable');
}

const tools = getAllTools({ config, store });
const kernel = createKernel(tools);
log(`Tools: ${getToolNames(tools).join(', ')}`);

// Start the server
async function main() {
  const { httpMode, port, host } = parseHttpArgs(process.argv, config.http);

  // Default: stdio; --http for remote clients
  const adapter: TransportAdapter = httpMode ? new HttpAdapter() : new StdioAdapter();
  await adapter.start(kernel, { port, host });

  const shutdown = (signal: NodeJS.Signals) => {
    log(`Received ${signal}, stopping ${adapter.name} transport`);
    adapter.stop().then(
      () => process.exit(0),
      (error) => {
        console.error('Error during shutdown:', describeError(error));
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
