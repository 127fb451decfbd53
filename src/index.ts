import { buildApp } from './api/index.js';
import { config } from './config/index.js';
import { ContactSearchService } from './services/contact-search/index.js';
import { DirectoryService } from './services/directory/index.js';
import { ConnectProvider } from './providers/connect/index.js';
import { createConnectApi, createConnectClient } from './providers/connect/client.js';
import { GatewayProvider } from './providers/gateway/index.js';
import type { ContactSearchProvider } from './providers/types.js';
import { logger } from './lib/logger.js';

export interface ServiceContainer {
  searchService: ContactSearchService;
  /** Present when the provider can list queues and users (Amazon Connect). */
  directory?: DirectoryService;
}

function createServices(): ServiceContainer {
  let provider: ContactSearchProvider;
  let directory: DirectoryService | undefined;

  if (config.provider === 'connect') {
    const client = createConnectClient(config.connect.region);
    const connect = new ConnectProvider(createConnectApi(client), {
      instanceId: config.connect.instanceId,
      hydrateAttributes: config.connect.hydrateAttributes,
    });
    provider = connect;
    directory = new DirectoryService(connect);
  } else {
    provider = new GatewayProvider({ baseUrl: config.gateway.url, apiKey: config.gateway.apiKey });
  }

  logger.info({ provider: provider.name, capabilities: provider.capabilities }, 'Search provider registered');

  const searchService = new ContactSearchService(provider, config.search, directory);
  return { searchService, directory };
}

async function main() {
  // 1. Initialize services
  const container = createServices();

  // 2. Start API server
  const app = await buildApp(config.apiKey, container, { logLevel: config.logLevel });
  await app.listen({ port: config.apiPort, host: '0.0.0.0' });
  logger.info({ port: config.apiPort }, 'Contact Search API started');

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');
    await app.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error) => {
  logger.fatal({ error }, 'Failed to start');
  process.exit(1);
});
