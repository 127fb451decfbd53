import Fastify from 'fastify';
import cors from '@fastify/cors';
import { authPlugin } from './plugins/auth.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { contactRoutes } from './routes/contacts.js';
import { directoryRoutes } from './routes/directory.js';
import type { ServiceContainer } from '../index.js';

export async function buildApp(
  apiKey: string,
  container: ServiceContainer,
  options: { logLevel?: string } = {},
) {
  const app = Fastify({
    logger: options.logLevel ? { level: options.logLevel } : false,
  });

  // Plugins
  await app.register(cors, { origin: true, methods: ['GET', 'HEAD', 'POST', 'OPTIONS'] });
  await app.register(authPlugin, { apiKey });
  await app.register(errorHandlerPlugin);

  // Routes
  await app.register(contactRoutes, { prefix: '/api/contacts', container });
  if (container.directory) {
    await app.register(directoryRoutes, { prefix: '/api/directory', directory: container.directory });
  }

  // Health check
  app.get('/health', async () => ({
    status: 'ok',
    provider: container.searchService.providerName,
    timestamp: new Date().toISOString(),
  }));

  return app;
}
