import { timingSafeEqual } from 'node:crypto';
import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

const PUBLIC_PATHS = new Set(['/health']);

const authPluginFn: FastifyPluginAsync<{ apiKey: string }> = async (app, opts) => {
  const expected = Buffer.from(opts.apiKey);

  app.addHook('onRequest', async (request, reply) => {
    if (PUBLIC_PATHS.has(request.url.split('?')[0])) return;

    const header = request.headers.authorization ?? '';
    const token = header.startsWith('Bearer ') ? Buffer.from(header.slice(7)) : undefined;
    if (!token || token.length !== expected.length || !timingSafeEqual(token, expected)) {
      return reply.status(401).send({ error: 'UNAUTHORIZED', message: 'Missing or invalid API key' });
    }
  });
};

export const authPlugin = fp(authPluginFn, { name: 'auth' });
