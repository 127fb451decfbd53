import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { DirectoryService } from '../../services/directory/index.js';

const currentUserDataBody = z.object({
  queues: z.array(z.string().min(1)).min(1),
});

export const directoryRoutes: FastifyPluginAsync<{ directory: DirectoryService }> = async (app, opts) => {
  const { directory } = opts;

  // GET /api/directory/queues
  app.get('/queues', async () => {
    const { queues } = await directory.loadConfiguration();
    return { data: queues };
  });

  // GET /api/directory/users
  app.get('/users', async () => {
    const { users } = await directory.loadConfiguration();
    return { data: users };
  });

  // POST /api/directory/refresh
  app.post('/refresh', async () => {
    const snapshot = await directory.refresh();
    return {
      data: {
        instance: snapshot.instance,
        queues: snapshot.queues.length,
        users: snapshot.users.length,
        loadedAt: snapshot.loadedAt,
      },
    };
  });

  // POST /api/directory/current-user-data
  app.post('/current-user-data', async (request) => {
    const body = currentUserDataBody.parse(request.body);
    const statuses = await directory.getCurrentUserStatuses(body.queues);
    return { data: statuses };
  });
};
