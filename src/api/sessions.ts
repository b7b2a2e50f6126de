import { FastifyInstance } from 'fastify';
import type { SessionRegistry } from '../services/SessionRegistry.js';
import type { TerminalBridge } from '../services/TerminalBridge.js';

export async function sessionRoutes(app: FastifyInstance, registry: SessionRegistry<TerminalBridge>) {
  // List active terminal sessions
  app.get('/api/sessions', async () => {
    return { sessions: registry.list() };
  });

  // Get single session
  app.get<{ Params: { id: string } }>('/api/sessions/:id', async (request, reply) => {
    const bridge = registry.lookup(request.params.id);

    if (!bridge) {
      reply.status(404);
      return { error: 'Session not found' };
    }

    return { session: bridge.info() };
  });

  // Terminate a session from outside its connection
  app.delete<{ Params: { id: string } }>('/api/sessions/:id', async (request, reply) => {
    const stopped = await registry.terminate(request.params.id);

    if (!stopped) {
      reply.status(404);
      return { error: 'Session not found' };
    }

    return reply.status(204).send();
  });
}
