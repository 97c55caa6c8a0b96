import Fastify, { type FastifyInstance } from 'fastify';
import { registerRoutes } from './routes/index.js';
import type { VoiceCache } from './services/voice-cache.js';

export interface ServerOptions {
  // Local files may only be pre-cached from below this directory
  recordingsPath: string;
}

export async function buildServer(cache: VoiceCache, options: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false,
  });

  await registerRoutes(fastify, cache, options.recordingsPath);

  // Health check endpoint
  fastify.get('/health', async (_request, reply) => {
    return reply.send({ status: cache.isOpen ? 'ok' : 'closed' });
  });

  return fastify;
}
