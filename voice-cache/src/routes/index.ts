import type { FastifyInstance } from 'fastify';
import type { VoiceCache } from '../services/voice-cache.js';
import { cacheRoutes } from './cache.js';

export async function registerRoutes(fastify: FastifyInstance, cache: VoiceCache, recordingsPath: string): Promise<void> {
  await fastify.register(cacheRoutes, { cache, recordingsPath });
}
