import * as fs from 'fs';
import * as path from 'path';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { VoiceCache } from '../services/voice-cache.js';
import type { DownloadPriority, FailureReason, PrefetchRequest } from '../types/cache.js';

export interface CacheRoutesOptions {
  cache: VoiceCache;
  recordingsPath: string;
}

type IdParams = { Params: { id: string } };

const PRIORITIES: readonly DownloadPriority[] = ['high', 'normal', 'low'];

function isPriority(value: unknown): value is DownloadPriority {
  return PRIORITIES.some(priority => priority === value);
}

function field(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  return (value as Record<string, unknown>)[key];
}

/**
 * Resolve a client supplied path against root. Null when it points outside root.
 */
export function resolveInside(root: string, target: string): string | null {
  const base = path.resolve(root);
  const resolved = path.resolve(base, target);
  const relative = path.relative(base, resolved);
  if (!relative || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return null;
  }
  return resolved;
}

// Map failure reasons to HTTP status codes
function statusForFailure(reason: FailureReason): number {
  switch (reason) {
    case 'timeout': return 504;
    case 'cancelled': return 409;
    case 'closed': return 503;
    case 'failed': return 502;
  }
}

function contentTypeFor(filePath: string): string {
  switch (path.extname(filePath).toLowerCase()) {
    case '.m4a':
    case '.mp4': return 'audio/mp4';
    case '.mp3': return 'audio/mpeg';
    case '.ogg':
    case '.opus': return 'audio/ogg';
    case '.wav': return 'audio/wav';
    case '.aac': return 'audio/aac';
    default: return 'application/octet-stream';
  }
}

function parsePrefetchItems(body: unknown): PrefetchRequest[] | null {
  const items = field(body, 'items');
  if (!Array.isArray(items)) return null;

  const requests: PrefetchRequest[] = [];
  for (const item of items) {
    const id = field(item, 'id');
    const url = field(item, 'url');
    const priority = field(item, 'priority');
    if (typeof id !== 'string' || typeof url !== 'string') return null;
    if (priority !== undefined && !isPriority(priority)) return null;
    requests.push({ id, url, priority });
  }
  return requests;
}

export async function cacheRoutes(fastify: FastifyInstance, options: CacheRoutesOptions): Promise<void> {
  const { cache, recordingsPath } = options;

  // Get (and download if needed) a file
  fastify.get('/api/cache/files/:id', async (
    request: FastifyRequest<IdParams & { Querystring: { url?: string; priority?: string } }>,
    reply: FastifyReply,
  ) => {
    const { id } = request.params;
    const { url, priority } = request.query;

    if (!url) {
      return reply.status(400).send({ error: 'url is required' });
    }
    if (priority !== undefined && !isPriority(priority)) {
      return reply.status(400).send({ error: `priority must be one of ${PRIORITIES.join(', ')}` });
    }

    const result = await cache.requestFile(id, url, priority ?? 'normal');
    if (result.ok) {
      return reply.send({ id, path: result.path });
    }
    return reply.status(statusForFailure(result.reason)).send({ id, reason: result.reason, error: result.error ?? null });
  });

  // Stream the cached bytes
  fastify.get('/api/cache/files/:id/content', async (request: FastifyRequest<IdParams>, reply: FastifyReply) => {
    const cachedPath = cache.getCachedPath(request.params.id);
    if (!cachedPath) {
      return reply.status(404).send({ error: 'Not cached' });
    }
    return reply.type(contentTypeFor(cachedPath)).send(fs.createReadStream(cachedPath));
  });

  // Status and progress
  fastify.get('/api/cache/files/:id/status', async (request: FastifyRequest<IdParams>, reply: FastifyReply) => {
    const { id } = request.params;
    return reply.send({
      id,
      cached: cache.isCached(id),
      status: cache.getStatus(id),
      progress: cache.getProgress(id),
    });
  });

  // Cache a local recording
  fastify.post('/api/cache/files/:id/precache', async (request: FastifyRequest<IdParams>, reply: FastifyReply) => {
    const localPath = field(request.body, 'localPath');
    const url = field(request.body, 'url');
    if (typeof localPath !== 'string' || typeof url !== 'string') {
      return reply.status(400).send({ error: 'localPath and url are required' });
    }
    const recording = resolveInside(recordingsPath, localPath);
    if (!recording) {
      console.warn(`[Server] Rejected pre-cache outside recordings directory: ${localPath}`);
      return reply.status(400).send({ error: 'localPath must be inside the recordings directory' });
    }

    const cached = await cache.preCacheLocalFile(request.params.id, recording, url);
    if (!cached) {
      return reply.status(422).send({ error: 'Could not cache local file' });
    }
    return reply.send({ id: request.params.id, path: cache.getCachedPath(request.params.id) });
  });

  // Queue several downloads
  fastify.post('/api/cache/prefetch', async (request: FastifyRequest, reply: FastifyReply) => {
    const items = parsePrefetchItems(request.body);
    if (!items) {
      return reply.status(400).send({ error: 'items must be a list of { id, url, priority? }' });
    }
    return reply.send({ queued: cache.prefetch(items) });
  });

  // Cancel a download
  fastify.delete('/api/cache/files/:id', async (request: FastifyRequest<IdParams>, reply: FastifyReply) => {
    return reply.send({ id: request.params.id, cancelled: cache.cancel(request.params.id) });
  });

  fastify.get('/api/cache/stats', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send(cache.stats());
  });

  // Clear everything
  fastify.delete('/api/cache', async (_request: FastifyRequest, reply: FastifyReply) => {
    cache.clearCache();
    return reply.send({ cleared: true });
  });
}
