import { getConfig } from './config.js';
import { SqliteKeyValueStore } from './db/kv-store.js';
import { buildServer } from './server.js';
import { AxiosFetcher } from './services/fetcher.js';
import { VoiceCache } from './services/voice-cache.js';

async function main() {
  const config = getConfig();

  console.log('=================================');
  console.log('  Voice Cache Service');
  console.log('=================================');
  console.log(`Port: ${config.port}`);
  console.log(`Data path: ${config.dataPath}`);
  console.log(`Cache path: ${config.cachePath}`);
  console.log(`Recordings path: ${config.recordingsPath}`);
  console.log(`Max cache size: ${Math.round(config.maxCacheBytes / (1024 * 1024))}MB / ${config.maxCachedFiles} files`);
  console.log(`Max concurrent downloads: ${config.maxConcurrentDownloads}`);
  console.log('');

  const cache = new VoiceCache({
    cacheDir: config.cachePath,
    store: new SqliteKeyValueStore(config.dataPath),
    fetcher: new AxiosFetcher({ timeoutMs: config.requestTimeoutMs }),
    maxCacheBytes: config.maxCacheBytes,
    maxCachedFiles: config.maxCachedFiles,
    maxConcurrentDownloads: config.maxConcurrentDownloads,
    maxAttempts: config.maxAttempts,
    retryDelaysMs: config.retryDelaysMs,
    waitTimeoutMs: config.waitTimeoutMs,
    fileExtension: config.fileExtension,
    minFileBytes: config.minFileBytes,
  });
  cache.open();

  const fastify = await buildServer(cache, { recordingsPath: config.recordingsPath });

  const shutdown = async (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    try {
      await fastify.close();
      await cache.close();
      process.exit(0);
    } catch (err) {
      console.error('[Server] Error during shutdown:', err);
      process.exit(1);
    }
  };
  process.once('SIGINT', () => { void shutdown('SIGINT'); });
  process.once('SIGTERM', () => { void shutdown('SIGTERM'); });

  // Start server
  try {
    await fastify.listen({ port: config.port, host: config.host });
    console.log(`[Server] Listening on http://${config.host}:${config.port}`);
  } catch (err) {
    console.error('Error starting server:', err);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
