import 'dotenv/config';
import { createClient } from 'redis';
import { buildApp } from './api';
import { getAuthConfig, getServerConfig } from './common/config';
import { hasApiKeys } from './auth/apiKeyGate';
import { logger } from './common/logger';
import type { RedisLike } from '../services/ctgov/client';

async function connectRedis(url: string): Promise<{ redis: RedisLike; close: () => Promise<void> } | null> {
  const client = createClient({ url });
  client.on('error', (err) => logger.warn('redis_error', { err: String(err) }));
  try {
    await client.connect();
  } catch (err) {
    logger.warn('redis_disabled_or_unreachable', { err: String(err) });
    return null;
  }
  return {
    redis: {
      get: (key) => client.get(key),
      set: (key, value, options) =>
        options?.EX ? client.set(key, value, { EX: options.EX }) : client.set(key, value),
    },
    close: async () => {
      await client.quit();
    },
  };
}

async function main() {
  const config = getServerConfig();
  const cache = config.redisUrl ? await connectRedis(config.redisUrl) : null;
  const app = await buildApp(cache ? { redis: cache.redis } : {});
  if (!hasApiKeys()) {
    const { requireKey } = getAuthConfig();
    logger.warn(requireKey ? 'action_gate_closed_no_keys' : 'action_gate_open_no_keys');
  }

  let closing = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;
    logger.info('shutdown', { signal });
    try {
      await app.close();
      await cache?.close();
    } catch (err) {
      logger.error('shutdown_failed', { err: String(err) });
      process.exitCode = 1;
    }
  };
  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));

  await app.listen({ port: config.port, host: config.host });
  logger.info(`API listening on http://${config.host}:${config.port}`);
}

main().catch((err) => {
  logger.error('startup_failed', { err: String(err) });
  process.exit(1);
});
