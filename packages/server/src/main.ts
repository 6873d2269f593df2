import { createMemoryStorage } from '@davlane/core';
import type { FastifyServerOptions } from 'fastify';
import { type ServerConfig, loadConfig } from './config';
import { createServer } from './server';

function loggerOptions(config: ServerConfig): FastifyServerOptions['logger'] {
  if (!config.logPretty) return { level: config.logLevel };
  return {
    level: config.logLevel,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const storage = await createMemoryStorage(config.users, {
    maxInstances: config.maxInstances,
    productId: config.productId,
  });

  const server = await createServer({
    storage,
    prefix: config.prefix,
    realm: config.realm,
    maxInstances: config.maxInstances,
    productId: config.productId,
    logger: loggerOptions(config),
  });

  if (config.users.length === 0) {
    server.log.warn('no users configured; set CALDAV_USERS=user:password');
  }

  await server.listen({ host: config.host, port: config.port });

  const shutdown = async (signal: string) => {
    server.log.info({ signal }, 'shutting down');
    try {
      await server.close();
      process.exit(0);
    } catch (error) {
      server.log.error({ err: error }, 'error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
