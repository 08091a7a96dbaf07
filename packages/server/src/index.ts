/**
 * Household Sync reference authority
 * Main entry point for the delta sync server
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { CLIENT_ID_HEADER } from '@household-sync/sdk';
import { SyncAuthority } from './authority/index.js';
import { registerSyncRoutes } from './gateway/index.js';

export { SyncAuthority } from './authority/index.js';
export type { AuthorityConfig, AuthorityRecord, AuthorityStats } from './authority/index.js';
export { ANONYMOUS_ACTOR, registerSyncRoutes } from './gateway/index.js';
export type { GatewayOptions } from './gateway/index.js';

export interface ServerConfig {
  port?: number;
  host?: string;
  logLevel?: string;
  corsOrigin?: string | string[] | boolean;
  corsCredentials?: boolean;
  /**
   * Shared record store; a fresh one is created when omitted
   */
  authority?: SyncAuthority;
}

function parseOrigin(value: string): string | string[] {
  // Comma-separated for multiple origins
  return value.includes(',') ? value.split(',').map((origin) => origin.trim()) : value;
}

export async function createServer(config: ServerConfig = {}) {
  const {
    logLevel = process.env.LOG_LEVEL ?? 'info',
    corsOrigin = parseOrigin(process.env.CORS_ORIGIN ?? '*'),
    corsCredentials = process.env.CORS_CREDENTIALS === 'true',
  } = config;

  const server = Fastify({
    logger: {
      level: logLevel,
    },
  });

  const authority = config.authority ?? new SyncAuthority({ logger: server.log });

  await server.register(cors, {
    origin: corsOrigin,
    credentials: corsCredentials,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept', 'Authorization', CLIENT_ID_HEADER],
  });

  server.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  });

  await server.register(registerSyncRoutes, { prefix: '/api/sync', authority });

  return server;
}

export async function startServer(config: ServerConfig = {}) {
  const {
    port = Number(process.env.PORT ?? 3000),
    host = process.env.HOST ?? '0.0.0.0',
  } = config;

  const server = await createServer(config);
  await server.listen({ port, host });

  return server;
}

// Start server if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  startServer().catch((error: unknown) => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
}
