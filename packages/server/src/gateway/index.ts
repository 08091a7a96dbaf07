/**
 * Gateway module - handles client delta sync requests
 * @module gateway
 */

import type { FastifyInstance, FastifyPluginOptions, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import {
  CLIENT_ID_HEADER,
  MSGPACK_CONTENT_TYPE,
  PayloadCodec,
  errorMessage,
  syncRequestSchema,
} from '@household-sync/sdk';
import type { SyncAuthority } from '../authority/index.js';

export interface GatewayOptions extends FastifyPluginOptions {
  authority: SyncAuthority;
}

/**
 * Writer recorded when a request carries no client id
 */
export const ANONYMOUS_ACTOR = 'anonymous';

const statsQuerySchema = z.object({
  since: z.string().datetime({ offset: true }).optional(),
});

const codec = new PayloadCodec();

function acceptsMessagePack(request: FastifyRequest): boolean {
  return request.headers.accept?.includes('msgpack') ?? false;
}

function send(request: FastifyRequest, reply: FastifyReply, body: unknown): FastifyReply {
  if (acceptsMessagePack(request)) {
    reply.header('content-type', codec.contentType);
    return reply.send(Buffer.from(codec.encode(body)));
  }
  return reply.send(body);
}

function actorOf(request: FastifyRequest): string {
  const header = request.headers[CLIENT_ID_HEADER];
  return typeof header === 'string' && header.length > 0 ? header : ANONYMOUS_ACTOR;
}

/**
 * Register gateway routes
 */
export async function registerSyncRoutes(fastify: FastifyInstance, options: GatewayOptions) {
  const { authority } = options;

  // Compressed bodies stay raw until the handler decodes them
  fastify.addContentTypeParser(MSGPACK_CONTENT_TYPE, { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  /**
   * POST /api/sync/delta - push pending changes, pull server changes
   */
  fastify.post('/delta', async (request, reply) => {
    let raw: unknown = request.body;
    if (Buffer.isBuffer(raw)) {
      try {
        raw = codec.decode(raw);
      } catch (error) {
        reply.code(400);
        return send(request, reply, { error: `Undecodable body: ${errorMessage(error)}` });
      }
    }

    const parsed = syncRequestSchema.safeParse(raw);
    if (!parsed.success) {
      request.log.warn({ issues: parsed.error.issues.length }, 'invalid sync request');
      reply.code(400);
      return send(request, reply, { error: 'Invalid sync request', issues: parsed.error.issues });
    }

    const response = authority.apply(parsed.data, actorOf(request));
    return send(request, reply, response);
  });

  /**
   * GET /api/sync/stats - change counts per collection
   */
  fastify.get('/stats', async (request, reply) => {
    const query = statsQuerySchema.safeParse(request.query);
    if (!query.success) {
      reply.code(400);
      return { error: 'since must be an ISO-8601 timestamp' };
    }

    return authority.getStats(query.data.since);
  });
}
