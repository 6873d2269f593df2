import {
  CalDavRequestHandler,
  DEFAULT_LIMITS,
  type ServerLimits,
  type Storage,
} from '@davlane/core';
import Fastify, {
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest,
  type FastifyServerOptions,
} from 'fastify';
import { authenticate } from './auth';

export interface ServerOptions {
  storage: Storage;
  prefix?: string;
  realm?: string;
  limits?: ServerLimits;
  maxInstances?: number;
  productId?: string;
  logger?: FastifyServerOptions['logger'];
}

// Methods Fastify does not route out of the box.
const DAV_METHODS = ['PROPFIND', 'REPORT', 'MKCALENDAR', 'MKCOL'];

export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const { storage } = options;
  const realm = options.realm ?? 'davlane';
  const limits = options.limits ?? DEFAULT_LIMITS;

  const app = Fastify({
    logger: options.logger ?? false,
    bodyLimit: limits.maxResourceSize,
    exposeHeadRoutes: false,
  });

  for (const method of DAV_METHODS) {
    app.addHttpMethod(method, { hasBody: true });
  }

  // CalDAV bodies are XML or iCalendar; the core parses them itself.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  const handler = new CalDavRequestHandler({
    storage,
    prefix: options.prefix,
    logger: app.log.child({ module: 'caldav' }),
    limits,
    maxInstances: options.maxInstances,
    productId: options.productId,
  });

  app.all('/.well-known/caldav', async (_request, reply) => {
    return reply.redirect(handler.converter.prefix, 301);
  });

  const serve = async (request: FastifyRequest, reply: FastifyReply) => {
    const auth = await authenticate(request.headers.authorization, storage);
    if (!auth.ok) {
      if (auth.status === 401) {
        reply.header('WWW-Authenticate', `Basic realm="${realm}"`);
      }
      return reply.code(auth.status).type('text/plain; charset=utf-8').send(auth.message);
    }

    const controller = new AbortController();
    reply.raw.once('close', () => {
      if (!reply.raw.writableEnded) controller.abort();
    });

    const response = await handler.handleRequest({
      method: request.method,
      path: request.url,
      headers: request.headers,
      body: typeof request.body === 'string' ? request.body : undefined,
      user: auth.user,
      signal: controller.signal,
    });

    reply.code(response.status).headers(response.headers);
    if (response.mimeType) reply.type(response.mimeType);
    return reply.send(response.content);
  };

  app.all('/', serve);
  app.all('/*', serve);

  return app;
}
