/**
 * Progress Portal HTTP application
 *
 * Builds the Fastify instance with sessions, flash messages and CSRF
 * protection for the server-rendered pages, plus the JSON API.
 */

import Fastify, { type FastifyError, type FastifyServerOptions } from 'fastify';
import fastifyCookie from '@fastify/cookie';
import fastifySession from '@fastify/session';
import fastifyFlash from '@fastify/flash';
import fastifyCsrf from '@fastify/csrf-protection';
import fastifyFormbody from '@fastify/formbody';
import fastifyStatic from '@fastify/static';
import rateLimit from '@fastify/rate-limit';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

import * as Sentry from '@sentry/node';
import { config } from './config.js';
import { dashboardRoutes } from './routes/dashboard.js';
import { notificationRoutes } from './routes/notifications.js';
import { apiRoutes } from './routes/api.js';
import { renderErrorPage } from './views/errorPage.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const CLIENT_DIST = join(__dirname, '../../client/dist');

function loggerOptions(): FastifyServerOptions['logger'] {
  if (config.isTest) return false;
  if (config.isProduction) return { level: config.logLevel };

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

function isApiRequest(url: string): boolean {
  return url === '/api' || url.startsWith('/api/');
}

export async function buildApp() {
  const fastify = Fastify({ logger: loggerOptions() });

  await fastify.register(fastifyCookie);
  await fastify.register(fastifySession, {
    secret: config.session.secret,
    cookieName: config.session.cookieName,
    cookie: {
      secure: config.isProduction,
      httpOnly: true,
      sameSite: 'lax',
      maxAge: config.session.maxAgeMs,
    },
  });
  await fastify.register(fastifyFlash);
  await fastify.register(fastifyCsrf, { sessionPlugin: '@fastify/session' });
  await fastify.register(fastifyFormbody);

  // Register global rate limiting (100 requests per minute)
  await fastify.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
    errorResponseBuilder: (request, context) => ({
      statusCode: 429,
      error: 'Too Many Requests',
      message: `Rate limit exceeded. You can make ${context.max} requests per ${context.after}. Try again later.`,
      retryAfter: context.after,
    }),
  });

  await fastify.register(fastifyStatic, {
    root: CLIENT_DIST,
    prefix: config.assets.prefix,
    maxAge: config.isProduction ? '1y' : 0,
  });

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode =
      error.statusCode && error.statusCode >= 400 && error.statusCode < 600 ? error.statusCode : 500;

    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
      Sentry.captureException(error);
    } else {
      request.log.info({ err: error, statusCode }, 'Request failed');
    }

    if (isApiRequest(request.url)) {
      return reply
        .status(statusCode)
        .send({ error: statusCode >= 500 ? 'Internal Server Error' : error.message });
    }

    return reply
      .status(statusCode)
      .type('text/html; charset=utf-8')
      .send(renderErrorPage(statusCode, statusCode >= 500 ? undefined : error.message));
  });

  fastify.setNotFoundHandler((request, reply) => {
    if (isApiRequest(request.url)) {
      return reply.status(404).send({ error: 'Not found' });
    }
    return reply.status(404).type('text/html; charset=utf-8').send(renderErrorPage(404));
  });

  await fastify.register(dashboardRoutes);
  await fastify.register(notificationRoutes);
  await fastify.register(apiRoutes, { prefix: '/api' });

  return fastify;
}

export type App = Awaited<ReturnType<typeof buildApp>>;
