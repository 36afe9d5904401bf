/**
 * Sentry Instrumentation for the Progress Portal server
 *
 * IMPORTANT: This file must be imported before any other modules
 * to ensure proper auto-instrumentation of all dependencies.
 */

import * as Sentry from '@sentry/node';

const dsn = process.env.SENTRY_DSN;

Sentry.init({
  dsn,
  enabled: Boolean(dsn),

  tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.2 : 1.0,

  // The ESM loader hooks rewrite every module imported afterwards; only
  // register them when events are actually reported
  registerEsmLoaderHooks: Boolean(dsn),

  // Include Fastify integration for automatic request tracing
  integrations: [Sentry.fastifyIntegration()],
});

export { Sentry };
