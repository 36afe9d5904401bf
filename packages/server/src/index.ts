/**
 * Progress Portal server
 *
 * Serves the progress dashboard and notification preferences pages and
 * runs the session reminder scheduler.
 */

// Sentry must be initialised before anything else is imported
import './instrument.js';

import { buildApp } from './app.js';
import { config } from './config.js';
import { createMailer } from './services/mailer.js';
import { startReminderScheduler } from './jobs/reminderScheduler.js';

const fastify = await buildApp();
const scheduler = startReminderScheduler(createMailer(fastify.log), fastify.log);

fastify.addHook('onClose', async () => {
  scheduler?.stop();
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    fastify.log.info(`Received ${signal}, shutting down`);
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error(err);
        process.exit(1);
      }
    );
  });
}

// Start server
const start = async () => {
  try {
    await fastify.listen({ port: config.port, host: config.host });
    fastify.log.info(`Progress Portal running at http://${config.host}:${config.port}/`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();
