/**
 * Reminder Scheduler
 *
 * Cron job that runs every 15 minutes and delivers session reminders
 * to learners whose reminder window has opened.
 */

import cron, { type ScheduledTask } from 'node-cron';
import type { FastifyBaseLogger } from 'fastify';
import { config } from '../config.js';
import { processDueReminders } from '../services/reminderService.js';
import type { Mailer } from '../services/mailer.js';

export interface ReminderScheduler {
  stop(): void;
}

/**
 * One pass of the reminder job. Overlapping runs are skipped.
 */
export function createReminderJob(
  mailer: Mailer,
  logger: FastifyBaseLogger,
  processReminders: typeof processDueReminders = processDueReminders
) {
  let running = false;

  return async function runReminderJob(now: Date = new Date()): Promise<void> {
    if (running) {
      logger.warn('[Scheduler] Previous reminder run still in progress, skipping');
      return;
    }

    running = true;
    try {
      const { sent, failed } = await processReminders(mailer, logger, now);
      if (sent > 0 || failed > 0) {
        logger.info({ sent, failed }, '[Scheduler] Reminder run finished');
      }
    } catch (error) {
      logger.error({ err: error }, '[Scheduler] Error running reminder job');
    } finally {
      running = false;
    }
  };
}

/**
 * Start the reminder scheduler. Returns null when reminders are disabled.
 */
export function startReminderScheduler(
  mailer: Mailer,
  logger: FastifyBaseLogger
): ReminderScheduler | null {
  if (!config.reminders.enabled) {
    logger.info('[Scheduler] Reminders disabled, not starting');
    return null;
  }

  const runReminderJob = createReminderJob(mailer, logger);
  const task: ScheduledTask = cron.schedule(config.reminders.cronExpression, () => {
    runReminderJob().catch((error: unknown) => {
      logger.error({ err: error }, '[Scheduler] Unhandled reminder job failure');
    });
  });

  logger.info(
    `[Scheduler] Reminder scheduler started (${config.reminders.cronExpression})`
  );

  return {
    stop() {
      task.stop();
    },
  };
}
