/**
 * Session Reminder Service
 *
 * Works out which upcoming sessions are inside each learner's reminder
 * window and delivers one reminder per enabled channel.
 */

import { and, eq, gt, inArray, lte } from 'drizzle-orm';
import type { FastifyBaseLogger } from 'fastify';
import { db, schema } from '../db/index.js';
import {
  DEFAULT_NOTIFICATION_PREFERENCES,
  REMINDER_DAYS_MAX,
  REMINDER_HOURS_MAX,
  formatDisplayDate,
  isReminderChannel,
  type NotificationPreferences,
  type ReminderChannel,
} from '@progress-portal/shared';
import type { Mailer } from './mailer.js';

const HOUR_MS = 1000 * 60 * 60;
const MAX_LEAD_MS = (REMINDER_DAYS_MAX * 24 + REMINDER_HOURS_MAX) * HOUR_MS;

export interface ReminderCandidate {
  userId: number;
  email: string;
  name: string;
  sessionId: number;
  sessionTitle: string;
  courseTitle: string;
  startTime: Date;
  preferences: NotificationPreferences;
  sentChannels: ReadonlySet<ReminderChannel>;
}

export interface DueReminder {
  userId: number;
  email: string;
  name: string;
  sessionId: number;
  sessionTitle: string;
  courseTitle: string;
  startTime: Date;
  channel: ReminderChannel;
}

export interface ReminderRunResult {
  sent: number;
  failed: number;
}

export function reminderLeadMs(preferences: NotificationPreferences): number {
  return (preferences.reminderDaysBefore * 24 + preferences.reminderHoursBefore) * HOUR_MS;
}

function enabledChannels(preferences: NotificationPreferences): ReminderChannel[] {
  const channels: ReminderChannel[] = [];
  if (preferences.emailNotifications) channels.push('email');
  if (preferences.inAppNotifications) channels.push('in_app');
  return channels;
}

/**
 * A session is due once `now` reaches `start - lead` and until it starts.
 * A zero lead time therefore never produces a reminder.
 */
export function findDueReminders(candidates: ReminderCandidate[], now: Date): DueReminder[] {
  const due: DueReminder[] = [];

  for (const candidate of candidates) {
    const start = candidate.startTime.getTime();
    const windowOpens = start - reminderLeadMs(candidate.preferences);
    if (now.getTime() < windowOpens || now.getTime() >= start) continue;

    for (const channel of enabledChannels(candidate.preferences)) {
      if (candidate.sentChannels.has(channel)) continue;
      due.push({
        userId: candidate.userId,
        email: candidate.email,
        name: candidate.name,
        sessionId: candidate.sessionId,
        sessionTitle: candidate.sessionTitle,
        courseTitle: candidate.courseTitle,
        startTime: candidate.startTime,
        channel,
      });
    }
  }

  return due;
}

export function reminderMessage(reminder: DueReminder): { title: string; text: string } {
  const when = `${formatDisplayDate(reminder.startTime)} at ${reminder.startTime
    .toISOString()
    .slice(11, 16)} UTC`;
  return {
    title: `Upcoming session: ${reminder.sessionTitle}`,
    text: `Hi ${reminder.name}, "${reminder.sessionTitle}" in ${reminder.courseTitle} starts on ${when}.`,
  };
}

/**
 * Upcoming sessions within the longest possible reminder window, joined with
 * each enrolled learner's preferences and the reminders already sent.
 */
export async function loadReminderCandidates(now: Date): Promise<ReminderCandidate[]> {
  const { users, courses, courseSessions, enrollments, notificationPreferences, sessionReminders } =
    schema;

  const rows = await db
    .select({
      userId: users.id,
      email: users.email,
      name: users.name,
      sessionId: courseSessions.id,
      sessionTitle: courseSessions.title,
      courseTitle: courses.title,
      startTime: courseSessions.startTime,
      prefs: notificationPreferences,
    })
    .from(courseSessions)
    .innerJoin(courses, eq(courseSessions.courseId, courses.id))
    .innerJoin(
      enrollments,
      and(eq(enrollments.courseId, courses.id), eq(enrollments.status, 'approved'))
    )
    .innerJoin(users, eq(enrollments.userId, users.id))
    .leftJoin(notificationPreferences, eq(notificationPreferences.userId, users.id))
    .where(
      and(
        gt(courseSessions.startTime, now),
        lte(courseSessions.startTime, new Date(now.getTime() + MAX_LEAD_MS))
      )
    );

  if (rows.length === 0) return [];

  const sessionIds = [...new Set(rows.map((r) => r.sessionId))];
  const sent = await db
    .select({
      userId: sessionReminders.userId,
      sessionId: sessionReminders.sessionId,
      channel: sessionReminders.channel,
    })
    .from(sessionReminders)
    .where(inArray(sessionReminders.sessionId, sessionIds));

  const sentMap = new Map<string, Set<ReminderChannel>>();
  for (const record of sent) {
    if (!isReminderChannel(record.channel)) continue;
    const key = `${record.userId}:${record.sessionId}`;
    const channels = sentMap.get(key) ?? new Set<ReminderChannel>();
    channels.add(record.channel);
    sentMap.set(key, channels);
  }

  return rows.map((row) => ({
    userId: row.userId,
    email: row.email,
    name: row.name,
    sessionId: row.sessionId,
    sessionTitle: row.sessionTitle,
    courseTitle: row.courseTitle,
    startTime: row.startTime,
    preferences: row.prefs
      ? {
          reminderDaysBefore: row.prefs.reminderDaysBefore,
          reminderHoursBefore: row.prefs.reminderHoursBefore,
          emailNotifications: row.prefs.emailNotifications,
          inAppNotifications: row.prefs.inAppNotifications,
        }
      : DEFAULT_NOTIFICATION_PREFERENCES,
    sentChannels: sentMap.get(`${row.userId}:${row.sessionId}`) ?? new Set<ReminderChannel>(),
  }));
}

/**
 * Record the reminder and create the in-app notification atomically.
 * Returns false when another run already delivered it.
 */
function deliverInApp(reminder: DueReminder, now: Date): boolean {
  const { title, text } = reminderMessage(reminder);

  // better-sqlite3 transactions must be synchronous - no async/await
  return db.transaction((tx) => {
    const claimed = tx
      .insert(schema.sessionReminders)
      .values({
        userId: reminder.userId,
        sessionId: reminder.sessionId,
        channel: 'in_app',
        sentAt: now,
      })
      .onConflictDoNothing()
      .returning({ id: schema.sessionReminders.id })
      .all();

    if (claimed.length === 0) return false;

    tx.insert(schema.inAppNotifications)
      .values({
        userId: reminder.userId,
        title,
        message: text,
        notificationType: 'session_reminder',
        createdAt: now,
      })
      .run();
    return true;
  });
}

async function deliverEmail(reminder: DueReminder, mailer: Mailer, now: Date): Promise<boolean> {
  const [claimed] = await db
    .insert(schema.sessionReminders)
    .values({
      userId: reminder.userId,
      sessionId: reminder.sessionId,
      channel: 'email',
      sentAt: now,
    })
    .onConflictDoNothing()
    .returning({ id: schema.sessionReminders.id });

  if (!claimed) return false;

  const { title, text } = reminderMessage(reminder);
  try {
    await mailer.send({ to: reminder.email, subject: title, text });
  } catch (error) {
    // Release the claim so the next run retries
    await db.delete(schema.sessionReminders).where(eq(schema.sessionReminders.id, claimed.id));
    throw error;
  }
  return true;
}

/**
 * Deliver every reminder that is due. A failure for one reminder is logged
 * and does not stop the rest.
 */
export async function processDueReminders(
  mailer: Mailer,
  logger: FastifyBaseLogger,
  now: Date = new Date()
): Promise<ReminderRunResult> {
  const candidates = await loadReminderCandidates(now);
  const due = findDueReminders(candidates, now);
  const result: ReminderRunResult = { sent: 0, failed: 0 };

  for (const reminder of due) {
    try {
      const delivered =
        reminder.channel === 'in_app'
          ? deliverInApp(reminder, now)
          : await deliverEmail(reminder, mailer, now);
      if (delivered) result.sent++;
    } catch (error) {
      result.failed++;
      logger.error(
        { err: error, userId: reminder.userId, sessionId: reminder.sessionId, channel: reminder.channel },
        'Failed to deliver session reminder'
      );
    }
  }

  return result;
}
