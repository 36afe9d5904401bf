import { describe, it, expect, beforeEach } from 'vitest';
import Fastify from 'fastify';
import {
  findDueReminders,
  processDueReminders,
  reminderLeadMs,
  reminderMessage,
  type ReminderCandidate,
} from './reminderService.js';
import type { Mailer, MailMessage } from './mailer.js';
import { saveNotificationPreferences } from './preferencesService.js';
import { db, schema } from '../db/index.js';
import { createCourse, createSession, createUser, enroll, resetDatabase } from '../test/fixtures.js';

const NOW = new Date('2026-10-18T12:00:00Z');
const HOUR_MS = 60 * 60 * 1000;
const logger = Fastify({ logger: false }).log;

function candidate(overrides: Partial<ReminderCandidate> = {}): ReminderCandidate {
  return {
    userId: 1,
    email: 'ada@example.com',
    name: 'Ada',
    sessionId: 10,
    sessionTitle: 'Week 3',
    courseTitle: 'TypeScript',
    startTime: new Date(NOW.getTime() + 20 * HOUR_MS),
    preferences: {
      reminderDaysBefore: 1,
      reminderHoursBefore: 0,
      emailNotifications: true,
      inAppNotifications: true,
    },
    sentChannels: new Set(),
    ...overrides,
  };
}

class RecordingMailer implements Mailer {
  sent: MailMessage[] = [];

  async send(message: MailMessage): Promise<void> {
    this.sent.push(message);
  }
}

class FailingMailer implements Mailer {
  async send(): Promise<void> {
    throw new Error('SMTP unavailable');
  }
}

describe('reminderLeadMs', () => {
  it('should combine days and hours', () => {
    expect(
      reminderLeadMs({
        reminderDaysBefore: 2,
        reminderHoursBefore: 3,
        emailNotifications: true,
        inAppNotifications: true,
      })
    ).toBe(51 * HOUR_MS);
  });
});

describe('findDueReminders', () => {
  it('should return one reminder per enabled channel inside the window', () => {
    const due = findDueReminders([candidate()], NOW);
    expect(due.map((r) => r.channel)).toEqual(['email', 'in_app']);
  });

  it('should skip sessions whose window has not opened', () => {
    const due = findDueReminders(
      [candidate({ startTime: new Date(NOW.getTime() + 25 * HOUR_MS) })],
      NOW
    );
    expect(due).toEqual([]);
  });

  it('should skip sessions that have started', () => {
    expect(findDueReminders([candidate({ startTime: NOW })], NOW)).toEqual([]);
  });

  it('should treat a zero lead time as no reminder', () => {
    const due = findDueReminders(
      [
        candidate({
          startTime: new Date(NOW.getTime() + HOUR_MS),
          preferences: {
            reminderDaysBefore: 0,
            reminderHoursBefore: 0,
            emailNotifications: true,
            inAppNotifications: true,
          },
        }),
      ],
      NOW
    );
    expect(due).toEqual([]);
  });

  it('should skip channels already sent or disabled', () => {
    const alreadyEmailed = candidate({ sentChannels: new Set(['email']) });
    const emailOnly = candidate({
      sessionId: 11,
      preferences: {
        reminderDaysBefore: 1,
        reminderHoursBefore: 0,
        emailNotifications: true,
        inAppNotifications: false,
      },
    });

    const due = findDueReminders([alreadyEmailed, emailOnly], NOW);

    expect(due.map((r) => [r.sessionId, r.channel])).toEqual([
      [10, 'in_app'],
      [11, 'email'],
    ]);
  });
});

describe('reminderMessage', () => {
  it('should name the session, course and start time', () => {
    const [reminder] = findDueReminders(
      [candidate({ startTime: new Date('2026-10-19T08:30:00Z') })],
      NOW
    );

    expect(reminderMessage(reminder)).toEqual({
      title: 'Upcoming session: Week 3',
      text: 'Hi Ada, "Week 3" in TypeScript starts on Oct 19, 2026 at 08:30 UTC.',
    });
  });
});

describe('processDueReminders', () => {
  beforeEach(() => {
    resetDatabase();
  });

  async function setupUpcomingSession(status: 'approved' | 'pending' = 'approved') {
    const user = await createUser('Ada', 'ada@example.com');
    const course = await createCourse('TypeScript', 'typescript');
    const session = await createSession(
      course.id,
      'Week 3',
      new Date(NOW.getTime() + 20 * HOUR_MS)
    );
    await enroll(user.id, course.id, status);
    return { user, course, session };
  }

  it('should deliver both channels once', async () => {
    const { user } = await setupUpcomingSession();
    const mailer = new RecordingMailer();

    const first = await processDueReminders(mailer, logger, NOW);
    const second = await processDueReminders(mailer, logger, NOW);

    expect(first).toEqual({ sent: 2, failed: 0 });
    expect(second).toEqual({ sent: 0, failed: 0 });

    expect(mailer.sent).toHaveLength(1);
    expect(mailer.sent[0].to).toBe('ada@example.com');
    expect(mailer.sent[0].subject).toBe('Upcoming session: Week 3');

    const notifications = await db.select().from(schema.inAppNotifications);
    expect(notifications).toHaveLength(1);
    expect(notifications[0].userId).toBe(user.id);
    expect(notifications[0].notificationType).toBe('session_reminder');

    const reminders = await db.select().from(schema.sessionReminders);
    expect(reminders.map((r) => r.channel).sort()).toEqual(['email', 'in_app']);
  });

  it('should use the default one-day lead for learners without stored preferences', async () => {
    const user = await createUser('Ada', 'ada@example.com');
    const course = await createCourse('TypeScript', 'typescript');
    const later = await createSession(course.id, 'Week 4', new Date(NOW.getTime() + 25 * HOUR_MS));
    const soon = await createSession(course.id, 'Week 3', new Date(NOW.getTime() + 20 * HOUR_MS));
    await enroll(user.id, course.id, 'approved');
    const mailer = new RecordingMailer();

    const result = await processDueReminders(mailer, logger, NOW);

    expect(result).toEqual({ sent: 2, failed: 0 });
    const reminders = await db.select().from(schema.sessionReminders);
    expect(new Set(reminders.map((r) => r.sessionId))).toEqual(new Set([soon.id]));
    expect(reminders.some((r) => r.sessionId === later.id)).toBe(false);
  });

  it('should honour stored channel preferences', async () => {
    const { user } = await setupUpcomingSession();
    await saveNotificationPreferences(user.id, {
      reminderDaysBefore: 1,
      reminderHoursBefore: 0,
      emailNotifications: false,
      inAppNotifications: true,
    });
    const mailer = new RecordingMailer();

    const result = await processDueReminders(mailer, logger, NOW);

    expect(result).toEqual({ sent: 1, failed: 0 });
    expect(mailer.sent).toEqual([]);
  });

  it('should ignore learners without an approved enrolment', async () => {
    await setupUpcomingSession('pending');
    const mailer = new RecordingMailer();

    expect(await processDueReminders(mailer, logger, NOW)).toEqual({ sent: 0, failed: 0 });
  });

  it('should release a failed email so the next run retries it', async () => {
    await setupUpcomingSession();

    const result = await processDueReminders(new FailingMailer(), logger, NOW);

    expect(result).toEqual({ sent: 1, failed: 1 });
    const reminders = await db.select().from(schema.sessionReminders);
    expect(reminders.map((r) => r.channel)).toEqual(['in_app']);

    const mailer = new RecordingMailer();
    expect(await processDueReminders(mailer, logger, NOW)).toEqual({ sent: 1, failed: 0 });
    expect(mailer.sent).toHaveLength(1);
  });
});
