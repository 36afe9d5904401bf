/**
 * Database fixtures for tests. DATABASE_PATH is ':memory:' under vitest, so
 * every test file works on its own empty database.
 */

import { db, schema, sqlite } from '../db/index.js';
import type { AttendanceStatus, EnrollmentStatus } from '@progress-portal/shared';

const TABLES = [
  'achievements',
  'session_reminders',
  'in_app_notifications',
  'notification_preferences',
  'session_completions',
  'session_attendances',
  'enrollments',
  'course_sessions',
  'courses',
  'users',
];

export function resetDatabase(): void {
  for (const table of TABLES) {
    sqlite.exec(`DELETE FROM ${table}`);
  }
}

export async function createUser(name = 'Test Learner', email = 'learner@example.com') {
  const [user] = await db
    .insert(schema.users)
    .values({ name, email, createdAt: new Date('2026-01-01T00:00:00Z') })
    .returning();
  return user;
}

export async function createCourse(title: string, slug: string, color: string | null = null) {
  const [course] = await db
    .insert(schema.courses)
    .values({ title, slug, color, createdAt: new Date('2026-01-01T00:00:00Z') })
    .returning();
  return course;
}

export async function createSession(
  courseId: number,
  title: string,
  startTime: Date,
  durationMinutes = 60
) {
  const [session] = await db
    .insert(schema.courseSessions)
    .values({ courseId, title, startTime, durationMinutes })
    .returning();
  return session;
}

export async function enroll(
  userId: number,
  courseId: number,
  status: EnrollmentStatus = 'approved',
  enrolledAt = new Date('2026-09-01T00:00:00Z')
) {
  await db.insert(schema.enrollments).values({ userId, courseId, status, enrolledAt });
}

export async function recordCompletion(userId: number, sessionId: number, completedAt: Date) {
  await db.insert(schema.sessionCompletions).values({ userId, sessionId, completedAt });
}

export async function recordAttendance(
  userId: number,
  sessionId: number,
  status: AttendanceStatus,
  recordedAt = new Date('2026-10-01T00:00:00Z')
) {
  await db.insert(schema.sessionAttendances).values({ userId, sessionId, status, recordedAt });
}

export async function createNotification(
  userId: number,
  title: string,
  createdAt: Date,
  isRead = false
) {
  const [notification] = await db
    .insert(schema.inAppNotifications)
    .values({
      userId,
      title,
      message: `${title} message`,
      notificationType: 'session_reminder',
      isRead,
      createdAt,
    })
    .returning();
  return notification;
}
