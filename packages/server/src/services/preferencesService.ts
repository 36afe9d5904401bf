import { eq } from 'drizzle-orm';
import { db, schema } from '../db/index.js';
import {
  DEFAULT_NOTIFICATION_PREFERENCES,
  type NotificationPreferences,
} from '@progress-portal/shared';

/**
 * Stored preferences for a user, or the defaults when none were saved yet.
 */
export async function getNotificationPreferences(userId: number): Promise<NotificationPreferences> {
  const [prefs] = await db
    .select()
    .from(schema.notificationPreferences)
    .where(eq(schema.notificationPreferences.userId, userId));

  if (!prefs) {
    return { ...DEFAULT_NOTIFICATION_PREFERENCES };
  }

  return {
    reminderDaysBefore: prefs.reminderDaysBefore,
    reminderHoursBefore: prefs.reminderHoursBefore,
    emailNotifications: prefs.emailNotifications,
    inAppNotifications: prefs.inAppNotifications,
  };
}

export async function saveNotificationPreferences(
  userId: number,
  preferences: NotificationPreferences
): Promise<void> {
  const now = new Date();

  // Upsert preferences with ON CONFLICT to avoid race conditions
  await db
    .insert(schema.notificationPreferences)
    .values({ userId, ...preferences, updatedAt: now })
    .onConflictDoUpdate({
      target: schema.notificationPreferences.userId,
      set: { ...preferences, updatedAt: now },
    });
}
