import { and, desc, eq, sql } from 'drizzle-orm';
import { db, schema } from '../db/index.js';
import type { InAppNotification } from '@progress-portal/shared';

/**
 * Most recent in-app notifications for a user, newest first.
 */
export async function listNotifications(
  userId: number,
  limit = 20
): Promise<InAppNotification[]> {
  const rows = await db
    .select()
    .from(schema.inAppNotifications)
    .where(eq(schema.inAppNotifications.userId, userId))
    .orderBy(desc(schema.inAppNotifications.createdAt), desc(schema.inAppNotifications.id))
    .limit(limit);

  return rows.map((row) => ({
    id: row.id,
    title: row.title,
    message: row.message,
    notificationType: row.notificationType,
    isRead: row.isRead,
    createdAt: row.createdAt.toISOString(),
  }));
}

export async function countUnread(userId: number): Promise<number> {
  const [result] = await db
    .select({ count: sql<number>`count(*)` })
    .from(schema.inAppNotifications)
    .where(
      and(
        eq(schema.inAppNotifications.userId, userId),
        eq(schema.inAppNotifications.isRead, false)
      )
    );
  return Number(result?.count ?? 0);
}

/**
 * Returns false when the notification does not exist or belongs to someone else.
 */
export async function markNotificationRead(userId: number, notificationId: number): Promise<boolean> {
  const updated = await db
    .update(schema.inAppNotifications)
    .set({ isRead: true })
    .where(
      and(
        eq(schema.inAppNotifications.id, notificationId),
        eq(schema.inAppNotifications.userId, userId)
      )
    )
    .returning({ id: schema.inAppNotifications.id });

  return updated.length > 0;
}

export async function markAllNotificationsRead(userId: number): Promise<number> {
  const updated = await db
    .update(schema.inAppNotifications)
    .set({ isRead: true })
    .where(
      and(
        eq(schema.inAppNotifications.userId, userId),
        eq(schema.inAppNotifications.isRead, false)
      )
    )
    .returning({ id: schema.inAppNotifications.id });

  return updated.length;
}
