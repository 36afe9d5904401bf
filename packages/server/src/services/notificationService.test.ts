import { describe, it, expect, beforeEach } from 'vitest';
import {
  countUnread,
  listNotifications,
  markAllNotificationsRead,
  markNotificationRead,
} from './notificationService.js';
import { createNotification, createUser, resetDatabase } from '../test/fixtures.js';

describe('notificationService', () => {
  beforeEach(() => {
    resetDatabase();
  });

  it('should list a user\'s notifications newest first', async () => {
    const user = await createUser();
    const other = await createUser('Other Learner', 'other@example.com');
    await createNotification(user.id, 'Older', new Date('2026-10-16T09:00:00Z'), true);
    await createNotification(user.id, 'Newer', new Date('2026-10-17T09:00:00Z'));
    await createNotification(other.id, 'Not mine', new Date('2026-10-18T09:00:00Z'));

    const notifications = await listNotifications(user.id);

    expect(notifications.map((n) => n.title)).toEqual(['Newer', 'Older']);
    expect(notifications[0]).toEqual({
      id: notifications[0].id,
      title: 'Newer',
      message: 'Newer message',
      notificationType: 'session_reminder',
      isRead: false,
      createdAt: '2026-10-17T09:00:00.000Z',
    });
  });

  it('should honour the limit', async () => {
    const user = await createUser();
    await createNotification(user.id, 'First', new Date('2026-10-15T09:00:00Z'));
    await createNotification(user.id, 'Second', new Date('2026-10-16T09:00:00Z'));
    await createNotification(user.id, 'Third', new Date('2026-10-17T09:00:00Z'));

    const notifications = await listNotifications(user.id, 2);

    expect(notifications.map((n) => n.title)).toEqual(['Third', 'Second']);
  });

  it('should count only unread notifications of the user', async () => {
    const user = await createUser();
    const other = await createUser('Other Learner', 'other@example.com');
    await createNotification(user.id, 'Read', new Date('2026-10-16T09:00:00Z'), true);
    await createNotification(user.id, 'Unread', new Date('2026-10-17T09:00:00Z'));
    await createNotification(other.id, 'Unread too', new Date('2026-10-17T09:00:00Z'));

    expect(await countUnread(user.id)).toBe(1);
  });

  it('should only mark the owner\'s notification as read', async () => {
    const user = await createUser();
    const other = await createUser('Other Learner', 'other@example.com');
    const notification = await createNotification(user.id, 'Reminder', new Date('2026-10-17T09:00:00Z'));

    expect(await markNotificationRead(other.id, notification.id)).toBe(false);
    expect(await countUnread(user.id)).toBe(1);

    expect(await markNotificationRead(user.id, notification.id)).toBe(true);
    expect(await countUnread(user.id)).toBe(0);
    expect(await markNotificationRead(user.id, notification.id + 100)).toBe(false);
  });

  it('should mark every unread notification as read', async () => {
    const user = await createUser();
    await createNotification(user.id, 'Read', new Date('2026-10-15T09:00:00Z'), true);
    await createNotification(user.id, 'One', new Date('2026-10-16T09:00:00Z'));
    await createNotification(user.id, 'Two', new Date('2026-10-17T09:00:00Z'));

    expect(await markAllNotificationsRead(user.id)).toBe(2);
    expect(await countUnread(user.id)).toBe(0);
    expect(await markAllNotificationsRead(user.id)).toBe(0);
  });
});
