import { describe, it, expect, beforeEach } from 'vitest';
import { DEFAULT_NOTIFICATION_PREFERENCES } from '@progress-portal/shared';
import { getNotificationPreferences, saveNotificationPreferences } from './preferencesService.js';
import { createUser, resetDatabase } from '../test/fixtures.js';

describe('notification preferences', () => {
  beforeEach(() => {
    resetDatabase();
  });

  it('should return the defaults when nothing is stored', async () => {
    const user = await createUser();

    const prefs = await getNotificationPreferences(user.id);

    expect(prefs).toEqual({
      reminderDaysBefore: 1,
      reminderHoursBefore: 0,
      emailNotifications: true,
      inAppNotifications: true,
    });
    // Callers get a copy they can change freely
    expect(prefs).not.toBe(DEFAULT_NOTIFICATION_PREFERENCES);
  });

  it('should store and then overwrite preferences', async () => {
    const user = await createUser();

    await saveNotificationPreferences(user.id, {
      reminderDaysBefore: 3,
      reminderHoursBefore: 12,
      emailNotifications: true,
      inAppNotifications: false,
    });
    expect(await getNotificationPreferences(user.id)).toEqual({
      reminderDaysBefore: 3,
      reminderHoursBefore: 12,
      emailNotifications: true,
      inAppNotifications: false,
    });

    await saveNotificationPreferences(user.id, {
      reminderDaysBefore: 0,
      reminderHoursBefore: 2,
      emailNotifications: false,
      inAppNotifications: true,
    });
    expect(await getNotificationPreferences(user.id)).toEqual({
      reminderDaysBefore: 0,
      reminderHoursBefore: 2,
      emailNotifications: false,
      inAppNotifications: true,
    });
  });
});
