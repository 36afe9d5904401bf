/**
 * Notification routes
 *
 * - GET  /notifications             - In-app notification inbox
 * - POST /notifications/read-all    - Mark every notification as read (CSRF-protected)
 * - GET  /notifications/preferences - Preferences form
 * - POST /notifications/preferences - Save preferences (CSRF-protected)
 */

import type { FastifyInstance } from 'fastify';
import { currentUserId, requirePageUser } from '../middleware/auth.js';
import {
  getNotificationPreferences,
  saveNotificationPreferences,
} from '../services/preferencesService.js';
import {
  countUnread,
  listNotifications,
  markAllNotificationsRead,
} from '../services/notificationService.js';
import { preferencesFormSchema, preferenceFormErrors } from '../validation/schemas.js';
import {
  renderNotificationPreferences,
  toFormValues,
  type PreferencesFormValues,
} from '../views/notificationPreferences.js';
import { renderNotificationInbox } from '../views/notificationInbox.js';
import { addFlash, consumeFlash } from '../utils/flash.js';
import type { FlashMessage } from '@progress-portal/shared';

export const INBOX_PATH = '/notifications';
export const READ_ALL_PATH = `${INBOX_PATH}/read-all`;
export const PREFERENCES_PATH = '/notifications/preferences';

type FormBody = Record<string, string | string[] | undefined> | undefined;

function firstValue(body: FormBody, field: string): string | undefined {
  const value = body?.[field];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * The submitted values as typed, for re-rendering a rejected form.
 */
function submittedValues(body: FormBody): PreferencesFormValues {
  return {
    reminderDaysBefore: firstValue(body, 'reminder_days_before') ?? '',
    reminderHoursBefore: firstValue(body, 'reminder_hours_before') ?? '',
    emailNotifications: firstValue(body, 'email_notifications') !== undefined,
    inAppNotifications: firstValue(body, 'in_app_notifications') !== undefined,
  };
}

export async function notificationRoutes(fastify: FastifyInstance) {
  fastify.get(INBOX_PATH, { preHandler: requirePageUser }, async (request, reply) => {
    const userId = currentUserId(request);
    const [notifications, unreadCount] = await Promise.all([
      listNotifications(userId),
      countUnread(userId),
    ]);

    return reply.type('text/html; charset=utf-8').send(
      renderNotificationInbox({
        notifications,
        unreadCount,
        csrfToken: reply.generateCsrf(),
        markAllAction: READ_ALL_PATH,
        flash: consumeFlash(reply),
      })
    );
  });

  fastify.post(
    READ_ALL_PATH,
    { preHandler: [requirePageUser, fastify.csrfProtection] },
    async (request, reply) => {
      const userId = currentUserId(request);
      const marked = await markAllNotificationsRead(userId);
      request.log.info({ userId, marked }, 'Notifications marked as read');

      addFlash(request, 'success', 'All notifications marked as read.');
      return reply.redirect(INBOX_PATH, 303);
    }
  );

  fastify.get(PREFERENCES_PATH, { preHandler: requirePageUser }, async (request, reply) => {
    const userId = currentUserId(request);
    const [preferences, unreadCount] = await Promise.all([
      getNotificationPreferences(userId),
      countUnread(userId),
    ]);

    return reply.type('text/html; charset=utf-8').send(
      renderNotificationPreferences({
        values: toFormValues(preferences),
        csrfToken: reply.generateCsrf(),
        action: PREFERENCES_PATH,
        flash: consumeFlash(reply),
        unreadCount,
      })
    );
  });

  fastify.post<{ Body: FormBody }>(
    PREFERENCES_PATH,
    { preHandler: [requirePageUser, fastify.csrfProtection] },
    async (request, reply) => {
      const userId = currentUserId(request);
      const parsed = preferencesFormSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply
          .status(400)
          .type('text/html; charset=utf-8')
          .send(
            renderNotificationPreferences({
              values: submittedValues(request.body),
              csrfToken: reply.generateCsrf(),
              action: PREFERENCES_PATH,
              flash: preferenceFormErrors(parsed.error).map(
                (text): FlashMessage => ({ level: 'error', text })
              ),
            })
          );
      }

      await saveNotificationPreferences(userId, parsed.data);
      request.log.info({ userId }, 'Notification preferences updated');

      addFlash(request, 'success', 'Notification preferences updated successfully!');
      return reply.redirect(PREFERENCES_PATH, 303);
    }
  );
}
