/**
 * JSON API
 *
 * - GET /api/health
 * - GET /api/progress/dashboard
 * - GET /api/notifications/preferences
 * - PUT /api/notifications/preferences
 * - GET /api/notifications
 * - POST /api/notifications/read-all
 * - POST /api/notifications/:notificationId/read
 */

import type { FastifyInstance } from 'fastify';
import { currentUserId, requireApiUser } from '../middleware/auth.js';
import { getDashboardContext } from '../services/progressService.js';
import {
  getNotificationPreferences,
  saveNotificationPreferences,
} from '../services/preferencesService.js';
import {
  countUnread,
  listNotifications,
  markAllNotificationsRead,
  markNotificationRead,
} from '../services/notificationService.js';
import {
  formatZodError,
  notificationIdParamSchema,
  notificationListQuerySchema,
  notificationPreferencesSchema,
} from '../validation/schemas.js';

export async function apiRoutes(fastify: FastifyInstance) {
  // Health check
  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  fastify.get('/progress/dashboard', { preHandler: requireApiUser }, async (request) => {
    return getDashboardContext(currentUserId(request));
  });

  fastify.get('/notifications/preferences', { preHandler: requireApiUser }, async (request) => {
    return getNotificationPreferences(currentUserId(request));
  });

  fastify.put<{ Body: unknown }>(
    '/notifications/preferences',
    { preHandler: requireApiUser },
    async (request, reply) => {
      const parsed = notificationPreferencesSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send(formatZodError(parsed.error));
      }

      const userId = currentUserId(request);
      await saveNotificationPreferences(userId, parsed.data);
      return getNotificationPreferences(userId);
    }
  );

  fastify.get<{ Querystring: unknown }>(
    '/notifications',
    { preHandler: requireApiUser },
    async (request, reply) => {
      const parsed = notificationListQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send(formatZodError(parsed.error));
      }

      const userId = currentUserId(request);
      const [notifications, unreadCount] = await Promise.all([
        listNotifications(userId, parsed.data.limit),
        countUnread(userId),
      ]);
      return { notifications, unreadCount };
    }
  );

  fastify.post('/notifications/read-all', { preHandler: requireApiUser }, async (request) => {
    const marked = await markAllNotificationsRead(currentUserId(request));
    return { marked };
  });

  fastify.post<{ Params: { notificationId: string } }>(
    '/notifications/:notificationId/read',
    { preHandler: requireApiUser },
    async (request, reply) => {
      const parsed = notificationIdParamSchema.safeParse(request.params);
      if (!parsed.success) {
        return reply.status(404).send({ error: 'Notification not found' });
      }

      const found = await markNotificationRead(currentUserId(request), parsed.data.notificationId);
      if (!found) {
        return reply.status(404).send({ error: 'Notification not found' });
      }
      return reply.status(204).send();
    }
  );
}
