/**
 * Progress dashboard routes
 *
 * - GET  /dashboard/progress            - Dashboard page
 * - GET  /dashboard/progress/report.pdf - PDF summary of the dashboard
 * - POST /sessions/:sessionId/complete  - Mark a session as completed
 */

import type { FastifyInstance } from 'fastify';
import { config } from '../config.js';
import { currentUserId, requirePageUser } from '../middleware/auth.js';
import { getDashboardContext, getLearnerName } from '../services/progressService.js';
import { generateProgressReportPdf } from '../services/reportGenerator.js';
import { completeSession } from '../services/completionService.js';
import { countUnread } from '../services/notificationService.js';
import { sessionIdParamSchema } from '../validation/schemas.js';
import { renderProgressDashboard } from '../views/progressDashboard.js';
import { renderErrorPage } from '../views/errorPage.js';
import { addFlash, consumeFlash } from '../utils/flash.js';
import { toDateKey } from '@progress-portal/shared';

export const DASHBOARD_PATH = '/dashboard/progress';
export const REPORT_PATH = `${DASHBOARD_PATH}/report.pdf`;

export function dashboardScriptUrl(): string {
  return `${config.assets.prefix}progress-dashboard.js?v=${encodeURIComponent(config.assets.version)}`;
}

export async function dashboardRoutes(fastify: FastifyInstance) {
  fastify.get('/', async (request, reply) => {
    return reply.redirect(DASHBOARD_PATH);
  });

  fastify.get(DASHBOARD_PATH, { preHandler: requirePageUser }, async (request, reply) => {
    const userId = currentUserId(request);
    const [context, unreadCount] = await Promise.all([
      getDashboardContext(userId),
      countUnread(userId),
    ]);

    return reply.type('text/html; charset=utf-8').send(
      renderProgressDashboard({
        context,
        flash: consumeFlash(reply),
        scriptUrl: dashboardScriptUrl(),
        reportUrl: REPORT_PATH,
        csrfToken: reply.generateCsrf(),
        unreadCount,
      })
    );
  });

  fastify.get(
    REPORT_PATH,
    {
      preHandler: requirePageUser,
      config: {
        // Rate limit: 10 downloads per minute per IP (CPU-intensive PDF generation)
        rateLimit: {
          max: 10,
          timeWindow: '1 minute',
        },
      },
    },
    async (request, reply) => {
      const userId = currentUserId(request);
      const now = new Date();
      const [context, learnerName] = await Promise.all([
        getDashboardContext(userId, now),
        getLearnerName(userId),
      ]);

      const pdfBuffer = await generateProgressReportPdf({
        learnerName: learnerName ?? 'Learner',
        context,
        generatedAt: now,
      });

      const filename = `learning-progress-${toDateKey(now)}.pdf`;
      return reply
        .header('Content-Type', 'application/pdf')
        .header('Content-Disposition', `attachment; filename="${filename}"`)
        .header('Content-Length', pdfBuffer.length)
        .send(pdfBuffer);
    }
  );

  fastify.post<{ Params: { sessionId: string } }>(
    '/sessions/:sessionId/complete',
    { preHandler: [requirePageUser, fastify.csrfProtection] },
    async (request, reply) => {
      const parsed = sessionIdParamSchema.safeParse(request.params);
      if (!parsed.success) {
        return reply.status(404).type('text/html; charset=utf-8').send(renderErrorPage(404));
      }

      const result = await completeSession(currentUserId(request), parsed.data.sessionId);

      if (result.status === 'not_found') {
        return reply.status(404).type('text/html; charset=utf-8').send(renderErrorPage(404));
      }

      if (result.status === 'not_enrolled') {
        addFlash(request, 'error', 'You must be enrolled in the course to mark sessions as completed!');
      } else {
        request.log.info(
          {
            sessionId: parsed.data.sessionId,
            alreadyCompleted: result.alreadyCompleted,
            awarded: result.awarded,
          },
          'Session completed'
        );
        addFlash(request, 'success', 'Session marked as completed!');
        for (const title of result.awarded) {
          addFlash(request, 'info', `Achievement unlocked: ${title}`);
        }
      }

      return reply.redirect(DASHBOARD_PATH, 303);
    }
  );
}
