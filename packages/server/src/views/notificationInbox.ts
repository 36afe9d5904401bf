import type { FlashMessage, InAppNotification } from '@progress-portal/shared';
import { escapeHtml, joinHtml } from './html.js';
import { renderLayout } from './layout.js';

export interface InboxViewOptions {
  notifications: InAppNotification[];
  unreadCount: number;
  csrfToken: string;
  /** Target of the "mark all as read" form */
  markAllAction: string;
  flash?: FlashMessage[];
}

function formatReceived(iso: string): string {
  return new Date(iso).toLocaleString('en-US', {
    month: 'short',
    day: 'numeric',
    year: 'numeric',
    hour: 'numeric',
    minute: '2-digit',
    timeZone: 'UTC',
    timeZoneName: 'short',
  });
}

function renderNotification(notification: InAppNotification): string {
  const state = notification.isRead ? 'read' : 'unread';
  const weight = notification.isRead ? 'text-gray-600' : 'font-semibold text-gray-900';

  return `<li class="notification py-4" data-notification-id="${notification.id}" data-state="${state}">
        <div class="flex justify-between gap-4">
          <p class="${weight}">${escapeHtml(notification.title)}</p>
          <time class="text-xs text-gray-500" datetime="${escapeHtml(notification.createdAt)}">${escapeHtml(formatReceived(notification.createdAt))}</time>
        </div>
        <p class="mt-1 text-sm text-gray-600">${escapeHtml(notification.message)}</p>
      </li>`;
}

/**
 * In-app notification inbox.
 */
export function renderNotificationInbox(options: InboxViewOptions): string {
  const { notifications, unreadCount, csrfToken, markAllAction, flash } = options;

  const markAll =
    unreadCount > 0
      ? `<form method="post" action="${escapeHtml(markAllAction)}" id="mark-all-read">
      <input type="hidden" name="_csrf" value="${escapeHtml(csrfToken)}" />
      <button type="submit" class="rounded bg-blue-600 px-4 py-2 text-white hover:bg-blue-700">Mark all as read</button>
    </form>`
      : '';

  const list =
    notifications.length === 0
      ? `<p class="text-gray-500" id="no-notifications">You have no notifications.</p>`
      : `<ul class="divide-y divide-gray-100" id="notification-list">
      ${joinHtml(notifications.map(renderNotification))}
    </ul>`;

  const body = `<div class="mx-auto max-w-2xl">
  <div class="mb-6 flex items-center justify-between">
    <h1 class="text-3xl font-bold">Inbox</h1>
    ${markAll}
  </div>
  <section class="rounded-lg bg-white p-6 shadow">
    ${list}
  </section>
</div>`;

  return renderLayout({
    title: 'Inbox',
    body,
    flash,
    activeNav: 'inbox',
    unreadCount,
  });
}
