import type { FlashLevel, FlashMessage } from '@progress-portal/shared';
import { escapeHtml, joinHtml } from './html.js';

export type NavItem = 'dashboard' | 'inbox' | 'notifications';

export interface LayoutOptions {
  title: string;
  body: string;
  flash?: FlashMessage[];
  activeNav?: NavItem;
  /** Unread in-app notifications, shown as a badge on the inbox link */
  unreadCount?: number;
  /** Extra markup placed before </body>, already escaped */
  scripts?: string;
}

const FLASH_STYLES: Record<FlashLevel, string> = {
  success: 'bg-green-50 border-green-400 text-green-800',
  error: 'bg-red-50 border-red-400 text-red-800',
  warning: 'bg-yellow-50 border-yellow-400 text-yellow-800',
  info: 'bg-blue-50 border-blue-400 text-blue-800',
};

const NAV_LINKS: Array<{ id: NavItem; href: string; label: string }> = [
  { id: 'dashboard', href: '/dashboard/progress', label: 'My Progress' },
  { id: 'inbox', href: '/notifications', label: 'Inbox' },
  { id: 'notifications', href: '/notifications/preferences', label: 'Notifications' },
];

export function renderFlashMessages(messages: FlashMessage[]): string {
  if (messages.length === 0) return '';

  const items = messages.map(
    (m) =>
      `<div class="flash flash-${m.level} mb-3 rounded border-l-4 p-4 ${FLASH_STYLES[m.level]}" role="alert">${escapeHtml(m.text)}</div>`
  );
  return `<div class="mb-6" id="flash-messages">\n${joinHtml(items)}\n</div>`;
}

export function renderUnreadBadge(count: number): string {
  if (count <= 0) return '';
  const label = count > 99 ? '99+' : String(count);
  return ` <span id="unread-count" class="ml-1 rounded-full bg-red-600 px-2 text-xs text-white" aria-label="${count} unread">${label}</span>`;
}

function renderNav(active: NavItem | undefined, unreadCount: number): string {
  const links = NAV_LINKS.map((link) => {
    const classes =
      link.id === active
        ? 'font-semibold text-blue-600'
        : 'text-gray-600 hover:text-blue-600';
    const current = link.id === active ? ' aria-current="page"' : '';
    const badge = link.id === 'inbox' ? renderUnreadBadge(unreadCount) : '';
    return `<a href="${link.href}" class="${classes}"${current}>${link.label}${badge}</a>`;
  });
  return `<nav class="flex gap-6">${links.join('')}</nav>`;
}

/**
 * Base page shell shared by every server-rendered view.
 */
export function renderLayout(options: LayoutOptions): string {
  const { title, body, flash = [], activeNav, unreadCount = 0, scripts = '' } = options;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${escapeHtml(title)} | Progress Portal</title>
  <script src="https://cdn.tailwindcss.com"></script>
</head>
<body class="min-h-screen bg-gray-50 text-gray-900">
  <header class="border-b border-gray-200 bg-white">
    <div class="mx-auto flex max-w-6xl items-center justify-between px-4 py-4">
      <a href="/" class="text-lg font-bold text-gray-900">Progress Portal</a>
      ${renderNav(activeNav, unreadCount)}
    </div>
  </header>
  <main class="mx-auto max-w-6xl px-4 py-8">
    ${renderFlashMessages(flash)}
    ${body}
  </main>
  ${scripts}
</body>
</html>
`;
}
