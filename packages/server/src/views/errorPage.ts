import { escapeHtml } from './html.js';
import { renderLayout } from './layout.js';

const TITLES: Record<number, string> = {
  401: 'Sign in required',
  403: 'Forbidden',
  404: 'Page not found',
  429: 'Too many requests',
};

export function renderErrorPage(statusCode: number, message?: string): string {
  const title = TITLES[statusCode] ?? 'Something went wrong';
  const detail =
    message ??
    (statusCode >= 500
      ? 'An unexpected error occurred. Please try again later.'
      : 'The request could not be completed.');

  const body = `<div class="mx-auto max-w-xl rounded-lg bg-white p-8 text-center shadow">
  <p class="text-5xl font-bold text-gray-300">${statusCode}</p>
  <h1 class="mt-4 text-2xl font-semibold">${escapeHtml(title)}</h1>
  <p class="mt-2 text-gray-600">${escapeHtml(detail)}</p>
  <a href="/" class="mt-6 inline-block text-blue-600 hover:underline">Back to dashboard</a>
</div>`;

  return renderLayout({ title, body });
}
