import {
  REMINDER_DAYS_MAX,
  REMINDER_DAYS_MIN,
  REMINDER_HOURS_MAX,
  REMINDER_HOURS_MIN,
  type FlashMessage,
  type NotificationPreferences,
} from '@progress-portal/shared';
import { checkedAttr, escapeHtml } from './html.js';
import { renderLayout } from './layout.js';

/**
 * Values as they appear in the form. Number inputs stay strings so a
 * rejected submission can be shown back exactly as typed.
 */
export interface PreferencesFormValues {
  reminderDaysBefore: string;
  reminderHoursBefore: string;
  emailNotifications: boolean;
  inAppNotifications: boolean;
}

export interface PreferencesViewOptions {
  values: PreferencesFormValues;
  csrfToken: string;
  action: string;
  flash?: FlashMessage[];
  unreadCount?: number;
}

export function toFormValues(preferences: NotificationPreferences): PreferencesFormValues {
  return {
    reminderDaysBefore: String(preferences.reminderDaysBefore),
    reminderHoursBefore: String(preferences.reminderHoursBefore),
    emailNotifications: preferences.emailNotifications,
    inAppNotifications: preferences.inAppNotifications,
  };
}

function numberField(
  name: string,
  label: string,
  value: string,
  min: number,
  max: number,
  help: string
): string {
  return `<div>
        <label for="id_${name}" class="mb-1 block text-sm font-medium text-gray-700">${label}</label>
        <input type="number" name="${name}" id="id_${name}" value="${escapeHtml(value)}" min="${min}" max="${max}" step="1" required
          class="w-full rounded border border-gray-300 px-3 py-2 focus:border-blue-500 focus:outline-none" />
        <p class="mt-1 text-xs text-gray-500">${help}</p>
      </div>`;
}

function checkboxField(name: string, label: string, checked: boolean): string {
  return `<label for="id_${name}" class="flex items-center gap-3">
        <input type="checkbox" name="${name}" id="id_${name}" class="h-4 w-4 rounded border-gray-300 text-blue-600"${checkedAttr(checked)} />
        <span class="text-sm text-gray-700">${label}</span>
      </label>`;
}

export function renderNotificationPreferences(options: PreferencesViewOptions): string {
  const { values, csrfToken, action, flash, unreadCount } = options;

  const body = `<div class="mx-auto max-w-2xl">
  <h1 class="mb-2 text-3xl font-bold">Notification Preferences</h1>
  <p class="mb-6 text-gray-600">Choose when and how we remind you about upcoming sessions.</p>

  <form method="post" action="${escapeHtml(action)}" class="space-y-6 rounded-lg bg-white p-6 shadow" id="notification-preferences-form">
    <input type="hidden" name="_csrf" value="${escapeHtml(csrfToken)}" />

    <fieldset class="grid gap-4 sm:grid-cols-2">
      <legend class="mb-3 text-lg font-semibold">Session reminders</legend>
      ${numberField(
        'reminder_days_before',
        'Days before session',
        values.reminderDaysBefore,
        REMINDER_DAYS_MIN,
        REMINDER_DAYS_MAX,
        `Between ${REMINDER_DAYS_MIN} and ${REMINDER_DAYS_MAX} days.`
      )}
      ${numberField(
        'reminder_hours_before',
        'Hours before session',
        values.reminderHoursBefore,
        REMINDER_HOURS_MIN,
        REMINDER_HOURS_MAX,
        `Between ${REMINDER_HOURS_MIN} and ${REMINDER_HOURS_MAX} hours.`
      )}
    </fieldset>

    <fieldset class="space-y-3">
      <legend class="mb-3 text-lg font-semibold">Channels</legend>
      ${checkboxField('email_notifications', 'Email notifications', values.emailNotifications)}
      ${checkboxField('in_app_notifications', 'In-app notifications', values.inAppNotifications)}
    </fieldset>

    <div class="flex justify-end">
      <button type="submit" class="rounded bg-blue-600 px-4 py-2 text-white hover:bg-blue-700">Save Preferences</button>
    </div>
  </form>
</div>`;

  return renderLayout({
    title: 'Notification Preferences',
    body,
    flash,
    activeNav: 'notifications',
    unreadCount,
  });
}
