import { z } from 'zod';
import {
  REMINDER_DAYS_MAX,
  REMINDER_DAYS_MIN,
  REMINDER_HOURS_MAX,
  REMINDER_HOURS_MIN,
} from '@progress-portal/shared';

// ============ Common Schemas ============

export const sessionIdParamSchema = z.object({
  sessionId: z
    .string()
    .regex(/^\d+$/, 'Session ID must be a positive integer')
    .transform(Number)
    .refine((val) => val > 0, { message: 'Session ID must be a positive integer' }),
});

export const notificationIdParamSchema = z.object({
  notificationId: z
    .string()
    .regex(/^\d+$/, 'Notification ID must be a positive integer')
    .transform(Number)
    .refine((val) => val > 0, { message: 'Notification ID must be a positive integer' }),
});

export const NOTIFICATION_LIST_MAX = 100;

export const notificationListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(NOTIFICATION_LIST_MAX).default(20),
});

// ============ Notification Preference Schemas ============

function boundedIntegerField(label: string, min: number, max: number) {
  return z
    .string({
      required_error: `${label} is required.`,
      invalid_type_error: `${label} must be a whole number.`,
    })
    .trim()
    .regex(/^\d+$/, `${label} must be a whole number.`)
    .transform(Number)
    .refine((val) => val >= min && val <= max, {
      message: `${label} must be between ${min} and ${max}.`,
    });
}

// HTML omits unchecked checkboxes; any submitted value means "on"
const checkboxField = z.unknown().transform((val) => val !== undefined);

export const PREFERENCE_FORM_FIELDS = [
  'reminder_days_before',
  'reminder_hours_before',
  'email_notifications',
  'in_app_notifications',
] as const;

/**
 * The urlencoded preferences form. Extra fields such as `_csrf` are stripped.
 */
export const preferencesFormSchema = z
  .object({
    reminder_days_before: boundedIntegerField(
      'Reminder days before',
      REMINDER_DAYS_MIN,
      REMINDER_DAYS_MAX
    ),
    reminder_hours_before: boundedIntegerField(
      'Reminder hours before',
      REMINDER_HOURS_MIN,
      REMINDER_HOURS_MAX
    ),
    email_notifications: checkboxField,
    in_app_notifications: checkboxField,
  })
  .transform((form) => ({
    reminderDaysBefore: form.reminder_days_before,
    reminderHoursBefore: form.reminder_hours_before,
    emailNotifications: form.email_notifications,
    inAppNotifications: form.in_app_notifications,
  }));

/**
 * JSON body for the preferences API. All fields are required.
 */
export const notificationPreferencesSchema = z.object({
  reminderDaysBefore: z.number().int().min(REMINDER_DAYS_MIN).max(REMINDER_DAYS_MAX),
  reminderHoursBefore: z.number().int().min(REMINDER_HOURS_MIN).max(REMINDER_HOURS_MAX),
  emailNotifications: z.boolean(),
  inAppNotifications: z.boolean(),
});

// ============ Helper Functions ============

/**
 * Format Zod errors into a consistent API response format
 */
export function formatZodError(error: z.ZodError): { error: string; details: z.ZodIssue[] } {
  return {
    error: 'Validation failed',
    details: error.issues,
  };
}

/**
 * One message per invalid field, in form order. A non-object body yields a
 * single generic message.
 */
export function preferenceFormErrors(error: z.ZodError): string[] {
  const byField = new Map<string, string>();
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : '';
    if (!byField.has(field)) {
      byField.set(field, issue.message);
    }
  }

  const ordered: string[] = [];
  for (const field of PREFERENCE_FORM_FIELDS) {
    const message = byField.get(field);
    if (message) ordered.push(message);
  }
  if (ordered.length === 0) {
    ordered.push('The submitted form could not be read.');
  }
  return ordered;
}
