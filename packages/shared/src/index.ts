// Progress Portal Shared Types

export * from './courseColors.js';

// ============ DASHBOARD TYPES ============

export interface CourseProgress {
  courseId: number;
  slug: string;
  title: string;
  progress: number; // 0-100
  color: string; // 'R, G, B'
  sessionsCompleted: number;
  totalSessions: number;
  lastActive: string; // 'Oct 12, 2026' or 'Never'
}

export interface ActivitySeries {
  dates: string[]; // YYYY-MM-DD, oldest first
  sessionCounts: number[];
}

export interface DashboardContext {
  totalCourses: number;
  coursesCompleted: number;
  topicsMastered: number;
  averageAttendance: number; // percent
  currentStreak: number; // days
  totalLearningHours: number;
  avgSessionsPerWeek: number;
  mostActiveDay: string;
  lastSessionDate: string;
  completionPace: CompletionPace;
  courses: CourseProgress[];
  activity: ActivitySeries;
  pendingSessions: PendingSession[];
  achievements: Achievement[];
}

// The earliest started session of a course the learner has not completed yet
export interface PendingSession {
  courseId: number;
  sessionId: number;
  title: string;
  startedOn: string; // 'Oct 12, 2026'
}

export const COMPLETION_PACES = [
  'Not started',
  'Falling behind',
  'On track',
  'Ahead of schedule',
] as const;
export type CompletionPace = (typeof COMPLETION_PACES)[number];

export const ACTIVITY_WINDOW_DAYS = 30;
export const NEVER_LABEL = 'Never';
export const NO_ACTIVE_DAY_LABEL = 'N/A';

/**
 * Fields handed to the dashboard script. Every value is a JSON document
 * serialised to a string, so the page can embed them as plain string literals.
 */
export const DASHBOARD_PAYLOAD_KEYS = [
  'chartDates',
  'chartSessionCounts',
  'courses',
  'totalCourses',
  'coursesCompleted',
  'totalLearningHours',
] as const;
export type DashboardPayloadKey = (typeof DASHBOARD_PAYLOAD_KEYS)[number];
export type DashboardPayload = Record<DashboardPayloadKey, string>;

/** Name of the global the dashboard page assigns the payload to */
export const DASHBOARD_PAYLOAD_GLOBAL = 'PROGRESS_DASHBOARD';

// ============ ENROLLMENT TYPES ============

export type EnrollmentStatus = 'pending' | 'approved' | 'completed';
export type AttendanceStatus = 'present' | 'late' | 'absent' | 'excused';

// Attendance statuses that count towards the attendance rate
export const ATTENDED_STATUSES: readonly AttendanceStatus[] = ['present', 'late'];

// ============ ACHIEVEMENT TYPES ============

export const ACHIEVEMENT_TYPES = ['completion', 'attendance'] as const;
export type AchievementType = (typeof ACHIEVEMENT_TYPES)[number];

export interface Achievement {
  courseId: number;
  courseTitle: string;
  achievementType: AchievementType;
  title: string;
  description: string;
  awardedOn: string; // 'Oct 12, 2026'
}

export function isAchievementType(value: string): value is AchievementType {
  return (ACHIEVEMENT_TYPES as readonly string[]).includes(value);
}

// ============ NOTIFICATION TYPES ============

export interface NotificationPreferences {
  reminderDaysBefore: number;
  reminderHoursBefore: number;
  emailNotifications: boolean;
  inAppNotifications: boolean;
}

export const REMINDER_DAYS_MIN = 0;
export const REMINDER_DAYS_MAX = 30;
export const REMINDER_HOURS_MIN = 0;
export const REMINDER_HOURS_MAX = 23;

export const DEFAULT_NOTIFICATION_PREFERENCES: NotificationPreferences = {
  reminderDaysBefore: 1,
  reminderHoursBefore: 0,
  emailNotifications: true,
  inAppNotifications: true,
};

export interface InAppNotification {
  id: number;
  title: string;
  message: string;
  notificationType: string;
  isRead: boolean;
  createdAt: string; // ISO 8601
}

export const REMINDER_CHANNELS = ['email', 'in_app'] as const;
export type ReminderChannel = (typeof REMINDER_CHANNELS)[number];

export function isReminderChannel(value: string): value is ReminderChannel {
  return (REMINDER_CHANNELS as readonly string[]).includes(value);
}

// ============ FLASH MESSAGES ============

export const FLASH_LEVELS = ['success', 'error', 'warning', 'info'] as const;
export type FlashLevel = (typeof FLASH_LEVELS)[number];

export interface FlashMessage {
  level: FlashLevel;
  text: string;
}

export function isFlashLevel(value: string): value is FlashLevel {
  return (FLASH_LEVELS as readonly string[]).includes(value);
}

// ============ DISPLAY HELPERS ============

/**
 * Clamp a percentage to the 0-100 range used for progress bars.
 * Non-finite input renders as an empty bar.
 */
export function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

/**
 * Format a date as "Oct 12, 2026" in UTC.
 */
export function formatDisplayDate(date: Date): string {
  return date.toLocaleDateString('en-US', {
    month: 'short',
    day: 'numeric',
    year: 'numeric',
    timeZone: 'UTC',
  });
}

/**
 * YYYY-MM-DD for a date in UTC
 */
export function toDateKey(date: Date): string {
  return date.toISOString().split('T')[0];
}
