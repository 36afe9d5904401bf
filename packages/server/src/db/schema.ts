import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core';

// Learners (identity is owned by the external auth service)
export const users = sqliteTable('users', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  email: text('email').notNull().unique(),
  name: text('name').notNull(),
  createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
});

// Courses
export const courses = sqliteTable('courses', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  slug: text('slug').notNull().unique(),
  color: text('color'), // 'R, G, B' for the progress bar, palette fallback when null
  createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
});

// Scheduled class sessions within a course
export const courseSessions = sqliteTable(
  'course_sessions',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    courseId: integer('course_id')
      .notNull()
      .references(() => courses.id, { onDelete: 'cascade' }),
    title: text('title').notNull(),
    startTime: integer('start_time', { mode: 'timestamp' }).notNull(),
    durationMinutes: integer('duration_minutes').notNull().default(60),
  },
  (table) => [
    index('course_sessions_course_idx').on(table.courseId),
    index('course_sessions_start_idx').on(table.startTime),
  ]
);

export const enrollments = sqliteTable(
  'enrollments',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    userId: integer('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    courseId: integer('course_id')
      .notNull()
      .references(() => courses.id, { onDelete: 'cascade' }),
    status: text('status').notNull().default('pending'), // 'pending' | 'approved' | 'completed'
    enrolledAt: integer('enrolled_at', { mode: 'timestamp' }).notNull(),
  },
  (table) => [
    uniqueIndex('enrollments_user_course_idx').on(table.userId, table.courseId),
    index('enrollments_course_idx').on(table.courseId),
  ]
);

// Attendance recorded by the instructor for a session
export const sessionAttendances = sqliteTable(
  'session_attendances',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    sessionId: integer('session_id')
      .notNull()
      .references(() => courseSessions.id, { onDelete: 'cascade' }),
    userId: integer('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    status: text('status').notNull(), // 'present' | 'late' | 'absent' | 'excused'
    recordedAt: integer('recorded_at', { mode: 'timestamp' }).notNull(),
  },
  (table) => [uniqueIndex('attendances_session_user_idx').on(table.sessionId, table.userId)]
);

// Sessions a learner has marked as completed
export const sessionCompletions = sqliteTable(
  'session_completions',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    sessionId: integer('session_id')
      .notNull()
      .references(() => courseSessions.id, { onDelete: 'cascade' }),
    userId: integer('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    completedAt: integer('completed_at', { mode: 'timestamp' }).notNull(),
  },
  (table) => [
    uniqueIndex('completions_session_user_idx').on(table.sessionId, table.userId),
    index('completions_user_idx').on(table.userId),
  ]
);

export const notificationPreferences = sqliteTable('notification_preferences', {
  userId: integer('user_id')
    .primaryKey()
    .references(() => users.id, { onDelete: 'cascade' }),
  reminderDaysBefore: integer('reminder_days_before').notNull().default(1),
  reminderHoursBefore: integer('reminder_hours_before').notNull().default(0),
  emailNotifications: integer('email_notifications', { mode: 'boolean' }).notNull().default(true),
  inAppNotifications: integer('in_app_notifications', { mode: 'boolean' }).notNull().default(true),
  updatedAt: integer('updated_at', { mode: 'timestamp' }).notNull(),
});

export const inAppNotifications = sqliteTable(
  'in_app_notifications',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    userId: integer('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    title: text('title').notNull(),
    message: text('message').notNull(),
    notificationType: text('notification_type').notNull(), // 'session_reminder'
    isRead: integer('is_read', { mode: 'boolean' }).notNull().default(false),
    createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
  },
  (table) => [
    index('in_app_notifications_user_idx').on(table.userId),
    index('in_app_notifications_user_read_idx').on(table.userId, table.isRead),
  ]
);

// One row per reminder sent, so the scheduler never repeats itself
export const sessionReminders = sqliteTable(
  'session_reminders',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    userId: integer('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    sessionId: integer('session_id')
      .notNull()
      .references(() => courseSessions.id, { onDelete: 'cascade' }),
    channel: text('channel').notNull(), // 'email' | 'in_app'
    sentAt: integer('sent_at', { mode: 'timestamp' }).notNull(),
  },
  (table) => [
    uniqueIndex('reminders_user_session_channel_idx').on(
      table.userId,
      table.sessionId,
      table.channel
    ),
  ]
);

// Awarded once per learner, course and type
export const achievements = sqliteTable(
  'achievements',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    userId: integer('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    courseId: integer('course_id')
      .notNull()
      .references(() => courses.id, { onDelete: 'cascade' }),
    achievementType: text('achievement_type').notNull(), // 'completion' | 'attendance'
    title: text('title').notNull(),
    description: text('description').notNull(),
    awardedAt: integer('awarded_at', { mode: 'timestamp' }).notNull(),
  },
  (table) => [
    uniqueIndex('achievements_user_course_type_idx').on(
      table.userId,
      table.courseId,
      table.achievementType
    ),
  ]
);
