/**
 * Progress Service
 *
 * Assembles the learning dashboard for one user from enrolments, session
 * completions and attendance records.
 */

import { and, eq, inArray, lt, sql } from 'drizzle-orm';
import { db, schema } from '../db/index.js';
import {
  ACTIVITY_WINDOW_DAYS,
  ATTENDED_STATUSES,
  NEVER_LABEL,
  NO_ACTIVE_DAY_LABEL,
  clampPercent,
  formatDisplayDate,
  isAchievementType,
  resolveCourseColor,
  toDateKey,
  type Achievement,
  type AchievementType,
  type AttendanceStatus,
  type CompletionPace,
  type CourseProgress,
  type DashboardContext,
  type EnrollmentStatus,
  type PendingSession,
} from '@progress-portal/shared';

const DAY_MS = 1000 * 60 * 60 * 24;
const PACE_WINDOW_DAYS = 28;
const WEEKDAY_NAMES = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
];
// Monday-first, so ties resolve to the earlier day of the week
const WEEKDAY_ORDER = [1, 2, 3, 4, 5, 6, 0];

// Enrolments that count towards the dashboard
const ACTIVE_ENROLLMENT_STATUSES: EnrollmentStatus[] = ['approved', 'completed'];

export interface EnrolledCourseRow {
  courseId: number;
  slug: string;
  title: string;
  color: string | null;
  totalSessions: number;
  pastSessions: number;
}

export interface CompletionRow {
  courseId: number;
  sessionId: number;
  completedAt: Date;
  durationMinutes: number;
}

export interface AttendanceRow {
  courseId: number;
  status: AttendanceStatus;
}

// Sessions that have already started in courses the learner may still complete
export interface StartedSessionRow {
  courseId: number;
  sessionId: number;
  title: string;
  startTime: Date;
}

export interface AchievementRow {
  courseId: number;
  courseTitle: string;
  achievementType: AchievementType;
  title: string;
  description: string;
  awardedAt: Date;
}

export interface ProgressSnapshot {
  courses: EnrolledCourseRow[];
  completions: CompletionRow[];
  attendance: AttendanceRow[];
  startedSessions: StartedSessionRow[];
  achievements: AchievementRow[];
}

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

function latest(dates: Date[]): Date | null {
  if (dates.length === 0) return null;
  return dates.reduce((a, b) => (b.getTime() > a.getTime() ? b : a));
}

/**
 * Consecutive UTC days with at least one completion, ending today or yesterday.
 */
export function calculateCurrentStreak(completionDates: Date[], now: Date): number {
  const days = new Set(completionDates.map(toDateKey));

  let cursor = new Date(now.getTime());
  if (!days.has(toDateKey(cursor))) {
    cursor = new Date(cursor.getTime() - DAY_MS);
    if (!days.has(toDateKey(cursor))) return 0;
  }

  let streak = 0;
  while (days.has(toDateKey(cursor))) {
    streak++;
    cursor = new Date(cursor.getTime() - DAY_MS);
  }
  return streak;
}

export function findMostActiveDay(completionDates: Date[]): string {
  if (completionDates.length === 0) return NO_ACTIVE_DAY_LABEL;

  const counts = new Array<number>(7).fill(0);
  for (const date of completionDates) {
    counts[date.getUTCDay()]++;
  }

  let best = WEEKDAY_ORDER[0];
  for (const day of WEEKDAY_ORDER) {
    if (counts[day] > counts[best]) best = day;
  }
  return WEEKDAY_NAMES[best];
}

export function determinePace(totalCompletions: number, sessionsPerWeek: number): CompletionPace {
  if (totalCompletions === 0) return 'Not started';
  if (sessionsPerWeek >= 3) return 'Ahead of schedule';
  if (sessionsPerWeek >= 1) return 'On track';
  return 'Falling behind';
}

export function buildActivitySeries(
  completionDates: Date[],
  now: Date,
  days: number = ACTIVITY_WINDOW_DAYS
): DashboardContext['activity'] {
  const perDay = new Map<string, number>();
  for (const date of completionDates) {
    const key = toDateKey(date);
    perDay.set(key, (perDay.get(key) ?? 0) + 1);
  }

  const dates: string[] = [];
  const sessionCounts: number[] = [];
  for (let offset = days - 1; offset >= 0; offset--) {
    const key = toDateKey(new Date(now.getTime() - offset * DAY_MS));
    dates.push(key);
    sessionCounts.push(perDay.get(key) ?? 0);
  }
  return { dates, sessionCounts };
}

/**
 * For each course, the earliest started session without a completion.
 */
export function findPendingSessions(
  courses: EnrolledCourseRow[],
  startedSessions: StartedSessionRow[],
  completions: CompletionRow[]
): PendingSession[] {
  const completed = new Set(completions.map((c) => c.sessionId));
  const pending: PendingSession[] = [];

  for (const course of courses) {
    let next: StartedSessionRow | null = null;
    for (const session of startedSessions) {
      if (session.courseId !== course.courseId || completed.has(session.sessionId)) continue;
      if (!next || session.startTime.getTime() < next.startTime.getTime()) next = session;
    }

    if (next) {
      pending.push({
        courseId: next.courseId,
        sessionId: next.sessionId,
        title: next.title,
        startedOn: formatDisplayDate(next.startTime),
      });
    }
  }

  return pending;
}

function toAchievement(row: AchievementRow): Achievement {
  return {
    courseId: row.courseId,
    courseTitle: row.courseTitle,
    achievementType: row.achievementType,
    title: row.title,
    description: row.description,
    awardedOn: formatDisplayDate(row.awardedAt),
  };
}

/**
 * Build the dashboard context from rows already loaded for one user.
 */
export function buildDashboardContext(snapshot: ProgressSnapshot, now: Date): DashboardContext {
  const completionsByCourse = new Map<number, CompletionRow[]>();
  for (const completion of snapshot.completions) {
    const list = completionsByCourse.get(completion.courseId) ?? [];
    list.push(completion);
    completionsByCourse.set(completion.courseId, list);
  }

  const courses: CourseProgress[] = snapshot.courses.map((course, index) => {
    const completions = completionsByCourse.get(course.courseId) ?? [];
    const progress =
      course.totalSessions > 0
        ? clampPercent(Math.round((completions.length / course.totalSessions) * 100))
        : 0;
    const lastActive = latest(completions.map((c) => c.completedAt));

    return {
      courseId: course.courseId,
      slug: course.slug,
      title: course.title,
      progress,
      color: resolveCourseColor(course.color, index),
      sessionsCompleted: completions.length,
      totalSessions: course.totalSessions,
      lastActive: lastActive ? formatDisplayDate(lastActive) : NEVER_LABEL,
    };
  });

  const coursesCompleted = courses.filter(
    (c) => c.totalSessions > 0 && c.sessionsCompleted >= c.totalSessions
  ).length;

  const pastSessions = snapshot.courses.reduce((sum, c) => sum + c.pastSessions, 0);
  const attended = snapshot.attendance.filter((a) => ATTENDED_STATUSES.includes(a.status)).length;
  const averageAttendance =
    pastSessions > 0 ? Math.min(100, Math.round((attended / pastSessions) * 100)) : 0;

  const completionDates = snapshot.completions.map((c) => c.completedAt);
  const totalMinutes = snapshot.completions.reduce((sum, c) => sum + c.durationMinutes, 0);

  const windowStart = now.getTime() - PACE_WINDOW_DAYS * DAY_MS;
  const recentCompletions = completionDates.filter(
    (d) => d.getTime() > windowStart && d.getTime() <= now.getTime()
  ).length;
  const avgSessionsPerWeek = roundToTenth(recentCompletions / (PACE_WINDOW_DAYS / 7));

  const lastSession = latest(completionDates);

  return {
    totalCourses: courses.length,
    coursesCompleted,
    topicsMastered: snapshot.completions.length,
    averageAttendance,
    currentStreak: calculateCurrentStreak(completionDates, now),
    totalLearningHours: roundToTenth(totalMinutes / 60),
    avgSessionsPerWeek,
    mostActiveDay: findMostActiveDay(completionDates),
    lastSessionDate: lastSession ? formatDisplayDate(lastSession) : NEVER_LABEL,
    completionPace: determinePace(snapshot.completions.length, avgSessionsPerWeek),
    courses,
    activity: buildActivitySeries(completionDates, now),
    pendingSessions: findPendingSessions(
      snapshot.courses,
      snapshot.startedSessions,
      snapshot.completions
    ),
    achievements: snapshot.achievements.map(toAchievement),
  };
}

/**
 * Load the rows the dashboard is computed from.
 */
export async function loadProgressSnapshot(userId: number, now: Date): Promise<ProgressSnapshot> {
  const { courses, courseSessions, enrollments, sessionCompletions, sessionAttendances, achievements } =
    schema;

  const courseRows = await db
    .select({
      courseId: courses.id,
      slug: courses.slug,
      title: courses.title,
      color: courses.color,
      totalSessions: sql<number>`count(${courseSessions.id})`,
      pastSessions: sql<number>`coalesce(sum(case when ${lt(courseSessions.startTime, now)} then 1 else 0 end), 0)`,
    })
    .from(enrollments)
    .innerJoin(courses, eq(enrollments.courseId, courses.id))
    .leftJoin(courseSessions, eq(courseSessions.courseId, courses.id))
    .where(
      and(
        eq(enrollments.userId, userId),
        inArray(enrollments.status, ACTIVE_ENROLLMENT_STATUSES)
      )
    )
    .groupBy(courses.id)
    .orderBy(enrollments.enrolledAt, courses.id);

  const completionRows = await db
    .select({
      courseId: courseSessions.courseId,
      sessionId: sessionCompletions.sessionId,
      completedAt: sessionCompletions.completedAt,
      durationMinutes: courseSessions.durationMinutes,
    })
    .from(sessionCompletions)
    .innerJoin(courseSessions, eq(sessionCompletions.sessionId, courseSessions.id))
    .innerJoin(
      enrollments,
      and(eq(enrollments.courseId, courseSessions.courseId), eq(enrollments.userId, userId))
    )
    .where(
      and(
        eq(sessionCompletions.userId, userId),
        inArray(enrollments.status, ACTIVE_ENROLLMENT_STATUSES)
      )
    );

  const attendanceRows = await db
    .select({
      courseId: courseSessions.courseId,
      status: sessionAttendances.status,
    })
    .from(sessionAttendances)
    .innerJoin(courseSessions, eq(sessionAttendances.sessionId, courseSessions.id))
    .innerJoin(
      enrollments,
      and(eq(enrollments.courseId, courseSessions.courseId), eq(enrollments.userId, userId))
    )
    .where(
      and(
        eq(sessionAttendances.userId, userId),
        lt(courseSessions.startTime, now),
        inArray(enrollments.status, ACTIVE_ENROLLMENT_STATUSES)
      )
    );

  // Only approved enrolments may record completions
  const startedRows = await db
    .select({
      courseId: courseSessions.courseId,
      sessionId: courseSessions.id,
      title: courseSessions.title,
      startTime: courseSessions.startTime,
    })
    .from(courseSessions)
    .innerJoin(
      enrollments,
      and(eq(enrollments.courseId, courseSessions.courseId), eq(enrollments.userId, userId))
    )
    .where(and(eq(enrollments.status, 'approved'), lt(courseSessions.startTime, now)))
    .orderBy(courseSessions.startTime, courseSessions.id);

  const achievementRows = await db
    .select({
      courseId: achievements.courseId,
      courseTitle: courses.title,
      achievementType: achievements.achievementType,
      title: achievements.title,
      description: achievements.description,
      awardedAt: achievements.awardedAt,
    })
    .from(achievements)
    .innerJoin(courses, eq(achievements.courseId, courses.id))
    .where(eq(achievements.userId, userId))
    .orderBy(achievements.awardedAt, achievements.id);

  return {
    courses: courseRows.map((row) => ({
      ...row,
      totalSessions: Number(row.totalSessions),
      pastSessions: Number(row.pastSessions),
    })),
    completions: completionRows,
    attendance: attendanceRows.flatMap((row) =>
      isAttendanceStatus(row.status) ? [{ courseId: row.courseId, status: row.status }] : []
    ),
    startedSessions: startedRows,
    achievements: achievementRows.flatMap((row) => {
      const { achievementType } = row;
      return isAchievementType(achievementType) ? [{ ...row, achievementType }] : [];
    }),
  };
}

const ATTENDANCE_STATUSES: readonly string[] = ['present', 'late', 'absent', 'excused'];

function isAttendanceStatus(value: string): value is AttendanceStatus {
  return ATTENDANCE_STATUSES.includes(value);
}

export async function getDashboardContext(
  userId: number,
  now: Date = new Date()
): Promise<DashboardContext> {
  const snapshot = await loadProgressSnapshot(userId, now);
  return buildDashboardContext(snapshot, now);
}

export async function getLearnerName(userId: number): Promise<string | null> {
  const [user] = await db
    .select({ name: schema.users.name })
    .from(schema.users)
    .where(eq(schema.users.id, userId));
  return user ? user.name : null;
}
