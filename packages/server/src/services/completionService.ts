import { and, eq, inArray, lt, sql } from 'drizzle-orm';
import { db, schema } from '../db/index.js';
import { ATTENDED_STATUSES, type AchievementType } from '@progress-portal/shared';

export type CompleteSessionResult =
  | { status: 'not_found' }
  | { status: 'not_enrolled'; courseId: number }
  | {
      status: 'completed';
      courseId: number;
      alreadyCompleted: boolean;
      /** Titles of achievements earned by this call */
      awarded: string[];
    };

export interface CourseStanding {
  totalSessions: number;
  completedSessions: number;
  pastSessions: number;
  attendedSessions: number;
}

interface AchievementDefinition {
  achievementType: AchievementType;
  title: string;
  description: string;
}

/**
 * Achievements a learner holds in a course with the given standing.
 * Completion needs every session completed; attendance needs every
 * session that has started attended.
 */
export function earnedAchievements(
  courseTitle: string,
  standing: CourseStanding
): AchievementDefinition[] {
  const earned: AchievementDefinition[] = [];

  if (standing.totalSessions > 0 && standing.completedSessions >= standing.totalSessions) {
    earned.push({
      achievementType: 'completion',
      title: 'Course Completed!',
      description: `Completed all sessions in ${courseTitle}`,
    });
  }

  if (standing.pastSessions > 0 && standing.attendedSessions >= standing.pastSessions) {
    earned.push({
      achievementType: 'attendance',
      title: 'Perfect Attendance!',
      description: `Attended all sessions in ${courseTitle}`,
    });
  }

  return earned;
}

async function loadCourseStanding(
  userId: number,
  courseId: number,
  now: Date
): Promise<CourseStanding> {
  const { courseSessions, sessionCompletions, sessionAttendances } = schema;

  const [sessions] = await db
    .select({
      total: sql<number>`count(*)`,
      past: sql<number>`coalesce(sum(case when ${lt(courseSessions.startTime, now)} then 1 else 0 end), 0)`,
    })
    .from(courseSessions)
    .where(eq(courseSessions.courseId, courseId));

  const [completed] = await db
    .select({ count: sql<number>`count(*)` })
    .from(sessionCompletions)
    .innerJoin(courseSessions, eq(sessionCompletions.sessionId, courseSessions.id))
    .where(and(eq(sessionCompletions.userId, userId), eq(courseSessions.courseId, courseId)));

  const [attended] = await db
    .select({ count: sql<number>`count(*)` })
    .from(sessionAttendances)
    .innerJoin(courseSessions, eq(sessionAttendances.sessionId, courseSessions.id))
    .where(
      and(
        eq(sessionAttendances.userId, userId),
        eq(courseSessions.courseId, courseId),
        lt(courseSessions.startTime, now),
        inArray(sessionAttendances.status, [...ATTENDED_STATUSES])
      )
    );

  return {
    totalSessions: Number(sessions?.total ?? 0),
    completedSessions: Number(completed?.count ?? 0),
    pastSessions: Number(sessions?.past ?? 0),
    attendedSessions: Number(attended?.count ?? 0),
  };
}

/**
 * Get-or-create each achievement the learner now holds in the course.
 * Returns the titles of the ones created.
 */
async function awardAchievements(
  userId: number,
  course: { id: number; title: string },
  now: Date
): Promise<string[]> {
  const standing = await loadCourseStanding(userId, course.id, now);
  const awarded: string[] = [];

  for (const achievement of earnedAchievements(course.title, standing)) {
    const created = await db
      .insert(schema.achievements)
      .values({ userId, courseId: course.id, ...achievement, awardedAt: now })
      .onConflictDoNothing({
        target: [
          schema.achievements.userId,
          schema.achievements.courseId,
          schema.achievements.achievementType,
        ],
      })
      .returning({ id: schema.achievements.id });

    if (created.length > 0) awarded.push(achievement.title);
  }

  return awarded;
}

/**
 * Mark a course session as completed by a learner.
 * Only learners with an approved enrolment may complete sessions; repeating
 * the call keeps the original completion time.
 */
export async function completeSession(
  userId: number,
  sessionId: number,
  now: Date = new Date()
): Promise<CompleteSessionResult> {
  const [session] = await db
    .select({ id: schema.courseSessions.id, courseId: schema.courses.id, courseTitle: schema.courses.title })
    .from(schema.courseSessions)
    .innerJoin(schema.courses, eq(schema.courseSessions.courseId, schema.courses.id))
    .where(eq(schema.courseSessions.id, sessionId));

  if (!session) {
    return { status: 'not_found' };
  }

  const [enrollment] = await db
    .select({ status: schema.enrollments.status })
    .from(schema.enrollments)
    .where(
      and(
        eq(schema.enrollments.userId, userId),
        eq(schema.enrollments.courseId, session.courseId)
      )
    );

  if (!enrollment || enrollment.status !== 'approved') {
    return { status: 'not_enrolled', courseId: session.courseId };
  }

  const inserted = await db
    .insert(schema.sessionCompletions)
    .values({ sessionId, userId, completedAt: now })
    .onConflictDoNothing({
      target: [schema.sessionCompletions.sessionId, schema.sessionCompletions.userId],
    })
    .returning({ id: schema.sessionCompletions.id });

  const awarded = await awardAchievements(
    userId,
    { id: session.courseId, title: session.courseTitle },
    now
  );

  return {
    status: 'completed',
    courseId: session.courseId,
    alreadyCompleted: inserted.length === 0,
    awarded,
  };
}
