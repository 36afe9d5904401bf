import { describe, it, expect, beforeEach } from 'vitest';
import {
  buildActivitySeries,
  buildDashboardContext,
  calculateCurrentStreak,
  determinePace,
  findMostActiveDay,
  findPendingSessions,
  getDashboardContext,
  getLearnerName,
  type ProgressSnapshot,
} from './progressService.js';
import { db, schema } from '../db/index.js';
import {
  createCourse,
  createSession,
  createUser,
  enroll,
  recordAttendance,
  recordCompletion,
  resetDatabase,
} from '../test/fixtures.js';

// A Sunday
const NOW = new Date('2026-10-18T12:00:00Z');

describe('calculateCurrentStreak', () => {
  it('should count consecutive days ending today', () => {
    const dates = [
      new Date('2026-10-18T08:00:00Z'),
      new Date('2026-10-17T08:00:00Z'),
      new Date('2026-10-16T08:00:00Z'),
      new Date('2026-10-14T08:00:00Z'),
    ];
    expect(calculateCurrentStreak(dates, NOW)).toBe(3);
  });

  it('should keep the streak alive when the last completion was yesterday', () => {
    const dates = [new Date('2026-10-17T08:00:00Z'), new Date('2026-10-16T23:59:00Z')];
    expect(calculateCurrentStreak(dates, NOW)).toBe(2);
  });

  it('should return 0 when the last completion is older than yesterday', () => {
    expect(calculateCurrentStreak([new Date('2026-10-15T08:00:00Z')], NOW)).toBe(0);
  });

  it('should return 0 without completions', () => {
    expect(calculateCurrentStreak([], NOW)).toBe(0);
  });
});

describe('findMostActiveDay', () => {
  it('should return the weekday with the most completions', () => {
    const dates = [
      new Date('2026-10-13T10:00:00Z'), // Tuesday
      new Date('2026-10-13T18:00:00Z'), // Tuesday
      new Date('2026-10-12T10:00:00Z'), // Monday
    ];
    expect(findMostActiveDay(dates)).toBe('Tuesday');
  });

  it('should resolve ties to the earlier day of a Monday-first week', () => {
    const dates = [
      new Date('2026-10-18T10:00:00Z'), // Sunday
      new Date('2026-10-12T10:00:00Z'), // Monday
    ];
    expect(findMostActiveDay(dates)).toBe('Monday');
  });

  it('should return N/A without completions', () => {
    expect(findMostActiveDay([])).toBe('N/A');
  });
});

describe('determinePace', () => {
  it('should report not started without completions', () => {
    expect(determinePace(0, 0)).toBe('Not started');
  });

  it('should grade by sessions per week', () => {
    expect(determinePace(12, 3)).toBe('Ahead of schedule');
    expect(determinePace(5, 1)).toBe('On track');
    expect(determinePace(2, 0.5)).toBe('Falling behind');
  });
});

describe('buildActivitySeries', () => {
  it('should count completions per UTC day, oldest first', () => {
    const series = buildActivitySeries(
      [
        new Date('2026-10-16T09:00:00Z'),
        new Date('2026-10-18T01:00:00Z'),
        new Date('2026-10-18T02:00:00Z'),
      ],
      NOW,
      3
    );

    expect(series).toEqual({
      dates: ['2026-10-16', '2026-10-17', '2026-10-18'],
      sessionCounts: [1, 0, 2],
    });
  });

  it('should cover thirty days by default', () => {
    const series = buildActivitySeries([], NOW);

    expect(series.dates).toHaveLength(30);
    expect(series.dates[0]).toBe('2026-09-19');
    expect(series.dates[29]).toBe('2026-10-18');
    expect(series.sessionCounts.every((count) => count === 0)).toBe(true);
  });
});

describe('buildDashboardContext', () => {
  const snapshot: ProgressSnapshot = {
    courses: [
      { courseId: 1, slug: 'a', title: 'Course A', color: '10, 20, 30', totalSessions: 4, pastSessions: 3 },
      { courseId: 2, slug: 'b', title: 'Course B', color: null, totalSessions: 2, pastSessions: 2 },
      { courseId: 3, slug: 'c', title: 'Course C', color: 'bad', totalSessions: 0, pastSessions: 0 },
    ],
    completions: [
      { courseId: 1, sessionId: 11, completedAt: new Date('2026-10-18T10:00:00Z'), durationMinutes: 60 },
      { courseId: 1, sessionId: 12, completedAt: new Date('2026-10-17T10:00:00Z'), durationMinutes: 90 },
      { courseId: 2, sessionId: 21, completedAt: new Date('2026-10-13T10:00:00Z'), durationMinutes: 45 },
      { courseId: 2, sessionId: 22, completedAt: new Date('2026-09-01T10:00:00Z'), durationMinutes: 45 },
    ],
    attendance: [
      { courseId: 1, status: 'present' },
      { courseId: 1, status: 'late' },
      { courseId: 1, status: 'absent' },
      { courseId: 2, status: 'present' },
      { courseId: 2, status: 'excused' },
    ],
    startedSessions: [
      { courseId: 1, sessionId: 11, title: 'A1', startTime: new Date('2026-10-01T10:00:00Z') },
      { courseId: 1, sessionId: 13, title: 'A3', startTime: new Date('2026-10-15T10:00:00Z') },
    ],
    achievements: [
      {
        courseId: 2,
        courseTitle: 'Course B',
        achievementType: 'completion',
        title: 'Course Completed!',
        description: 'Completed all sessions in Course B',
        awardedAt: new Date('2026-10-13T10:00:00Z'),
      },
    ],
  };

  it('should compute per-course progress', () => {
    const context = buildDashboardContext(snapshot, NOW);

    expect(context.courses).toEqual([
      {
        courseId: 1,
        slug: 'a',
        title: 'Course A',
        progress: 50,
        color: '10, 20, 30',
        sessionsCompleted: 2,
        totalSessions: 4,
        lastActive: 'Oct 18, 2026',
      },
      {
        courseId: 2,
        slug: 'b',
        title: 'Course B',
        progress: 100,
        color: '16, 185, 129',
        sessionsCompleted: 2,
        totalSessions: 2,
        lastActive: 'Oct 13, 2026',
      },
      {
        courseId: 3,
        slug: 'c',
        title: 'Course C',
        progress: 0,
        color: '245, 158, 11',
        sessionsCompleted: 0,
        totalSessions: 0,
        lastActive: 'Never',
      },
    ]);
  });

  it('should compute the aggregate metrics', () => {
    const context = buildDashboardContext(snapshot, NOW);

    expect(context.totalCourses).toBe(3);
    expect(context.coursesCompleted).toBe(1);
    expect(context.topicsMastered).toBe(4);
    expect(context.averageAttendance).toBe(60);
    expect(context.currentStreak).toBe(2);
    expect(context.totalLearningHours).toBe(4);
    expect(context.avgSessionsPerWeek).toBe(0.8);
    expect(context.mostActiveDay).toBe('Tuesday');
    expect(context.lastSessionDate).toBe('Oct 18, 2026');
    expect(context.completionPace).toBe('Falling behind');
    expect(context.activity.sessionCounts.slice(-2)).toEqual([1, 1]);
  });

  it('should list pending sessions and achievements', () => {
    const context = buildDashboardContext(snapshot, NOW);

    expect(context.pendingSessions).toEqual([
      { courseId: 1, sessionId: 13, title: 'A3', startedOn: 'Oct 15, 2026' },
    ]);
    expect(context.achievements).toEqual([
      {
        courseId: 2,
        courseTitle: 'Course B',
        achievementType: 'completion',
        title: 'Course Completed!',
        description: 'Completed all sessions in Course B',
        awardedOn: 'Oct 13, 2026',
      },
    ]);
  });

  it('should return zeros for an empty snapshot', () => {
    const context = buildDashboardContext(
      { courses: [], completions: [], attendance: [], startedSessions: [], achievements: [] },
      NOW
    );

    expect(context).toMatchObject({
      totalCourses: 0,
      coursesCompleted: 0,
      topicsMastered: 0,
      averageAttendance: 0,
      currentStreak: 0,
      totalLearningHours: 0,
      avgSessionsPerWeek: 0,
      mostActiveDay: 'N/A',
      lastSessionDate: 'Never',
      completionPace: 'Not started',
      courses: [],
      pendingSessions: [],
      achievements: [],
    });
  });
});

describe('findPendingSessions', () => {
  const courses = [
    { courseId: 1, slug: 'a', title: 'Course A', color: null, totalSessions: 3, pastSessions: 3 },
    { courseId: 2, slug: 'b', title: 'Course B', color: null, totalSessions: 1, pastSessions: 1 },
  ];

  it('should pick the earliest uncompleted started session per course', () => {
    const pending = findPendingSessions(
      courses,
      [
        { courseId: 2, sessionId: 21, title: 'B1', startTime: new Date('2026-10-02T10:00:00Z') },
        { courseId: 1, sessionId: 13, title: 'A3', startTime: new Date('2026-10-09T10:00:00Z') },
        { courseId: 1, sessionId: 12, title: 'A2', startTime: new Date('2026-10-05T10:00:00Z') },
        { courseId: 1, sessionId: 11, title: 'A1', startTime: new Date('2026-10-01T10:00:00Z') },
      ],
      [{ courseId: 1, sessionId: 11, completedAt: NOW, durationMinutes: 60 }]
    );

    expect(pending).toEqual([
      { courseId: 1, sessionId: 12, title: 'A2', startedOn: 'Oct 5, 2026' },
      { courseId: 2, sessionId: 21, title: 'B1', startedOn: 'Oct 2, 2026' },
    ]);
  });

  it('should skip courses whose started sessions are all completed', () => {
    const pending = findPendingSessions(
      courses,
      [{ courseId: 2, sessionId: 21, title: 'B1', startTime: new Date('2026-10-02T10:00:00Z') }],
      [{ courseId: 2, sessionId: 21, completedAt: NOW, durationMinutes: 60 }]
    );

    expect(pending).toEqual([]);
  });
});

describe('getDashboardContext', () => {
  beforeEach(() => {
    resetDatabase();
  });

  it('should load progress from enrolled courses only', async () => {
    const user = await createUser();
    const other = await createUser('Other Learner', 'other@example.com');
    const typescript = await createCourse('TypeScript', 'typescript', '1, 2, 3');
    const pending = await createCourse('Pending Course', 'pending');

    const past1 = await createSession(typescript.id, 'Week 1', new Date('2026-10-10T10:00:00Z'), 90);
    const past2 = await createSession(typescript.id, 'Week 2', new Date('2026-10-17T10:00:00Z'), 30);
    await createSession(typescript.id, 'Week 3', new Date('2026-10-24T10:00:00Z'));
    await createSession(pending.id, 'Intro', new Date('2026-10-01T10:00:00Z'));

    await enroll(user.id, typescript.id, 'approved');
    await enroll(user.id, pending.id, 'pending');
    await enroll(other.id, typescript.id, 'approved');

    await recordCompletion(user.id, past1.id, new Date('2026-10-10T12:00:00Z'));
    await recordCompletion(user.id, past2.id, new Date('2026-10-17T12:00:00Z'));
    await recordCompletion(other.id, past1.id, new Date('2026-10-10T12:00:00Z'));
    await recordAttendance(user.id, past1.id, 'present');
    await recordAttendance(user.id, past2.id, 'absent');

    const context = await getDashboardContext(user.id, NOW);

    expect(context.totalCourses).toBe(1);
    expect(context.courses).toHaveLength(1);
    expect(context.courses[0]).toMatchObject({
      courseId: typescript.id,
      slug: 'typescript',
      title: 'TypeScript',
      progress: 67,
      color: '1, 2, 3',
      sessionsCompleted: 2,
      totalSessions: 3,
      lastActive: 'Oct 17, 2026',
    });
    expect(context.topicsMastered).toBe(2);
    expect(context.averageAttendance).toBe(50);
    expect(context.totalLearningHours).toBe(2);
    expect(context.currentStreak).toBe(1);
    expect(context.pendingSessions).toEqual([]);
  });

  it('should load the next session to complete and awarded achievements', async () => {
    const user = await createUser();
    const course = await createCourse('TypeScript', 'typescript');
    const week1 = await createSession(course.id, 'Week 1', new Date('2026-10-03T10:00:00Z'));
    const week2 = await createSession(course.id, 'Week 2', new Date('2026-10-10T10:00:00Z'));
    await createSession(course.id, 'Week 3', new Date('2026-10-24T10:00:00Z'));
    await enroll(user.id, course.id, 'approved');
    await recordCompletion(user.id, week1.id, new Date('2026-10-03T12:00:00Z'));
    await db.insert(schema.achievements).values({
      userId: user.id,
      courseId: course.id,
      achievementType: 'attendance',
      title: 'Perfect Attendance!',
      description: 'Attended all sessions in TypeScript',
      awardedAt: new Date('2026-10-03T12:00:00Z'),
    });

    const context = await getDashboardContext(user.id, NOW);

    expect(context.pendingSessions).toEqual([
      { courseId: course.id, sessionId: week2.id, title: 'Week 2', startedOn: 'Oct 10, 2026' },
    ]);
    expect(context.achievements).toEqual([
      {
        courseId: course.id,
        courseTitle: 'TypeScript',
        achievementType: 'attendance',
        title: 'Perfect Attendance!',
        description: 'Attended all sessions in TypeScript',
        awardedOn: 'Oct 3, 2026',
      },
    ]);
  });

  it('should return an empty dashboard for a user without enrolments', async () => {
    const user = await createUser();

    const context = await getDashboardContext(user.id, NOW);

    expect(context.totalCourses).toBe(0);
    expect(context.courses).toEqual([]);
    expect(context.averageAttendance).toBe(0);
  });
});

describe('getLearnerName', () => {
  beforeEach(() => {
    resetDatabase();
  });

  it('should return the stored name or null', async () => {
    const user = await createUser('Ada Learner', 'ada@example.com');

    expect(await getLearnerName(user.id)).toBe('Ada Learner');
    expect(await getLearnerName(user.id + 100)).toBeNull();
  });
});
