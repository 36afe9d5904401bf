import { db, sqlite } from './index.js';
import {
  users,
  courses,
  courseSessions,
  enrollments,
  sessionAttendances,
  sessionCompletions,
} from './schema.js';
import { signAccessToken } from '../services/jwt.js';

const DAY_MS = 1000 * 60 * 60 * 24;

const DEMO_COURSES = [
  { title: 'Introduction to TypeScript', slug: 'intro-typescript', color: '59, 130, 246', sessions: 8 },
  { title: 'Web Accessibility Basics', slug: 'web-accessibility', color: '16, 185, 129', sessions: 5 },
  { title: 'Testing Web Applications', slug: 'testing-web-apps', color: null, sessions: 6 },
];

async function seed() {
  console.log('Seeding database...');

  const existing = await db.select({ id: users.id }).from(users).limit(1);
  if (existing.length > 0) {
    console.log('Database already seeded. Skipping...');
    sqlite.close();
    return;
  }

  const now = Date.now();

  const [learner] = await db
    .insert(users)
    .values({ email: 'learner@example.com', name: 'Demo Learner', createdAt: new Date(now) })
    .returning();

  for (const [courseIndex, course] of DEMO_COURSES.entries()) {
    const [insertedCourse] = await db
      .insert(courses)
      .values({
        title: course.title,
        slug: course.slug,
        color: course.color,
        createdAt: new Date(now - 60 * DAY_MS),
      })
      .returning();

    await db.insert(enrollments).values({
      userId: learner.id,
      courseId: insertedCourse.id,
      status: 'approved',
      enrolledAt: new Date(now - 45 * DAY_MS),
    });

    // Two sessions a week, the last one or two still upcoming
    for (let i = 0; i < course.sessions; i++) {
      const startTime = new Date(now - (course.sessions - i - 2) * 3.5 * DAY_MS + courseIndex * 3600_000);
      const [session] = await db
        .insert(courseSessions)
        .values({
          courseId: insertedCourse.id,
          title: `${course.title} - Session ${i + 1}`,
          startTime,
          durationMinutes: 90,
        })
        .returning();

      if (startTime.getTime() >= now) continue;

      await db.insert(sessionAttendances).values({
        sessionId: session.id,
        userId: learner.id,
        status: i % 4 === 3 ? 'absent' : 'present',
        recordedAt: startTime,
      });

      if (i % 4 !== 3) {
        await db.insert(sessionCompletions).values({
          sessionId: session.id,
          userId: learner.id,
          completedAt: new Date(startTime.getTime() + 2 * 3600_000),
        });
      }
    }

    console.log(`Inserted course: ${course.title}`);
  }

  console.log('Seeding completed!');
  console.log(`Access token for ${learner.email} (set as the access_token cookie):`);
  console.log(signAccessToken(learner.id, 60 * 60 * 24 * 30));

  sqlite.close();
}

seed().catch(console.error);
