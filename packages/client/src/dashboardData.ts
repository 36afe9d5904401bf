import { z } from 'zod';
import type { CourseProgress } from '@progress-portal/shared';

declare global {
  interface Window {
    PROGRESS_DASHBOARD?: unknown;
  }
}

export interface DashboardData {
  chartDates: string[];
  chartSessionCounts: number[];
  courses: CourseProgress[];
  totalCourses: number;
  coursesCompleted: number;
  totalLearningHours: number;
}

export class DashboardDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DashboardDataError';
  }
}

// Every field arrives as a JSON document inside a string
const payloadSchema = z.object({
  chartDates: z.string(),
  chartSessionCounts: z.string(),
  courses: z.string(),
  totalCourses: z.string(),
  coursesCompleted: z.string(),
  totalLearningHours: z.string(),
});

const courseSchema = z.object({
  courseId: z.number().int(),
  slug: z.string(),
  title: z.string(),
  progress: z.number().min(0).max(100),
  color: z.string(),
  sessionsCompleted: z.number().int().min(0),
  totalSessions: z.number().int().min(0),
  lastActive: z.string(),
});

const countSchema = z.number().int().min(0);

function parseField<T>(field: string, raw: string, schema: z.ZodType<T>): T {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new DashboardDataError(`${field} is not valid JSON`);
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DashboardDataError(`${field} has an unexpected shape`);
  }
  return result.data;
}

/**
 * Decode and validate the server-rendered dashboard payload.
 * @throws DashboardDataError when any field is missing or malformed
 */
export function parseDashboardPayload(raw: unknown): DashboardData {
  const payload = payloadSchema.safeParse(raw);
  if (!payload.success) {
    throw new DashboardDataError('Dashboard payload is missing or incomplete');
  }

  const fields = payload.data;
  const data: DashboardData = {
    chartDates: parseField('chartDates', fields.chartDates, z.array(z.string())),
    chartSessionCounts: parseField('chartSessionCounts', fields.chartSessionCounts, z.array(countSchema)),
    courses: parseField('courses', fields.courses, z.array(courseSchema)),
    totalCourses: parseField('totalCourses', fields.totalCourses, countSchema),
    coursesCompleted: parseField('coursesCompleted', fields.coursesCompleted, countSchema),
    totalLearningHours: parseField('totalLearningHours', fields.totalLearningHours, z.number().min(0)),
  };

  if (data.chartDates.length !== data.chartSessionCounts.length) {
    throw new DashboardDataError('chartDates and chartSessionCounts differ in length');
  }

  return data;
}
