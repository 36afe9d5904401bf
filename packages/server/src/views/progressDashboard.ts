import {
  DASHBOARD_PAYLOAD_GLOBAL,
  DASHBOARD_PAYLOAD_KEYS,
  clampPercent,
  resolveCourseColor,
  type Achievement,
  type CourseProgress,
  type DashboardContext,
  type DashboardPayload,
  type FlashMessage,
  type PendingSession,
} from '@progress-portal/shared';
import { escapeHtml, joinHtml, jsStringLiteral } from './html.js';
import { renderLayout } from './layout.js';

export interface DashboardViewOptions {
  context: DashboardContext;
  flash?: FlashMessage[];
  /** Versioned URL of the dashboard script bundle */
  scriptUrl: string;
  reportUrl: string;
  /** Token for the mark-complete forms */
  csrfToken: string;
  unreadCount?: number;
}

interface MetricCard {
  key: keyof DashboardContext;
  label: string;
  value: string;
}

/**
 * Serialise the values the dashboard script reads. Each field is a JSON
 * document held in a string.
 */
export function buildDashboardPayload(context: DashboardContext): DashboardPayload {
  return {
    chartDates: JSON.stringify(context.activity.dates),
    chartSessionCounts: JSON.stringify(context.activity.sessionCounts),
    courses: JSON.stringify(context.courses),
    totalCourses: JSON.stringify(context.totalCourses),
    coursesCompleted: JSON.stringify(context.coursesCompleted),
    totalLearningHours: JSON.stringify(context.totalLearningHours),
  };
}

export function renderPayloadScript(payload: DashboardPayload): string {
  const fields = DASHBOARD_PAYLOAD_KEYS.map(
    (key) => `    ${key}: ${jsStringLiteral(payload[key])},`
  );
  return `<script>
  window.${DASHBOARD_PAYLOAD_GLOBAL} = {
${fields.join('\n')}
  };
</script>`;
}

function metricCards(context: DashboardContext): MetricCard[] {
  return [
    { key: 'totalCourses', label: 'Total Courses', value: String(context.totalCourses) },
    { key: 'coursesCompleted', label: 'Courses Completed', value: String(context.coursesCompleted) },
    { key: 'topicsMastered', label: 'Topics Mastered', value: String(context.topicsMastered) },
    { key: 'averageAttendance', label: 'Average Attendance', value: `${context.averageAttendance}%` },
    { key: 'currentStreak', label: 'Current Streak', value: `${context.currentStreak} days` },
    { key: 'totalLearningHours', label: 'Learning Hours', value: String(context.totalLearningHours) },
  ];
}

function insightRows(context: DashboardContext): MetricCard[] {
  return [
    { key: 'avgSessionsPerWeek', label: 'Sessions per Week', value: String(context.avgSessionsPerWeek) },
    { key: 'mostActiveDay', label: 'Most Active Day', value: context.mostActiveDay },
    { key: 'lastSessionDate', label: 'Last Session', value: context.lastSessionDate },
    { key: 'completionPace', label: 'Completion Pace', value: context.completionPace },
  ];
}

function renderMetricCard(card: MetricCard): string {
  return `<div class="rounded-lg bg-white p-5 shadow">
        <p class="text-sm text-gray-500">${card.label}</p>
        <p class="mt-1 text-2xl font-bold" data-metric="${card.key}">${escapeHtml(card.value)}</p>
      </div>`;
}

function renderInsightRow(row: MetricCard): string {
  return `<div class="flex justify-between py-2">
          <dt class="text-gray-500">${row.label}</dt>
          <dd class="font-medium" data-metric="${row.key}">${escapeHtml(row.value)}</dd>
        </div>`;
}

export function completeSessionPath(sessionId: number): string {
  return `/sessions/${sessionId}/complete`;
}

export function renderCompleteForm(session: PendingSession, csrfToken: string): string {
  return `<form method="post" action="${completeSessionPath(session.sessionId)}" class="complete-session mt-2 flex items-center justify-between gap-3 text-sm" data-session-id="${session.sessionId}">
          <input type="hidden" name="_csrf" value="${escapeHtml(csrfToken)}" />
          <span class="text-gray-600">Next: ${escapeHtml(session.title)} (${escapeHtml(session.startedOn)})</span>
          <button type="submit" class="rounded bg-green-600 px-3 py-1 text-white hover:bg-green-700">Mark complete</button>
        </form>`;
}

export function renderCourseBar(course: CourseProgress, index: number, completeForm = ''): string {
  const width = clampPercent(course.progress);
  const color = resolveCourseColor(course.color, index);
  const title = escapeHtml(course.title);

  return `<li class="course-progress" data-course-id="${course.courseId}">
        <div class="mb-1 flex justify-between text-sm">
          <span class="font-medium">${title}</span>
          <span class="text-gray-500">${width}%</span>
        </div>
        <div class="h-3 w-full rounded-full bg-gray-200" role="progressbar" aria-label="${title} progress" aria-valuemin="0" aria-valuemax="100" aria-valuenow="${width}">
          <div class="course-progress-fill h-3 rounded-full" style="width: ${width}%; background-color: rgb(${color});"></div>
        </div>
        <div class="mt-1 flex justify-between text-xs text-gray-500">
          <span class="course-sessions">${course.sessionsCompleted}/${course.totalSessions} sessions</span>
          <span>Last active: ${escapeHtml(course.lastActive)}</span>
        </div>${completeForm ? `\n        ${completeForm}` : ''}
      </li>`;
}

function renderCourseList(context: DashboardContext, csrfToken: string): string {
  const { courses, pendingSessions } = context;
  if (courses.length === 0) {
    return `<p class="text-gray-500" id="no-courses">You are not enrolled in any courses yet.</p>`;
  }

  const bars = courses.map((course, index) => {
    const pending = pendingSessions.find((s) => s.courseId === course.courseId);
    return renderCourseBar(course, index, pending ? renderCompleteForm(pending, csrfToken) : '');
  });
  return `<ul class="space-y-5" id="course-progress-list">
      ${joinHtml(bars)}
    </ul>`;
}

function renderAchievement(achievement: Achievement): string {
  return `<li class="flex justify-between py-2" data-achievement-type="${achievement.achievementType}">
          <div>
            <p class="font-medium">${escapeHtml(achievement.title)}</p>
            <p class="text-sm text-gray-500">${escapeHtml(achievement.description)}</p>
          </div>
          <span class="text-sm text-gray-500">${escapeHtml(achievement.awardedOn)}</span>
        </li>`;
}

function renderAchievementList(achievements: Achievement[]): string {
  if (achievements.length === 0) {
    return `<p class="text-gray-500" id="no-achievements">Complete or attend every session of a course to earn an achievement.</p>`;
  }
  return `<ul class="divide-y divide-gray-100" id="achievement-list">
      ${joinHtml(achievements.map(renderAchievement))}
    </ul>`;
}

/**
 * Learning progress dashboard: metric cards, activity chart and one bar per course.
 */
export function renderProgressDashboard(options: DashboardViewOptions): string {
  const { context, flash, scriptUrl, reportUrl, csrfToken, unreadCount } = options;

  const body = `<div class="mb-8 flex flex-wrap items-center justify-between gap-4">
    <h1 class="text-3xl font-bold">My Learning Progress</h1>
    <div class="flex gap-3">
      <a id="download-pdf" href="${escapeHtml(reportUrl)}" class="rounded bg-blue-600 px-4 py-2 text-white hover:bg-blue-700">Download PDF</a>
      <button id="share-image" type="button" class="rounded bg-gray-800 px-4 py-2 text-white hover:bg-gray-900">Share Image</button>
    </div>
  </div>

  <section class="mb-8 grid grid-cols-2 gap-4 md:grid-cols-3 lg:grid-cols-6">
      ${joinHtml(metricCards(context).map(renderMetricCard))}
  </section>

  <div class="mb-8 grid gap-6 lg:grid-cols-3">
    <section class="rounded-lg bg-white p-6 shadow lg:col-span-2">
      <h2 class="mb-4 text-xl font-semibold">Sessions Completed (Last 30 Days)</h2>
      <canvas id="progress-chart" height="120"></canvas>
    </section>
    <section class="rounded-lg bg-white p-6 shadow">
      <h2 class="mb-4 text-xl font-semibold">Learning Insights</h2>
      <dl class="divide-y divide-gray-100">
        ${joinHtml(insightRows(context).map(renderInsightRow))}
      </dl>
    </section>
  </div>

  <section class="mb-8 rounded-lg bg-white p-6 shadow">
    <h2 class="mb-4 text-xl font-semibold">Course Progress</h2>
    ${renderCourseList(context, csrfToken)}
  </section>

  <section class="rounded-lg bg-white p-6 shadow">
    <h2 class="mb-4 text-xl font-semibold">Achievements</h2>
    ${renderAchievementList(context.achievements)}
  </section>`;

  const scripts = `${renderPayloadScript(buildDashboardPayload(context))}
  <script src="${escapeHtml(scriptUrl)}" defer></script>`;

  return renderLayout({
    title: 'My Learning Progress',
    body,
    flash,
    activeNav: 'dashboard',
    unreadCount,
    scripts,
  });
}
