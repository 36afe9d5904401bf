import PDFDocument from 'pdfkit';
import {
  clampPercent,
  parseRgbTriple,
  type Achievement,
  type DashboardContext,
} from '@progress-portal/shared';

export interface ProgressReportParams {
  learnerName: string;
  context: DashboardContext;
  generatedAt: Date;
}

const BAR_WIDTH = 300;
const BAR_HEIGHT = 10;

export function achievementLines(achievements: Achievement[]): string[] {
  return achievements.map(
    (a) => `${a.title} ${a.courseTitle} - ${a.description} (${a.awardedOn})`
  );
}

/**
 * Generates a PDF summary of a learner's dashboard.
 * Returns a Buffer containing the PDF data.
 */
export async function generateProgressReportPdf(params: ProgressReportParams): Promise<Buffer> {
  const { learnerName, context, generatedAt } = params;

  return new Promise((resolve, reject) => {
    try {
      const doc = new PDFDocument({
        size: 'A4',
        margins: { top: 50, bottom: 50, left: 50, right: 50 },
        info: { Title: `Learning Progress - ${learnerName}` },
      });

      const chunks: Buffer[] = [];
      doc.on('data', (chunk) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);

      const left = doc.page.margins.left;

      // Header
      doc
        .fillColor('#1a365d')
        .fontSize(22)
        .font('Helvetica-Bold')
        .text('Learning Progress Report', left, 50);

      const formattedDate = generatedAt.toLocaleDateString('en-US', {
        year: 'numeric',
        month: 'long',
        day: 'numeric',
        timeZone: 'UTC',
      });

      doc
        .fillColor('#4a5568')
        .fontSize(11)
        .font('Helvetica')
        .text(`${learnerName} - generated ${formattedDate}`)
        .moveDown(1.5);

      // Summary metrics
      const metrics: Array<[string, string]> = [
        ['Total courses', String(context.totalCourses)],
        ['Courses completed', String(context.coursesCompleted)],
        ['Topics mastered', String(context.topicsMastered)],
        ['Average attendance', `${context.averageAttendance}%`],
        ['Current streak', `${context.currentStreak} days`],
        ['Learning hours', String(context.totalLearningHours)],
        ['Sessions per week', String(context.avgSessionsPerWeek)],
        ['Most active day', context.mostActiveDay],
        ['Last session', context.lastSessionDate],
        ['Completion pace', context.completionPace],
      ];

      doc.fillColor('#1a365d').fontSize(14).font('Helvetica-Bold').text('Summary').moveDown(0.5);
      for (const [label, value] of metrics) {
        doc
          .fillColor('#4a5568')
          .fontSize(11)
          .font('Helvetica')
          .text(`${label}: `, { continued: true })
          .fillColor('#1a202c')
          .font('Helvetica-Bold')
          .text(value);
      }

      doc.moveDown(1.5);
      doc.fillColor('#1a365d').fontSize(14).font('Helvetica-Bold').text('Courses').moveDown(0.5);

      if (context.courses.length === 0) {
        doc.fillColor('#718096').fontSize(11).font('Helvetica').text('No enrolled courses.');
      }

      for (const course of context.courses) {
        const percent = clampPercent(course.progress);
        const [r, g, b] = parseRgbTriple(course.color) ?? [59, 130, 246];

        doc
          .fillColor('#1a202c')
          .fontSize(11)
          .font('Helvetica-Bold')
          .text(course.title, left)
          .fillColor('#718096')
          .font('Helvetica')
          .fontSize(9)
          .text(
            `${course.sessionsCompleted}/${course.totalSessions} sessions - ${percent}% - last active ${course.lastActive}`
          );

        // Progress bar track and fill
        const barY = doc.y + 4;
        doc.rect(left, barY, BAR_WIDTH, BAR_HEIGHT).fill('#e2e8f0');
        if (percent > 0) {
          doc.rect(left, barY, (BAR_WIDTH * percent) / 100, BAR_HEIGHT).fill([r, g, b]);
        }
        doc.y = barY + BAR_HEIGHT + 12;
      }

      doc.moveDown(1);
      doc.fillColor('#1a365d').fontSize(14).font('Helvetica-Bold').text('Achievements', left).moveDown(0.5);

      const lines = achievementLines(context.achievements);
      if (lines.length === 0) {
        doc.fillColor('#718096').fontSize(11).font('Helvetica').text('No achievements yet.');
      }
      for (const line of lines) {
        doc.fillColor('#1a202c').fontSize(11).font('Helvetica').text(line);
      }

      doc.end();
    } catch (error) {
      reject(error);
    }
  });
}
