import {
  CategoryScale,
  Chart,
  Filler,
  LineController,
  LineElement,
  LinearScale,
  PointElement,
  Tooltip,
  type ChartConfiguration,
} from 'chart.js';
import type { DashboardData } from './dashboardData.js';

Chart.register(LineController, CategoryScale, LinearScale, PointElement, LineElement, Filler, Tooltip);

const LINE_COLOR = 'rgb(59, 130, 246)';
const FILL_COLOR = 'rgba(59, 130, 246, 0.15)';

/**
 * "2026-10-17" -> "Oct 17"
 */
export function formatChartLabel(dateKey: string): string {
  return new Date(`${dateKey}T00:00:00Z`).toLocaleDateString('en-US', {
    month: 'short',
    day: 'numeric',
    timeZone: 'UTC',
  });
}

export function buildChartConfig(data: DashboardData): ChartConfiguration<'line', number[], string> {
  return {
    type: 'line',
    data: {
      labels: data.chartDates.map(formatChartLabel),
      datasets: [
        {
          label: 'Sessions completed',
          data: data.chartSessionCounts,
          borderColor: LINE_COLOR,
          backgroundColor: FILL_COLOR,
          fill: true,
          tension: 0.3,
          pointRadius: 2,
        },
      ],
    },
    options: {
      responsive: true,
      // Keep the canvas in a state that exports cleanly as an image
      animation: false,
      plugins: {
        tooltip: { mode: 'index', intersect: false },
      },
      scales: {
        y: {
          beginAtZero: true,
          ticks: { precision: 0 },
        },
      },
    },
  };
}

export function createProgressChart(canvas: HTMLCanvasElement, data: DashboardData) {
  return new Chart(canvas, buildChartConfig(data));
}
