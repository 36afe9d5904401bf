import { toDateKey } from '@progress-portal/shared';
import { parseDashboardPayload } from './dashboardData.js';
import { createProgressChart } from './chart.js';
import { shareImage } from './share.js';

function init(): void {
  const canvas = document.getElementById('progress-chart');
  if (!(canvas instanceof HTMLCanvasElement)) return;

  let chart: ReturnType<typeof createProgressChart>;
  try {
    chart = createProgressChart(canvas, parseDashboardPayload(window.PROGRESS_DASHBOARD));
  } catch (error) {
    console.error('Failed to load dashboard data:', error);
    return;
  }

  const shareButton = document.getElementById('share-image');
  if (!(shareButton instanceof HTMLButtonElement)) return;

  shareButton.addEventListener('click', () => {
    shareButton.disabled = true;
    shareImage(chart.toBase64Image('image/png'), `learning-progress-${toDateKey(new Date())}.png`)
      .catch((error: unknown) => {
        console.error('Failed to share progress image:', error);
      })
      .finally(() => {
        shareButton.disabled = false;
      });
  });
}

if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', init);
} else {
  init();
}
