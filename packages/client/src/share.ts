/**
 * Share or download a PNG exported from the progress chart.
 */

export type ShareOutcome = 'shared' | 'downloaded' | 'cancelled';

export interface ShareTarget {
  canShare?: (data: ShareData) => boolean;
  share?: (data: ShareData) => Promise<void>;
}

export function dataUrlToBlob(dataUrl: string): Blob {
  const match = /^data:([^;,]+);base64,(.*)$/.exec(dataUrl);
  if (!match) {
    throw new Error('Expected a base64 data URL');
  }

  const binary = atob(match[2]);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return new Blob([bytes], { type: match[1] });
}

export function downloadDataUrl(dataUrl: string, filename: string): void {
  const link = document.createElement('a');
  link.href = dataUrl;
  link.download = filename;
  document.body.appendChild(link);
  link.click();
  document.body.removeChild(link);
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Open the native share sheet when the browser can share files, otherwise
 * download the image.
 */
export async function shareImage(
  dataUrl: string,
  filename: string,
  target: ShareTarget = navigator,
  download: (dataUrl: string, filename: string) => void = downloadDataUrl
): Promise<ShareOutcome> {
  const file = new File([dataUrlToBlob(dataUrl)], filename, { type: 'image/png' });
  const shareData: ShareData = { files: [file], title: 'My learning progress' };

  if (target.share && target.canShare?.(shareData)) {
    try {
      await target.share(shareData);
      return 'shared';
    } catch (error) {
      if (isAbortError(error)) return 'cancelled';
      console.error('Native share failed, falling back to download:', error);
    }
  }

  download(dataUrl, filename);
  return 'downloaded';
}
