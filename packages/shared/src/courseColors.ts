export type RgbTriple = readonly [number, number, number];

// Bar colours handed out by course position when a course has none of its own
export const COURSE_COLOR_PALETTE: readonly RgbTriple[] = [
  [59, 130, 246],
  [16, 185, 129],
  [245, 158, 11],
  [239, 68, 68],
  [139, 92, 246],
  [236, 72, 153],
  [20, 184, 166],
  [249, 115, 22],
];

const TRIPLE_PATTERN = /^\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*$/;

/**
 * Parse an "R, G, B" string. Returns null unless all three channels are 0-255.
 */
export function parseRgbTriple(value: string | null | undefined): RgbTriple | null {
  if (!value) return null;
  const match = TRIPLE_PATTERN.exec(value);
  if (!match) return null;

  const channels = [Number(match[1]), Number(match[2]), Number(match[3])] as const;
  if (channels.some((c) => c > 255)) return null;
  return channels;
}

export function formatRgbTriple(triple: RgbTriple): string {
  return `${triple[0]}, ${triple[1]}, ${triple[2]}`;
}

export function paletteColor(index: number): RgbTriple {
  const size = COURSE_COLOR_PALETTE.length;
  return COURSE_COLOR_PALETTE[((index % size) + size) % size];
}

/**
 * Normalise a course colour, falling back to the palette slot for its position.
 */
export function resolveCourseColor(value: string | null | undefined, index: number): string {
  return formatRgbTriple(parseRgbTriple(value) ?? paletteColor(index));
}
