import { describe, it, expect } from 'vitest';
import {
  clampPercent,
  formatDisplayDate,
  isAchievementType,
  isFlashLevel,
  isReminderChannel,
  toDateKey,
} from './index.js';

describe('clampPercent', () => {
  it('should keep values inside 0-100', () => {
    expect(clampPercent(42.5)).toBe(42.5);
    expect(clampPercent(-3)).toBe(0);
    expect(clampPercent(140)).toBe(100);
  });

  it('should treat non-finite values as empty', () => {
    expect(clampPercent(Number.NaN)).toBe(0);
    expect(clampPercent(Number.POSITIVE_INFINITY)).toBe(0);
  });
});

describe('date helpers', () => {
  it('should use UTC for display dates', () => {
    expect(formatDisplayDate(new Date('2026-10-12T23:30:00Z'))).toBe('Oct 12, 2026');
  });

  it('should build YYYY-MM-DD keys in UTC', () => {
    expect(toDateKey(new Date('2026-01-05T00:15:00Z'))).toBe('2026-01-05');
  });
});

describe('guards', () => {
  it('should recognise flash levels', () => {
    expect(isFlashLevel('warning')).toBe(true);
    expect(isFlashLevel('debug')).toBe(false);
  });

  it('should recognise reminder channels', () => {
    expect(isReminderChannel('email')).toBe(true);
    expect(isReminderChannel('in_app')).toBe(true);
    expect(isReminderChannel('sms')).toBe(false);
  });

  it('should recognise achievement types', () => {
    expect(isAchievementType('completion')).toBe(true);
    expect(isAchievementType('attendance')).toBe(true);
    expect(isAchievementType('streak')).toBe(false);
  });
});
