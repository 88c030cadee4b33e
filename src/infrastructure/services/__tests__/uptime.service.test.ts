import { describe, it, expect, afterEach, vi } from 'vitest';
import { UptimeService, formatDuration } from '../uptime.service';

describe('formatDuration', () => {
  it.each([
    [0, '0s'],
    [59_999, '59s'],
    [61_000, '1m 1s'],
    [3_723_000, '1h 2m 3s'],
    [90_061_000, '1d 1h 1m'],
    [86_400_000, '1d 0h 0m'],
    [-5, '0s'],
  ])('formats %dms as %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});

describe('UptimeService', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('measures from construction', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-03-04T09:15:00.000Z'));
    const uptime = new UptimeService();

    vi.setSystemTime(new Date('2024-03-04T09:17:05.000Z'));

    expect(uptime.getUptimeMs()).toBe(125_000);
    expect(formatDuration(uptime.getUptimeMs())).toBe('2m 5s');
  });
});
