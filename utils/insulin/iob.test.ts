import { describe, expect, it } from 'vitest';
import { estimateIob, remainingFraction } from './iob';

describe('remainingFraction', () => {
  it('starts at 1 and reaches exactly 0 at the end of the action duration', () => {
    expect(remainingFraction(0)).toBe(1);
    expect(remainingFraction(240)).toBe(0);
    expect(remainingFraction(300)).toBe(0);
  });

  it('treats negative elapsed time as a fresh dose', () => {
    expect(remainingFraction(-15)).toBe(1);
  });

  it('never increases with elapsed time', () => {
    let previous = Infinity;
    for (let t = 0; t <= 260; t += 5) {
      const fraction = remainingFraction(t);
      expect(fraction).toBeLessThanOrEqual(previous);
      expect(fraction).toBeGreaterThanOrEqual(0);
      previous = fraction;
    }
  });
});

describe('estimateIob', () => {
  const now = new Date('2024-03-10T12:00:00Z');
  const minutesAgo = (m: number) => new Date(now.getTime() - m * 60_000);

  it('sums the active part of every dose', () => {
    const iob = estimateIob(
      [
        { timestamp: now, units: 2 },
        { timestamp: minutesAgo(240), units: 5 },
        { timestamp: minutesAgo(90), units: 4 },
      ],
      now
    );
    expect(iob).toBeCloseTo(2 + 4 * remainingFraction(90), 10);
  });

  it('ignores empty and invalid doses', () => {
    expect(estimateIob([{ timestamp: now, units: 0 }, { timestamp: now, units: Number.NaN }], now)).toBe(0);
    expect(estimateIob([], now)).toBe(0);
  });
});
