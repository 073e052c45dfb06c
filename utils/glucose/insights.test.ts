import { describe, expect, it } from 'vitest';
import type { GlucoseReading } from '@/types';
import { generatePersonalInsights } from './insights';

function series(values: number[], from = '2024-03-10T10:00:00Z'): GlucoseReading[] {
  const start = new Date(from).getTime();
  return values.map((value, i) => ({ timestamp: new Date(start + i * 5 * 60_000), value, source: 'device' as const }));
}

describe('generatePersonalInsights', () => {
  it('reports missing data', () => {
    expect(generatePersonalInsights([], 'UTC')).toEqual([
      { icon: 'info', title: 'No Data', body: 'Not enough readings to generate insights.', severity: 'info' },
    ]);
  });

  it('praises a steady day in range', () => {
    const insights = generatePersonalInsights(series(Array(12).fill(120)), 'UTC');
    expect(insights.map((i) => i.title)).toEqual(['Time in Range', 'Glucose Stability', 'Stable Trend', 'Daily Average']);
    expect(insights[3]).toEqual({
      icon: 'average',
      title: 'Daily Average',
      body: 'Average glucose today is 120 mg/dL (estimated A1C: 5.8%). This is within a healthy range — keep it up.',
      severity: 'good',
    });
  });

  it('counts separate low episodes and flags severe lows', () => {
    const insights = generatePersonalInsights(series([100, 65, 60, 100, 50, 100]), 'UTC');
    const low = insights.find((i) => i.title === 'Low Glucose Alert');
    expect(low?.severity).toBe('danger');
    expect(low?.body.startsWith('Detected 2 low glucose episodes (below 70 mg/dL), reaching as low as 50 mg/dL.')).toBe(
      true
    );
  });

  it('detects a rapid rise', () => {
    const insights = generatePersonalInsights(series([100, 115, 130, 145, 160, 175]), 'UTC');
    expect(insights.find((i) => i.icon === 'trend_up')?.title).toBe('Rapidly Rising');
  });

  it('reads the dawn window in the user time zone', () => {
    const readings: GlucoseReading[] = [
      { timestamp: new Date('2024-03-10T02:00:00Z'), value: 100, source: 'device' },
      { timestamp: new Date('2024-03-10T06:00:00Z'), value: 140, source: 'device' },
    ];
    expect(generatePersonalInsights(readings, 'UTC').some((i) => i.title === 'Dawn Phenomenon')).toBe(true);
    expect(generatePersonalInsights(readings, 'Asia/Kolkata').some((i) => i.title === 'Dawn Phenomenon')).toBe(false);
  });
});
