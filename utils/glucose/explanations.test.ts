import { describe, expect, it } from 'vitest';
import { contributionShares, forecastDirection, summarizeContributions } from './explanations';

describe('contributionShares', () => {
  it('orders features by absolute share', () => {
    expect(contributionShares({ IOB: -1, Carbs: 3 })).toEqual([
      { feature: 'Carbs', contribution: 3, share: 0.75, direction: 'up' },
      { feature: 'IOB', contribution: -1, share: 0.25, direction: 'down' },
    ]);
  });

  it('gives zero shares when every contribution is zero', () => {
    expect(contributionShares({ Carbs: 0 })).toEqual([{ feature: 'Carbs', contribution: 0, share: 0, direction: 'up' }]);
  });
});

describe('forecastDirection', () => {
  it('uses a 5 mg/dL dead band', () => {
    expect(forecastDirection(120, 126)).toBe('rise');
    expect(forecastDirection(120, 114)).toBe('drop');
    expect(forecastDirection(120, 125)).toBe('stable reading');
  });
});

describe('summarizeContributions', () => {
  it('names the top three drivers with signed percentages', () => {
    expect(
      summarizeContributions({ 'Carbs Intake': 6.2, 'Insulin on Board': -2.1, 'Glucose Trend': 1.7 }, 'rise')
    ).toBe('Predicted rise mainly driven by: Carbs Intake (+62%), Insulin on Board (-21%), Glucose Trend (+17%).');
  });

  it('infers the direction from the contributions when none is given', () => {
    expect(summarizeContributions({ 'Insulin on Board': -3 })).toBe(
      'Predicted drop mainly driven by: Insulin on Board (-100%).'
    );
  });

  it('handles empty, zero and evenly spread contributions', () => {
    expect(summarizeContributions({})).toBe('Unable to generate explanation.');
    expect(summarizeContributions({ Carbs: 0, IOB: 0 })).toBe('No significant drivers identified for this prediction.');
    const even = Object.fromEntries(Array.from({ length: 30 }, (_, i) => [`f${i}`, 1] as const));
    expect(summarizeContributions(even, 'rise')).toBe('Prediction is driven by a balanced mix of factors.');
  });
});
