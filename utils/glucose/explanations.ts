import type { FeatureContributions } from '@/types';

export interface ContributionShare {
  feature: string;
  contribution: number;
  share: number; // |contribution| / Σ|contributions|, 0..1
  direction: 'up' | 'down';
}

/** Features ordered by absolute contribution, each with its share of the total. */
export function contributionShares(contributions: FeatureContributions): ContributionShare[] {
  const entries = Object.entries(contributions).filter(([, v]) => Number.isFinite(v));
  const totalAbs = entries.reduce((sum, [, v]) => sum + Math.abs(v), 0);
  return entries
    .map(([feature, contribution]) => ({
      feature,
      contribution,
      share: totalAbs > 0 ? Math.abs(contribution) / totalAbs : 0,
      direction: contribution >= 0 ? ('up' as const) : ('down' as const),
    }))
    .sort((a, b) => b.share - a.share);
}

export type ForecastDirection = 'rise' | 'drop' | 'stable reading';

/** Direction of the 60-minute prediction relative to now; ±5 mg/dL counts as stable. */
export function forecastDirection(currentBg: number, predicted60: number): ForecastDirection {
  const diff = predicted60 - currentBg;
  if (diff > 5) return 'rise';
  if (diff < -5) return 'drop';
  return 'stable reading';
}

/**
 * One-line summary of the top drivers, e.g.
 * "Predicted rise mainly driven by: Carbs Intake (+62%), Insulin on Board (-21%)."
 */
export function summarizeContributions(contributions: FeatureContributions, direction?: ForecastDirection): string {
  const shares = contributionShares(contributions);
  if (shares.length === 0) return 'Unable to generate explanation.';

  let dir = direction;
  if (!dir) {
    const total = shares.reduce((sum, s) => sum + s.contribution, 0);
    dir = total > 0.01 ? 'rise' : total < -0.01 ? 'drop' : 'stable reading';
  }

  if (shares.every((s) => s.share === 0)) return 'No significant drivers identified for this prediction.';

  const drivers = shares
    .slice(0, 3)
    .map((s) => ({ ...s, pct: Math.round(s.share * 100) }))
    .filter((s) => s.pct >= 5)
    .map((s) => `${s.feature} (${s.contribution > 0 ? '+' : '-'}${s.pct}%)`);

  if (drivers.length === 0) return 'Prediction is driven by a balanced mix of factors.';
  return `Predicted ${dir} mainly driven by: ${drivers.join(', ')}.`;
}
