import { subHours } from 'date-fns';
import type { DoseRecord, ResolvedParameters } from '@/types';
import { InsufficientDataError } from '@/utils/error';
import type { DataStore } from '@/utils/store';
import { roundTo } from '@/utils/units';
import {
  DEFAULT_ICR,
  DEFAULT_ISF,
  ICR_BOUNDS,
  ICR_RULE,
  ISF_BOUNDS,
  ISF_RULE,
  MIN_TDD_DAYS,
  TDD_LOOKBACK_DAYS,
} from './policy';

export interface TddEstimate {
  tdd: number; // mean units per day
  days: number; // days with any insulin logged
}

const clamp = (n: number, { min, max }: { min: number; max: number }) => Math.min(Math.max(n, min), max);

/**
 * Mean total daily dose: insulin summed per UTC calendar day, averaged over the
 * days that have any. Null when no positive dose exists.
 */
export function calculateTdd(doses: DoseRecord[]): TddEstimate | null {
  const dailyTotals = new Map<string, number>();
  for (const dose of doses) {
    if (!Number.isFinite(dose.units) || dose.units <= 0) continue;
    const day = dose.timestamp.toISOString().slice(0, 10);
    dailyTotals.set(day, (dailyTotals.get(day) ?? 0) + dose.units);
  }
  if (dailyTotals.size === 0) return null;
  let sum = 0;
  for (const total of dailyTotals.values()) sum += total;
  return { tdd: sum / dailyTotals.size, days: dailyTotals.size };
}

/** ISF and ICR from the 1700 and 500 rules, rounded to one decimal and clamped. */
export function parametersFromTdd(tdd: number): { isf: number; icr: number } {
  return {
    isf: clamp(roundTo(ISF_RULE / tdd, 1), ISF_BOUNDS),
    icr: clamp(roundTo(ICR_RULE / tdd, 1), ICR_BOUNDS),
  };
}

export interface ResolveOptions {
  now?: Date;
  /** Demand a TDD-derived value; throws InsufficientDataError when there is no history. */
  require?: 'calculated';
}

export async function resolveProfileParameters(
  store: DataStore,
  userId: string,
  { now = new Date(), require }: ResolveOptions = {}
): Promise<ResolvedParameters> {
  if (require !== 'calculated') {
    const profile = await store.getProfile(userId);
    if (profile && profile.isf != null && profile.icr != null && profile.isf > 0 && profile.icr > 0) {
      return { isf: profile.isf, icr: profile.icr, source: 'explicit' };
    }
  }

  const doses = await store.listDoses(userId, subHours(now, TDD_LOOKBACK_DAYS * 24));
  const estimate = calculateTdd(doses.filter((d) => d.timestamp <= now));

  if (estimate && (estimate.days >= MIN_TDD_DAYS || require === 'calculated')) {
    return { ...parametersFromTdd(estimate.tdd), source: 'calculated', tdd: roundTo(estimate.tdd, 1) };
  }

  if (require === 'calculated') {
    throw new InsufficientDataError(
      `No insulin doses logged in the last ${TDD_LOOKBACK_DAYS} days; cannot calculate ISF/ICR`
    );
  }

  return { isf: DEFAULT_ISF, icr: DEFAULT_ICR, source: 'default' };
}
