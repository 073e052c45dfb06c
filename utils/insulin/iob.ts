import type { DoseRecord } from '@/types';
import { INSULIN_ACTION_MINUTES, INSULIN_HALF_LIFE_MINUTES } from './policy';

const TAIL = 0.5 ** (INSULIN_ACTION_MINUTES / INSULIN_HALF_LIFE_MINUTES);

/**
 * Fraction of a dose still active after `elapsedMinutes`: exponential decay with
 * a 75-minute half-life, rescaled to be exactly 1 at 0 and exactly 0 at the end
 * of the action duration. Negative elapsed time (clock skew) counts as 0.
 */
export function remainingFraction(elapsedMinutes: number): number {
  const t = Math.max(0, elapsedMinutes);
  if (t >= INSULIN_ACTION_MINUTES) return 0;
  const decayed = 0.5 ** (t / INSULIN_HALF_LIFE_MINUTES);
  return Math.max(0, (decayed - TAIL) / (1 - TAIL));
}

/** Units of insulin still active at `now`. */
export function estimateIob(doses: DoseRecord[], now: Date): number {
  let iob = 0;
  for (const dose of doses) {
    if (!Number.isFinite(dose.units) || dose.units <= 0) continue;
    const elapsedMinutes = (now.getTime() - dose.timestamp.getTime()) / 60_000;
    iob += dose.units * remainingFraction(elapsedMinutes);
  }
  return iob;
}
