import { InvalidInputError } from '@/utils/error';
import { roundTo } from '@/utils/units';
import { TARGET_BG } from './policy';

export interface DoseInput {
  plannedCarbs: number; // g
  currentBg: number; // mg/dL
  isf: number;
  icr: number;
  iob: number; // units
  targetBg?: number;
}

export interface DoseBreakdown {
  meal_dose: number;
  correction_dose: number;
  iob_adjustment: number;
  total_dose: number;
  current_bg: number;
  target_bg: number;
}

/**
 * Meal + correction dose, offset by insulin on board. Every field is rounded to
 * one decimal on the way out; intermediate values keep full precision.
 * No maximum dose is applied here.
 */
export function calculateDose(input: DoseInput): DoseBreakdown {
  const { plannedCarbs, currentBg, isf, icr, iob, targetBg = TARGET_BG } = input;

  for (const [name, value] of Object.entries({ plannedCarbs, currentBg, isf, icr, iob, targetBg })) {
    if (!Number.isFinite(value)) throw new InvalidInputError(`${name} must be a finite number`);
  }
  if (plannedCarbs < 0) throw new InvalidInputError('planned_carbs must be >= 0');
  if (currentBg <= 0) throw new InvalidInputError('current_bg must be > 0');
  if (isf <= 0) throw new InvalidInputError('isf must be > 0');
  if (icr <= 0) throw new InvalidInputError('icr must be > 0');

  const mealDose = Math.max(0, plannedCarbs / icr);
  const correctionDose = Math.max(0, (currentBg - targetBg) / isf);
  const iobAdjustment = Math.min(Math.max(0, iob), mealDose + correctionDose);
  const total = Math.max(0, mealDose + correctionDose - iobAdjustment);

  return {
    meal_dose: roundTo(mealDose, 1),
    correction_dose: roundTo(correctionDose, 1),
    iob_adjustment: roundTo(iobAdjustment, 1),
    total_dose: roundTo(total, 1),
    current_bg: currentBg,
    target_bg: targetBg,
  };
}
