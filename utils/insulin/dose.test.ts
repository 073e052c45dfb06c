import { describe, expect, it } from 'vitest';
import { InvalidInputError } from '@/utils/error';
import { calculateDose } from './dose';

const base = { plannedCarbs: 60, currentBg: 180, isf: 50, icr: 10, iob: 0 };

describe('calculateDose', () => {
  it('adds meal and correction doses', () => {
    expect(calculateDose(base)).toEqual({
      meal_dose: 6,
      correction_dose: 1.6,
      iob_adjustment: 0,
      total_dose: 7.6,
      current_bg: 180,
      target_bg: 100,
    });
  });

  it('never lets insulin on board push the dose below zero', () => {
    const dose = calculateDose({ plannedCarbs: 0, currentBg: 100, isf: 50, icr: 10, iob: 2 });
    expect(dose.meal_dose).toBe(0);
    expect(dose.correction_dose).toBe(0);
    expect(dose.iob_adjustment).toBe(0);
    expect(dose.total_dose).toBe(0);
  });

  it('subtracts insulin on board from the total', () => {
    const dose = calculateDose({ ...base, iob: 2 });
    expect(dose.iob_adjustment).toBe(2);
    expect(dose.total_dose).toBe(5.6);
  });

  it('gives no correction below target', () => {
    const dose = calculateDose({ ...base, currentBg: 70 });
    expect(dose.correction_dose).toBe(0);
    expect(dose.total_dose).toBe(6);
  });

  it('is non-decreasing in planned carbs and in glucose above target', () => {
    let previous = -1;
    for (let carbs = 0; carbs <= 150; carbs += 7) {
      const { total_dose } = calculateDose({ ...base, plannedCarbs: carbs, iob: 1.5 });
      expect(total_dose).toBeGreaterThanOrEqual(previous);
      previous = total_dose;
    }

    previous = -1;
    for (let bg = 100; bg <= 400; bg += 13) {
      const { total_dose } = calculateDose({ ...base, currentBg: bg, iob: 3 });
      expect(total_dose).toBeGreaterThanOrEqual(previous);
      previous = total_dose;
    }
  });

  it('rejects invalid inputs', () => {
    expect(() => calculateDose({ ...base, plannedCarbs: -1 })).toThrow('planned_carbs must be >= 0');
    expect(() => calculateDose({ ...base, currentBg: 0 })).toThrow('current_bg must be > 0');
    expect(() => calculateDose({ ...base, isf: 0 })).toThrow('isf must be > 0');
    expect(() => calculateDose({ ...base, icr: -5 })).toThrow('icr must be > 0');
    expect(() => calculateDose({ ...base, plannedCarbs: Number.NaN })).toThrow(InvalidInputError);
  });
});
