import { describe, expect, it } from 'vitest';
import { normalizeNutrients, parseNumWithUnits } from './nutrients';
import { giBand, glycemicLoad, roundTo } from './units';

describe('parseNumWithUnits', () => {
  it('reads numbers with units and separators', () => {
    expect(parseNumWithUnits('1,200 kcal')).toEqual({ value: 1200, unit: 'kcal' });
    expect(parseNumWithUnits('2,5 g')).toEqual({ value: 2.5, unit: 'g' });
    expect(parseNumWithUnits('1.2k')).toEqual({ value: 1200, unit: null });
    expect(parseNumWithUnits(7)).toEqual({ value: 7, unit: null });
  });

  it('returns null for anything else', () => {
    expect(parseNumWithUnits('n/a')).toBeNull();
    expect(parseNumWithUnits('')).toBeNull();
    expect(parseNumWithUnits(Number.POSITIVE_INFINITY)).toBeNull();
  });
});

describe('normalizeNutrients', () => {
  it('maps label keys and converts kJ and salt once', () => {
    const n = normalizeNutrients({
      Carbohydrate: '45 g',
      'Total Fat': '3.5g',
      Protein: 7,
      Energy: '850 kJ',
      Salt: '1.2 g',
      Fibre: '4 g',
      Sugars: '2,5 g',
    });
    expect(n.carbs).toBe(45);
    expect(n.fat).toBe(3.5);
    expect(n.protein).toBe(7);
    expect(n.fiber).toBe(4);
    expect(n.sugar).toBe(2.5);
    expect(n.calories).toBeCloseTo(203.155, 3);
    expect(n.sodium).toBeCloseTo(480, 6);
  });

  it('prefers sodium over salt', () => {
    expect(normalizeNutrients({ sodium: '350mg', salt: '5 g' }).sodium).toBe(350);
    expect(normalizeNutrients({ sodium: '0.4 g' }).sodium).toBe(400);
  });

  it('defaults missing and negative values to zero', () => {
    expect(normalizeNutrients({ carbs: '-5', protein: 'unknown' })).toEqual({
      carbs: 0,
      protein: 0,
      fat: 0,
      fiber: 0,
      sugar: 0,
      sodium: 0,
      calories: 0,
    });
  });
});

describe('glycaemic helpers', () => {
  it('computes GL to one decimal', () => {
    expect(glycemicLoad(72, 35)).toBe(25.2);
    expect(glycemicLoad(0, 50)).toBe(0);
    expect(roundTo(1.25, 1)).toBe(1.3);
  });

  it('bands GI by colour', () => {
    expect(giBand(54.9)).toBe('green');
    expect(giBand(55)).toBe('yellow');
    expect(giBand(70)).toBe('red');
  });
});
