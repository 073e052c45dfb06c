export type EnergyUnit = 'kcal' | 'kJ';
export type MassUnit = 'g' | 'mg';

/** A number that carries its unit, so conversions happen exactly once. */
export interface Quantity<U extends string> {
  value: number;
  unit: U;
}

export const KJ_PER_KCAL = 4.184;
/** Table salt is 40% sodium by mass. */
export const SALT_TO_SODIUM_DIVISOR = 2.5;

export function toKcal(energy: Quantity<EnergyUnit>): number {
  return energy.unit === 'kJ' ? energy.value / KJ_PER_KCAL : energy.value;
}

export function toGrams(mass: Quantity<MassUnit>): number {
  return mass.unit === 'mg' ? mass.value / 1000 : mass.value;
}

export function toMilligrams(mass: Quantity<MassUnit>): number {
  return mass.unit === 'g' ? mass.value * 1000 : mass.value;
}

/** Sodium content, in mg, of a given amount of salt. */
export function saltToSodiumMg(salt: Quantity<MassUnit>): number {
  return (toGrams(salt) / SALT_TO_SODIUM_DIVISOR) * 1000;
}

export function roundTo(value: number, decimals: number = 1): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** GL = GI × carbs / 100, rounded the same way doses are. */
export function glycemicLoad(gi: number, carbs: number): number {
  return roundTo((gi * carbs) / 100, 1);
}

export type GiBand = 'green' | 'yellow' | 'red';

/** Low (< 55), medium (55-69) and high (>= 70) glycaemic index. */
export function giBand(gi: number): GiBand {
  if (gi < 55) return 'green';
  if (gi < 70) return 'yellow';
  return 'red';
}
