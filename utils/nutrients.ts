import type { NutrientProfile } from '@/types';
import { saltToSodiumMg, toKcal, toMilligrams, toGrams, type EnergyUnit, type MassUnit, type Quantity } from './units';

type Parsed = { value: number; unit: string | null };

/**
 * Unit-aware numeric parsing for label values, e.g. "20 g", "850 kJ", "1.2k",
 * "350mg". Returns null for anything that is not a finite number.
 */
export function parseNumWithUnits(raw: unknown): Parsed | null {
  if (raw === null || raw === undefined || raw === '') return null;
  if (typeof raw === 'number') return Number.isFinite(raw) ? { value: raw, unit: null } : null;
  if (typeof raw !== 'string') return null;
  // "1,200" is a thousands separator, "2,5" a decimal comma
  const s = raw.trim().toLowerCase().replace(/(\d),(\d{3})\b/g, '$1$2').replace(/,/g, '.');
  if (!s) return null;
  // Handle 1.2k style
  const kMatch = s.match(/^([+-]?[0-9]*\.?[0-9]+)\s*k$/);
  if (kMatch) {
    const n = parseFloat(kMatch[1]);
    return Number.isFinite(n) ? { value: n * 1000, unit: null } : null;
  }
  const m = s.match(/^([+-]?[0-9]*\.?[0-9]+)\s*([a-z]*)/);
  if (!m) return null;
  const n = parseFloat(m[1]);
  if (!Number.isFinite(n)) return null;
  const unit = m[2] || null;
  return { value: n, unit };
}

function energyUnit(unit: string | null): EnergyUnit {
  return unit === 'kj' ? 'kJ' : 'kcal';
}

function massUnit(unit: string | null, fallback: MassUnit): MassUnit {
  if (unit === 'mg') return 'mg';
  if (unit === 'g' || unit === 'gram' || unit === 'grams') return 'g';
  return fallback;
}

const ALIASES = {
  carbs: ['carbs', 'carbohydrate', 'carbohydrates', 'carb', 'carbs_g', 'total carbohydrate'],
  sugar: ['sugar', 'sugars', 'total sugars'],
  fiber: ['fiber', 'fibre', 'dietary fiber', 'dietary fibre'],
  fat: ['fat', 'total fat', 'fat_g', 'fats'],
  protein: ['protein', 'proteins', 'protein_g'],
  sodium: ['sodium', 'sodium_mg'],
  salt: ['salt', 'salt_g'],
  energy: ['energy', 'calories', 'calorie', 'kcal', 'energy_kcal'],
  energyKj: ['energy_kj', 'kj'],
} as const;

// Helper: case-insensitive lookup across the aliases of one nutrient
function findFirst(keys: readonly string[], lowered: Record<string, unknown>): unknown {
  for (const key of keys) {
    if (key in lowered) return lowered[key];
  }
  return undefined;
}

/**
 * Maps an OCR or client nutrient mapping onto canonical units: grams for
 * macros, mg for sodium, kcal for energy. Missing or unreadable keys become 0.
 * Salt is only used when no sodium value is present.
 */
export function normalizeNutrients(raw: Record<string, unknown>): NutrientProfile {
  const lowered = Object.entries(raw).reduce<Record<string, unknown>>((acc, [k, v]) => {
    acc[k.trim().toLowerCase()] = v;
    return acc;
  }, {});

  const grams = (keys: readonly string[]): number => {
    const p = parseNumWithUnits(findFirst(keys, lowered));
    if (!p) return 0;
    return Math.max(0, toGrams({ value: p.value, unit: massUnit(p.unit, 'g') }));
  };

  let calories = 0;
  const kcalRaw = parseNumWithUnits(findFirst(ALIASES.energy, lowered));
  const kjRaw = parseNumWithUnits(findFirst(ALIASES.energyKj, lowered));
  if (kcalRaw) {
    calories = toKcal({ value: kcalRaw.value, unit: energyUnit(kcalRaw.unit) });
  } else if (kjRaw) {
    calories = toKcal({ value: kjRaw.value, unit: 'kJ' });
  }

  let sodium = 0;
  const sodiumRaw = parseNumWithUnits(findFirst(ALIASES.sodium, lowered));
  const saltRaw = parseNumWithUnits(findFirst(ALIASES.salt, lowered));
  if (sodiumRaw) {
    sodium = toMilligrams({ value: sodiumRaw.value, unit: massUnit(sodiumRaw.unit, 'mg') });
  } else if (saltRaw) {
    const salt: Quantity<MassUnit> = { value: saltRaw.value, unit: massUnit(saltRaw.unit, 'g') };
    sodium = saltToSodiumMg(salt);
  }

  return {
    carbs: grams(ALIASES.carbs),
    protein: grams(ALIASES.protein),
    fat: grams(ALIASES.fat),
    fiber: grams(ALIASES.fiber),
    sugar: grams(ALIASES.sugar),
    sodium: Math.max(0, sodium),
    calories: Math.max(0, calories),
  };
}
