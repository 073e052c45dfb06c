import { subHours } from 'date-fns';
import type { MealRecord, NutrientLine } from '@/types';
import { formatClock12, formatDisplayDate } from './date';
import { giBand, type GiBand } from './units';

export const DIARY_PAGE_SIZE = 10;

export type DiaryTimeWindow = 'all' | '24h' | '7d' | '30d';

export interface DiaryEntry extends MealRecord {
  display_date: string;
  display_time: string;
  gi_color: GiBand;
}

export interface DiaryPagination {
  page: number;
  pages: number;
  has_prev: boolean;
  has_next: boolean;
  prev_num: number;
  next_num: number;
}

/** Earliest timestamp a diary time filter admits (exact 24h multiples), or undefined for "all". */
export function timeWindowStart(window: DiaryTimeWindow, now: Date): Date | undefined {
  switch (window) {
    case '24h':
      return subHours(now, 24);
    case '7d':
      return subHours(now, 7 * 24);
    case '30d':
      return subHours(now, 30 * 24);
    default:
      return undefined;
  }
}

export function paginate(page: number, total: number, perPage: number = DIARY_PAGE_SIZE): DiaryPagination {
  const totalPages = Math.ceil(total / perPage);
  return {
    page,
    pages: Math.max(totalPages, 1),
    has_prev: page > 1,
    has_next: page < totalPages,
    prev_num: page - 1,
    next_num: page + 1,
  };
}

export function toDiaryEntry(meal: MealRecord, timeZone: string): DiaryEntry {
  return {
    ...meal,
    display_date: formatDisplayDate(meal.timestamp, timeZone),
    display_time: formatClock12(meal.timestamp, timeZone),
    gi_color: giBand(meal.gi),
  };
}

export function nutrientBreakdown(meal: MealRecord): NutrientLine[] {
  return [
    { name: 'Calories', value: meal.calories, unit: 'kcal' },
    { name: 'Carbohydrates', value: meal.carbs, unit: 'g' },
    { name: 'Protein', value: meal.protein, unit: 'g' },
    { name: 'Fat', value: meal.fat, unit: 'g' },
    { name: 'Fiber', value: meal.fiber, unit: 'g' },
    { name: 'Sodium', value: meal.sodium, unit: 'mg' },
  ];
}
