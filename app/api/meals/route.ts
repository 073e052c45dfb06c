import { NextResponse } from 'next/server';
import { z } from 'zod';
import { apiHandler, readJsonBody, requireUserId, resolveTimeZone } from '@/utils/api';
import { parseTimestamp } from '@/utils/date';
import { InvalidInputError, validateWithZod } from '@/utils/error';
import { DIARY_PAGE_SIZE, paginate, timeWindowStart, toDiaryEntry } from '@/utils/diary';
import { normalizeNutrients } from '@/utils/nutrients';
import { getStore } from '@/utils/store';
import { toMealType } from '@/utils/store/supabase';
import { glycemicLoad, roundTo } from '@/utils/units';

export const dynamic = 'force-dynamic';

const mealEntrySchema = z.object({
  user_id: z.union([z.string(), z.number()]).transform(String).pipe(z.string().trim().min(1, 'Missing user_id')),
  food_name: z.string().trim().min(1, 'food_name is required').max(200),
  meal_type: z.string().nullish(),
  // Raw label or OCR mapping, e.g. { "Carbohydrate": "45 g", "Energy": "850 kJ" }
  nutrients: z.record(z.string(), z.unknown()).default({}),
  gi: z.number().min(0).max(150).default(0),
  insulin: z.number().min(0, 'insulin must be >= 0').default(0),
  timestamp: z.string().nullish(),
});

const lowerEnum = <U extends string, T extends [U, ...U[]]>(values: T, fallback: T[number]) =>
  z.string().trim().toLowerCase().pipe(z.enum(values)).default(fallback);

const diaryParamsSchema = z.object({
  page: z.coerce.number().int().min(1, 'page must be >= 1').default(1),
  food: z.string().trim().max(100).optional(),
  time: lowerEnum(['all', '24h', '7d', '30d'], 'all'),
  // "custom" (or "all") defers to gi_max
  gi: lowerEnum(['all', 'custom', 'low', 'medium', 'high'], 'all'),
  gi_max: z.coerce.number().min(0, 'gi_max must be >= 0').optional(),
  meal: lowerEnum(['all', 'breakfast', 'lunch', 'dinner', 'snack'], 'all'),
  sort: lowerEnum(['newest', 'oldest', 'highest_gi'], 'newest'),
});

// GET /api/meals?user_id=...&page=&food=&time=&gi=&gi_max=&meal=&sort=&tz=
export const GET = apiHandler(async (req: Request) => {
  const { searchParams } = new URL(req.url);
  const userId = requireUserId(searchParams);
  const timeZone = resolveTimeZone(searchParams);
  const params = validateWithZod(diaryParamsSchema, {
    page: searchParams.get('page') ?? undefined,
    food: searchParams.get('food') ?? undefined,
    time: searchParams.get('time') ?? undefined,
    gi: searchParams.get('gi') ?? undefined,
    gi_max: searchParams.get('gi_max') || undefined,
    meal: searchParams.get('meal') ?? undefined,
    sort: searchParams.get('sort') ?? undefined,
  });

  const band = params.gi === 'low' || params.gi === 'medium' || params.gi === 'high' ? params.gi : undefined;
  const { entries, total } = await getStore().listMealEntries(userId, {
    since: timeWindowStart(params.time, new Date()),
    search: params.food || undefined,
    gi: band,
    giMax: band ? undefined : params.gi_max,
    mealType: params.meal === 'all' ? undefined : params.meal,
    sort: params.sort,
    limit: DIARY_PAGE_SIZE,
    offset: (params.page - 1) * DIARY_PAGE_SIZE,
  });

  return {
    entries: entries.map((meal) => toDiaryEntry(meal, timeZone)),
    pagination: paginate(params.page, total),
  };
});

// POST /api/meals
export const POST = apiHandler(async (req: Request) => {
  const entry = validateWithZod(mealEntrySchema, await readJsonBody(req));

  let timestamp = new Date();
  if (entry.timestamp !== null && entry.timestamp !== undefined) {
    const parsed = parseTimestamp(entry.timestamp);
    if (!parsed) throw new InvalidInputError('timestamp must be an ISO-8601 date-time');
    timestamp = parsed;
  }

  const nutrients = normalizeNutrients(entry.nutrients);
  // GL from the carbs as stored
  const carbs = roundTo(nutrients.carbs, 1);
  const saved = await getStore().insertMeal(entry.user_id, {
    timestamp,
    foodName: entry.food_name,
    mealType: toMealType(entry.meal_type),
    carbs,
    protein: roundTo(nutrients.protein, 1),
    fat: roundTo(nutrients.fat, 1),
    fiber: roundTo(nutrients.fiber, 1),
    sodium: roundTo(nutrients.sodium, 1),
    calories: roundTo(nutrients.calories, 1),
    gi: entry.gi,
    gl: glycemicLoad(entry.gi, carbs),
    insulin: entry.insulin,
  });

  console.log('/api/meals saved', { userId: entry.user_id, mealId: saved.id });
  return NextResponse.json({ status: 'success', message: 'Meal saved', data: saved }, { status: 201 });
});
