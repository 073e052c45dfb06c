import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type {
  DoseRecord,
  GlucoseReading,
  MealPage,
  MealQuery,
  MealRecord,
  MealType,
  NewMealRecord,
  TimeRange,
  UserProfile,
} from '@/types';
import { parseTimestamp } from '@/utils/date';
import { UpstreamUnavailableError } from '@/utils/error';
import type { DataStore } from './types';

const MEAL_COLUMNS: string = 'id,user_id,foodname,mealtype,calories,carbs,protein,fat,fiber,sodium,gi,gl,insulin,created_at';
const MEAL_LIMIT = 5000;
const GLUCOSE_LIMIT = 5000;

// Null or unparsable numeric columns read as 0
const numeric = z.unknown().transform((v) => {
  const n = typeof v === 'number' ? v : typeof v === 'string' ? parseFloat(v) : NaN;
  return Number.isFinite(n) ? n : 0;
});

const id = z.union([z.string(), z.number()]).transform(String);

const MEAL_TYPES: readonly MealType[] = ['breakfast', 'lunch', 'dinner', 'snack'];

export function toMealType(raw: unknown): MealType {
  const s = typeof raw === 'string' ? raw.trim().toLowerCase() : '';
  return MEAL_TYPES.find((t) => t === s) ?? 'other';
}

const mealRowSchema = z.object({
  id,
  user_id: id,
  foodname: z.string().nullish(),
  mealtype: z.string().nullish(),
  calories: numeric,
  carbs: numeric,
  protein: numeric,
  fat: numeric,
  fiber: numeric,
  sodium: numeric,
  gi: numeric,
  gl: numeric,
  insulin: numeric,
  created_at: z.unknown(),
});

const glucoseRowSchema = z.object({
  id: id.optional(),
  bg_value: numeric,
  timestamp: z.unknown(),
  source: z.string().nullish(),
});

const profileRowSchema = z.object({
  user_id: id,
  isf: z.number().nullish(),
  icr: z.number().nullish(),
});

function toMeal(row: unknown): MealRecord | null {
  const parsed = mealRowSchema.safeParse(row);
  if (!parsed.success) return null;
  const r = parsed.data;
  const timestamp = parseTimestamp(r.created_at);
  if (!timestamp) return null;
  return {
    id: r.id,
    userId: r.user_id,
    timestamp,
    foodName: r.foodname?.trim() || 'Unknown',
    mealType: toMealType(r.mealtype),
    carbs: r.carbs,
    protein: r.protein,
    fat: r.fat,
    fiber: r.fiber,
    sodium: r.sodium,
    calories: r.calories,
    gi: r.gi,
    gl: r.gl,
    insulin: r.insulin,
  };
}

function toReading(row: unknown): GlucoseReading | null {
  const parsed = glucoseRowSchema.safeParse(row);
  if (!parsed.success) return null;
  const timestamp = parseTimestamp(parsed.data.timestamp);
  if (!timestamp || parsed.data.bg_value <= 0) return null;
  const source = parsed.data.source;
  return {
    id: parsed.data.id,
    timestamp,
    value: parsed.data.bg_value,
    source: source === 'simulator' || source === 'manual' ? source : 'device',
  };
}

// LIKE wildcards in user input match literally
const likeEscape = (text: string) => text.replace(/[\\%_]/g, (c) => `\\${c}`);

function isPresent<T>(value: T | null): value is T {
  return value !== null;
}

function storeError(operation: string, error: { message: string }): UpstreamUnavailableError {
  console.error(`[store] ${operation} failed`, { error });
  return new UpstreamUnavailableError('store', `Database error during ${operation}: ${error.message}`);
}

/**
 * DataStore over the Supabase tables `meal_data`, `cgm_data` and `user_profiles`.
 */
export class SupabaseStore implements DataStore {
  constructor(private readonly client: SupabaseClient) {}

  async getProfile(userId: string): Promise<UserProfile | null> {
    const { data, error } = await this.client
      .from('user_profiles')
      .select('user_id,isf,icr')
      .eq('user_id', userId)
      .maybeSingle();
    if (error) throw storeError('getProfile', error);
    if (!data) return null;
    const parsed = profileRowSchema.safeParse(data);
    if (!parsed.success) return null;
    return { id: parsed.data.user_id, isf: parsed.data.isf ?? null, icr: parsed.data.icr ?? null };
  }

  async listMeals(userId: string, range: TimeRange): Promise<MealRecord[]> {
    const { data, error } = await this.client
      .from('meal_data')
      .select(MEAL_COLUMNS)
      .eq('user_id', userId)
      .gte('created_at', range.start.toISOString())
      .lt('created_at', range.end.toISOString())
      .order('created_at', { ascending: true })
      .limit(MEAL_LIMIT);
    if (error) throw storeError('listMeals', error);
    return (data ?? []).map(toMeal).filter(isPresent);
  }

  async listMealEntries(userId: string, query: MealQuery): Promise<MealPage> {
    let request = this.client
      .from('meal_data')
      .select(MEAL_COLUMNS, { count: 'exact' })
      .eq('user_id', userId);

    if (query.since) request = request.gte('created_at', query.since.toISOString());
    if (query.search) request = request.ilike('foodname', `%${likeEscape(query.search)}%`);
    if (query.gi === 'low') request = request.lte('gi', 55);
    if (query.gi === 'medium') request = request.gt('gi', 55).lt('gi', 70);
    if (query.gi === 'high') request = request.gte('gi', 70);
    if (query.giMax !== undefined) request = request.lte('gi', query.giMax);
    if (query.mealType) request = request.eq('mealtype', query.mealType);

    if (query.sort === 'highest_gi') {
      request = request.order('gi', { ascending: false }).order('created_at', { ascending: false });
    } else {
      request = request.order('created_at', { ascending: query.sort === 'oldest' });
    }

    const { data, error, count } = await request.range(query.offset, query.offset + query.limit - 1);
    if (error) throw storeError('listMealEntries', error);
    return { entries: (data ?? []).map(toMeal).filter(isPresent), total: count ?? 0 };
  }

  async getMeal(mealId: string): Promise<MealRecord | null> {
    const { data, error } = await this.client
      .from('meal_data')
      .select(MEAL_COLUMNS)
      .eq('id', mealId)
      .maybeSingle();
    if (error) throw storeError('getMeal', error);
    return data ? toMeal(data) : null;
  }

  async listDoses(userId: string, since: Date): Promise<DoseRecord[]> {
    const { data, error } = await this.client
      .from('meal_data')
      .select(MEAL_COLUMNS)
      .eq('user_id', userId)
      .gt('insulin', 0)
      .gte('created_at', since.toISOString())
      .order('created_at', { ascending: true })
      .limit(MEAL_LIMIT);
    if (error) throw storeError('listDoses', error);
    return (data ?? [])
      .map(toMeal)
      .filter(isPresent)
      .map((m) => ({ timestamp: m.timestamp, units: m.insulin, mealId: m.id }));
  }

  async listGlucose(userId: string, range: TimeRange): Promise<GlucoseReading[]> {
    const { data, error } = await this.client
      .from('cgm_data')
      .select('id,bg_value,timestamp,source')
      .eq('patient_id', userId)
      .gte('timestamp', range.start.toISOString())
      .lt('timestamp', range.end.toISOString())
      .order('timestamp', { ascending: true })
      .limit(GLUCOSE_LIMIT);
    if (error) throw storeError('listGlucose', error);
    return (data ?? []).map(toReading).filter(isPresent);
  }

  async latestGlucose(userId: string): Promise<GlucoseReading | null> {
    const { data, error } = await this.client
      .from('cgm_data')
      .select('id,bg_value,timestamp,source')
      .eq('patient_id', userId)
      .order('timestamp', { ascending: false })
      .limit(1);
    if (error) throw storeError('latestGlucose', error);
    const [row] = data ?? [];
    return row ? toReading(row) : null;
  }

  async insertMeal(userId: string, meal: NewMealRecord): Promise<MealRecord> {
    const toInsert = {
      user_id: userId,
      foodname: meal.foodName,
      mealtype: meal.mealType,
      calories: meal.calories,
      carbs: meal.carbs,
      protein: meal.protein,
      fat: meal.fat,
      fiber: meal.fiber,
      sodium: meal.sodium,
      gi: meal.gi,
      gl: meal.gl,
      insulin: meal.insulin,
      created_at: meal.timestamp.toISOString(),
    };
    const { data, error } = await this.client
      .from('meal_data')
      .insert(toInsert)
      .select(MEAL_COLUMNS)
      .single();
    if (error) throw storeError('insertMeal', error);
    const saved = toMeal(data);
    if (!saved) throw new UpstreamUnavailableError('store', 'Inserted meal row could not be read back');
    return saved;
  }

  async insertGlucose(userId: string, reading: GlucoseReading): Promise<GlucoseReading> {
    const { data, error } = await this.client
      .from('cgm_data')
      .insert({
        patient_id: userId,
        bg_value: reading.value,
        timestamp: reading.timestamp.toISOString(),
        source: reading.source,
      })
      .select('id,bg_value,timestamp,source')
      .single();
    if (error) throw storeError('insertGlucose', error);
    return toReading(data) ?? reading;
  }

  async getMealOwner(mealId: string): Promise<string | null> {
    const { data, error } = await this.client
      .from('meal_data')
      .select('id,user_id')
      .eq('id', mealId)
      .maybeSingle();
    if (error) throw storeError('getMealOwner', error);
    const parsed = z.object({ user_id: id }).safeParse(data);
    return parsed.success ? parsed.data.user_id : null;
  }

  async deleteMeal(mealId: string): Promise<void> {
    const { error } = await this.client.from('meal_data').delete().eq('id', mealId);
    if (error) throw storeError('deleteMeal', error);
  }
}
