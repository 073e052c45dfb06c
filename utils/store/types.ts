import type {
  DoseRecord,
  GlucoseReading,
  MealPage,
  MealQuery,
  MealRecord,
  NewMealRecord,
  TimeRange,
  UserProfile,
} from '@/types';

/**
 * Data access used by the advisor, dashboards and glucose stats. Every call is a
 * single read or write scoped to one user; ranges are half-open [start, end).
 */
export interface DataStore {
  getProfile(userId: string): Promise<UserProfile | null>;
  listMeals(userId: string, range: TimeRange): Promise<MealRecord[]>;
  /** One filtered, sorted page of the food diary plus the total match count. */
  listMealEntries(userId: string, query: MealQuery): Promise<MealPage>;
  getMeal(mealId: string): Promise<MealRecord | null>;
  /** Doses logged at or after `since`, including any future-dated ones. */
  listDoses(userId: string, since: Date): Promise<DoseRecord[]>;
  listGlucose(userId: string, range: TimeRange): Promise<GlucoseReading[]>;
  latestGlucose(userId: string): Promise<GlucoseReading | null>;
  insertMeal(userId: string, meal: NewMealRecord): Promise<MealRecord>;
  insertGlucose(userId: string, reading: GlucoseReading): Promise<GlucoseReading>;
  /** Owner of a meal row, or null when it does not exist. */
  getMealOwner(mealId: string): Promise<string | null>;
  deleteMeal(mealId: string): Promise<void>;
}
