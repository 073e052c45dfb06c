import type {
  DailyDashboard,
  DashboardSummary,
  MealRecord,
  MealType,
  OverallDashboard,
  WeeklyDashboard,
} from '@/types';
import { calendarDateIn, formatClock, monthLabel, weekdayIndex, weekdayLabels } from '@/utils/date';
import { roundTo } from '@/utils/units';
import { inWindow, type AggregationWindow } from './windows';

export const TOP_OVERALL = 20;
export const TOP_WEEKLY = 5;

const MEAL_TYPE_ORDER: MealType[] = ['breakfast', 'lunch', 'dinner', 'snack', 'other'];

type Totals = { carbs: number; gl: number; calories: number };

const emptyTotals = (): Totals => ({ carbs: 0, gl: 0, calories: 0 });

function addTo(totals: Totals, meal: MealRecord) {
  totals.carbs += meal.carbs;
  totals.gl += meal.gl;
  totals.calories += meal.calories;
}

const capitalize = (s: string) => s.charAt(0).toUpperCase() + s.slice(1);

/** Meals inside the window, oldest first (ties by id) so rankings are stable. */
export function mealsInWindow(meals: MealRecord[], window: AggregationWindow): MealRecord[] {
  return meals
    .filter((m) => inWindow(m.timestamp, window))
    .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

export function summarize(meals: MealRecord[]): DashboardSummary {
  const totals = emptyTotals();
  meals.forEach((m) => addTo(totals, m));
  return {
    glycaemic_load: roundTo(totals.gl, 1),
    average_glycaemic_load: meals.length > 0 ? roundTo(totals.gl / meals.length, 1) : 0,
    carbohydrates: roundTo(totals.carbs, 1),
    calories: roundTo(totals.calories, 1),
    meal_count: meals.length,
  };
}

/**
 * Percentages with one decimal that sum to exactly 100 (largest remainder,
 * earlier entries win ties). All-zero input gives all zeros.
 */
export function toPercentages(values: number[]): number[] {
  const total = values.reduce((sum, v) => sum + v, 0);
  if (total <= 0) return values.map(() => 0);
  const tenths = values.map((v) => (v / total) * 1000);
  const floors = tenths.map(Math.floor);
  let remaining = 1000 - floors.reduce((sum, v) => sum + v, 0);
  const order = tenths
    .map((t, i) => ({ i, frac: t - Math.floor(t) }))
    .sort((a, b) => b.frac - a.frac || a.i - b.i);
  for (const { i } of order) {
    if (remaining <= 0) break;
    floors[i] += 1;
    remaining -= 1;
  }
  return floors.map((f) => f / 10);
}

/** GL share per meal type; meal types with no GL are left out. */
export function mealTypeBreakdown(meals: MealRecord[]): { labels: string[]; values: number[] } {
  const glByType = new Map<MealType, number>();
  for (const meal of meals) {
    glByType.set(meal.mealType, (glByType.get(meal.mealType) ?? 0) + meal.gl);
  }
  const present = MEAL_TYPE_ORDER.filter((t) => (glByType.get(t) ?? 0) > 0);
  return {
    labels: present.map(capitalize),
    values: toPercentages(present.map((t) => glByType.get(t) ?? 0)),
  };
}

export function aggregateOverall(allMeals: MealRecord[], window: AggregationWindow): OverallDashboard {
  const meals = mealsInWindow(allMeals, window);

  // One bucket per calendar month the window touches
  const months: Array<{ key: string; label: string; totals: Totals }> = [];
  let { year, month } = window.firstDay;
  while (year < window.lastDay.year || (year === window.lastDay.year && month <= window.lastDay.month)) {
    months.push({ key: `${year}-${month}`, label: monthLabel(year, month), totals: emptyTotals() });
    month += 1;
    if (month > 12) {
      month = 1;
      year += 1;
    }
  }
  for (const meal of meals) {
    const day = calendarDateIn(meal.timestamp, window.timeZone);
    const bucket = months.find((m) => m.key === `${day.year}-${day.month}`);
    if (bucket) addTo(bucket.totals, meal);
  }

  const byDesc = <K extends 'gi' | 'carbs'>(key: K) =>
    [...meals].sort((a, b) => b[key] - a[key]).slice(0, TOP_OVERALL);

  return {
    summary: summarize(meals),
    line_chart: {
      labels: months.map((m) => m.label),
      carb: months.map((m) => roundTo(m.totals.carbs, 1)),
      gl: months.map((m) => roundTo(m.totals.gl, 1)),
      calories: months.map((m) => roundTo(m.totals.calories, 1)),
    },
    pie_chart: mealTypeBreakdown(meals),
    top_gi: byDesc('gi').map((m) => ({ name: m.foodName, gi: roundTo(m.gi, 1) })),
    top_carb: byDesc('carbs').map((m) => ({ name: m.foodName, carbs: roundTo(m.carbs, 1) })),
  };
}

export function aggregateWeekly(allMeals: MealRecord[], window: AggregationWindow): WeeklyDashboard {
  const meals = mealsInWindow(allMeals, window);
  const days = weekdayLabels().map(() => emptyTotals());
  const glByFood = new Map<string, number>();

  for (const meal of meals) {
    addTo(days[weekdayIndex(calendarDateIn(meal.timestamp, window.timeZone))], meal);
    glByFood.set(meal.foodName, (glByFood.get(meal.foodName) ?? 0) + meal.gl);
  }

  const top5 = [...glByFood.entries()]
    .sort(([nameA, a], [nameB, b]) => b - a || nameA.localeCompare(nameB))
    .slice(0, TOP_WEEKLY)
    .map(([name, gl]) => ({ name, gl: roundTo(gl, 1) }));

  const summary = summarize(meals);
  const carbs = days.map((d) => roundTo(d.carbs, 1));
  const gl = days.map((d) => roundTo(d.gl, 1));
  const calories = days.map((d) => roundTo(d.calories, 1));
  const pie = mealTypeBreakdown(meals);

  return {
    glycaemic_load: summary.glycaemic_load,
    average_glycaemic_load: summary.average_glycaemic_load,
    carbohydrates: summary.carbohydrates,
    calories: summary.calories,
    line_labels: weekdayLabels(),
    line_carb: carbs,
    line_gl: gl,
    line_calories: calories,
    top5_gl: top5,
    pie_labels: pie.labels,
    pie_values: pie.values,
    daily_breakdown_gl: [...gl],
    daily_breakdown_carbs: [...carbs],
    daily_breakdown_calories: [...calories],
  };
}

export function aggregateDaily(allMeals: MealRecord[], window: AggregationWindow): DailyDashboard {
  const meals = mealsInWindow(allMeals, window);
  const summary = summarize(meals);
  const foodEntries = meals.map((m) => ({
    time: formatClock(m.timestamp, window.timeZone),
    food: m.foodName,
    gl: roundTo(m.gl, 1),
  }));

  // Single placeholder point keeps the chart drawable on an empty day
  const empty = meals.length === 0;
  return {
    glycaemic_load: summary.glycaemic_load,
    average_glycaemic_load: summary.average_glycaemic_load,
    carbohydrates: summary.carbohydrates,
    calories: summary.calories,
    food_entries: foodEntries,
    line_labels: empty ? ['--'] : foodEntries.map((e) => e.time),
    line_carb: empty ? [0] : meals.map((m) => roundTo(m.carbs, 1)),
    line_gl: empty ? [0] : meals.map((m) => roundTo(m.gl, 1)),
    line_calories: empty ? [0] : meals.map((m) => roundTo(m.calories, 1)),
  };
}

/** Zeroed payloads returned alongside an `error` when the store cannot be read. */
export const emptyDashboards = {
  overall: (): OverallDashboard => ({
    summary: summarize([]),
    line_chart: { labels: [], carb: [], gl: [], calories: [] },
    pie_chart: { labels: [], values: [] },
    top_gi: [],
    top_carb: [],
  }),
  weekly: (): WeeklyDashboard => {
    const zeros = () => weekdayLabels().map(() => 0);
    return {
      glycaemic_load: 0,
      average_glycaemic_load: 0,
      carbohydrates: 0,
      calories: 0,
      line_labels: weekdayLabels(),
      line_carb: zeros(),
      line_gl: zeros(),
      line_calories: zeros(),
      top5_gl: [],
      pie_labels: [],
      pie_values: [],
      daily_breakdown_gl: zeros(),
      daily_breakdown_carbs: zeros(),
      daily_breakdown_calories: zeros(),
    };
  },
  daily: (): DailyDashboard => ({
    glycaemic_load: 0,
    average_glycaemic_load: 0,
    carbohydrates: 0,
    calories: 0,
    food_entries: [],
    line_labels: ['--'],
    line_carb: [0],
    line_gl: [0],
    line_calories: [0],
  }),
};
