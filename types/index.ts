// Meal types
export type MealType = 'breakfast' | 'lunch' | 'dinner' | 'snack' | 'other';

export interface NutrientProfile {
  carbs: number; // g
  protein: number; // g
  fat: number; // g
  fiber: number; // g
  sugar: number; // g
  sodium: number; // mg
  calories: number; // kcal
}

export interface MealRecord {
  id: string;
  userId: string;
  timestamp: Date;
  foodName: string;
  mealType: MealType;
  carbs: number;
  protein: number;
  fat: number;
  fiber: number;
  sodium: number;
  calories: number;
  gi: number;
  gl: number;
  insulin: number; // units logged with the meal
}

export type NewMealRecord = Omit<MealRecord, 'id' | 'userId'>;

// Food diary
export type DiarySort = 'newest' | 'oldest' | 'highest_gi';
export type GiFilter = 'low' | 'medium' | 'high';

export interface MealQuery {
  since?: Date;
  search?: string; // case-insensitive substring of the food name
  gi?: GiFilter;
  giMax?: number;
  mealType?: MealType;
  sort: DiarySort;
  limit: number;
  offset: number;
}

export interface MealPage {
  entries: MealRecord[];
  total: number;
}

export interface NutrientLine {
  name: string;
  value: number;
  unit: 'kcal' | 'g' | 'mg';
}

// Insulin types
export interface DoseRecord {
  timestamp: Date;
  units: number;
  mealId?: string;
}

export interface UserProfile {
  id: string;
  isf: number | null; // mg/dL drop per unit
  icr: number | null; // grams carb per unit
}

export type ParameterSource = 'explicit' | 'calculated' | 'default';

export interface ResolvedParameters {
  isf: number;
  icr: number;
  source: ParameterSource;
  tdd?: number;
}

export interface DoseRecommendation {
  meal_dose: number;
  correction_dose: number;
  iob_adjustment: number;
  total_dose: number;
  current_bg: number;
  target_bg: number;
  iob: number;
  isf_used: number;
  icr_used: number;
  parameter_source: ParameterSource | 'request';
}

// Glucose types
export type GlucoseSource = 'device' | 'simulator' | 'manual';

export interface GlucoseReading {
  id?: string;
  timestamp: Date;
  value: number; // mg/dL
  source: GlucoseSource;
}

export interface ChartPoint {
  x: string; // ISO timestamp
  y: number;
}

export type InsightSeverity = 'good' | 'warning' | 'danger' | 'info';

export interface GlucoseInsight {
  icon: string;
  title: string;
  body: string;
  severity: InsightSeverity;
}

// Forecast types
export type HorizonLabel = '30min' | '60min' | '90min';

export type FeatureContributions = Record<string, number>;

export type ForecastExplanations = Partial<Record<HorizonLabel, FeatureContributions>> & {
  summary?: string;
};

export interface ForecastPrediction {
  pred_30min: number;
  pred_60min: number;
  pred_90min: number;
  explanations?: ForecastExplanations;
}

/** One 5-minute step of forecaster input. */
export interface ForecastInputReading {
  glucose: number;
  insulin: number;
  carbs: number;
  IOB: number;
  COB: number;
  timestamp: string;
}

export interface GlucoseStats {
  chart_data: ChartPoint[];
  forecast_data: ChartPoint[] | null;
  latest: { value: number; time: string } | null;
  insights: GlucoseInsight[];
  explanations: ForecastExplanations | null;
  error?: string;
}

// Dashboard types
export interface TimeRange {
  start: Date; // inclusive
  end: Date; // exclusive
}

export interface DashboardSummary {
  glycaemic_load: number;
  average_glycaemic_load: number;
  carbohydrates: number;
  calories: number;
  meal_count: number;
}

export interface OverallDashboard {
  summary: DashboardSummary;
  line_chart: { labels: string[]; carb: number[]; gl: number[]; calories: number[] };
  pie_chart: { labels: string[]; values: number[] };
  top_gi: Array<{ name: string; gi: number }>;
  top_carb: Array<{ name: string; carbs: number }>;
}

export interface WeeklyDashboard {
  glycaemic_load: number;
  average_glycaemic_load: number;
  carbohydrates: number;
  calories: number;
  line_labels: string[];
  line_carb: number[];
  line_gl: number[];
  line_calories: number[];
  top5_gl: Array<{ name: string; gl: number }>;
  pie_labels: string[];
  pie_values: number[];
  daily_breakdown_gl: number[];
  daily_breakdown_carbs: number[];
  daily_breakdown_calories: number[];
}

export interface DailyDashboard {
  glycaemic_load: number;
  average_glycaemic_load: number;
  carbohydrates: number;
  calories: number;
  food_entries: Array<{ time: string; food: string; gl: number }>;
  line_labels: string[];
  line_carb: number[];
  line_gl: number[];
  line_calories: number[];
}
