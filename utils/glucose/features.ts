import { addMinutes, subHours } from 'date-fns';
import type { ForecastInputReading, GlucoseReading, MealRecord } from '@/types';

export const FORECAST_INPUT_LENGTH = 12; // 60 minutes at 5-minute cadence
export const MEAL_LOOKBACK_HOURS = 4;

const STEP_MINUTES = 5;
const IOB_DECAY = 0.5 ** (STEP_MINUTES / 75);
const COB_DECAY = 0.5 ** (STEP_MINUTES / 45);

/** Floors to the 5-minute slot, as an epoch-ms key. */
function slotOf(at: Date): number {
  const stepMs = STEP_MINUTES * 60_000;
  return Math.floor(at.getTime() / stepMs) * stepMs;
}

/** Start of the meal lookback needed to build IOB/COB for the given window. */
export function mealLookbackStart(window: GlucoseReading[]): Date | null {
  return window.length > 0 ? subHours(window[0].timestamp, MEAL_LOOKBACK_HOURS) : null;
}

/**
 * Forecaster input for the last 12 readings: insulin and carbs logged in each
 * reading's 5-minute slot, and IOB/COB decayed step by step from the start of
 * the meal lookback. Null with fewer than 12 readings.
 */
export function buildForecastInput(readings: GlucoseReading[], meals: MealRecord[]): ForecastInputReading[] | null {
  if (readings.length < FORECAST_INPUT_LENGTH) return null;
  const window = readings.slice(-FORECAST_INPUT_LENGTH);
  const lookback = mealLookbackStart(window);
  if (!lookback) return null;

  const events = new Map<number, { carbs: number; insulin: number }>();
  for (const meal of meals) {
    const key = slotOf(meal.timestamp);
    const slot = events.get(key) ?? { carbs: 0, insulin: 0 };
    slot.carbs += meal.carbs;
    slot.insulin += meal.insulin;
    events.set(key, slot);
  }

  const iobAt = new Map<number, number>();
  const cobAt = new Map<number, number>();
  let iob = 0;
  let cob = 0;
  const last = window[window.length - 1].timestamp.getTime();
  for (let t = new Date(slotOf(lookback)); t.getTime() <= last; t = addMinutes(t, STEP_MINUTES)) {
    const key = t.getTime();
    const slot = events.get(key);
    iob = iob * IOB_DECAY + (slot?.insulin ?? 0);
    cob = cob * COB_DECAY + (slot?.carbs ?? 0);
    iobAt.set(key, iob);
    cobAt.set(key, cob);
  }

  return window.map((r) => {
    const key = slotOf(r.timestamp);
    const slot = events.get(key);
    return {
      glucose: r.value,
      insulin: slot?.insulin ?? 0,
      carbs: slot?.carbs ?? 0,
      IOB: iobAt.get(key) ?? 0,
      COB: cobAt.get(key) ?? 0,
      timestamp: r.timestamp.toISOString(),
    };
  });
}
