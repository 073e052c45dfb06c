import { addMinutes, subHours } from 'date-fns';
import type { ForecastExplanations, ForecastPrediction, GlucoseReading, GlucoseStats } from '@/types';
import { formatClock } from '@/utils/date';
import { UpstreamUnavailableError } from '@/utils/error';
import type { InferenceClient } from '@/utils/inference';
import type { DataStore } from '@/utils/store';
import { forecastDirection, summarizeContributions } from './explanations';
import { buildForecastInput, FORECAST_INPUT_LENGTH, mealLookbackStart } from './features';
import { assembleForecast } from './forecast';
import { generatePersonalInsights } from './insights';

export const CHART_HOURS = 24;

interface StatsDeps {
  store: DataStore;
  forecaster: InferenceClient;
}

function withSummary(
  explanations: ForecastExplanations | null,
  latest: GlucoseReading,
  prediction: ForecastPrediction
): ForecastExplanations | null {
  if (!explanations || explanations.summary !== undefined) return explanations;
  const contributions = explanations['60min'];
  if (!contributions) return explanations;
  const direction = forecastDirection(latest.value, prediction.pred_60min);
  return { ...explanations, summary: summarizeContributions(contributions, direction) };
}

/**
 * Last 24h of readings as a chart series, the latest reading, pattern insights
 * and (with at least 12 readings) a 30/60/90-minute forecast. A forecaster
 * failure or timeout leaves `forecast_data` and `explanations` null.
 */
export async function getGlucoseStats(
  { store, forecaster }: StatsDeps,
  userId: string,
  { now = new Date(), timeZone }: { now?: Date; timeZone: string }
): Promise<GlucoseStats> {
  // Readings up to one minute ahead of the server clock still count as current
  const readings = await store.listGlucose(userId, { start: subHours(now, CHART_HOURS), end: addMinutes(now, 1) });

  if (readings.length === 0) {
    return {
      chart_data: [],
      forecast_data: null,
      latest: null,
      insights: generatePersonalInsights([], timeZone),
      explanations: null,
      error: 'No data found',
    };
  }

  const latest = readings[readings.length - 1];
  const stats: GlucoseStats = {
    chart_data: readings.map((r) => ({ x: r.timestamp.toISOString(), y: r.value })),
    forecast_data: null,
    latest: { value: latest.value, time: formatClock(latest.timestamp, timeZone) },
    insights: generatePersonalInsights(readings, timeZone),
    explanations: null,
  };

  if (readings.length < FORECAST_INPUT_LENGTH) return stats;

  const window = readings.slice(-FORECAST_INPUT_LENGTH);
  const lookback = mealLookbackStart(window) ?? window[0].timestamp;
  const meals = await store.listMeals(userId, { start: lookback, end: addMinutes(latest.timestamp, 1) });
  const input = buildForecastInput(readings, meals);
  if (!input) return stats;

  let prediction: ForecastPrediction;
  try {
    prediction = await forecaster.forecastGlucose(input, { userId, explain: true });
  } catch (error) {
    if (!(error instanceof UpstreamUnavailableError)) throw error;
    console.error('[glucose-stats] forecast unavailable', { userId, error: error.message });
    return stats;
  }

  const assembled = assembleForecast(latest, prediction);
  return {
    ...stats,
    forecast_data: assembled.forecast_data,
    explanations: withSummary(assembled.explanations, latest, prediction),
  };
}
