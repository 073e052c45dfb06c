import { addMinutes } from 'date-fns';
import type { ChartPoint, ForecastExplanations, ForecastPrediction, GlucoseReading, HorizonLabel } from '@/types';

export const FORECAST_HORIZONS: ReadonlyArray<{ label: HorizonLabel; minutes: number; key: keyof Omit<ForecastPrediction, 'explanations'> }> = [
  { label: '30min', minutes: 30, key: 'pred_30min' },
  { label: '60min', minutes: 60, key: 'pred_60min' },
  { label: '90min', minutes: 90, key: 'pred_90min' },
];

export interface ForecastAssembly {
  forecast_data: ChartPoint[] | null;
  explanations: ForecastExplanations | null;
}

/**
 * Joins the latest actual reading and the three forecast horizons into one
 * chart line. Horizon timestamps are offsets from the reading, not from now.
 * Without a reading there is nothing to anchor the line to, so nothing is returned.
 */
export function assembleForecast(
  latest: GlucoseReading | null,
  prediction: ForecastPrediction | null
): ForecastAssembly {
  if (!latest || !prediction) return { forecast_data: null, explanations: null };

  const forecast_data: ChartPoint[] = [
    { x: latest.timestamp.toISOString(), y: latest.value },
    ...FORECAST_HORIZONS.map(({ minutes, key }) => ({
      x: addMinutes(latest.timestamp, minutes).toISOString(),
      y: prediction[key],
    })),
  ];

  return { forecast_data, explanations: prediction.explanations ?? null };
}
