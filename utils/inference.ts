import { z } from 'zod';
import type { ForecastExplanations, ForecastInputReading, ForecastPrediction, NutrientProfile } from '@/types';
import { fetchApi } from './api';
import { getEnv } from './env';
import { ApiError, UpstreamUnavailableError } from './error';

const contributionsSchema = z.record(z.string(), z.number());

const explanationsSchema = z
  .object({
    '30min': contributionsSchema.optional(),
    '60min': contributionsSchema.optional(),
    '90min': contributionsSchema.optional(),
    summary: z.string().optional(),
  })
  .passthrough()
  .transform((e): ForecastExplanations | null => {
    if (!e['30min'] && !e['60min'] && !e['90min']) return null;
    return {
      ...(e['30min'] ? { '30min': e['30min'] } : {}),
      ...(e['60min'] ? { '60min': e['60min'] } : {}),
      ...(e['90min'] ? { '90min': e['90min'] } : {}),
      ...(e.summary !== undefined ? { summary: e.summary } : {}),
    };
  });

const forecastResponseSchema = z.object({
  pred_30min: z.number().finite(),
  pred_60min: z.number().finite(),
  pred_90min: z.number().finite(),
  // malformed explanations are dropped; the predictions are kept
  explanations: explanationsSchema.nullish().catch(null),
});

const giResponseSchema = z.object({ gi: z.number().finite().min(0) });

/** Black-box model endpoints: GI regressor and multi-horizon glucose forecaster. */
export interface InferenceClient {
  forecastGlucose(readings: ForecastInputReading[], options: { userId?: string; explain?: boolean }): Promise<ForecastPrediction>;
  predictGlycemicIndex(nutrients: NutrientProfile): Promise<number>;
}

export interface InferenceConfig {
  baseUrl: string;
  timeoutMs: number;
}

async function call<S extends z.ZodTypeAny>(
  config: InferenceConfig,
  path: string,
  body: unknown,
  schema: S
): Promise<z.output<S>> {
  let payload: unknown;
  try {
    payload = await fetchApi(new URL(path, config.baseUrl), {
      method: 'POST',
      body: JSON.stringify(body),
      timeoutMs: config.timeoutMs,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Inference request failed';
    throw new UpstreamUnavailableError('inference', `${path}: ${message}`, error instanceof ApiError ? error.status : undefined);
  }
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new UpstreamUnavailableError('inference', `${path}: unexpected response shape`, parsed.error.issues);
  }
  return parsed.data;
}

export function createInferenceClient(config: InferenceConfig): InferenceClient {
  return {
    async forecastGlucose(readings, { userId, explain = false }) {
      const result = await call(config, '/forecast-bg', { readings, user_id: userId, explain }, forecastResponseSchema);
      return {
        pred_30min: result.pred_30min,
        pred_60min: result.pred_60min,
        pred_90min: result.pred_90min,
        ...(result.explanations ? { explanations: result.explanations } : {}),
      };
    },

    async predictGlycemicIndex(nutrients) {
      const { gi } = await call(config, '/predict-gi', { nutrients }, giResponseSchema);
      return gi;
    },
  };
}

let client: InferenceClient | null = null;

export function getInferenceClient(): InferenceClient {
  if (!client) {
    const env = getEnv();
    client = createInferenceClient({ baseUrl: env.INFERENCE_SERVICE_URL, timeoutMs: env.INFERENCE_TIMEOUT_MS });
  }
  return client;
}
