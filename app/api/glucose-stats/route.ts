import type { GlucoseStats } from '@/types';
import { apiHandler, requireUserId, resolveTimeZone } from '@/utils/api';
import { getGlucoseStats } from '@/utils/glucose/stats';
import { getInferenceClient } from '@/utils/inference';
import { getStore } from '@/utils/store';

export const dynamic = 'force-dynamic';

const emptyStats = (): GlucoseStats => ({
  chart_data: [],
  forecast_data: null,
  latest: null,
  insights: [],
  explanations: null,
});

// GET /api/glucose-stats?user_id=...&tz=Europe/London
export const GET = apiHandler(
  async (req: Request) => {
    const { searchParams } = new URL(req.url);
    const userId = requireUserId(searchParams);
    const timeZone = resolveTimeZone(searchParams);
    return getGlucoseStats({ store: getStore(), forecaster: getInferenceClient() }, userId, { timeZone });
  },
  { fallback: emptyStats }
);
