import { z } from 'zod';
import { apiHandler, readJsonBody } from '@/utils/api';
import { validateWithZod } from '@/utils/error';
import { getInferenceClient } from '@/utils/inference';
import { normalizeNutrients } from '@/utils/nutrients';
import { giBand, glycemicLoad, roundTo } from '@/utils/units';

export const dynamic = 'force-dynamic';

const analyzeSchema = z.object({
  food_name: z.string().trim().max(200).nullish(),
  nutrients: z.record(z.string(), z.unknown(), { required_error: 'nutrients is required' }),
});

// POST /api/scan/analyze
export const POST = apiHandler(async (req: Request) => {
  const body = validateWithZod(analyzeSchema, await readJsonBody(req));
  const nutrients = normalizeNutrients(body.nutrients);
  const gi = roundTo(await getInferenceClient().predictGlycemicIndex(nutrients), 1);

  return {
    ...(body.food_name ? { food_name: body.food_name } : {}),
    gi,
    gl: glycemicLoad(gi, nutrients.carbs),
    gi_color: giBand(gi),
    nutrients,
  };
});
