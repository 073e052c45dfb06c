import { z } from 'zod';
import { apiHandler, readJsonBody } from '@/utils/api';
import { validateWithZod } from '@/utils/error';
import { adviseInsulin } from '@/utils/insulin/advisor';
import { getStore } from '@/utils/store';

export const dynamic = 'force-dynamic';

const optionalFactor = (name: string) =>
  z
    .number({ invalid_type_error: `${name} must be a number` })
    .positive(`${name} must be > 0`)
    .nullish()
    .transform((v) => v ?? undefined);

const adviceSchema = z.object({
  user_id: z.union([z.string(), z.number()]).transform(String).pipe(z.string().trim().min(1, 'Missing user_id')),
  planned_carbs: z.number({
    required_error: 'planned_carbs is required',
    invalid_type_error: 'planned_carbs must be a number',
  }),
  isf: optionalFactor('isf'),
  icr: optionalFactor('icr'),
});

export const POST = apiHandler(async (req: Request) => {
  const body = validateWithZod(adviceSchema, await readJsonBody(req));
  return adviseInsulin(getStore(), {
    userId: body.user_id,
    plannedCarbs: body.planned_carbs,
    isf: body.isf,
    icr: body.icr,
  });
});
