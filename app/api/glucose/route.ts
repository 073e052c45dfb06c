import { NextResponse } from 'next/server';
import { z } from 'zod';
import { apiHandler, readJsonBody } from '@/utils/api';
import { parseTimestamp } from '@/utils/date';
import { InvalidInputError, validateWithZod } from '@/utils/error';
import { getStore } from '@/utils/store';

export const dynamic = 'force-dynamic';

const readingSchema = z.object({
  user_id: z.union([z.string(), z.number()]).transform(String).pipe(z.string().trim().min(1, 'Missing user_id')),
  bg_value: z
    .number({ required_error: 'bg_value is required', invalid_type_error: 'bg_value must be a number' })
    .positive('bg_value must be > 0')
    .max(1000, 'bg_value must be <= 1000'),
  timestamp: z.string().nullish(),
  source: z.enum(['device', 'simulator', 'manual']).default('manual'),
});

// POST /api/glucose
export const POST = apiHandler(async (req: Request) => {
  const body = validateWithZod(readingSchema, await readJsonBody(req));

  let timestamp = new Date();
  if (body.timestamp !== null && body.timestamp !== undefined) {
    const parsed = parseTimestamp(body.timestamp);
    if (!parsed) throw new InvalidInputError('timestamp must be an ISO-8601 date-time');
    timestamp = parsed;
  }

  const data = await getStore().insertGlucose(body.user_id, {
    timestamp,
    value: body.bg_value,
    source: body.source,
  });
  return NextResponse.json({ status: 'success', data }, { status: 201 });
});
