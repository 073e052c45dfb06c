import { apiHandler, requireUserId } from '@/utils/api';
import { InvalidInputError } from '@/utils/error';
import { resolveProfileParameters } from '@/utils/insulin/profile';
import { getStore } from '@/utils/store';

export const dynamic = 'force-dynamic';

// GET /api/insulin/auto-isf-icr?user_id=...&source=calculated
export const GET = apiHandler(async (req: Request) => {
  const { searchParams } = new URL(req.url);
  const userId = requireUserId(searchParams);
  const source = searchParams.get('source');
  if (source && source !== 'calculated') {
    throw new InvalidInputError(`Unsupported source: ${source}`);
  }

  return resolveProfileParameters(getStore(), userId, {
    require: source === 'calculated' ? 'calculated' : undefined,
  });
});
