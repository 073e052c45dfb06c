import { apiHandler, requireUserId, resolveTimeZone } from '@/utils/api';
import { emptyDashboards } from '@/utils/dashboard/aggregate';
import { getOverallDashboard } from '@/utils/dashboard/service';
import { DEFAULT_OVERALL_DAYS } from '@/utils/dashboard/windows';
import { InvalidInputError } from '@/utils/error';
import { getStore } from '@/utils/store';

export const dynamic = 'force-dynamic';

function parseDays(raw: string | null): number {
  if (!raw) return DEFAULT_OVERALL_DAYS;
  const days = parseInt(raw, 10);
  if (!Number.isFinite(days) || String(days) !== raw.trim()) {
    throw new InvalidInputError('days must be an integer');
  }
  return days;
}

// GET /api/dashboard/overall?user_id=...&days=30&tz=...
export const GET = apiHandler(
  async (req: Request) => {
    const { searchParams } = new URL(req.url);
    const userId = requireUserId(searchParams);
    const timeZone = resolveTimeZone(searchParams);
    const days = parseDays(searchParams.get('days'));
    return getOverallDashboard({ store: getStore(), userId, timeZone }, days);
  },
  { fallback: emptyDashboards.overall }
);
