import { apiHandler, requireUserId, resolveTimeZone } from '@/utils/api';
import { emptyDashboards } from '@/utils/dashboard/aggregate';
import { getDailyDashboard } from '@/utils/dashboard/service';
import { getStore } from '@/utils/store';

export const dynamic = 'force-dynamic';

// GET /api/dashboard/daily?user_id=...&date=YYYY-MM-DD
export const GET = apiHandler(
  async (req: Request) => {
    const { searchParams } = new URL(req.url);
    const userId = requireUserId(searchParams);
    const timeZone = resolveTimeZone(searchParams);
    return getDailyDashboard({ store: getStore(), userId, timeZone }, searchParams.get('date'));
  },
  { fallback: emptyDashboards.daily }
);
