import { apiHandler, requireUserId, resolveTimeZone } from '@/utils/api';
import { emptyDashboards } from '@/utils/dashboard/aggregate';
import { getWeeklyDashboard } from '@/utils/dashboard/service';
import { getStore } from '@/utils/store';

export const dynamic = 'force-dynamic';

// GET /api/dashboard/weekly?user_id=...&start=YYYY-MM-DD&end=YYYY-MM-DD
export const GET = apiHandler(
  async (req: Request) => {
    const { searchParams } = new URL(req.url);
    const userId = requireUserId(searchParams);
    const timeZone = resolveTimeZone(searchParams);
    return getWeeklyDashboard(
      { store: getStore(), userId, timeZone },
      { start: searchParams.get('start'), end: searchParams.get('end') }
    );
  },
  { fallback: emptyDashboards.weekly }
);
