import type { DailyDashboard, OverallDashboard, WeeklyDashboard } from '@/types';
import type { DataStore } from '@/utils/store';
import { aggregateDaily, aggregateOverall, aggregateWeekly } from './aggregate';
import { dailyWindow, overallWindow, weeklyWindow, type AggregationWindow } from './windows';

interface DashboardContext {
  store: DataStore;
  userId: string;
  timeZone: string;
  now?: Date;
}

async function mealsFor(ctx: DashboardContext, window: AggregationWindow) {
  return ctx.store.listMeals(ctx.userId, { start: window.start, end: window.end });
}

export async function getOverallDashboard(ctx: DashboardContext, days: number): Promise<OverallDashboard> {
  const window = overallWindow(ctx.now ?? new Date(), days, ctx.timeZone);
  return aggregateOverall(await mealsFor(ctx, window), window);
}

export async function getWeeklyDashboard(
  ctx: DashboardContext,
  range: { start?: string | null; end?: string | null }
): Promise<WeeklyDashboard> {
  const window = weeklyWindow(range, ctx.now ?? new Date(), ctx.timeZone);
  return aggregateWeekly(await mealsFor(ctx, window), window);
}

export async function getDailyDashboard(ctx: DashboardContext, date?: string | null): Promise<DailyDashboard> {
  const window = dailyWindow(date, ctx.now ?? new Date(), ctx.timeZone);
  return aggregateDaily(await mealsFor(ctx, window), window);
}
