import { subHours } from 'date-fns';
import type { DoseRecommendation } from '@/types';
import { InvalidInputError, NotFoundError } from '@/utils/error';
import type { DataStore } from '@/utils/store';
import { roundTo } from '@/utils/units';
import { calculateDose } from './dose';
import { estimateIob } from './iob';
import { INSULIN_ACTION_MINUTES } from './policy';
import { resolveProfileParameters } from './profile';

export interface AdviceRequest {
  userId: string;
  plannedCarbs: number;
  isf?: number;
  icr?: number;
}

/**
 * Dose recommendation from the user's latest glucose reading, the insulin still
 * on board and their ISF/ICR (request values win over stored or derived ones).
 */
export async function adviseInsulin(
  store: DataStore,
  request: AdviceRequest,
  now: Date = new Date()
): Promise<DoseRecommendation> {
  if (!Number.isFinite(request.plannedCarbs) || request.plannedCarbs < 0) {
    throw new InvalidInputError('planned_carbs must be >= 0');
  }
  for (const [name, value] of Object.entries({ isf: request.isf, icr: request.icr })) {
    if (value !== undefined && !(value > 0)) throw new InvalidInputError(`${name} must be > 0`);
  }

  const latest = await store.latestGlucose(request.userId);
  if (!latest) {
    throw new NotFoundError('No CGM data available. Please sync your sensor first.');
  }

  const doses = await store.listDoses(request.userId, subHours(now, INSULIN_ACTION_MINUTES / 60));
  const iob = estimateIob(doses, now);

  let isf = request.isf;
  let icr = request.icr;
  let source: DoseRecommendation['parameter_source'] = 'request';
  if (isf === undefined || icr === undefined) {
    const resolved = await resolveProfileParameters(store, request.userId, { now });
    isf = isf ?? resolved.isf;
    icr = icr ?? resolved.icr;
    source = resolved.source;
  }

  const dose = calculateDose({
    plannedCarbs: request.plannedCarbs,
    currentBg: latest.value,
    isf,
    icr,
    iob,
  });

  return {
    ...dose,
    iob: roundTo(iob, 2),
    isf_used: isf,
    icr_used: icr,
    parameter_source: source,
  };
}
