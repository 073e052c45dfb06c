import type { GlucoseInsight, GlucoseReading } from '@/types';
import { zonedParts } from '@/utils/date';

export const RANGE_LOW = 70;
export const RANGE_HIGH = 180;
const SEVERE_LOW = 54;
const SEVERE_HIGH = 250;

const fmt0 = (n: number) => n.toFixed(0);

/** Runs of consecutive readings matching `predicate`, with the extreme value seen. */
function episodes(values: number[], predicate: (v: number) => boolean, pick: (a: number, b: number) => number) {
  let count = 0;
  let inEpisode = false;
  let extreme: number | null = null;
  for (const v of values) {
    if (predicate(v)) {
      if (!inEpisode) {
        count += 1;
        inEpisode = true;
      }
      extreme = extreme === null ? v : pick(extreme, v);
    } else {
      inEpisode = false;
    }
  }
  return { count, extreme: extreme ?? 0 };
}

/**
 * Pattern insights over a day of readings (oldest first, 5-minute cadence):
 * time in range, variability, hypo/hyper episodes, 30-minute trend, dawn
 * phenomenon, post-meal spikes and the daily average with estimated A1C.
 */
export function generatePersonalInsights(readings: GlucoseReading[], timeZone: string): GlucoseInsight[] {
  const values = readings.map((r) => r.value);
  if (values.length === 0) {
    return [{ icon: 'info', title: 'No Data', body: 'Not enough readings to generate insights.', severity: 'info' }];
  }

  const n = values.length;
  const avg = values.reduce((s, v) => s + v, 0) / n;
  const std = n > 1 ? Math.sqrt(values.reduce((s, v) => s + (v - avg) ** 2, 0) / n) : 0;
  const cv = avg > 0 ? (std / avg) * 100 : 0;
  const latest = values[n - 1];
  const minVal = Math.min(...values);
  const maxVal = Math.max(...values);

  const inRange = values.filter((v) => v >= RANGE_LOW && v <= RANGE_HIGH).length;
  const below = values.filter((v) => v < RANGE_LOW).length;
  const above = values.filter((v) => v > RANGE_HIGH).length;
  const tirPct = Math.round((inRange / n) * 100);
  const belowPct = Math.round((below / n) * 100);
  const abovePct = Math.round((above / n) * 100);

  const insights: GlucoseInsight[] = [];

  if (tirPct >= 70) {
    insights.push({
      icon: 'target',
      title: 'Time in Range',
      body: `${tirPct}% of readings are within target (70-180 mg/dL). This meets the recommended >70% goal — great control today.`,
      severity: 'good',
    });
  } else if (tirPct >= 50) {
    insights.push({
      icon: 'target',
      title: 'Time in Range',
      body: `${tirPct}% of readings are within target (70-180 mg/dL). Aim for >70%. Consider reviewing meal timing and portions.`,
      severity: 'warning',
    });
  } else {
    insights.push({
      icon: 'target',
      title: 'Time in Range',
      body: `Only ${tirPct}% of readings are in range. ${abovePct}% above and ${belowPct}% below target. This needs attention.`,
      severity: 'danger',
    });
  }

  if (cv < 36) {
    insights.push({
      icon: 'variability',
      title: 'Glucose Stability',
      body: `Your glucose variability (CV ${fmt0(cv)}%) is stable. A CV below 36% indicates consistent glucose levels.`,
      severity: 'good',
    });
  } else {
    insights.push({
      icon: 'variability',
      title: 'High Glucose Swings',
      body: `Your glucose variability is elevated (CV ${fmt0(cv)}%). Frequent swings between ${fmt0(minVal)} and ${fmt0(maxVal)} mg/dL. Consider smaller, more frequent meals with lower GI foods.`,
      severity: 'warning',
    });
  }

  if (below > 0) {
    const hypo = episodes(values, (v) => v < RANGE_LOW, Math.min);
    const severe = hypo.extreme < SEVERE_LOW;
    let body = `Detected ${hypo.count} low glucose episode${hypo.count > 1 ? 's' : ''} (below 70 mg/dL), reaching as low as ${fmt0(hypo.extreme)} mg/dL.`;
    body += severe
      ? ' Readings below 54 mg/dL are clinically significant — review insulin dosing with your care team.'
      : ' Consider reducing insulin dose before similar activities or having a fast-acting carb on hand.';
    insights.push({ icon: 'hypo', title: 'Low Glucose Alert', body, severity: severe ? 'danger' : 'warning' });
  }

  if (above > 0) {
    const hyper = episodes(values, (v) => v > RANGE_HIGH, Math.max);
    const severe = hyper.extreme > SEVERE_HIGH;
    let body = `Detected ${hyper.count} high glucose episode${hyper.count > 1 ? 's' : ''} (above 180 mg/dL), peaking at ${fmt0(hyper.extreme)} mg/dL.`;
    body += severe
      ? ' Sustained highs above 250 mg/dL increase risk of complications. Review carb intake and insulin timing.'
      : ' Post-meal spikes can be reduced by pairing carbs with protein or fat, or taking a short walk after eating.';
    insights.push({ icon: 'hyper', title: 'High Glucose Alert', body, severity: severe ? 'danger' : 'warning' });
  }

  // Trend over the last 30 minutes (6 readings)
  if (n >= 6) {
    const recent = values.slice(-6);
    const trendDiff = recent[5] - recent[0];
    const rate = trendDiff / 30; // mg/dL per minute
    if (rate > 2) {
      insights.push({
        icon: 'trend_up',
        title: 'Rapidly Rising',
        body: `Glucose has risen ${fmt0(trendDiff)} mg/dL in the last 30 minutes (${rate.toFixed(1)} mg/dL/min). This may indicate a recent high-GI meal. Consider activity or correction.`,
        severity: 'warning',
      });
    } else if (rate < -2) {
      insights.push({
        icon: 'trend_down',
        title: 'Rapidly Dropping',
        body: `Glucose has dropped ${fmt0(Math.abs(trendDiff))} mg/dL in the last 30 minutes (${Math.abs(rate).toFixed(1)} mg/dL/min). Monitor closely and have fast-acting carbs ready if needed.`,
        severity: 'warning',
      });
    } else if (Math.abs(trendDiff) < 10) {
      insights.push({
        icon: 'trend_stable',
        title: 'Stable Trend',
        body: `Glucose has been steady over the last 30 minutes (currently ${fmt0(latest)} mg/dL). Your current management is working well.`,
        severity: 'good',
      });
    }
  }

  // Dawn phenomenon: 04:00-08:00 average well above 00:00-04:00
  const dawn: number[] = [];
  const night: number[] = [];
  for (const r of readings) {
    const { hour } = zonedParts(r.timestamp, timeZone);
    if (hour >= 4 && hour < 8) dawn.push(r.value);
    else if (hour < 4) night.push(r.value);
  }
  if (dawn.length > 0 && night.length > 0) {
    const dawnAvg = dawn.reduce((s, v) => s + v, 0) / dawn.length;
    const nightAvg = night.reduce((s, v) => s + v, 0) / night.length;
    if (dawnAvg - nightAvg > 20) {
      insights.push({
        icon: 'dawn',
        title: 'Dawn Phenomenon',
        body: `Your glucose rises an average of ${fmt0(dawnAvg - nightAvg)} mg/dL between midnight and early morning (${fmt0(nightAvg)} → ${fmt0(dawnAvg)} mg/dL). This is common and may be managed with basal insulin adjustments.`,
        severity: 'info',
      });
    }
  }

  // Post-meal spikes: rises > 50 mg/dL inside 2-hour windows
  if (n >= 24) {
    let spikeCount = 0;
    let maxSpike = 0;
    for (let i = 0; i < n - 24; i++) {
      const window = values.slice(i, i + 24);
      const trough = Math.min(...window.slice(0, 6));
      const peak = Math.max(...window.slice(6));
      const spike = peak - trough;
      if (spike > 50) {
        spikeCount += 1;
        maxSpike = Math.max(maxSpike, spike);
      }
    }
    // Only distinct spikes, not a continuous high
    if (spikeCount > 0 && spikeCount <= 10) {
      insights.push({
        icon: 'spike',
        title: 'Post-Meal Spikes Detected',
        body: `Detected glucose spikes of up to ${fmt0(maxSpike)} mg/dL after meals. Pre-bolusing insulin 15-20 minutes before eating, or choosing lower-GI foods, can help flatten these spikes.`,
        severity: 'warning',
      });
    }
  }

  const a1c = (avg + 46.7) / 28.7;
  const avgText = `Average glucose today is ${fmt0(avg)} mg/dL (estimated A1C: ${a1c.toFixed(1)}%).`;
  if (avg < 140) {
    insights.push({ icon: 'average', title: 'Daily Average', body: `${avgText} This is within a healthy range — keep it up.`, severity: 'good' });
  } else if (avg < 180) {
    insights.push({
      icon: 'average',
      title: 'Daily Average',
      body: `${avgText} Slightly elevated — consider increasing activity or reviewing carb portions.`,
      severity: 'warning',
    });
  } else {
    insights.push({
      icon: 'average',
      title: 'Daily Average',
      body: `${avgText} This is above target and warrants attention to diet and insulin dosing.`,
      severity: 'danger',
    });
  }

  return insights;
}
