import { TabClosureRecord, TabMetadata, VisitRecord } from '../shared/types';
import { DAY_MS } from './date-range';

const STILL_OPEN_RECENCY_MS = 60 * 60 * 1000;
const STILL_OPEN_HEARTBEAT_SLACK_MS = 5 * 60 * 1000;

function roundTenth(n: number): number {
  return Math.round(n * 10) / 10;
}

function daysBetween(from: number, to: number): number {
  return Math.max(0, roundTenth((to - from) / DAY_MS));
}

function likelyStillOpen(last: VisitRecord, now: number): boolean {
  const elapsed = now - last.visited_at;
  if (elapsed < 0 || elapsed >= STILL_OPEN_RECENCY_MS) return false;
  if (last.duration_seconds === null || last.duration_seconds <= 0) return false;
  // recording reached close to now, so the visit has not ended yet
  return (
    last.visited_at + last.duration_seconds * 1000 >=
    now - STILL_OPEN_HEARTBEAT_SLACK_MS
  );
}

/**
 * Reduces the visits of one tab into lifecycle metadata.
 *
 * Age and recency are measured against the closure time when the tab is
 * known to be closed and against `now` otherwise.
 */
export function calculateTabMetadata(
  visits: readonly VisitRecord[],
  closure: TabClosureRecord | null = null,
  now: number = Date.now(),
): TabMetadata | null {
  if (visits.length === 0) return null;

  const sorted = [...visits].sort((a, b) => a.visited_at - b.visited_at);
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  const openedAt = Math.min(first.opened_at ?? first.visited_at, first.visited_at);
  const anchor = closure ? closure.closed_at : now;

  let totalDuration = 0;
  let totalEngagement = 0;
  let rateSum = 0;
  for (const v of sorted) {
    totalDuration += v.duration_seconds ?? 0;
    totalEngagement += v.active_duration_seconds ?? 0;
    rateSum += v.engagement_rate ?? 0;
  }

  return {
    url: first.url,
    domain: first.domain,
    title: last.title,
    visit_count: sorted.length,
    is_single_visit: sorted.length === 1,
    opened_at: openedAt,
    first_visited_at: first.visited_at,
    last_visited_at: last.visited_at,
    tab_age_days: daysBetween(openedAt, anchor),
    days_since_last_activity: daysBetween(last.visited_at, anchor),
    tab_status: closure ? 'closed' : 'unknown',
    closed_at: closure ? closure.closed_at : null,
    actual_tab_duration_seconds: closure ? closure.total_time_seconds : null,
    total_duration_seconds: totalDuration,
    total_engagement_seconds: totalEngagement,
    average_engagement_rate: rateSum / sorted.length,
    is_likely_still_open: closure ? false : likelyStillOpen(last, now),
    is_pinned: last.metadata.pinned === true,
    most_recent_visit_id: last.id,
  };
}
