import { BehaviorType } from '../shared/types';

export const SIGNIFICANT_CHANGE_PERCENT = 20;

export type Trend = 'increasing' | 'decreasing' | 'stable';

export interface ComparableOpener {
  normalized_url: string;
  title: string;
  domain: string;
  visit_count: number;
  total_engagement_seconds: number;
  behavior_type: BehaviorType;
}

export interface MetricComparison {
  current: number;
  previous: number;
  change: number;
  percent_change: number;
  trend: Trend;
}

export type ResourceComparison =
  | {
      url: string;
      title: string;
      domain: string;
      status: 'continued';
      visit_count_change: number;
      visit_count_percent_change: number;
      engagement_change: number;
      behavior_type_current: BehaviorType;
      behavior_type_previous: BehaviorType;
      behavior_changed: boolean;
    }
  | {
      url: string;
      title: string;
      domain: string;
      status: 'new';
      visit_count: number;
      visit_count_change: number;
      behavior_type: BehaviorType;
      insight: string;
    }
  | {
      url: string;
      title: string;
      domain: string;
      status: 'resolved';
      previous_visit_count: number;
      visit_count_change: number;
      insight: string;
    };

export interface BehavioralChange {
  url: string;
  title: string;
  domain: string;
  from: BehaviorType;
  to: BehaviorType;
  direction: 'improved' | 'worsened';
  visit_count_change: number;
}

export interface PeriodComparison {
  overall: {
    total_serial_openers: MetricComparison;
    total_visits: MetricComparison;
    total_engagement_seconds: MetricComparison;
  };
  by_resource: ResourceComparison[];
  behavioral_changes: BehavioralChange[];
  summary: string;
}

const SEVERITY: Record<BehaviorType, number> = {
  compulsive_checking: 4,
  frequent_monitoring: 3,
  regular_reference: 2,
  periodic_revisit: 1,
};

export function percentChange(current: number, previous: number): number {
  if (current === 0 && previous === 0) return 0;
  if (previous === 0) return 100;
  if (current === 0) return -100;
  return Math.round(((current - previous) / previous) * 1000) / 10;
}

export function trendOf(percent: number): Trend {
  if (percent > SIGNIFICANT_CHANGE_PERCENT) return 'increasing';
  if (percent < -SIGNIFICANT_CHANGE_PERCENT) return 'decreasing';
  return 'stable';
}

function compare(current: number, previous: number): MetricComparison {
  const percent = percentChange(current, previous);
  return {
    current,
    previous,
    change: Math.round((current - previous) * 10) / 10,
    percent_change: percent,
    trend: trendOf(percent),
  };
}

const sum = (xs: readonly ComparableOpener[], f: (o: ComparableOpener) => number) =>
  Math.round(xs.reduce((s, o) => s + f(o), 0) * 10) / 10;

function byUrl<T extends ComparableOpener>(xs: readonly T[]): Map<string, T> {
  return new Map(xs.map((o) => [o.normalized_url, o]));
}

function resourceChanges(
  current: Map<string, ComparableOpener>,
  previous: Map<string, ComparableOpener>,
): ResourceComparison[] {
  const out: ResourceComparison[] = [];
  for (const [url, cur] of current) {
    const prev = previous.get(url);
    if (!prev) {
      out.push({
        url,
        title: cur.title,
        domain: cur.domain,
        status: 'new',
        visit_count: cur.visit_count,
        visit_count_change: cur.visit_count,
        behavior_type: cur.behavior_type,
        insight: 'New pattern emerged this period',
      });
      continue;
    }
    const visitDelta = cur.visit_count - prev.visit_count;
    const behaviorChanged = cur.behavior_type !== prev.behavior_type;
    if (visitDelta === 0 && !behaviorChanged) continue;
    out.push({
      url,
      title: cur.title,
      domain: cur.domain,
      status: 'continued',
      visit_count_change: visitDelta,
      visit_count_percent_change: percentChange(cur.visit_count, prev.visit_count),
      engagement_change:
        Math.round((cur.total_engagement_seconds - prev.total_engagement_seconds) * 10) / 10,
      behavior_type_current: cur.behavior_type,
      behavior_type_previous: prev.behavior_type,
      behavior_changed: behaviorChanged,
    });
  }
  for (const [url, prev] of previous) {
    if (current.has(url)) continue;
    out.push({
      url,
      title: prev.title,
      domain: prev.domain,
      status: 'resolved',
      previous_visit_count: prev.visit_count,
      visit_count_change: -prev.visit_count,
      insight: 'No longer a serial opener - pattern improved!',
    });
  }
  return out.sort(
    (a, b) => Math.abs(b.visit_count_change) - Math.abs(a.visit_count_change),
  );
}

function behavioralChanges(
  current: Map<string, ComparableOpener>,
  previous: Map<string, ComparableOpener>,
): BehavioralChange[] {
  const out: BehavioralChange[] = [];
  for (const [url, cur] of current) {
    const prev = previous.get(url);
    if (!prev || SEVERITY[prev.behavior_type] === SEVERITY[cur.behavior_type]) continue;
    out.push({
      url,
      title: cur.title,
      domain: cur.domain,
      from: prev.behavior_type,
      to: cur.behavior_type,
      direction:
        SEVERITY[cur.behavior_type] > SEVERITY[prev.behavior_type]
          ? 'worsened'
          : 'improved',
      visit_count_change: cur.visit_count - prev.visit_count,
    });
  }
  return out.sort((a, b) => SEVERITY[b.to] - SEVERITY[a.to]);
}

function summarize(
  visits: MetricComparison,
  changes: readonly BehavioralChange[],
): string {
  const messages: string[] = [];
  const pct = Math.round(Math.abs(visits.percent_change));
  if (visits.trend === 'increasing')
    messages.push(`Serial opener activity increased by ${pct}%`);
  else if (visits.trend === 'decreasing')
    messages.push(`Serial opener activity decreased by ${pct}% - improvement!`);
  else messages.push('Serial opener activity remained stable');

  const worsened = changes.filter((c) => c.direction === 'worsened').length;
  const improved = changes.length - worsened;
  if (worsened > 0) messages.push(`${worsened} resources worsened`);
  if (improved > 0) messages.push(`${improved} resources improved`);
  return messages.join('. ');
}

/** Period-over-period view of two serial opener lists, matched by normalized URL. */
export function comparePeriods(
  currentOpeners: readonly ComparableOpener[],
  previousOpeners: readonly ComparableOpener[],
): PeriodComparison {
  const current = byUrl(currentOpeners);
  const previous = byUrl(previousOpeners);
  const totalVisits = compare(
    sum(currentOpeners, (o) => o.visit_count),
    sum(previousOpeners, (o) => o.visit_count),
  );
  const changes = behavioralChanges(current, previous);
  return {
    overall: {
      total_serial_openers: compare(currentOpeners.length, previousOpeners.length),
      total_visits: totalVisits,
      total_engagement_seconds: compare(
        sum(currentOpeners, (o) => o.total_engagement_seconds),
        sum(previousOpeners, (o) => o.total_engagement_seconds),
      ),
    },
    by_resource: resourceChanges(current, previous),
    behavioral_changes: changes,
    summary: summarize(totalVisits, changes),
  };
}
