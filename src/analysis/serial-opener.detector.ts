import { BehaviorType, EngagementType, VisitRecord } from '../shared/types';
import { AdaptiveThresholdCalculator } from './adaptive-threshold.calculator';
import {
  InferredPurpose,
  TimePattern,
  actionableSuggestion,
  behavioralInsight,
  efficiencyScore,
  inferPurpose,
  timePatterns,
} from './serial-opener.insights';
import { normalizeUrl } from './url-normalizer';

const HOUR_MS = 3_600_000;

export interface SerialOpenerStats {
  normalized_url: string;
  url: string;
  title: string;
  domain: string;
  category: string | null;
  visit_count: number;
  url_variations_count: number;
  first_visit_at: string;
  last_visit_at: string;
  time_span_hours: number;
  avg_hours_between_visits: number | null;
  visits_per_day: number;
  total_engagement_seconds: number;
  avg_engagement_per_visit: number;
}

export interface SerialOpener extends SerialOpenerStats {
  behavior_type: BehaviorType;
  engagement_type: EngagementType;
  inferred_purpose: InferredPurpose;
  efficiency_score: number;
  behavioral_insight: string;
  actionable_suggestion: string;
  peak_hours: number[];
  most_active_day: string | null;
  time_pattern: TimePattern;
}

type Group = {
  key: string;
  visits: VisitRecord[];
  first: number;
  last: number;
};

const round = (n: number, digits: number) => {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
};

function groupByResource(visits: readonly VisitRecord[]): Group[] {
  const groups = new Map<string, Group>();
  for (const v of visits) {
    const key = normalizeUrl(v.url);
    const g = groups.get(key);
    if (!g) {
      groups.set(key, { key, visits: [v], first: v.visited_at, last: v.visited_at });
      continue;
    }
    g.visits.push(v);
    g.first = Math.min(g.first, v.visited_at);
    g.last = Math.max(g.last, v.visited_at);
  }
  return [...groups.values()];
}

function statsFor(g: Group, days: number) {
  const latest = g.visits.reduce((a, b) => (b.visited_at > a.visited_at ? b : a));
  const n = g.visits.length;
  const spanHours = (g.last - g.first) / HOUR_MS;
  const engagement = g.visits.reduce((s, v) => s + (v.active_duration_seconds ?? 0), 0);
  const avgHours = n > 1 && spanHours > 0 ? spanHours / (n - 1) : null;
  const perDay = days > 0 ? n / days : 0;
  const avgEngagement = engagement / n;
  const stats: SerialOpenerStats = {
    normalized_url: g.key,
    url: latest.url,
    title: latest.title,
    domain: latest.domain,
    category: latest.category ?? null,
    visit_count: n,
    url_variations_count: new Set(g.visits.map((v) => v.url)).size,
    first_visit_at: new Date(g.first).toISOString(),
    last_visit_at: new Date(g.last).toISOString(),
    time_span_hours: round(spanHours, 1),
    avg_hours_between_visits: avgHours === null ? null : round(avgHours, 2),
    visits_per_day: round(perDay, 1),
    total_engagement_seconds: round(engagement, 1),
    avg_engagement_per_visit: round(avgEngagement, 1),
  };
  return { stats, avgHours, perDay, engagement, avgEngagement };
}

/**
 * Finds resources that are reopened at a steady rate but never really read.
 * Visits are grouped by normalized URL, so links that differ only in
 * tracking or view parameters count as one resource. Results are ordered
 * by visit count, most recent last visit first on ties.
 */
export function detectSerialOpeners(
  visits: readonly VisitRecord[],
  calculator: AdaptiveThresholdCalculator,
): SerialOpener[] {
  const days = calculator.daysInPeriod;
  const minVisits = calculator.minSerialOpenerVisits();
  const maxEngagement = calculator.maxSerialOpenerEngagementSeconds();

  return groupByResource(visits)
    .filter(
      (g) =>
        g.visits.length >= minVisits &&
        calculator.qualifiesAsSerialOpener(g.visits.length, days),
    )
    .map((g) => ({ g, ...statsFor(g, days) }))
    .filter(({ engagement }) => engagement <= maxEngagement)
    .sort((a, b) => b.stats.visit_count - a.stats.visit_count || b.g.last - a.g.last)
    .map(({ g, stats, avgHours, perDay, engagement, avgEngagement }) => {
      const behavior = calculator.classifyByFrequency(avgHours);
      const purpose = inferPurpose(stats.domain, stats.title, stats.category);
      const vars = {
        visit_count: stats.visit_count,
        visits_per_day: perDay.toFixed(1),
        avg_seconds: avgEngagement.toFixed(1),
        avg_hours_between: avgHours === null ? 'few' : avgHours.toFixed(1),
        domain: stats.domain,
      };
      return {
        ...stats,
        behavior_type: behavior,
        engagement_type: calculator.classifyEngagement(avgEngagement),
        inferred_purpose: purpose,
        efficiency_score: efficiencyScore(engagement, stats.visit_count),
        behavioral_insight: behavioralInsight(behavior, purpose, vars),
        actionable_suggestion: actionableSuggestion(purpose, vars),
        ...timePatterns(g.visits.map((v) => v.visited_at)),
      };
    });
}
