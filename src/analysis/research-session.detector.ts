import { VisitRecord } from '../shared/types';
import { normalizeHost } from './domain-context.analyzer';

export const DEFAULT_MIN_TABS = 3;
export const DEFAULT_TIME_WINDOW_MINUTES = 15;
export const DEFAULT_MIN_DURATION_MINUTES = 10;

const MINUTE_MS = 60_000;
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export interface ResearchSessionCriteria {
  min_tabs: number;
  time_window_minutes: number;
  min_duration_minutes: number;
}

export interface ResearchSession {
  session_name: string;
  session_start: string;
  session_end: string;
  tab_count: number;
  primary_domain: string | null;
  domains: string[];
  total_duration_seconds: number;
  avg_engagement_rate: number;
  page_visit_ids: string[];
  status: 'detected';
}

export const DEFAULT_RESEARCH_CRITERIA: ResearchSessionCriteria = {
  min_tabs: DEFAULT_MIN_TABS,
  time_window_minutes: DEFAULT_TIME_WINDOW_MINUTES,
  min_duration_minutes: DEFAULT_MIN_DURATION_MINUTES,
};

const pad = (n: number) => String(n).padStart(2, '0');

/** `Oct 20, 09:05AM`, in UTC. */
function formatStamp(ms: number): string {
  const d = new Date(ms);
  const h = d.getUTCHours();
  const h12 = h % 12 === 0 ? 12 : h % 12;
  return `${MONTHS[d.getUTCMonth()]} ${pad(d.getUTCDate())}, ${pad(h12)}:${pad(
    d.getUTCMinutes(),
  )}${h < 12 ? 'AM' : 'PM'}`;
}

export function sessionName(primaryDomain: string | null, start: number): string {
  const label = primaryDomain ? normalizeHost(primaryDomain, '').split('.')[0] : '';
  const name = label
    ? label.charAt(0).toUpperCase() + label.slice(1).toLowerCase()
    : 'Research';
  return `${name} - ${formatStamp(start)}`;
}

function primaryDomainOf(visits: readonly VisitRecord[]): string | null {
  const counts = new Map<string, number>();
  for (const v of visits) if (v.domain) counts.set(v.domain, (counts.get(v.domain) ?? 0) + 1);
  let best: string | null = null;
  let bestCount = 0;
  for (const [domain, count] of counts) {
    if (count > bestCount) {
      best = domain;
      bestCount = count;
    }
  }
  return best;
}

function build(visits: VisitRecord[]): ResearchSession {
  const start = visits[0].visited_at;
  const end = visits[visits.length - 1].visited_at;
  const primary = primaryDomainOf(visits);
  const engagement = visits.reduce((sum, v) => sum + (v.engagement_rate ?? 0), 0);
  return {
    session_name: sessionName(primary, start),
    session_start: new Date(start).toISOString(),
    session_end: new Date(end).toISOString(),
    tab_count: visits.length,
    primary_domain: primary,
    domains: [...new Set(visits.map((v) => v.domain).filter(Boolean))],
    total_duration_seconds: visits.reduce((sum, v) => sum + (v.duration_seconds ?? 0), 0),
    avg_engagement_rate: Math.round((engagement / visits.length) * 100) / 100,
    page_visit_ids: visits.map((v) => v.id),
    status: 'detected',
  };
}

/**
 * Finds bursts of tab opening: runs of at least `min_tabs` visits that all fall
 * within `time_window_minutes` of the run's first visit, and whose first and
 * last visits are at least `min_duration_minutes` apart. Oldest first.
 */
export function detectResearchSessions(
  visits: readonly VisitRecord[],
  criteria: ResearchSessionCriteria = DEFAULT_RESEARCH_CRITERIA,
): ResearchSession[] {
  const windowMs = criteria.time_window_minutes * MINUTE_MS;
  const minDurationMs = criteria.min_duration_minutes * MINUTE_MS;
  const ordered = [...visits].sort((a, b) => a.visited_at - b.visited_at);

  const runs: VisitRecord[][] = [];
  let current: VisitRecord[] = [];
  for (const v of ordered) {
    if (current.length && v.visited_at - current[0].visited_at <= windowMs) {
      current.push(v);
      continue;
    }
    if (current.length) runs.push(current);
    current = [v];
  }
  if (current.length) runs.push(current);

  return runs
    .filter(
      (run) =>
        run.length >= criteria.min_tabs &&
        run[run.length - 1].visited_at - run[0].visited_at >= minDurationMs,
    )
    .map(build);
}
