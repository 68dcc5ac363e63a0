import { Session, SessionType, VisitRecord } from '../shared/types';

export const SESSION_GAP_SECONDS = 600;
export const DEFAULT_ACTIVITY_LIMIT = 20;
export const MAX_ACTIVITY_LIMIT = 100;

const RESEARCH_MIN_SECONDS = 1800;
const RESEARCH_MIN_VISITS = 10;
const BROWSING_MIN_SECONDS = 600;
const QUICK_SEARCH_MIN_VISITS = 5;

type OpenSession = {
  start: number;
  end: number;
  visits: VisitRecord[];
  domains: Set<string>;
};

export function clampLimit(limit: number | null | undefined): number {
  if (typeof limit !== 'number' || !Number.isFinite(limit))
    return DEFAULT_ACTIVITY_LIMIT;
  return Math.min(MAX_ACTIVITY_LIMIT, Math.max(1, Math.trunc(limit)));
}

export function classifySession(durationSeconds: number, visitCount: number): SessionType {
  if (durationSeconds > RESEARCH_MIN_SECONDS && visitCount > RESEARCH_MIN_VISITS)
    return 'research_session';
  if (durationSeconds > BROWSING_MIN_SECONDS) return 'browsing_session';
  if (visitCount > QUICK_SEARCH_MIN_VISITS) return 'quick_search';
  return 'brief_visit';
}

function finalize(s: OpenSession): Session {
  const duration = Math.floor((s.end - s.start) / 1000);
  const engagement = s.visits.reduce((sum, v) => sum + (v.engagement_rate ?? 0), 0);
  return {
    type: classifySession(duration, s.visits.length),
    started_at: new Date(s.start).toISOString(),
    ended_at: new Date(s.end).toISOString(),
    duration_seconds: duration,
    domains: [...s.domains],
    visit_count: s.visits.length,
    avg_engagement: Math.round((engagement / s.visits.length) * 100) / 100,
  };
}

/**
 * Splits a visit stream into sessions wherever more than
 * `SESSION_GAP_SECONDS` pass without a visit. Newest session first.
 */
export function clusterSessions(
  visits: readonly VisitRecord[],
  limit: number = DEFAULT_ACTIVITY_LIMIT,
): Session[] {
  const ordered = [...visits].sort((a, b) => b.visited_at - a.visited_at);
  const sessions: Session[] = [];
  let current: OpenSession | null = null;

  for (const v of ordered) {
    if (current && (current.start - v.visited_at) / 1000 <= SESSION_GAP_SECONDS) {
      current.start = v.visited_at;
      current.visits.push(v);
      current.domains.add(v.domain);
      continue;
    }
    if (current) sessions.push(finalize(current));
    current = {
      start: v.visited_at,
      end: v.visited_at,
      visits: [v],
      domains: new Set([v.domain]),
    };
  }
  if (current) sessions.push(finalize(current));

  return sessions.slice(0, clampLimit(limit));
}
