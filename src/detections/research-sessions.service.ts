import { Injectable } from '@nestjs/common';
import { VisitsRepository } from '../visits/visits.repository';
import { DAY_MS } from '../analysis/date-range';
import {
  DEFAULT_RESEARCH_CRITERIA,
  ResearchSession,
  ResearchSessionCriteria,
  detectResearchSessions,
} from '../analysis/research-session.detector';

export const RESEARCH_LOOKBACK_DAYS = 30;

export interface ResearchSessionsQuery extends Partial<ResearchSessionCriteria> {
  lookback_days?: number;
}

export interface ResearchSessionsResult {
  research_sessions: ResearchSession[];
  count: number;
  criteria: ResearchSessionCriteria & { lookback_days: number };
}

@Injectable()
export class ResearchSessionsService {
  constructor(private repo: VisitsRepository) {}

  async detect(
    user_id: string,
    q: ResearchSessionsQuery = {},
    now = Date.now(),
  ): Promise<ResearchSessionsResult> {
    const lookback_days = q.lookback_days ?? RESEARCH_LOOKBACK_DAYS;
    const criteria: ResearchSessionCriteria = {
      min_tabs: q.min_tabs ?? DEFAULT_RESEARCH_CRITERIA.min_tabs,
      time_window_minutes:
        q.time_window_minutes ?? DEFAULT_RESEARCH_CRITERIA.time_window_minutes,
      min_duration_minutes:
        q.min_duration_minutes ?? DEFAULT_RESEARCH_CRITERIA.min_duration_minutes,
    };
    const visits = await this.repo.listInRange(
      user_id,
      now - lookback_days * DAY_MS,
      now,
    );
    const sessions = detectResearchSessions(visits, criteria);
    return {
      research_sessions: sessions,
      count: sessions.length,
      criteria: { ...criteria, lookback_days },
    };
  }
}
