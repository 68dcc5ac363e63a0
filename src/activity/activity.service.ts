import { Injectable, Logger } from '@nestjs/common';
import { MAX_VISITS_PER_READ, VisitsRepository } from '../visits/visits.repository';
import { clampLimit, clusterSessions } from '../analysis/session-clusterer';
import { Session } from '../shared/types';

export const DEFAULT_SINCE_MS = 24 * 3_600_000;

@Injectable()
export class ActivityService {
  private readonly logger = new Logger(ActivityService.name);
  constructor(private repo: VisitsRepository) {}

  async recent(
    user_id: string,
    opts: { limit?: number; since?: string } = {},
    now = Date.now(),
  ): Promise<{ activities: Session[] }> {
    const since = this.parseSince(opts.since, now);
    const visits = await this.repo.listSince(user_id, since, MAX_VISITS_PER_READ);
    return { activities: clusterSessions(visits, clampLimit(opts.limit)) };
  }

  private parseSince(raw: string | undefined, now: number) {
    if (!raw) return now - DEFAULT_SINCE_MS;
    const ms = Date.parse(raw);
    if (Number.isNaN(ms)) {
      this.logger.warn(`ignoring unparsable since=${raw}`);
      return now - DEFAULT_SINCE_MS;
    }
    return ms;
  }
}
