import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { SqliteService } from '../sqlite/sqlite.service';
import { TabClosureRecord, VisitRecord } from '../shared/types';

export const MAX_VISITS_PER_READ = 1000;

export interface PageVisitRow {
  id: string;
  user_id: string;
  url: string;
  title: string | null;
  domain: string | null;
  visited_at: number;
  opened_at: number | null;
  duration_seconds: number | null;
  active_duration_seconds: number | null;
  engagement_rate: number | null;
  category: string | null;
  metadata: string | null;
}

export interface TabAggregateRow {
  page_visit_id: string;
  closed_at: number;
  total_time_seconds: number | null;
  active_time_seconds: number | null;
  scroll_depth_percent: number | null;
}

const metadataSchema = z.record(z.unknown());

const VISIT_COLUMNS =
  'id,user_id,url,title,domain,visited_at,opened_at,duration_seconds,active_duration_seconds,engagement_rate,category,metadata';

export function parseMetadata(raw: string | null): Record<string, unknown> {
  if (!raw) return {};
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return {};
  }
  const r = metadataSchema.safeParse(json);
  return r.success ? r.data : {};
}

export function toVisitRecord(row: PageVisitRow): VisitRecord {
  return {
    id: row.id,
    user_id: row.user_id,
    url: row.url,
    domain: row.domain ?? '',
    title: row.title ?? '',
    visited_at: row.visited_at,
    opened_at: row.opened_at,
    duration_seconds: row.duration_seconds,
    active_duration_seconds: row.active_duration_seconds,
    engagement_rate: row.engagement_rate,
    category: row.category,
    metadata: parseMetadata(row.metadata),
  };
}

function toClosure(row: TabAggregateRow): TabClosureRecord {
  return {
    page_visit_id: row.page_visit_id,
    closed_at: row.closed_at,
    total_time_seconds: row.total_time_seconds ?? 0,
    active_time_seconds: row.active_time_seconds ?? 0,
    scroll_depth_percent: row.scroll_depth_percent,
  };
}

@Injectable()
export class VisitsRepository {
  private readonly logger = new Logger(VisitsRepository.name);
  constructor(private db: SqliteService) {}

  /** Visits with `from <= visited_at < to`, oldest first. */
  async listInRange(user_id: string, from: number, to: number) {
    const rows = await this.db.all<PageVisitRow>(
      `select ${VISIT_COLUMNS} from page_visits where user_id=? and visited_at>=? and visited_at<? order by visited_at asc`,
      [user_id, from, to],
    );
    this.logger.debug(`listInRange user=${user_id} rows=${rows.length}`);
    return rows.map(toVisitRecord);
  }

  /** Newest first, capped at `limit` rows. */
  async listSince(user_id: string, since: number, limit = MAX_VISITS_PER_READ) {
    const rows = await this.db.all<PageVisitRow>(
      `select ${VISIT_COLUMNS} from page_visits where user_id=? and visited_at>=? order by visited_at desc limit ?`,
      [user_id, since, limit],
    );
    return rows.map(toVisitRecord);
  }

  /** Closure records for every visit of the user in the window, keyed by visit id. */
  async listClosures(user_id: string, from: number, to: number) {
    const rows = await this.db.all<TabAggregateRow>(
      `select t.page_visit_id,t.closed_at,t.total_time_seconds,t.active_time_seconds,t.scroll_depth_percent
       from tab_aggregates t join page_visits p on p.id=t.page_visit_id
       where p.user_id=? and p.visited_at>=? and p.visited_at<?
       order by t.closed_at asc`,
      [user_id, from, to],
    );
    const out = new Map<string, TabClosureRecord>();
    for (const r of rows) out.set(r.page_visit_id, toClosure(r));
    return out;
  }
}
