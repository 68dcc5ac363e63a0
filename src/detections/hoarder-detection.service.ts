import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { VisitsRepository } from '../visits/visits.repository';
import { DAY_MS } from '../analysis/date-range';
import { calculateTabMetadata } from '../analysis/tab-age.calculator';
import {
  analyzeDomainContext,
  normalizeHost,
} from '../analysis/domain-context.analyzer';
import { scoreHoarder } from '../analysis/hoarder.scorer';
import { ValueBreakdown, rankByValue } from '../analysis/value-ranker';
import { clampLimit } from '../analysis/session-clusterer';
import {
  ConfidenceLevel,
  FactorScore,
  ScoreFactor,
  TabStatus,
  VisitRecord,
} from '../shared/types';
import { HoarderSort } from './dto/detections.dto';

export const DEFAULT_LOOKBACK_DAYS = 30;
const TOP_DOMAINS = 5;

export interface HoarderFilters {
  lookback_days?: number;
  min_score?: number;
  age_min?: number;
  domain?: string;
  exclude_domains?: string[];
  limit?: number;
  sort_by?: HoarderSort;
}

export interface LinkPreview {
  image?: string;
  favicon?: string;
  description?: string;
  site_name?: string;
}

export interface HoarderTab {
  page_visit_id: string;
  url: string;
  title: string;
  domain: string;
  score: number;
  confidence_level: ConfidenceLevel;
  reason: string;
  first_visited_at: string;
  last_activity_at: string;
  tab_age_days: number;
  days_since_last_activity: number;
  visit_count: number;
  tab_status: TabStatus;
  is_likely_still_open: boolean;
  engagement_rate: number;
  score_breakdown: Partial<Record<ScoreFactor, FactorScore>>;
  suggested_action: string;
  preview: LinkPreview | null;
  value_rank?: number;
  value_breakdown?: ValueBreakdown;
}

export interface HoarderResult {
  summary: {
    total_detected: number;
    showing: number;
    top_domains: Array<{ domain: string; count: number }>;
  };
  hoarder_tabs: HoarderTab[];
  count: number;
}

function suggestAction(level: ConfidenceLevel): string {
  switch (level) {
    case 'high':
      return 'save_to_reading_list_or_close';
    case 'medium':
      return 'save_to_reading_list';
    default:
      return 'review';
  }
}

function extractPreview(metadata: Record<string, unknown>): LinkPreview | null {
  const raw = metadata['preview'];
  if (typeof raw !== 'object' || raw === null) return null;
  const pick = (k: string) => {
    const v: unknown = Reflect.get(raw, k);
    return typeof v === 'string' && v ? v : undefined;
  };
  const preview: LinkPreview = {};
  const image = pick('image');
  const favicon = pick('favicon');
  const description = pick('description');
  const siteName = pick('siteName');
  if (image) preview.image = image;
  if (favicon) preview.favicon = favicon;
  if (description) preview.description = description;
  if (siteName) preview.site_name = siteName;
  return image || favicon || description ? preview : null;
}

function topDomains(tabs: readonly HoarderTab[]) {
  const counts = new Map<string, number>();
  for (const t of tabs) counts.set(t.domain, (counts.get(t.domain) ?? 0) + 1);
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, TOP_DOMAINS)
    .map(([domain, count]) => ({ domain, count }));
}

@Injectable()
export class HoarderDetectionService {
  constructor(
    private repo: VisitsRepository,
    private cfg: ConfigService,
  ) {}

  async detect(
    user_id: string,
    filters: HoarderFilters = {},
    now = Date.now(),
  ): Promise<HoarderResult> {
    const lookback =
      filters.lookback_days ??
      this.cfg.get<number>('INSIGHTS_HOARDER_LOOKBACK_DAYS') ??
      DEFAULT_LOOKBACK_DAYS;
    const from = now - lookback * DAY_MS;
    const [visits, closures] = await Promise.all([
      this.repo.listInRange(user_id, from, now),
      this.repo.listClosures(user_id, from, now),
    ]);

    const groups = new Map<string, VisitRecord[]>();
    for (const v of visits) {
      const g = groups.get(v.url);
      if (g) g.push(v);
      else groups.set(v.url, [v]);
    }

    const detected: HoarderTab[] = [];
    for (const group of groups.values()) {
      const latest = group.reduce((a, b) => (b.visited_at > a.visited_at ? b : a));
      // A tab known to be closed is no longer being kept open.
      if (closures.has(latest.id)) continue;
      const meta = calculateTabMetadata(group, null, now);
      if (!meta) continue;
      const ctx = analyzeDomainContext(meta.domain, meta.url, meta);
      const result = scoreHoarder(meta, ctx);
      if (!result.is_hoarder) continue;
      detected.push({
        page_visit_id: meta.most_recent_visit_id,
        url: meta.url,
        title: meta.title,
        domain: meta.domain,
        score: result.total_score,
        confidence_level: result.confidence_level,
        reason: result.reason,
        first_visited_at: new Date(meta.first_visited_at).toISOString(),
        last_activity_at: new Date(meta.last_visited_at).toISOString(),
        tab_age_days: meta.tab_age_days,
        days_since_last_activity: meta.days_since_last_activity,
        visit_count: meta.visit_count,
        tab_status: meta.tab_status,
        is_likely_still_open: meta.is_likely_still_open,
        engagement_rate: meta.average_engagement_rate,
        score_breakdown: result.score_breakdown,
        suggested_action: suggestAction(result.confidence_level),
        preview: extractPreview(latest.metadata),
      });
    }

    const filtered = this.applyFilters(detected, filters);
    const sorted = this.applySorting(filtered, filters.sort_by ?? 'hoarder_score');
    const shown = sorted.slice(0, clampLimit(filters.limit));
    return {
      summary: {
        total_detected: filtered.length,
        showing: shown.length,
        top_domains: topDomains(filtered),
      },
      hoarder_tabs: shown,
      count: shown.length,
    };
  }

  private applyFilters(tabs: HoarderTab[], f: HoarderFilters) {
    const only = f.domain ? normalizeHost(f.domain, '') : null;
    const excluded = new Set(
      (f.exclude_domains ?? []).map((d) => normalizeHost(d, '')).filter(Boolean),
    );
    return tabs.filter((t) => {
      const host = normalizeHost(t.domain, t.url);
      if (f.min_score !== undefined && t.score < f.min_score) return false;
      if (f.age_min !== undefined && t.tab_age_days < f.age_min) return false;
      if (only && host !== only) return false;
      return !excluded.has(host);
    });
  }

  private applySorting(tabs: HoarderTab[], sort: HoarderSort): HoarderTab[] {
    switch (sort) {
      case 'value_rank':
        return rankByValue(tabs);
      case 'age':
        return [...tabs].sort((a, b) => b.tab_age_days - a.tab_age_days);
      case 'hoarder_score':
        return [...tabs].sort((a, b) => b.score - a.score);
    }
  }
}
