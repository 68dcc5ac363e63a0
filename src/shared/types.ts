export interface VisitRecord {
  id: string;
  user_id: string;
  url: string;
  domain: string;
  title: string;
  visited_at: number;
  opened_at?: number | null;
  duration_seconds: number | null;
  active_duration_seconds: number | null;
  engagement_rate: number | null;
  category?: string | null;
  metadata: Record<string, unknown>;
}

export interface TabClosureRecord {
  page_visit_id: string;
  closed_at: number;
  total_time_seconds: number;
  active_time_seconds: number;
  scroll_depth_percent: number | null;
}

export type TabStatus = 'closed' | 'unknown';

export interface TabMetadata {
  url: string;
  domain: string;
  title: string;
  visit_count: number;
  is_single_visit: boolean;
  opened_at: number;
  first_visited_at: number;
  last_visited_at: number;
  tab_age_days: number;
  days_since_last_activity: number;
  tab_status: TabStatus;
  closed_at: number | null;
  actual_tab_duration_seconds: number | null;
  total_duration_seconds: number;
  total_engagement_seconds: number;
  average_engagement_rate: number;
  /**
   * Best guess only. Always false for closed tabs; for `unknown` tabs it is
   * true when the latest visit is under an hour old and was still recording
   * a few minutes ago. A false value does not mean the tab is closed.
   */
  is_likely_still_open: boolean;
  is_pinned: boolean;
  most_recent_visit_id: string;
}

export type DomainType =
  | 'productivity_tool'
  | 'content_site'
  | 'code_platform'
  | 'documentation'
  | 'general';

export interface DomainContext {
  domain_type: DomainType;
  should_apply_strict_rules: boolean;
  should_apply_lenient_rules: boolean;
  context_notes: string[];
}

export type ConfidenceLevel = 'excluded' | 'not_hoarder' | 'medium' | 'high';

export type ScoreFactor = 'tab_age' | 'inactivity' | 'visit_pattern' | 'engagement';

export interface FactorScore {
  points: number;
  reason: string;
}

export interface HoarderScoreResult {
  total_score: number;
  is_hoarder: boolean;
  confidence_level: ConfidenceLevel;
  score_breakdown: Partial<Record<ScoreFactor, FactorScore>>;
  reason: string;
}

export type BehaviorType =
  | 'compulsive_checking'
  | 'frequent_monitoring'
  | 'regular_reference'
  | 'periodic_revisit';

export type EngagementType = 'quick_glance' | 'brief_check' | 'scan' | 'shallow_work';

export type SessionType =
  | 'research_session'
  | 'browsing_session'
  | 'quick_search'
  | 'brief_visit';

export interface Session {
  type: SessionType;
  started_at: string;
  ended_at: string;
  duration_seconds: number;
  domains: string[];
  visit_count: number;
  avg_engagement: number;
}

export interface DateRange {
  start: Date;
  end: Date;
  period_label: string;
  is_custom: boolean;
}
