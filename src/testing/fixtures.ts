import { TabMetadata, VisitRecord } from '../shared/types';

export const NOW = Date.UTC(2025, 9, 20, 12, 0, 0);

export function makeVisit(over: Partial<VisitRecord> = {}): VisitRecord {
  return {
    id: 'v1',
    user_id: 'u1',
    url: 'https://example.com/post',
    domain: 'example.com',
    title: 'A post',
    visited_at: NOW,
    duration_seconds: 60,
    active_duration_seconds: 20,
    engagement_rate: 0.3,
    metadata: {},
    ...over,
  };
}

export function makeMeta(over: Partial<TabMetadata> = {}): TabMetadata {
  return {
    url: 'https://example.com/post',
    domain: 'example.com',
    title: 'A post',
    visit_count: 1,
    is_single_visit: true,
    opened_at: NOW,
    first_visited_at: NOW,
    last_visited_at: NOW,
    tab_age_days: 0,
    days_since_last_activity: 0,
    tab_status: 'unknown',
    closed_at: null,
    actual_tab_duration_seconds: null,
    total_duration_seconds: 60,
    total_engagement_seconds: 20,
    average_engagement_rate: 0.3,
    is_likely_still_open: false,
    is_pinned: false,
    most_recent_visit_id: 'v1',
    ...over,
  };
}
