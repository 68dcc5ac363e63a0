import { scoreHoarder } from './hoarder.scorer';
import { analyzeDomainContext } from './domain-context.analyzer';
import { makeMeta } from '../testing/fixtures';
import { TabMetadata } from '../shared/types';

function score(meta: TabMetadata) {
  return scoreHoarder(meta, analyzeDomainContext(meta.domain, meta.url, meta));
}

const forgottenArticle = makeMeta({
  url: 'https://medium.com/@writer/long-read',
  domain: 'medium.com',
  tab_age_days: 8,
  days_since_last_activity: 7,
  average_engagement_rate: 0.05,
});

describe('scoreHoarder', () => {
  it('scores a forgotten single-visit article as a high-confidence hoarder', () => {
    const r = score(forgottenArticle);
    expect(r.is_hoarder).toBe(true);
    expect(r.confidence_level).toBe('high');
    expect(r.total_score).toBe(95);
    expect(r.score_breakdown).toEqual({
      tab_age: { points: 45, reason: 'Tab open for 8.0 days (3+ days)' },
      inactivity: { points: 25, reason: 'No activity for 7.0 days on a content_site' },
      visit_pattern: { points: 20, reason: 'Opened once and forgotten' },
      engagement: { points: 5, reason: 'Low engagement (5.0%)' },
    });
    expect(r.reason).toBe(
      'Tab open for 8.0 days (3+ days) • No activity for 7.0 days on a content_site • Opened once and forgotten',
    );
  });

  it('excludes the same tab when pinned', () => {
    const r = score({ ...forgottenArticle, is_pinned: true });
    expect(r).toEqual({
      total_score: 0,
      is_hoarder: false,
      confidence_level: 'excluded',
      score_breakdown: {},
      reason: 'Excluded: Pinned tab',
    });
  });

  it('excludes a productivity tool used today', () => {
    const r = score(
      makeMeta({
        url: 'https://notion.so/roadmap',
        domain: 'notion.so',
        tab_age_days: 12,
        days_since_last_activity: 0.2,
        average_engagement_rate: 0,
      }),
    );
    expect(r.confidence_level).toBe('excluded');
    expect(r.reason).toBe('Excluded: Productivity tool with recent activity');
  });

  it('lands on the medium tier at exactly 60 points', () => {
    const r = score(
      makeMeta({
        visit_count: 2,
        is_single_visit: false,
        tab_age_days: 4,
        days_since_last_activity: 2,
        average_engagement_rate: 0.2,
      }),
    );
    expect(r.total_score).toBe(60);
    expect(r.confidence_level).toBe('medium');
    expect(r.reason).toBe('Tab open for 4.0 days (3+ days) • No activity for 2.0 days');
  });

  it('explains why a young tab is not a hoarder', () => {
    const r = score(
      makeMeta({ tab_age_days: 2, days_since_last_activity: 0.5, average_engagement_rate: 0.4 }),
    );
    expect(r.total_score).toBe(30);
    expect(r.is_hoarder).toBe(false);
    expect(r.confidence_level).toBe('not_hoarder');
    expect(r.reason).toBe('Not a hoarder tab (open 2.0 days, idle 0.5 days)');
  });

  it('ignores inactivity on revisited documentation', () => {
    const r = score(
      makeMeta({
        url: 'https://docs.python.org/3/',
        domain: 'docs.python.org',
        visit_count: 3,
        is_single_visit: false,
        tab_age_days: 6,
        days_since_last_activity: 5,
        average_engagement_rate: 0.02,
      }),
    );
    expect(r.score_breakdown.inactivity).toEqual({
      points: 0,
      reason: 'No activity for 5.0 days, ignored for documentation',
    });
    expect(r.score_breakdown.engagement?.points).toBe(8);
    expect(r.total_score).toBe(53);
    expect(r.is_hoarder).toBe(false);
  });

  it('never scores a pinned tab', () => {
    for (const age of [0, 1, 5, 30])
      for (const rate of [0, 0.05, 0.5]) {
        const r = score(
          makeMeta({
            is_pinned: true,
            tab_age_days: age,
            days_since_last_activity: age,
            average_engagement_rate: rate,
          }),
        );
        expect(r.total_score).toBe(0);
        expect(r.is_hoarder).toBe(false);
      }
  });
});
