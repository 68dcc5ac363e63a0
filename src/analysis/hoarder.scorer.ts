import {
  ConfidenceLevel,
  DomainContext,
  FactorScore,
  HoarderScoreResult,
  ScoreFactor,
  TabMetadata,
} from '../shared/types';

export const HOARDER_THRESHOLD = 60;
export const HIGH_CONFIDENCE_THRESHOLD = 80;

export const WEIGHTS = {
  tab_age_1_day: 30,
  tab_age_3_days: 45,
  inactive: 15,
  inactive_strict: 25,
  single_visit: 20,
  low_engagement_max: 10,
} as const;

export const LOW_ENGAGEMENT_FLOOR = 0.1;

type Breakdown = Record<ScoreFactor, FactorScore>;

const days = (n: number) => n.toFixed(1);

function tabAgeScore(meta: TabMetadata): FactorScore {
  const age = meta.tab_age_days;
  if (age >= 3)
    return {
      points: WEIGHTS.tab_age_3_days,
      reason: `Tab open for ${days(age)} days (3+ days)`,
    };
  if (age >= 1)
    return {
      points: WEIGHTS.tab_age_1_day,
      reason: `Tab open for ${days(age)} days (1-3 days)`,
    };
  return { points: 0, reason: `Tab recently opened (${days(age)} days)` };
}

function inactivityScore(meta: TabMetadata, ctx: DomainContext): FactorScore {
  const idle = meta.days_since_last_activity;
  if (idle < 1)
    return { points: 0, reason: `Recent activity (${days(idle)} days ago)` };
  if (ctx.should_apply_lenient_rules)
    return {
      points: 0,
      reason: `No activity for ${days(idle)} days, ignored for ${ctx.domain_type}`,
    };
  if (ctx.should_apply_strict_rules)
    return {
      points: WEIGHTS.inactive_strict,
      reason: `No activity for ${days(idle)} days on a ${ctx.domain_type}`,
    };
  return {
    points: WEIGHTS.inactive,
    reason: `No activity for ${days(idle)} days`,
  };
}

function visitPatternScore(meta: TabMetadata, ctx: DomainContext): FactorScore {
  if (ctx.should_apply_strict_rules && meta.visit_count === 1)
    return { points: WEIGHTS.single_visit, reason: 'Opened once and forgotten' };
  return {
    points: 0,
    reason: `${meta.visit_count} visit${meta.visit_count === 1 ? '' : 's'}`,
  };
}

function engagementScore(meta: TabMetadata): FactorScore {
  const rate = Math.max(0, meta.average_engagement_rate);
  const pct = (rate * 100).toFixed(1);
  if (rate >= LOW_ENGAGEMENT_FLOOR)
    return { points: 0, reason: `Engagement: ${pct}%` };
  const points = Math.round(
    ((LOW_ENGAGEMENT_FLOOR - rate) / LOW_ENGAGEMENT_FLOOR) *
      WEIGHTS.low_engagement_max,
  );
  return { points, reason: `Low engagement (${pct}%)` };
}

function exclusionReason(meta: TabMetadata, ctx: DomainContext): string | null {
  if (meta.is_pinned) return 'Excluded: Pinned tab';
  if (ctx.domain_type === 'productivity_tool' && ctx.should_apply_lenient_rules)
    return 'Excluded: Productivity tool with recent activity';
  return null;
}

function confidenceFor(score: number): ConfidenceLevel {
  if (score >= HIGH_CONFIDENCE_THRESHOLD) return 'high';
  if (score >= HOARDER_THRESHOLD) return 'medium';
  return 'not_hoarder';
}

function summarize(score: number, meta: TabMetadata, breakdown: Breakdown) {
  if (score < HOARDER_THRESHOLD)
    return `Not a hoarder tab (open ${days(meta.tab_age_days)} days, idle ${days(meta.days_since_last_activity)} days)`;
  return Object.values(breakdown)
    .filter((f) => f.points > 0)
    .sort((a, b) => b.points - a.points)
    .slice(0, 3)
    .map((f) => f.reason)
    .join(' • ');
}

/**
 * Scores how likely a tab is abandoned clutter. Factors add up
 * independently; pinned tabs and recently used productivity tools are
 * excluded before any factor is looked at.
 */
export function scoreHoarder(
  meta: TabMetadata,
  ctx: DomainContext,
): HoarderScoreResult {
  const excluded = exclusionReason(meta, ctx);
  if (excluded)
    return {
      total_score: 0,
      is_hoarder: false,
      confidence_level: 'excluded',
      score_breakdown: {},
      reason: excluded,
    };

  const breakdown: Breakdown = {
    tab_age: tabAgeScore(meta),
    inactivity: inactivityScore(meta, ctx),
    visit_pattern: visitPatternScore(meta, ctx),
    engagement: engagementScore(meta),
  };
  const total = Object.values(breakdown).reduce((s, f) => s + f.points, 0);
  const level = confidenceFor(total);
  return {
    total_score: total,
    is_hoarder: level !== 'not_hoarder',
    confidence_level: level,
    score_breakdown: breakdown,
    reason: summarize(total, meta, breakdown),
  };
}
