import { BehaviorType } from '../shared/types';
import { normalizeHost } from './domain-context.analyzer';

export type InferredPurpose =
  | 'documentation'
  | 'reference'
  | 'task_tracking'
  | 'note_taking'
  | 'code_development'
  | 'code_review'
  | 'issue_tracking'
  | 'repo_browsing'
  | 'email'
  | 'social_media'
  | 'video_content'
  | 'communication'
  | 'work'
  | 'learning'
  | 'entertainment'
  | 'news'
  | 'shopping'
  | 'unknown';

export type TimePattern =
  | 'work_hours'
  | 'late_night'
  | 'early_morning'
  | 'evening'
  | 'mixed'
  | 'unknown';

export interface InsightVars {
  visit_count: number;
  visits_per_day: string;
  avg_seconds: string;
  avg_hours_between: string;
  domain: string;
}

type Template = (v: InsightVars) => string;

type DomainPattern = {
  purpose: InferredPurpose;
  keywords: Array<[RegExp, InferredPurpose]>;
};

const DOMAIN_PATTERNS: Record<string, DomainPattern> = {
  'notion.so': {
    purpose: 'documentation',
    keywords: [
      [/issue|tracker|ticket/i, 'task_tracking'],
      [/meeting|notes/i, 'note_taking'],
      [/doc|documentation/i, 'reference'],
    ],
  },
  'notion.site': { purpose: 'documentation', keywords: [] },
  'github.com': {
    purpose: 'code_development',
    keywords: [
      [/pull|\bpr\b/i, 'code_review'],
      [/issues/i, 'issue_tracking'],
      [/repositories|repos/i, 'repo_browsing'],
    ],
  },
  'mail.google.com': { purpose: 'email', keywords: [] },
  'gmail.com': { purpose: 'email', keywords: [] },
  'x.com': { purpose: 'social_media', keywords: [] },
  'twitter.com': { purpose: 'social_media', keywords: [] },
  'linkedin.com': { purpose: 'social_media', keywords: [] },
  'facebook.com': { purpose: 'social_media', keywords: [] },
  'youtube.com': { purpose: 'video_content', keywords: [] },
  'slack.com': { purpose: 'communication', keywords: [] },
  'discord.com': { purpose: 'communication', keywords: [] },
};

const INSIGHTS: Record<
  BehaviorType,
  Partial<Record<InferredPurpose, Template>> & { default: Template }
> = {
  compulsive_checking: {
    task_tracking: (v) =>
      `You're checking this task tracker ${v.visits_per_day} times per day, spending only ${v.avg_seconds}s each time. This suggests anxious waiting for updates rather than active work.`,
    email: (v) =>
      `You check your email ${v.visits_per_day} times per day with ${v.avg_seconds}s per visit. This constant inbox checking is disrupting your focus.`,
    social_media: (v) =>
      `Checking ${v.domain} ${v.visits_per_day} times per day indicates compulsive behavior. This is fragmenting your attention.`,
    code_review: (v) =>
      `You've checked this PR ${v.visit_count} times (${v.visits_per_day}/day). You're likely anxiously waiting for reviews or CI results.`,
    communication: (v) =>
      `You check ${v.domain} ${v.visits_per_day} times per day. Enable notifications instead of constant manual checking.`,
    default: (v) =>
      `You check this ${v.visits_per_day} times per day, spending only ${v.avg_seconds}s each time. This frequent checking pattern is inefficient.`,
  },
  frequent_monitoring: {
    task_tracking: (v) =>
      `You check this task tracker ${v.visits_per_day} times per day for quick status updates.`,
    code_review: (v) =>
      `You monitor this PR frequently (${v.visits_per_day}/day) for updates.`,
    default: (v) =>
      `You check this ${v.visits_per_day} times per day for monitoring purposes.`,
  },
  regular_reference: {
    documentation: (v) =>
      `You reference this ${v.visits_per_day} times per day. Consider pinning or bookmarking.`,
    default: (v) =>
      `You come back to this regularly (${v.visits_per_day} times per day).`,
  },
  periodic_revisit: {
    default: (v) => `You revisit this occasionally (${v.visit_count} times total).`,
  },
};

const SUGGESTIONS: Partial<Record<InferredPurpose, Template>> & {
  default: Template;
} = {
  task_tracking: (v) =>
    `Enable notifications or a chat integration for task updates. Stop manually checking every ${v.avg_hours_between} hours.`,
  email: (v) =>
    `Turn on desktop notifications. Schedule specific email check times (e.g., 9am, 1pm, 4pm) instead of checking ${v.visits_per_day} times per day.`,
  social_media: () =>
    'Set specific times to check social media (e.g., lunch, end of day). Consider app blockers during focus work hours.',
  code_review: () =>
    'Enable email or chat notifications for PR reviews, comments, and CI status. You will know immediately when action is needed.',
  communication: (v) =>
    `Enable desktop notifications for ${v.domain}. Stop the constant manual checking.`,
  documentation: (v) =>
    `Pin this tab or add to bookmarks bar for quick access. ${v.visit_count} reopenings is inefficient.`,
  video_content: (v) =>
    `If you keep coming back, add to a Watch Later playlist instead of reopening ${v.visit_count} times.`,
  default: (v) =>
    `Consider bookmarking this instead of reopening it ${v.visit_count} times.`,
};

const OPEN_OVERHEAD_SECONDS = 5;
const WEEKDAYS = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
];

function purposeFromCategory(category: string | null | undefined): InferredPurpose {
  const c = category ?? '';
  if (c.includes('work_')) return 'work';
  if (c.includes('learning_')) return 'learning';
  if (c.includes('entertainment_')) return 'entertainment';
  switch (c) {
    case 'social_media':
      return 'social_media';
    case 'news':
      return 'news';
    case 'shopping':
      return 'shopping';
    case 'reference':
      return 'reference';
    default:
      return 'unknown';
  }
}

export function inferPurpose(
  domain: string,
  title: string,
  category?: string | null,
): InferredPurpose {
  const pattern = DOMAIN_PATTERNS[normalizeHost(domain, '')];
  if (pattern) {
    const hit = pattern.keywords.find(([re]) => re.test(title));
    return hit ? hit[1] : pattern.purpose;
  }
  return purposeFromCategory(category);
}

export function behavioralInsight(
  behavior: BehaviorType,
  purpose: InferredPurpose,
  vars: InsightVars,
): string {
  const set = INSIGHTS[behavior];
  return (set[purpose] ?? set.default)(vars);
}

export function actionableSuggestion(
  purpose: InferredPurpose,
  vars: InsightVars,
): string {
  return (SUGGESTIONS[purpose] ?? SUGGESTIONS.default)(vars);
}

/** Share of time spent reading versus opening and closing, in percent. */
export function efficiencyScore(totalEngagementSeconds: number, visitCount: number): number {
  const total = totalEngagementSeconds + visitCount * OPEN_OVERHEAD_SECONDS;
  if (total <= 0) return 0;
  return Math.round((totalEngagementSeconds / total) * 1000) / 10;
}

export function classifyTimePattern(peakHours: readonly number[]): TimePattern {
  if (peakHours.length === 0) return 'unknown';
  if (peakHours.every((h) => h >= 9 && h <= 17)) return 'work_hours';
  if (peakHours.some((h) => h >= 22 || h <= 6)) return 'late_night';
  if (peakHours.some((h) => h >= 6 && h <= 9)) return 'early_morning';
  if (peakHours.some((h) => h >= 17 && h <= 22)) return 'evening';
  return 'mixed';
}

/** Peak hours (UTC, top three) and the busiest weekday for a set of visit times. */
export function timePatterns(visitedAt: readonly number[]): {
  peak_hours: number[];
  most_active_day: string | null;
  time_pattern: TimePattern;
} {
  const byHour = new Map<number, number>();
  const byDay = new Map<number, number>();
  for (const t of visitedAt) {
    const d = new Date(t);
    byHour.set(d.getUTCHours(), (byHour.get(d.getUTCHours()) ?? 0) + 1);
    byDay.set(d.getUTCDay(), (byDay.get(d.getUTCDay()) ?? 0) + 1);
  }
  const peak = [...byHour.entries()]
    .sort((a, b) => b[1] - a[1] || a[0] - b[0])
    .slice(0, 3)
    .map(([h]) => h);
  const topDay = [...byDay.entries()].sort((a, b) => b[1] - a[1] || a[0] - b[0])[0];
  return {
    peak_hours: peak,
    most_active_day: topDay ? WEEKDAYS[topDay[0]] : null,
    time_pattern: classifyTimePattern(peak),
  };
}
