import { BehaviorType, EngagementType } from '../shared/types';
import { InvalidArgumentError } from './errors';

/** Baselines are expressed for a 7-day window and scaled linearly from there. */
export const BASE_PERIOD_DAYS = 7;

const VISITS_PER_WEEK = {
  compulsive: 50,
  frequent: 20,
  regular: 10,
} as const;

export type BehaviorTier = keyof typeof VISITS_PER_WEEK;

// ~3 visits per week; the same rate applies to every window length
export const SERIAL_OPENER_MIN_VISITS_PER_DAY = 0.43;
export const SERIAL_OPENER_BASE_MIN_VISITS = 3;
export const SERIAL_OPENER_ABSOLUTE_MIN_VISITS = 2;
export const SERIAL_OPENER_MAX_ENGAGEMENT_SECONDS = 300;

// hours between visits
const COMPULSIVE_HOURS_BETWEEN = 0.5;
const FREQUENT_HOURS_BETWEEN = 2;
const REGULAR_HOURS_BETWEEN = 6;

// seconds per visit
const QUICK_GLANCE_SECONDS = 5;
const BRIEF_CHECK_SECONDS = 15;
const SCAN_SECONDS = 60;

function isTier(tier: string): tier is BehaviorTier {
  return Object.prototype.hasOwnProperty.call(VISITS_PER_WEEK, tier);
}

function positive(n: number | null | undefined): n is number {
  return typeof n === 'number' && Number.isFinite(n) && n > 0;
}

export class AdaptiveThresholdCalculator {
  readonly daysInPeriod: number;
  private readonly scale: number;

  constructor(daysInPeriod: number) {
    this.daysInPeriod = positive(daysInPeriod) ? daysInPeriod : 0;
    this.scale = this.daysInPeriod / BASE_PERIOD_DAYS;
  }

  /**
   * Minimum visit count for a behaviour tier in this window. Tiers keep a
   * strict order (compulsive > frequent > regular) even for very short
   * windows where plain rounding would make them equal.
   */
  minVisitsFor(tier: string): number {
    if (!isTier(tier))
      throw new InvalidArgumentError(`Unknown behavior tier: ${tier}`);
    const regular = Math.max(1, this.scaled(VISITS_PER_WEEK.regular));
    if (tier === 'regular') return regular;
    const frequent = Math.max(regular + 1, this.scaled(VISITS_PER_WEEK.frequent));
    if (tier === 'frequent') return frequent;
    return Math.max(frequent + 1, this.scaled(VISITS_PER_WEEK.compulsive));
  }

  minSerialOpenerVisits(): number {
    return Math.max(
      SERIAL_OPENER_ABSOLUTE_MIN_VISITS,
      this.scaled(SERIAL_OPENER_BASE_MIN_VISITS),
    );
  }

  /** Cumulative active seconds a resource may collect and still count as never really read. */
  maxSerialOpenerEngagementSeconds(): number {
    return this.scaled(SERIAL_OPENER_MAX_ENGAGEMENT_SECONDS);
  }

  minVisitsPerDayThreshold(): number {
    return SERIAL_OPENER_MIN_VISITS_PER_DAY;
  }

  qualifiesAsSerialOpener(visitCount: number, days?: number | null): boolean {
    const d = days ?? this.daysInPeriod;
    if (!positive(d)) return false;
    return visitCount / d >= SERIAL_OPENER_MIN_VISITS_PER_DAY;
  }

  classifyByVisitCount(visitCount: number): BehaviorType {
    if (visitCount >= this.minVisitsFor('compulsive')) return 'compulsive_checking';
    if (visitCount >= this.minVisitsFor('frequent')) return 'frequent_monitoring';
    if (visitCount >= this.minVisitsFor('regular')) return 'regular_reference';
    return 'periodic_revisit';
  }

  classifyByFrequency(avgHoursBetween: number | null | undefined): BehaviorType {
    // no measurable cadence
    if (!positive(avgHoursBetween)) return 'periodic_revisit';
    if (avgHoursBetween < COMPULSIVE_HOURS_BETWEEN) return 'compulsive_checking';
    if (avgHoursBetween < FREQUENT_HOURS_BETWEEN) return 'frequent_monitoring';
    if (avgHoursBetween < REGULAR_HOURS_BETWEEN) return 'regular_reference';
    return 'periodic_revisit';
  }

  classifyEngagement(avgSeconds: number | null | undefined): EngagementType {
    if (!positive(avgSeconds) || avgSeconds < QUICK_GLANCE_SECONDS)
      return 'quick_glance';
    if (avgSeconds < BRIEF_CHECK_SECONDS) return 'brief_check';
    if (avgSeconds < SCAN_SECONDS) return 'scan';
    return 'shallow_work';
  }

  private scaled(base: number): number {
    return Math.round(base * this.scale);
  }
}
