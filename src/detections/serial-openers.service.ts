import { Injectable, Logger } from '@nestjs/common';
import { VisitsRepository } from '../visits/visits.repository';
import {
  DateRangeQuery,
  daysInRange,
  parseDateRange,
  previousPeriodRange,
} from '../analysis/date-range';
import { AdaptiveThresholdCalculator } from '../analysis/adaptive-threshold.calculator';
import {
  SerialOpener,
  detectSerialOpeners,
} from '../analysis/serial-opener.detector';
import {
  PeriodComparison,
  comparePeriods,
} from '../analysis/comparison.calculator';
import { DateRange } from '../shared/types';

export interface SerialOpenersQuery extends DateRangeQuery {
  include_comparison?: boolean;
}

export interface SerialOpenersResult {
  period: string;
  date_range: { start: string; end: string; days: number };
  serial_openers: SerialOpener[];
  count: number;
  criteria: {
    min_visits_per_day: number;
    effective_min_visits: number;
    max_total_engagement_seconds: number;
  };
  comparison?: PeriodComparison & {
    previous_period: { start: string; end: string; count: number };
  };
}

const isoDay = (d: Date) => d.toISOString().slice(0, 10);

@Injectable()
export class SerialOpenersService {
  private readonly logger = new Logger(SerialOpenersService.name);
  constructor(private repo: VisitsRepository) {}

  async detect(
    user_id: string,
    q: SerialOpenersQuery = {},
    now = new Date(),
  ): Promise<SerialOpenersResult> {
    const range = parseDateRange(q, now);
    const days = daysInRange(range);
    const calculator = new AdaptiveThresholdCalculator(days);
    const openers = await this.openersIn(user_id, range, calculator);

    const result: SerialOpenersResult = {
      period: range.period_label,
      date_range: {
        start: isoDay(range.start),
        end: isoDay(range.end),
        days: Math.round(days * 10) / 10,
      },
      serial_openers: openers,
      count: openers.length,
      criteria: {
        min_visits_per_day: calculator.minVisitsPerDayThreshold(),
        effective_min_visits: Math.round(calculator.minVisitsPerDayThreshold() * days),
        max_total_engagement_seconds: calculator.maxSerialOpenerEngagementSeconds(),
      },
    };
    if (q.include_comparison) {
      const comparison = await this.compareWithPrevious(
        user_id,
        range,
        calculator,
        openers,
      );
      if (comparison) result.comparison = comparison;
    }
    return result;
  }

  private async openersIn(
    user_id: string,
    range: DateRange,
    calculator: AdaptiveThresholdCalculator,
  ) {
    const visits = await this.repo.listInRange(
      user_id,
      range.start.getTime(),
      range.end.getTime(),
    );
    return detectSerialOpeners(visits, calculator);
  }

  private async compareWithPrevious(
    user_id: string,
    range: DateRange,
    calculator: AdaptiveThresholdCalculator,
    current: SerialOpener[],
  ) {
    const previous = previousPeriodRange(range);
    try {
      const before = await this.openersIn(user_id, previous, calculator);
      return {
        ...comparePeriods(current, before),
        previous_period: {
          start: isoDay(previous.start),
          end: isoDay(previous.end),
          count: before.length,
        },
      };
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e);
      this.logger.warn(`comparison skipped for user=${user_id}: ${msg}`);
      return null;
    }
  }
}
