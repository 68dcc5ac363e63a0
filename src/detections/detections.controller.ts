import { Controller, Get, Logger, Query } from '@nestjs/common';
import { HoarderDetectionService } from './hoarder-detection.service';
import { SerialOpenersService } from './serial-openers.service';
import { ResearchSessionsService } from './research-sessions.service';
import {
  HoarderTabsQueryDto,
  ResearchSessionsQueryDto,
  SerialOpenersQueryDto,
} from './dto/detections.dto';
import { toHttpError } from '../shared/http-errors';

const splitCsv = (s?: string) =>
  s
    ? s
        .split(',')
        .map((d) => d.trim())
        .filter(Boolean)
    : undefined;

@Controller()
export class DetectionsController {
  private readonly logger = new Logger(DetectionsController.name);
  constructor(
    private readonly hoarders: HoarderDetectionService,
    private readonly serialOpeners: SerialOpenersService,
    private readonly researchSessions: ResearchSessionsService,
  ) {}

  @Get('/api/detections/hoarder-tabs')
  async hoarderTabs(@Query() q: HoarderTabsQueryDto) {
    try {
      return await this.hoarders.detect(q.user_id, {
        lookback_days: q.lookback_days,
        min_score: q.min_score,
        age_min: q.age_min,
        domain: q.domain,
        exclude_domains: splitCsv(q.exclude_domains),
        limit: q.limit,
        sort_by: q.sort_by,
      });
    } catch (e: unknown) {
      throw toHttpError(e, this.logger, 'hoarder detection');
    }
  }

  @Get('/api/detections/serial-openers')
  async serialOpenersList(@Query() q: SerialOpenersQueryDto) {
    try {
      return await this.serialOpeners.detect(q.user_id, {
        period: q.period,
        start_date: q.start_date,
        end_date: q.end_date,
        include_comparison: q.include_comparison,
      });
    } catch (e: unknown) {
      throw toHttpError(e, this.logger, 'serial opener detection');
    }
  }

  @Get('/api/detections/research-sessions')
  async researchSessionsList(@Query() q: ResearchSessionsQueryDto) {
    try {
      return await this.researchSessions.detect(q.user_id, {
        lookback_days: q.lookback_days,
        min_tabs: q.min_tabs,
        time_window_minutes: q.time_window,
        min_duration_minutes: q.min_duration,
      });
    } catch (e: unknown) {
      throw toHttpError(e, this.logger, 'research session detection');
    }
  }
}
