import { Controller, Get, Logger, Query } from '@nestjs/common';
import { ActivityService } from './activity.service';
import { RecentActivityQueryDto } from './dto/activity.dto';
import { toHttpError } from '../shared/http-errors';

@Controller()
export class ActivityController {
  private readonly logger = new Logger(ActivityController.name);
  constructor(private readonly svc: ActivityService) {}

  @Get('/api/activity/recent')
  async recent(@Query() q: RecentActivityQueryDto) {
    try {
      return await this.svc.recent(q.user_id, { limit: q.limit, since: q.since });
    } catch (e: unknown) {
      throw toHttpError(e, this.logger, 'recent activity');
    }
  }
}
