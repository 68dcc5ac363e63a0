import { Module } from '@nestjs/common';
import { VisitsModule } from '../visits/visits.module';
import { ActivityController } from './activity.controller';
import { ActivityService } from './activity.service';

@Module({
  imports: [VisitsModule],
  controllers: [ActivityController],
  providers: [ActivityService],
})
export class ActivityModule {}
