import { Module } from '@nestjs/common';
import { VisitsModule } from '../visits/visits.module';
import { DetectionsController } from './detections.controller';
import { HoarderDetectionService } from './hoarder-detection.service';
import { SerialOpenersService } from './serial-openers.service';
import { ResearchSessionsService } from './research-sessions.service';

@Module({
  imports: [VisitsModule],
  controllers: [DetectionsController],
  providers: [HoarderDetectionService, SerialOpenersService, ResearchSessionsService],
})
export class DetectionsModule {}
