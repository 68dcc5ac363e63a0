import { Module } from '@nestjs/common';
import { SqliteModule } from '../sqlite/sqlite.module';
import { VisitsRepository } from './visits.repository';

@Module({
  imports: [SqliteModule],
  providers: [VisitsRepository],
  exports: [VisitsRepository],
})
export class VisitsModule {}
