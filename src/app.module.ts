import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { validateEnv } from './config/env.validation';
import { ApiKeyGuard } from './guards/api-key.guard';
import { SqliteModule } from './sqlite/sqlite.module';
import { SystemModule } from './system/system.module';
import { DetectionsModule } from './detections/detections.module';
import { ActivityModule } from './activity/activity.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      envFilePath: ['.env'],
      isGlobal: true,
      validate: validateEnv,
    }),
    SqliteModule,
    SystemModule,
    DetectionsModule,
    ActivityModule,
  ],
  providers: [{ provide: APP_GUARD, useClass: ApiKeyGuard }],
})
export class AppModule {}
