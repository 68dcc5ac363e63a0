import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

@Controller()
export class SystemController {
  private readonly startedAt = Date.now();
  constructor(private readonly cfg: ConfigService) {}

  @Get('/api/system/health')
  health() {
    return {
      ok: true,
      service: 'browsing-insights',
      port: this.cfg.get<number>('INSIGHTS_PORT') ?? 8080,
      auth: this.cfg.get<string>('INSIGHTS_API_KEY') ? 'api_key' : 'none',
      uptime_seconds: Math.floor((Date.now() - this.startedAt) / 1000),
    };
  }
}
