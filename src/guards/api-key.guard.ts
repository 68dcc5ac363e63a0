import {
  Injectable,
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import { Request } from 'express';
import type { IncomingHttpHeaders } from 'http';

const pub = ['/api/system/health'];

@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private cfg: ConfigService) {}
  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<Request>();
    return this.check(req.path || req.url || '', req.headers);
  }
  check(path: string, headers: IncomingHttpHeaders): boolean {
    if (pub.some((e) => path === e || path.startsWith(`${e}/`))) return true;
    const key = this.cfg.get<string>('INSIGHTS_API_KEY') || '';
    if (!key) return true;
    const provided = this.extract(headers);
    if (!provided)
      throw new UnauthorizedException({
        error: 'authentication_required',
        message: 'API key required',
      });
    if (!this.equal(provided, key))
      throw new ForbiddenException({ error: 'invalid_api_key' });
    return true;
  }
  private extract(h: IncomingHttpHeaders): string | null {
    const direct = h['x-api-key'];
    if (direct) return Array.isArray(direct) ? direct[0] : direct;
    const auth = h['authorization'] ?? '';
    if (auth.startsWith('Bearer ')) return auth.slice(7);
    if (auth.startsWith('ApiKey ')) return auth.slice(7);
    return null;
  }
  private equal(a: string, b: string): boolean {
    if (!a || !b) return false;
    const x = Buffer.from(a);
    const y = Buffer.from(b);
    if (x.length !== y.length) return false;
    return timingSafeEqual(x, y);
  }
}
