import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Inject,
  Injectable,
} from '@nestjs/common';
import { timingSafeEqual } from 'crypto';
import type { Request } from 'express';
import {
  renderJobsConfig,
  type RenderJobsConfigType,
} from '../../../config/render-jobs.config';
import { ADMIN_TOKEN_HEADER } from '../render-jobs.constants';

@Injectable()
export class AdminGuard implements CanActivate {
  constructor(
    @Inject(renderJobsConfig.KEY)
    private readonly config: RenderJobsConfigType,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.config.adminToken;
    if (!expected) {
      throw new ForbiddenException({
        error: 'ADMIN_DISABLED',
        message: 'Admin endpoints are disabled. Set ADMIN_TOKEN to enable them.',
      });
    }

    const req = context.switchToHttp().getRequest<Request>();
    const header = req.headers[ADMIN_TOKEN_HEADER];
    const provided = Buffer.from(String(Array.isArray(header) ? header[0] : header ?? ''));
    const wanted = Buffer.from(expected);

    if (provided.length !== wanted.length || !timingSafeEqual(provided, wanted)) {
      throw new ForbiddenException({ error: 'ACCESS_DENIED', message: 'Access denied' });
    }
    return true;
  }
}
