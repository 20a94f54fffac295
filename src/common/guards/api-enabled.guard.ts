import { CanActivate, ExecutionContext, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';

/** Hides every HTTP route behind a 404 when `api.enabled` is off. */
@Injectable()
export class ApiEnabledGuard implements CanActivate {
  private readonly logger = new Logger(ApiEnabledGuard.name);

  constructor(private configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    if (context.getType() !== 'http') {
      return true;
    }

    const apiEnabled = this.configService.get<boolean>('api.enabled') ?? false;
    if (!apiEnabled) {
      const req = context.switchToHttp().getRequest<Request>();
      this.logger.warn(`[WARN] API call blocked: ${req.method} ${req.url}`);
      throw new NotFoundException();
    }
    return true;
  }
}
