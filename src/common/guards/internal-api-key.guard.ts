//src/common/guards/internal-api-key.guard.ts
import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';

export const INTERNAL_API_KEY_HEADER = 'x-internal-api-key';

/**
 * Admits the identity provider's onboarding hook to `/internal` routes.
 * Profiles are provisioned there outside the policy engine, so the shared
 * key is the only thing standing in front of them. A repeated header is
 * refused rather than picking one of its values.
 */
@Injectable()
export class InternalApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(InternalApiKeyGuard.name);

  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const presented = request.headers[INTERNAL_API_KEY_HEADER];
    const expected = this.configService.get<string>('INTERNAL_API_KEY');

    if (expected && typeof presented === 'string' && presented === expected) {
      return true;
    }

    this.logger.warn(`Rejected provisioning call to ${request.url}`);
    throw new UnauthorizedException(
      'Profile provisioning requires a valid internal API key.',
    );
  }
}
