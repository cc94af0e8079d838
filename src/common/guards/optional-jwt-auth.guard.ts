// src/common/guards/optional-jwt-auth.guard.ts
import {
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import type { Request } from 'express';
import { Observable } from 'rxjs';
import { getErrorMessage } from '../utils/error.utils';

/**
 * Lets anonymous requests through with no user attached, so the policy
 * engine can deny them per operation. A bearer token that is present but
 * invalid is still rejected with 401.
 */
@Injectable()
export class OptionalJwtAuthGuard extends AuthGuard('jwt') {
  private readonly logger = new Logger(OptionalJwtAuthGuard.name);

  canActivate(
    context: ExecutionContext,
  ): boolean | Promise<boolean> | Observable<boolean> {
    const request = context.switchToHttp().getRequest<Request>();
    if (!request.headers.authorization) {
      return true;
    }
    return super.canActivate(context);
  }

  handleRequest<TUser>(
    err: unknown,
    user: TUser | false,
    info: unknown,
  ): TUser {
    if (err || !user) {
      this.logger.warn(`JWT Auth Error: ${getErrorMessage(info ?? err)}`);
      throw new UnauthorizedException('Invalid or expired token');
    }
    return user;
  }
}
