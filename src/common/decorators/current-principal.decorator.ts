// src/common/decorators/current-principal.decorator.ts
import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Principal } from '../../access/access.types';
import { JwtPayload } from '../interfaces/auth.interface';

/**
 * The request's principal, or `null` when no token was sent.
 * Pair with OptionalJwtAuthGuard.
 *
 * Usage:
 * @Get(':id')
 * findOne(@CurrentPrincipal() principal: Principal) { ... }
 */
export const CurrentPrincipal = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Principal => {
    const request = ctx.switchToHttp().getRequest<{ user?: JwtPayload }>();
    return request.user?.sub ?? null;
  },
);
