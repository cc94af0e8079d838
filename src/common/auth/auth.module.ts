// src/common/auth/auth.module.ts
import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PassportModule } from '@nestjs/passport';
import { InternalApiKeyGuard } from '../guards/internal-api-key.guard';
import { OptionalJwtAuthGuard } from '../guards/optional-jwt-auth.guard';
import { AccessTokenStrategy } from '../strategies/access-token.strategy';

/**
 * Registers the Passport JWT strategy that resolves the identity context
 * of each request.
 */
@Global()
@Module({
  imports: [
    ConfigModule,
    PassportModule.register({ defaultStrategy: 'jwt' }),
  ],
  providers: [AccessTokenStrategy, OptionalJwtAuthGuard, InternalApiKeyGuard],
  exports: [PassportModule, OptionalJwtAuthGuard, InternalApiKeyGuard],
})
export class AuthModule {}
