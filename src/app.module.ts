//src/app.module.ts
import { Module, ValidationPipe } from '@nestjs/common';
import { APP_FILTER, APP_PIPE } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { resolve } from 'path';
import { AccessModule } from './access/access.module';
import { AuthModule } from './common/auth/auth.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { envValidationSchema } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { EventsModule } from './events/events.module';
import { HealthController } from './health/health.controller';
import { InternalModule } from './internal/internal.module';
import { ProfilesModule } from './profiles/profiles.module';
import { SponsorEventTypesModule } from './sponsor-event-types/sponsor-event-types.module';
import { SponsorOffersModule } from './sponsor-offers/sponsor-offers.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: process.env.NODE_ENV === 'test' ? '.env.test' : '.env',
      validationSchema: envValidationSchema,
    }),
    DatabaseModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        url: configService.getOrThrow<string>('DATABASE_URL'),
        migrationsDir: resolve(
          configService.getOrThrow<string>('DATABASE_MIGRATIONS_DIR'),
        ),
      }),
      inject: [ConfigService],
    }),
    AuthModule,
    AccessModule,
    ProfilesModule,
    EventsModule,
    SponsorOffersModule,
    SponsorEventTypesModule,
    InternalModule,
  ],
  controllers: [HealthController],
  providers: [
    {
      provide: APP_PIPE,
      useValue: new ValidationPipe({ whitelist: true, transform: true }),
    },
    {
      provide: APP_FILTER,
      useClass: HttpExceptionFilter,
    },
  ],
})
export class AppModule {}
