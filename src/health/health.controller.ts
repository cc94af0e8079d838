// src/health/health.controller.ts
import { Controller, Get } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';

/**
 * Liveness probe for load balancers. No authentication required.
 */
@Controller('health')
export class HealthController {
  constructor(private readonly database: DatabaseService) {}

  @Get()
  healthCheck(): { status: string; database: string; timestamp: string } {
    const databaseUp = this.database.ping();
    return {
      status: databaseUp ? 'ok' : 'degraded',
      database: databaseUp ? 'up' : 'down',
      timestamp: new Date().toISOString(),
    };
  }
}
