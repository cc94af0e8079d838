//src/internal/internal.controller.ts
import { Body, Controller, Post, UseGuards } from '@nestjs/common';
import { AccessService } from '../access/access.service';
import { InternalApiKeyGuard } from '../common/guards/internal-api-key.guard';

/** Called by the identity provider's onboarding hook. */
@Controller('internal')
@UseGuards(InternalApiKeyGuard)
export class InternalController {
  constructor(private readonly accessService: AccessService) {}

  @Post('profiles')
  provisionProfile(@Body() body: Record<string, unknown>) {
    return this.accessService.provisionProfile(body);
  }
}
