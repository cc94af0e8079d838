// src/profiles/profiles.controller.ts
import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  UseGuards,
} from '@nestjs/common';
import { AccessService, EntityGateway } from '../access/access.service';
import type { Principal } from '../access/access.types';
import { CurrentPrincipal } from '../common/decorators/current-principal.decorator';
import { OptionalJwtAuthGuard } from '../common/guards/optional-jwt-auth.guard';
import { PermissionDeniedError } from '../common/errors/access.errors';

@Controller('profiles')
@UseGuards(OptionalJwtAuthGuard)
export class ProfilesController {
  private readonly profiles: EntityGateway<'profile'>;

  constructor(accessService: AccessService) {
    this.profiles = accessService.for('profile');
  }

  @Get('me')
  getMyProfile(@CurrentPrincipal() principal: Principal) {
    return this.profiles.read(principal, this.requireSelf(principal));
  }

  @Patch('me')
  updateMyProfile(
    @CurrentPrincipal() principal: Principal,
    @Body() body: Record<string, unknown>,
  ) {
    return this.profiles.update(principal, this.requireSelf(principal), body);
  }

  @Get(':id')
  findOne(@CurrentPrincipal() principal: Principal, @Param('id') id: string) {
    return this.profiles.read(principal, id);
  }

  @Patch(':id')
  update(
    @CurrentPrincipal() principal: Principal,
    @Param('id') id: string,
    @Body() body: Record<string, unknown>,
  ) {
    return this.profiles.update(principal, id, body);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@CurrentPrincipal() principal: Principal, @Param('id') id: string) {
    this.profiles.remove(principal, id);
  }

  // "me" has no meaning for an anonymous caller.
  private requireSelf(principal: Principal): string {
    if (principal === null) {
      throw new PermissionDeniedError();
    }
    return principal;
  }
}
