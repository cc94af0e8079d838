// src/sponsor-event-types/sponsor-event-types.controller.ts
import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { AccessService, EntityGateway } from '../access/access.service';
import type { Principal } from '../access/access.types';
import { CurrentPrincipal } from '../common/decorators/current-principal.decorator';
import { OptionalJwtAuthGuard } from '../common/guards/optional-jwt-auth.guard';
import { ListSponsorEventTypesQueryDto } from './dto/list-sponsor-event-types-query.dto';

/** Tags are append-only; PATCH and DELETE are always refused by policy. */
@Controller('sponsor-event-types')
@UseGuards(OptionalJwtAuthGuard)
export class SponsorEventTypesController {
  private readonly eventTypes: EntityGateway<'sponsorEventType'>;

  constructor(accessService: AccessService) {
    this.eventTypes = accessService.for('sponsorEventType');
  }

  @Get()
  findAll(
    @CurrentPrincipal() principal: Principal,
    @Query() query: ListSponsorEventTypesQueryDto,
  ) {
    return this.eventTypes.list(principal, query);
  }

  @Get(':id')
  findOne(@CurrentPrincipal() principal: Principal, @Param('id') id: string) {
    return this.eventTypes.read(principal, id);
  }

  @Post()
  create(
    @CurrentPrincipal() principal: Principal,
    @Body() body: Record<string, unknown>,
  ) {
    return this.eventTypes.create(principal, body);
  }

  @Patch(':id')
  update(
    @CurrentPrincipal() principal: Principal,
    @Param('id') id: string,
    @Body() body: Record<string, unknown>,
  ) {
    return this.eventTypes.update(principal, id, body);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@CurrentPrincipal() principal: Principal, @Param('id') id: string) {
    this.eventTypes.remove(principal, id);
  }
}
