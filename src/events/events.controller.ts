// src/events/events.controller.ts
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
import { ListEventsQueryDto } from './dto/list-events-query.dto';

// Bodies are passed through as-is: the policy decision comes before field
// validation, which the integrity rules perform.
@Controller('events')
@UseGuards(OptionalJwtAuthGuard)
export class EventsController {
  private readonly events: EntityGateway<'event'>;

  constructor(accessService: AccessService) {
    this.events = accessService.for('event');
  }

  @Get()
  findAll(
    @CurrentPrincipal() principal: Principal,
    @Query() query: ListEventsQueryDto,
  ) {
    return this.events.list(principal, query);
  }

  @Get(':id')
  findOne(@CurrentPrincipal() principal: Principal, @Param('id') id: string) {
    return this.events.read(principal, id);
  }

  @Post()
  create(
    @CurrentPrincipal() principal: Principal,
    @Body() body: Record<string, unknown>,
  ) {
    return this.events.create(principal, body);
  }

  @Patch(':id')
  update(
    @CurrentPrincipal() principal: Principal,
    @Param('id') id: string,
    @Body() body: Record<string, unknown>,
  ) {
    return this.events.update(principal, id, body);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@CurrentPrincipal() principal: Principal, @Param('id') id: string) {
    this.events.remove(principal, id);
  }
}
