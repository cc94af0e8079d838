// src/sponsor-offers/sponsor-offers.controller.ts
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
import { ListSponsorOffersQueryDto } from './dto/list-sponsor-offers-query.dto';

@Controller('sponsor-offers')
@UseGuards(OptionalJwtAuthGuard)
export class SponsorOffersController {
  private readonly offers: EntityGateway<'sponsorOffer'>;

  constructor(accessService: AccessService) {
    this.offers = accessService.for('sponsorOffer');
  }

  @Get()
  findAll(
    @CurrentPrincipal() principal: Principal,
    @Query() query: ListSponsorOffersQueryDto,
  ) {
    return this.offers.list(principal, query);
  }

  @Get(':id')
  findOne(@CurrentPrincipal() principal: Principal, @Param('id') id: string) {
    return this.offers.read(principal, id);
  }

  @Post()
  create(
    @CurrentPrincipal() principal: Principal,
    @Body() body: Record<string, unknown>,
  ) {
    return this.offers.create(principal, body);
  }

  @Patch(':id')
  update(
    @CurrentPrincipal() principal: Principal,
    @Param('id') id: string,
    @Body() body: Record<string, unknown>,
  ) {
    return this.offers.update(principal, id, body);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@CurrentPrincipal() principal: Principal, @Param('id') id: string) {
    this.offers.remove(principal, id);
  }
}
