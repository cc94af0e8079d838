//src/sponsor-offers/sponsor-offers.module.ts
import { Module } from '@nestjs/common';
import { AccessModule } from '../access/access.module';
import { SponsorOffersController } from './sponsor-offers.controller';

@Module({
  imports: [AccessModule],
  controllers: [SponsorOffersController],
})
export class SponsorOffersModule {}
