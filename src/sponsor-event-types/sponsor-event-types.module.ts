//src/sponsor-event-types/sponsor-event-types.module.ts
import { Module } from '@nestjs/common';
import { AccessModule } from '../access/access.module';
import { SponsorEventTypesController } from './sponsor-event-types.controller';

@Module({
  imports: [AccessModule],
  controllers: [SponsorEventTypesController],
})
export class SponsorEventTypesModule {}
