//src/events/events.module.ts
import { Module } from '@nestjs/common';
import { AccessModule } from '../access/access.module';
import { EventsController } from './events.controller';

@Module({
  imports: [AccessModule],
  controllers: [EventsController],
})
export class EventsModule {}
