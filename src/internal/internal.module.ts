//src/internal/internal.module.ts
import { Module } from '@nestjs/common';
import { AccessModule } from '../access/access.module';
import { InternalController } from './internal.controller';

@Module({
  imports: [AccessModule],
  controllers: [InternalController],
})
export class InternalModule {}
