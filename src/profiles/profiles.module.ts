//src/profiles/profiles.module.ts
import { Module } from '@nestjs/common';
import { AccessModule } from '../access/access.module';
import { ProfilesController } from './profiles.controller';

@Module({
  imports: [AccessModule],
  controllers: [ProfilesController],
})
export class ProfilesModule {}
