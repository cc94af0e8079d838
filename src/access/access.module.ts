//src/access/access.module.ts
import { Module } from '@nestjs/common';
import { CLOCK, systemClock } from '../common/clock/clock';
import { AccessService } from './access.service';
import { IntegrityService } from './integrity/integrity.service';
import { DEFAULT_POLICY_TABLE, POLICY_TABLE } from './policy/policy.rules';
import { PolicyService } from './policy/policy.service';

// EntityStore comes from the global DatabaseModule.
@Module({
  providers: [
    AccessService,
    PolicyService,
    IntegrityService,
    { provide: POLICY_TABLE, useValue: DEFAULT_POLICY_TABLE },
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [AccessService, PolicyService],
})
export class AccessModule {}
