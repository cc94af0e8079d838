//src/access/policy/policy.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  Decision,
  EntityKind,
  Operation,
  Principal,
  PolicyLookup,
  PrincipalId,
  Target,
} from '../access.types';
import { POLICY_TABLE } from './policy.rules';
import type { PolicyRule, PolicyTable } from './policy.rules';

@Injectable()
export class PolicyService {
  private readonly logger = new Logger(PolicyService.name);

  constructor(@Inject(POLICY_TABLE) private readonly table: PolicyTable) {}

  /**
   * Decides whether `principal` may apply `operation` to `target`: the stored
   * row for read/update/delete, the candidate fields for create.
   *
   * Never throws. A missing row and a row owned by somebody else both come
   * back as `deny`.
   */
  authorize(
    principal: Principal,
    kind: EntityKind,
    operation: Operation,
    target: Target,
    lookup: PolicyLookup,
  ): Decision {
    const rule = this.table[kind][operation];

    if (principal === null || rule === undefined) {
      this.logger.debug(`deny ${operation} on ${kind}: no applicable rule`);
      return 'deny';
    }

    const allowed = this.evaluate(rule, principal, target, lookup);
    this.logger.debug(
      `${allowed ? 'allow' : 'deny'} ${operation} on ${kind} for ${principal}`,
    );
    return allowed ? 'allow' : 'deny';
  }

  /** Whether the table has any rule for the pair. */
  supports(kind: EntityKind, operation: Operation): boolean {
    return this.table[kind][operation] !== undefined;
  }

  private evaluate(
    rule: PolicyRule,
    principal: PrincipalId,
    target: Target,
    lookup: PolicyLookup,
  ): boolean {
    switch (rule.kind) {
      case 'authenticated':
        return true;

      case 'owner':
        return target[rule.field] === principal;

      case 'role-bound':
        return (
          lookup.get('profile', principal)?.role === rule.role &&
          target[rule.field] === principal
        );

      case 'parent-owner': {
        const parentId = target[rule.field];
        if (typeof parentId !== 'string') {
          return false;
        }
        const parent: Target | undefined = lookup.get(rule.parent, parentId);
        return parent !== undefined && parent[rule.ownerField] === principal;
      }
    }
  }
}
