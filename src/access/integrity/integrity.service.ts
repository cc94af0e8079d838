//src/access/integrity/integrity.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import type { ClassConstructor } from 'class-transformer';
import { validateSync } from 'class-validator';
import { CLOCK } from '../../common/clock/clock';
import type { Clock } from '../../common/clock/clock';
import { ConstraintViolationError } from '../../common/errors/access.errors';
import type {
  EntityInputMap,
  EntityInsertMap,
  EntityKind,
  EntityRowMap,
  EntityUpdateMap,
  EventInput,
  SponsorOfferInput,
  Target,
} from '../access.types';
import { EventFields } from './fields/event.fields';
import { ProfileFields } from './fields/profile.fields';
import { SponsorEventTypeFields } from './fields/sponsor-event-type.fields';
import { SponsorOfferFields } from './fields/sponsor-offer.fields';

interface IntegrityRules<K extends EntityKind> {
  fields: ClassConstructor<EntityInputMap[K]>;
  /** Columns an update may never change. */
  immutable: readonly string[];
  /** The caller-editable columns of a stored row, as they are now. */
  current(row: EntityRowMap[K]): EntityInputMap[K];
  toInsert(input: EntityInputMap[K], now: Date): EntityInsertMap[K];
  toUpdate(input: EntityInputMap[K], now: Date): EntityUpdateMap[K];
}

type IntegrityRulesMap = { [K in EntityKind]: IntegrityRules<K> };

const eventColumns = (input: EventInput): EventInput => ({
  name: input.name,
  type: input.type,
  amount: input.amount,
  city: input.city,
  description: input.description,
  date: input.date,
  organizerId: input.organizerId,
});

const offerColumns = (input: SponsorOfferInput) => ({
  profileId: input.profileId,
  amount: input.amount,
  description: input.description ?? null,
});

const RULES: IntegrityRulesMap = {
  profile: {
    fields: ProfileFields,
    immutable: ['id', 'role'],
    current: ({ id, name, companyName, role }) => ({
      id,
      name,
      companyName,
      role,
    }),
    toInsert: ({ id, name, companyName, role }, now) => ({
      id,
      name,
      companyName,
      role,
      createdAt: now,
      updatedAt: now,
    }),
    toUpdate: ({ name, companyName }, now) => ({
      name,
      companyName,
      updatedAt: now,
    }),
  },
  event: {
    fields: EventFields,
    immutable: ['id'],
    current: eventColumns,
    toInsert: (input, now) => ({
      ...eventColumns(input),
      createdAt: now,
      updatedAt: now,
    }),
    toUpdate: (input, now) => ({ ...eventColumns(input), updatedAt: now }),
  },
  sponsorOffer: {
    fields: SponsorOfferFields,
    immutable: ['id'],
    current: offerColumns,
    toInsert: (input, now) => ({
      ...offerColumns(input),
      createdAt: now,
      updatedAt: now,
    }),
    toUpdate: (input, now) => ({ ...offerColumns(input), updatedAt: now }),
  },
  sponsorEventType: {
    fields: SponsorEventTypeFields,
    immutable: ['id'],
    current: ({ sponsorOfferId, eventType }) => ({ sponsorOfferId, eventType }),
    toInsert: ({ sponsorOfferId, eventType }, now) => ({
      sponsorOfferId,
      eventType,
      createdAt: now,
    }),
    toUpdate: () => {
      throw new ConstraintViolationError(
        'id',
        'sponsorEventType rows are append-only',
      );
    },
  },
};

/**
 * Field-level rules applied to every mutation after the policy decision:
 * required fields, enumerations, positive amounts, immutable columns and
 * timestamp bookkeeping.
 */
@Injectable()
export class IntegrityService {
  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  /**
   * Validates candidate fields and stamps `createdAt`/`updatedAt` with the
   * current time. Caller-supplied timestamps and unknown fields are dropped.
   */
  prepareInsert<K extends EntityKind>(
    kind: K,
    fields: Target,
  ): EntityInsertMap[K] {
    const rules: IntegrityRules<K> = RULES[kind];
    const input = this.validate(rules.fields, fields);
    return rules.toInsert(input, this.clock.now());
  }

  /**
   * Merges `patch` over the stored row, validates the result and sets
   * `updatedAt` to now, even when nothing else changed.
   */
  prepareUpdate<K extends EntityKind>(
    kind: K,
    existing: EntityRowMap[K],
    patch: Target,
  ): EntityUpdateMap[K] {
    const rules: IntegrityRules<K> = RULES[kind];
    this.assertImmutable(kind, existing, patch);

    const merged: Target = { ...rules.current(existing), ...patch };
    const input = this.validate(rules.fields, merged);
    return rules.toUpdate(input, this.clock.now());
  }

  /** Rejects a patch that would change an immutable column of `existing`. */
  assertImmutable<K extends EntityKind>(
    kind: K,
    existing: EntityRowMap[K],
    patch: Target,
  ) {
    const stored: Target = existing;

    for (const field of RULES[kind].immutable) {
      if (field in patch && patch[field] !== stored[field]) {
        throw new ConstraintViolationError(field, `${field} cannot be changed`);
      }
    }
  }

  private validate<T extends object>(
    fields: ClassConstructor<T>,
    plain: Target,
  ): T {
    const instance = plainToInstance(fields, plain);
    const [violation] = validateSync(instance, { whitelist: true });

    if (violation) {
      const [message] = Object.values(violation.constraints ?? {});
      throw new ConstraintViolationError(
        violation.property,
        message ?? `${violation.property} is invalid`,
      );
    }
    return instance;
  }
}
