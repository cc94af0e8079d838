//src/access/policy/policy.rules.ts
import type {
  EntityKind,
  EntityRowMap,
  Operation,
  ProfileRole,
} from '../access.types';

type FieldOf<K extends EntityKind> = keyof EntityRowMap[K] & string;

/**
 * Rule descriptors. Each one names a predicate over
 * (principal, target fields, lookups) that the policy service interprets.
 */
export type PolicyRule =
  /** Any authenticated principal. */
  | { readonly kind: 'authenticated' }
  /** `target[field]` equals the principal. */
  | { readonly kind: 'owner'; readonly field: string }
  /**
   * The principal's profile carries `role`, and the candidate row is
   * attributed to the principal through `field`.
   */
  | {
      readonly kind: 'role-bound';
      readonly role: ProfileRole;
      readonly field: string;
    }
  /**
   * `target[field]` references a `parent` row whose `ownerField` equals
   * the principal.
   */
  | {
      readonly kind: 'parent-owner';
      readonly field: string;
      readonly parent: EntityKind;
      readonly ownerField: string;
    };

/** Missing operations are unsupported and always denied. */
export type PolicyTable = {
  readonly [K in EntityKind]: Readonly<Partial<Record<Operation, PolicyRule>>>;
};

export const POLICY_TABLE = 'POLICY_TABLE';

const authenticated: PolicyRule = { kind: 'authenticated' };

const owner = <K extends EntityKind>(field: FieldOf<K>): PolicyRule => ({
  kind: 'owner',
  field,
});

const roleBound = <K extends EntityKind>(
  role: ProfileRole,
  field: FieldOf<K>,
): PolicyRule => ({ kind: 'role-bound', role, field });

const parentOwner = <K extends EntityKind, P extends EntityKind>(
  field: FieldOf<K>,
  parent: P,
  ownerField: FieldOf<P>,
): PolicyRule => ({ kind: 'parent-owner', field, parent, ownerField });

export const DEFAULT_POLICY_TABLE: PolicyTable = {
  // Profiles are created by the provisioning flow, never through here.
  profile: {
    read: owner<'profile'>('id'),
    update: owner<'profile'>('id'),
  },
  event: {
    read: authenticated,
    create: roleBound<'event'>('organizer', 'organizerId'),
    update: owner<'event'>('organizerId'),
  },
  sponsorOffer: {
    read: authenticated,
    create: roleBound<'sponsorOffer'>('sponsor', 'profileId'),
    update: owner<'sponsorOffer'>('profileId'),
  },
  sponsorEventType: {
    read: authenticated,
    create: parentOwner<'sponsorEventType', 'sponsorOffer'>(
      'sponsorOfferId',
      'sponsorOffer',
      'profileId',
    ),
  },
};
