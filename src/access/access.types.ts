//src/access/access.types.ts
import type {
  EventRow,
  NewEventRow,
  NewProfileRow,
  NewSponsorEventTypeRow,
  NewSponsorOfferRow,
  ProfileRole,
  ProfileRow,
  SponsorEventTypeRow,
  SponsorOfferRow,
} from '../database/schema';

/** Opaque subject identifier issued by the identity provider. */
export type PrincipalId = string;

/** `null` stands for an anonymous request. */
export type Principal = PrincipalId | null;

export type EntityKind =
  | 'profile'
  | 'event'
  | 'sponsorOffer'
  | 'sponsorEventType';

export const ENTITY_KINDS: readonly EntityKind[] = [
  'profile',
  'event',
  'sponsorOffer',
  'sponsorEventType',
];

export type Operation = 'read' | 'create' | 'update' | 'delete';

export type Decision = 'allow' | 'deny';

/** Untrusted field bag: a stored row, or candidate fields from a request. */
export type Target = Readonly<Record<string, unknown>>;

export interface EntityRowMap {
  profile: ProfileRow;
  event: EventRow;
  sponsorOffer: SponsorOfferRow;
  sponsorEventType: SponsorEventTypeRow;
}

export interface EntityInsertMap {
  profile: NewProfileRow;
  event: NewEventRow;
  sponsorOffer: NewSponsorOfferRow;
  sponsorEventType: NewSponsorEventTypeRow;
}

// Fields a caller supplies; ids (except the profile's) and timestamps are
// never taken from input.
export interface ProfileInput {
  id: string;
  name: string;
  companyName: string;
  role: ProfileRole;
}

export interface EventInput {
  name: string;
  type: string;
  amount: number;
  city: string;
  description: string;
  date: string;
  organizerId: string;
}

export interface SponsorOfferInput {
  profileId: string;
  amount: number;
  description?: string | null;
}

export interface SponsorEventTypeInput {
  sponsorOfferId: string;
  eventType: string;
}

export interface EntityInputMap {
  profile: ProfileInput;
  event: EventInput;
  sponsorOffer: SponsorOfferInput;
  sponsorEventType: SponsorEventTypeInput;
}

/** Column values written by an update; sponsor event types are append-only. */
export interface EntityUpdateMap {
  profile: Pick<ProfileRow, 'name' | 'companyName' | 'updatedAt'>;
  event: Omit<EventRow, 'id' | 'createdAt'>;
  sponsorOffer: Omit<SponsorOfferRow, 'id' | 'createdAt'>;
  sponsorEventType: never;
}

export interface EntityFilterMap {
  profile: Record<string, never>;
  event: { organizerId?: string; type?: string; city?: string };
  sponsorOffer: { profileId?: string };
  sponsorEventType: { sponsorOfferId?: string; eventType?: string };
}

/** Read access the policy engine needs for role and ownership lookups. */
export interface PolicyLookup {
  get<K extends EntityKind>(kind: K, id: string): EntityRowMap[K] | undefined;
}

export type { ProfileRole };
