import type {
  EntityKind,
  EntityRowMap,
  PolicyLookup,
} from '../access.types';
import type { ProfileRole, ProfileRow, SponsorOfferRow } from '../../database/schema';
import { DEFAULT_POLICY_TABLE } from './policy.rules';
import type { PolicyTable } from './policy.rules';
import { PolicyService } from './policy.service';

const createdAt = new Date('2026-01-05T10:00:00.000Z');

const profile = (id: string, role: ProfileRole): ProfileRow => ({
  id,
  name: `Name of ${id}`,
  companyName: `${id} Ltd`,
  role,
  createdAt,
  updatedAt: createdAt,
});

const offer = (id: string, profileId: string): SponsorOfferRow => ({
  id,
  profileId,
  amount: 500,
  description: null,
  createdAt,
  updatedAt: createdAt,
});

class InMemoryLookup implements PolicyLookup {
  private readonly rows: { [K in EntityKind]: Map<string, EntityRowMap[K]> } =
    {
      profile: new Map(),
      event: new Map(),
      sponsorOffer: new Map(),
      sponsorEventType: new Map(),
    };

  addProfile(row: ProfileRow) {
    this.rows.profile.set(row.id, row);
  }

  addOffer(row: SponsorOfferRow) {
    this.rows.sponsorOffer.set(row.id, row);
  }

  get<K extends EntityKind>(kind: K, id: string): EntityRowMap[K] | undefined {
    const table: Map<string, EntityRowMap[K]> = this.rows[kind];
    return table.get(id);
  }
}

describe('PolicyService', () => {
  let service: PolicyService;
  let lookup: InMemoryLookup;

  const organizerA = profile('organizer-a', 'organizer');
  const organizerC = profile('organizer-c', 'organizer');
  const sponsorB = profile('sponsor-b', 'sponsor');
  const sponsorD = profile('sponsor-d', 'sponsor');

  const eventRow = {
    id: 'event-1',
    name: 'Harbour Jazz Night',
    type: 'concert',
    amount: 250,
    city: 'Lisbon',
    description: 'Open-air evening concert',
    date: '2026-06-12',
    organizerId: organizerA.id,
    createdAt,
    updatedAt: createdAt,
  };

  beforeEach(() => {
    service = new PolicyService(DEFAULT_POLICY_TABLE);
    lookup = new InMemoryLookup();
    [organizerA, organizerC, sponsorB, sponsorD].forEach((row) =>
      lookup.addProfile(row),
    );
    lookup.addOffer(offer('offer-b', sponsorB.id));
    lookup.addOffer(offer('offer-d', sponsorD.id));
  });

  describe('profiles', () => {
    it('should let a principal read and update its own profile', () => {
      for (const operation of ['read', 'update'] as const) {
        expect(
          service.authorize(sponsorB.id, 'profile', operation, sponsorB, lookup),
        ).toBe('allow');
      }
    });

    it('should deny every other principal', () => {
      for (const principal of [organizerA.id, 'unknown-principal']) {
        expect(
          service.authorize(principal, 'profile', 'read', sponsorB, lookup),
        ).toBe('deny');
        expect(
          service.authorize(principal, 'profile', 'update', sponsorB, lookup),
        ).toBe('deny');
      }
    });

    it('should never allow profile creation or deletion', () => {
      expect(
        service.authorize(sponsorB.id, 'profile', 'create', sponsorB, lookup),
      ).toBe('deny');
      expect(
        service.authorize(sponsorB.id, 'profile', 'delete', sponsorB, lookup),
      ).toBe('deny');
    });
  });

  describe('events', () => {
    it('should let any authenticated principal read an event', () => {
      expect(
        service.authorize(sponsorD.id, 'event', 'read', eventRow, lookup),
      ).toBe('allow');
    });

    it('should allow an organizer to create an event attributed to itself', () => {
      const candidate = { ...eventRow, id: undefined };
      expect(
        service.authorize(organizerA.id, 'event', 'create', candidate, lookup),
      ).toBe('allow');
    });

    it('should deny an organizer creating an event for another organizer', () => {
      const candidate = { name: 'Spoof', organizerId: organizerC.id };
      expect(
        service.authorize(organizerA.id, 'event', 'create', candidate, lookup),
      ).toBe('deny');
    });

    it('should deny a sponsor creating an event, even attributed to itself', () => {
      for (const organizerId of [sponsorB.id, organizerA.id]) {
        expect(
          service.authorize(
            sponsorB.id,
            'event',
            'create',
            { organizerId },
            lookup,
          ),
        ).toBe('deny');
      }
    });

    it('should deny a principal that has no profile yet', () => {
      expect(
        service.authorize(
          'no-profile',
          'event',
          'create',
          { organizerId: 'no-profile' },
          lookup,
        ),
      ).toBe('deny');
    });

    it('should only let the owning organizer update an event', () => {
      expect(
        service.authorize(organizerA.id, 'event', 'update', eventRow, lookup),
      ).toBe('allow');
      expect(
        service.authorize(organizerC.id, 'event', 'update', eventRow, lookup),
      ).toBe('deny');
      expect(
        service.authorize(sponsorB.id, 'event', 'update', eventRow, lookup),
      ).toBe('deny');
    });

    it('should deny deleting an event, even for its owner', () => {
      expect(
        service.authorize(organizerA.id, 'event', 'delete', eventRow, lookup),
      ).toBe('deny');
    });
  });

  describe('sponsor offers', () => {
    it('should allow a sponsor to create an offer for itself', () => {
      expect(
        service.authorize(
          sponsorB.id,
          'sponsorOffer',
          'create',
          { profileId: sponsorB.id, amount: 1000 },
          lookup,
        ),
      ).toBe('allow');
    });

    it('should deny an organizer creating an offer for itself', () => {
      expect(
        service.authorize(
          organizerA.id,
          'sponsorOffer',
          'create',
          { profileId: organizerA.id, amount: 1000 },
          lookup,
        ),
      ).toBe('deny');
    });

    it('should deny a sponsor creating an offer for another sponsor', () => {
      expect(
        service.authorize(
          sponsorB.id,
          'sponsorOffer',
          'create',
          { profileId: sponsorD.id, amount: 1000 },
          lookup,
        ),
      ).toBe('deny');
    });

    it('should only let the owning sponsor update an offer', () => {
      const row = offer('offer-b', sponsorB.id);
      expect(
        service.authorize(sponsorB.id, 'sponsorOffer', 'update', row, lookup),
      ).toBe('allow');
      expect(
        service.authorize(sponsorD.id, 'sponsorOffer', 'update', row, lookup),
      ).toBe('deny');
    });
  });

  describe('sponsor event types', () => {
    it('should allow tagging an offer the principal owns', () => {
      expect(
        service.authorize(
          sponsorB.id,
          'sponsorEventType',
          'create',
          { sponsorOfferId: 'offer-b', eventType: 'concert' },
          lookup,
        ),
      ).toBe('allow');
    });

    it("should deny tagging another sponsor's existing offer", () => {
      expect(
        service.authorize(
          sponsorB.id,
          'sponsorEventType',
          'create',
          { sponsorOfferId: 'offer-d', eventType: 'concert' },
          lookup,
        ),
      ).toBe('deny');
    });

    it('should deny tagging an offer that does not exist', () => {
      for (const sponsorOfferId of ['offer-missing', 42, undefined]) {
        expect(
          service.authorize(
            sponsorB.id,
            'sponsorEventType',
            'create',
            { sponsorOfferId, eventType: 'concert' },
            lookup,
          ),
        ).toBe('deny');
      }
    });

    it('should deny updates because tags are append-only', () => {
      const tag = {
        id: 'tag-1',
        sponsorOfferId: 'offer-b',
        eventType: 'concert',
        createdAt,
      };
      expect(
        service.authorize(sponsorB.id, 'sponsorEventType', 'update', tag, lookup),
      ).toBe('deny');
    });
  });

  it('should deny anonymous principals every operation', () => {
    const operations = ['read', 'create', 'update', 'delete'] as const;
    for (const operation of operations) {
      expect(
        service.authorize(null, 'event', operation, eventRow, lookup),
      ).toBe('deny');
      expect(
        service.authorize(null, 'sponsorOffer', operation, offer('offer-b', sponsorB.id), lookup),
      ).toBe('deny');
    }
  });

  it('should pick up new rules from the table without code changes', () => {
    const table: PolicyTable = {
      ...DEFAULT_POLICY_TABLE,
      event: {
        ...DEFAULT_POLICY_TABLE.event,
        delete: { kind: 'owner', field: 'organizerId' },
      },
    };
    const extended = new PolicyService(table);

    expect(extended.supports('event', 'delete')).toBe(true);
    expect(service.supports('event', 'delete')).toBe(false);
    expect(
      extended.authorize(organizerA.id, 'event', 'delete', eventRow, lookup),
    ).toBe('allow');
    expect(
      extended.authorize(organizerC.id, 'event', 'delete', eventRow, lookup),
    ).toBe('deny');
  });
});
