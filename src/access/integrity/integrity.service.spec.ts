import { Test, TestingModule } from '@nestjs/testing';
import { CLOCK } from '../../common/clock/clock';
import type { Clock } from '../../common/clock/clock';
import { ConstraintViolationError } from '../../common/errors/access.errors';
import type { EventRow, ProfileRow } from '../../database/schema';
import { IntegrityService } from './integrity.service';

function violationOf(action: () => unknown): ConstraintViolationError {
  try {
    action();
  } catch (error) {
    if (error instanceof ConstraintViolationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ConstraintViolationError');
}

describe('IntegrityService', () => {
  let service: IntegrityService;
  let module: TestingModule;
  let now: Date;

  const clock: Clock = { now: () => now };
  const created = new Date('2026-02-01T08:00:00.000Z');

  const eventFields = {
    name: 'Riverside Food Fair',
    type: 'festival',
    amount: 1200,
    city: 'Porto',
    description: 'Street food and local producers',
    date: '2026-07-04',
    organizerId: 'organizer-a',
  };

  const storedProfile: ProfileRow = {
    id: 'organizer-a',
    name: 'Ana',
    companyName: 'Harbour Events',
    role: 'organizer',
    createdAt: created,
    updatedAt: created,
  };

  const storedEvent: EventRow = {
    ...eventFields,
    id: 'event-1',
    createdAt: created,
    updatedAt: created,
  };

  beforeEach(async () => {
    now = new Date('2026-03-10T12:30:00.000Z');
    module = await Test.createTestingModule({
      providers: [IntegrityService, { provide: CLOCK, useValue: clock }],
    }).compile();

    service = module.get<IntegrityService>(IntegrityService);
  });

  afterAll(async () => {
    await module.close();
  });

  describe('prepareInsert', () => {
    it('should stamp both timestamps with the current time', () => {
      const values = service.prepareInsert('event', {
        ...eventFields,
        createdAt: new Date('1999-01-01T00:00:00.000Z'),
        updatedAt: 'yesterday',
      });

      expect(values).toEqual({ ...eventFields, createdAt: now, updatedAt: now });
    });

    it('should drop fields the entity does not have', () => {
      const values = service.prepareInsert('sponsorEventType', {
        sponsorOfferId: 'offer-b',
        eventType: 'concert',
        id: 'chosen-by-caller',
        priority: 'high',
      });

      expect(values).toEqual({
        sponsorOfferId: 'offer-b',
        eventType: 'concert',
        createdAt: now,
      });
    });

    it.each([0, -10, Number.NaN, '250'])(
      'should reject an event amount of %p',
      (amount) => {
        const violation = violationOf(() =>
          service.prepareInsert('event', { ...eventFields, amount }),
        );
        expect(violation.field).toBe('amount');
      },
    );

    it('should accept the smallest positive amount', () => {
      const values = service.prepareInsert('event', {
        ...eventFields,
        amount: 0.01,
      });
      expect(values.amount).toBe(0.01);
    });

    it('should reject a non-positive sponsor offer amount', () => {
      const violation = violationOf(() =>
        service.prepareInsert('sponsorOffer', {
          profileId: 'sponsor-b',
          amount: 0,
        }),
      );
      expect(violation.field).toBe('amount');
      expect(violation.message).toBe('amount must be greater than zero');
    });

    it('should store a missing offer description as null', () => {
      const values = service.prepareInsert('sponsorOffer', {
        profileId: 'sponsor-b',
        amount: 300,
      });
      expect(values).toEqual({
        profileId: 'sponsor-b',
        amount: 300,
        description: null,
        createdAt: now,
        updatedAt: now,
      });
    });

    it.each(['name', 'type', 'city', 'description', 'organizerId'])(
      'should require the event %s',
      (field) => {
        const violation = violationOf(() =>
          service.prepareInsert('event', { ...eventFields, [field]: null }),
        );
        expect(violation.field).toBe(field);
      },
    );

    it.each(['2026-02-30', '04/07/2026', '2026-07-04T10:00:00Z'])(
      'should reject the event date %p',
      (date) => {
        const violation = violationOf(() =>
          service.prepareInsert('event', { ...eventFields, date }),
        );
        expect(violation.field).toBe('date');
      },
    );

    it('should reject a role outside the enumeration', () => {
      const violation = violationOf(() =>
        service.prepareInsert('profile', {
          id: 'principal-x',
          name: 'Xavier',
          companyName: 'X Corp',
          role: 'admin',
        }),
      );
      expect(violation.field).toBe('role');
      expect(violation.message).toBe('role must be one of: sponsor, organizer');
    });
  });

  describe('prepareUpdate', () => {
    it('should advance updatedAt on an unchanged payload', () => {
      const values = service.prepareUpdate('profile', storedProfile, {
        id: storedProfile.id,
        name: storedProfile.name,
        companyName: storedProfile.companyName,
        role: storedProfile.role,
      });

      expect(values).toEqual({
        name: 'Ana',
        companyName: 'Harbour Events',
        updatedAt: now,
      });
    });

    it.each([
      ['role', { role: 'sponsor' }],
      ['id', { id: 'someone-else' }],
    ])('should refuse to change the profile %s', (field, patch) => {
      const violation = violationOf(() =>
        service.prepareUpdate('profile', storedProfile, patch),
      );
      expect(violation.field).toBe(field);
    });

    it('should merge a partial patch over the stored row', () => {
      const values = service.prepareUpdate('event', storedEvent, {
        city: 'Braga',
        createdAt: new Date('2030-01-01T00:00:00.000Z'),
      });

      expect(values).toEqual({ ...eventFields, city: 'Braga', updatedAt: now });
      expect(values).not.toHaveProperty('createdAt');
    });

    it('should validate the merged row', () => {
      expect(
        violationOf(() =>
          service.prepareUpdate('event', storedEvent, { amount: 0 }),
        ).field,
      ).toBe('amount');
      expect(
        violationOf(() =>
          service.prepareUpdate('event', storedEvent, { name: null }),
        ).field,
      ).toBe('name');
    });

    it('should refuse any update to a sponsor event type', () => {
      const violation = violationOf(() =>
        service.prepareUpdate(
          'sponsorEventType',
          {
            id: 'tag-1',
            sponsorOfferId: 'offer-b',
            eventType: 'concert',
            createdAt: created,
          },
          { eventType: 'festival' },
        ),
      );
      expect(violation.field).toBe('id');
    });
  });
});
