//src/access/store/entity-store.ts
import { and, asc, eq } from 'drizzle-orm';
import type { SqliteExecutor } from '../../database/database.service';
import {
  events,
  profiles,
  sponsorEventTypes,
  sponsorOffers,
} from '../../database/schema';
import type { ProfileRole } from '../../database/schema';
import {
  ConstraintViolationError,
  EntityNotFoundError,
} from '../../common/errors/access.errors';
import type {
  EntityFilterMap,
  EntityInsertMap,
  EntityKind,
  EntityRowMap,
  EntityUpdateMap,
  PolicyLookup,
} from '../access.types';

interface TableAdapter<K extends EntityKind> {
  get(db: SqliteExecutor, id: string): EntityRowMap[K] | undefined;
  list(db: SqliteExecutor, filter?: EntityFilterMap[K]): EntityRowMap[K][];
  insert(db: SqliteExecutor, values: EntityInsertMap[K]): EntityRowMap[K];
  update(
    db: SqliteExecutor,
    id: string,
    values: EntityUpdateMap[K],
  ): EntityRowMap[K] | undefined;
  delete(db: SqliteExecutor, id: string): boolean;
}

interface ForeignKey<K extends EntityKind> {
  field: keyof EntityInsertMap[K] & string;
  references: EntityKind;
  /** Role the referenced profile must carry when the row is created. */
  role?: ProfileRole;
}

const ADAPTERS: { [K in EntityKind]: TableAdapter<K> } = {
  profile: {
    get: (db, id) =>
      db.select().from(profiles).where(eq(profiles.id, id)).get(),
    list: (db) =>
      db
        .select()
        .from(profiles)
        .orderBy(asc(profiles.createdAt), asc(profiles.id))
        .all(),
    insert: (db, values) =>
      db.insert(profiles).values(values).returning().get(),
    update: (db, id, values) =>
      db
        .update(profiles)
        .set(values)
        .where(eq(profiles.id, id))
        .returning()
        .get(),
    delete: (db, id) =>
      db
        .delete(profiles)
        .where(eq(profiles.id, id))
        .returning({ id: profiles.id })
        .all().length > 0,
  },
  event: {
    get: (db, id) => db.select().from(events).where(eq(events.id, id)).get(),
    list: (db, filter = {}) =>
      db
        .select()
        .from(events)
        .where(
          and(
            filter.organizerId !== undefined
              ? eq(events.organizerId, filter.organizerId)
              : undefined,
            filter.type !== undefined
              ? eq(events.type, filter.type)
              : undefined,
            filter.city !== undefined
              ? eq(events.city, filter.city)
              : undefined,
          ),
        )
        .orderBy(asc(events.createdAt), asc(events.id))
        .all(),
    insert: (db, values) => db.insert(events).values(values).returning().get(),
    update: (db, id, values) =>
      db.update(events).set(values).where(eq(events.id, id)).returning().get(),
    delete: (db, id) =>
      db
        .delete(events)
        .where(eq(events.id, id))
        .returning({ id: events.id })
        .all().length > 0,
  },
  sponsorOffer: {
    get: (db, id) =>
      db.select().from(sponsorOffers).where(eq(sponsorOffers.id, id)).get(),
    list: (db, filter = {}) =>
      db
        .select()
        .from(sponsorOffers)
        .where(
          filter.profileId !== undefined
            ? eq(sponsorOffers.profileId, filter.profileId)
            : undefined,
        )
        .orderBy(asc(sponsorOffers.createdAt), asc(sponsorOffers.id))
        .all(),
    insert: (db, values) =>
      db.insert(sponsorOffers).values(values).returning().get(),
    update: (db, id, values) =>
      db
        .update(sponsorOffers)
        .set(values)
        .where(eq(sponsorOffers.id, id))
        .returning()
        .get(),
    delete: (db, id) =>
      db
        .delete(sponsorOffers)
        .where(eq(sponsorOffers.id, id))
        .returning({ id: sponsorOffers.id })
        .all().length > 0,
  },
  sponsorEventType: {
    get: (db, id) =>
      db
        .select()
        .from(sponsorEventTypes)
        .where(eq(sponsorEventTypes.id, id))
        .get(),
    list: (db, filter = {}) =>
      db
        .select()
        .from(sponsorEventTypes)
        .where(
          and(
            filter.sponsorOfferId !== undefined
              ? eq(sponsorEventTypes.sponsorOfferId, filter.sponsorOfferId)
              : undefined,
            filter.eventType !== undefined
              ? eq(sponsorEventTypes.eventType, filter.eventType)
              : undefined,
          ),
        )
        .orderBy(asc(sponsorEventTypes.createdAt), asc(sponsorEventTypes.id))
        .all(),
    insert: (db, values) =>
      db.insert(sponsorEventTypes).values(values).returning().get(),
    update: () => {
      throw new ConstraintViolationError(
        'id',
        'sponsorEventType rows are append-only',
      );
    },
    delete: (db, id) =>
      db
        .delete(sponsorEventTypes)
        .where(eq(sponsorEventTypes.id, id))
        .returning({ id: sponsorEventTypes.id })
        .all().length > 0,
  },
};

const FOREIGN_KEYS: { [K in EntityKind]: readonly ForeignKey<K>[] } = {
  profile: [],
  event: [{ field: 'organizerId', references: 'profile', role: 'organizer' }],
  sponsorOffer: [
    { field: 'profileId', references: 'profile', role: 'sponsor' },
  ],
  sponsorEventType: [{ field: 'sponsorOfferId', references: 'sponsorOffer' }],
};

/**
 * Storage for the four entity kinds. Callers are expected to have been
 * authorized already; the store only guards referential integrity.
 */
export class EntityStore implements PolicyLookup {
  private wrote = false;

  /** `afterWrite` runs once a transaction that changed rows has committed. */
  constructor(
    private readonly db: SqliteExecutor,
    private readonly afterWrite?: () => void,
  ) {}

  /**
   * Runs `work` inside one transaction. Anything thrown rolls the whole
   * unit back.
   */
  transaction<T>(work: (store: EntityStore) => T): T {
    let wrote = false;
    const result = this.db.transaction((tx) => {
      const scoped = new EntityStore(tx);
      const value = work(scoped);
      wrote = scoped.wrote;
      return value;
    });
    if (wrote) {
      this.afterWrite?.();
    }
    return result;
  }

  get<K extends EntityKind>(
    kind: K,
    id: string,
  ): EntityRowMap[K] | undefined {
    const adapter: TableAdapter<K> = ADAPTERS[kind];
    return adapter.get(this.db, id);
  }

  list<K extends EntityKind>(
    kind: K,
    filter?: EntityFilterMap[K],
  ): EntityRowMap[K][] {
    const adapter: TableAdapter<K> = ADAPTERS[kind];
    return adapter.list(this.db, filter);
  }

  insert<K extends EntityKind>(
    kind: K,
    values: EntityInsertMap[K],
  ): EntityRowMap[K] {
    const adapter: TableAdapter<K> = ADAPTERS[kind];
    const foreignKeys: readonly ForeignKey<K>[] = FOREIGN_KEYS[kind];

    for (const foreignKey of foreignKeys) {
      this.assertReference(foreignKey, values[foreignKey.field]);
    }
    if (kind === 'profile' && typeof values.id === 'string') {
      if (this.get('profile', values.id)) {
        throw new ConstraintViolationError(
          'id',
          `a profile already exists for ${values.id}`,
        );
      }
    }
    this.wrote = true;
    return adapter.insert(this.db, values);
  }

  update<K extends EntityKind>(
    kind: K,
    id: string,
    values: EntityUpdateMap[K],
  ): EntityRowMap[K] {
    const adapter: TableAdapter<K> = ADAPTERS[kind];
    const row = adapter.update(this.db, id, values);
    if (!row) {
      throw new EntityNotFoundError(kind, id);
    }
    this.wrote = true;
    return row;
  }

  delete(kind: EntityKind, id: string): void {
    if (!ADAPTERS[kind].delete(this.db, id)) {
      throw new EntityNotFoundError(kind, id);
    }
    this.wrote = true;
  }

  private assertReference<K extends EntityKind>(
    foreignKey: ForeignKey<K>,
    value: unknown,
  ) {
    const { field, references, role } = foreignKey;
    const referenced =
      typeof value === 'string' ? this.get(references, value) : undefined;

    if (!referenced) {
      throw new ConstraintViolationError(
        field,
        `${field} does not reference an existing ${references}`,
      );
    }
    if (
      role !== undefined &&
      (!('role' in referenced) || referenced.role !== role)
    ) {
      throw new ConstraintViolationError(
        field,
        `${field} must reference a profile with role ${role}`,
      );
    }
  }
}
