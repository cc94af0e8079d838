//src/database/schema.ts
import { randomUUID } from 'crypto';
import { integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core';

// Mirrors the DDL in drizzle/*.sql, which is what actually creates the
// tables. Change both together; entity-store.spec.ts compares the columns.

export const PROFILE_ROLES = ['sponsor', 'organizer'] as const;

export const profiles = sqliteTable('profiles', {
  // Same value as the identity provider's subject claim.
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  companyName: text('company_name').notNull(),
  role: text('role', { enum: PROFILE_ROLES }).notNull(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

export const events = sqliteTable('events', {
  id: text('id')
    .primaryKey()
    .$defaultFn(() => randomUUID()),
  name: text('name').notNull(),
  type: text('type').notNull(),
  amount: real('amount').notNull(),
  city: text('city').notNull(),
  description: text('description').notNull(),
  date: text('date').notNull(),
  organizerId: text('organizer_id')
    .notNull()
    .references(() => profiles.id),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

export const sponsorOffers = sqliteTable('sponsor_offers', {
  id: text('id')
    .primaryKey()
    .$defaultFn(() => randomUUID()),
  profileId: text('profile_id')
    .notNull()
    .references(() => profiles.id),
  amount: real('amount').notNull(),
  description: text('description'),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

export const sponsorEventTypes = sqliteTable('sponsor_event_types', {
  id: text('id')
    .primaryKey()
    .$defaultFn(() => randomUUID()),
  sponsorOfferId: text('sponsor_offer_id')
    .notNull()
    .references(() => sponsorOffers.id),
  eventType: text('event_type').notNull(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

export type ProfileRole = (typeof PROFILE_ROLES)[number];

export type ProfileRow = typeof profiles.$inferSelect;
export type NewProfileRow = typeof profiles.$inferInsert;
export type EventRow = typeof events.$inferSelect;
export type NewEventRow = typeof events.$inferInsert;
export type SponsorOfferRow = typeof sponsorOffers.$inferSelect;
export type NewSponsorOfferRow = typeof sponsorOffers.$inferInsert;
export type SponsorEventTypeRow = typeof sponsorEventTypes.$inferSelect;
export type NewSponsorEventTypeRow = typeof sponsorEventTypes.$inferInsert;
