//src/access/access.service.ts
import { Injectable, Logger } from '@nestjs/common';
import {
  EntityNotFoundError,
  PermissionDeniedError,
} from '../common/errors/access.errors';
import type {
  EntityFilterMap,
  EntityKind,
  EntityRowMap,
  Operation,
  Principal,
  PrincipalId,
  Target,
} from './access.types';
import type { ProfileRow } from '../database/schema';
import { IntegrityService } from './integrity/integrity.service';
import { PolicyService } from './policy/policy.service';
import { EntityStore } from './store/entity-store';

/** The operations of one entity kind, bound to that kind. */
export interface EntityGateway<K extends EntityKind> {
  read(principal: Principal, id: string): EntityRowMap[K];
  list(principal: Principal, filter?: EntityFilterMap[K]): EntityRowMap[K][];
  create(principal: Principal, fields: Target): EntityRowMap[K];
  update(principal: Principal, id: string, patch: Target): EntityRowMap[K];
  remove(principal: Principal, id: string): void;
}

/**
 * Authorize-then-act for every entity kind. Each call runs the policy check,
 * the integrity rules and the write inside a single store transaction, so a
 * row's ownership cannot change between the check and the mutation.
 */
@Injectable()
export class AccessService {
  private readonly logger = new Logger(AccessService.name);

  constructor(
    private readonly store: EntityStore,
    private readonly policy: PolicyService,
    private readonly integrity: IntegrityService,
  ) {}

  for<K extends EntityKind>(kind: K): EntityGateway<K> {
    return {
      read: (principal, id) => this.read(principal, kind, id),
      list: (principal, filter) => this.list(principal, kind, filter),
      create: (principal, fields) => this.create(principal, kind, fields),
      update: (principal, id, patch) =>
        this.update(principal, kind, id, patch),
      remove: (principal, id) => this.remove(principal, kind, id),
    };
  }

  read<K extends EntityKind>(
    principal: Principal,
    kind: K,
    id: string,
  ): EntityRowMap[K] {
    const actor = this.requirePrincipal(principal, kind, 'read');
    return this.store.transaction((store) => {
      const row = store.get(kind, id);
      if (!row) {
        throw new EntityNotFoundError(kind, id);
      }
      this.assertAllowed(actor, kind, 'read', row, store);
      return row;
    });
  }

  /** Rows of `kind` matching `filter` that the principal may read. */
  list<K extends EntityKind>(
    principal: Principal,
    kind: K,
    filter?: EntityFilterMap[K],
  ): EntityRowMap[K][] {
    const actor = this.requirePrincipal(principal, kind, 'read');
    return this.store.transaction((store) =>
      store
        .list(kind, filter)
        .filter(
          (row) =>
            this.policy.authorize(actor, kind, 'read', row, store) === 'allow',
        ),
    );
  }

  create<K extends EntityKind>(
    principal: Principal,
    kind: K,
    fields: Target,
  ): EntityRowMap[K] {
    const actor = this.requirePrincipal(principal, kind, 'create');
    return this.store.transaction((store) => {
      this.assertAllowed(actor, kind, 'create', fields, store);
      const values = this.integrity.prepareInsert(kind, fields);
      const row = store.insert(kind, values);
      this.logger.log(`${actor} created ${kind} ${row.id}`);
      return row;
    });
  }

  /**
   * The update rule must hold for the stored row and for the row as the
   * patch would leave it, so ownership cannot be handed to someone else.
   */
  update<K extends EntityKind>(
    principal: Principal,
    kind: K,
    id: string,
    patch: Target,
  ): EntityRowMap[K] {
    const actor = this.requirePrincipal(principal, kind, 'update');
    return this.store.transaction((store) => {
      const existing = store.get(kind, id);
      if (!existing) {
        throw new EntityNotFoundError(kind, id);
      }
      this.assertAllowed(actor, kind, 'update', existing, store);
      // Immutable columns are checked before the patched row is authorized.
      this.integrity.assertImmutable(kind, existing, patch);
      const patched: Target = { ...existing, ...patch };
      this.assertAllowed(actor, kind, 'update', patched, store);

      const values = this.integrity.prepareUpdate(kind, existing, patch);
      const row = store.update(kind, id, values);
      this.logger.log(`${actor} updated ${kind} ${id}`);
      return row;
    });
  }

  /** No kind has a delete rule today, so this always ends in a denial. */
  remove(principal: Principal, kind: EntityKind, id: string): void {
    const actor = this.requirePrincipal(principal, kind, 'delete');
    this.store.transaction((store) => {
      const existing = store.get(kind, id);
      if (!existing) {
        throw new EntityNotFoundError(kind, id);
      }
      this.assertAllowed(actor, kind, 'delete', existing, store);
      store.delete(kind, id);
      this.logger.log(`${actor} deleted ${kind} ${id}`);
    });
  }

  /**
   * Creates the principal's profile on behalf of the identity provider.
   * Not a user action, so no policy rule applies.
   */
  provisionProfile(fields: Target): ProfileRow {
    return this.store.transaction((store) => {
      const row = store.insert(
        'profile',
        this.integrity.prepareInsert('profile', fields),
      );
      this.logger.log(`Provisioned ${row.role} profile ${row.id}`);
      return row;
    });
  }

  private requirePrincipal(
    principal: Principal,
    kind: EntityKind,
    operation: Operation,
  ): PrincipalId {
    if (principal === null) {
      this.logger.warn(`Anonymous ${operation} on ${kind} denied`);
      throw new PermissionDeniedError();
    }
    return principal;
  }

  private assertAllowed(
    principal: PrincipalId,
    kind: EntityKind,
    operation: Operation,
    target: Target,
    store: EntityStore,
  ) {
    const decision = this.policy.authorize(
      principal,
      kind,
      operation,
      target,
      store,
    );
    if (decision === 'deny') {
      this.logger.warn(`${principal} denied ${operation} on ${kind}`);
      throw new PermissionDeniedError();
    }
  }
}
