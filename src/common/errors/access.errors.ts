// src/common/errors/access.errors.ts
import {
  BadRequestException,
  ForbiddenException,
  NotFoundException,
} from '@nestjs/common';
import type { EntityKind } from '../../access/access.types';

/**
 * The policy engine said no. The message is the same whether the row is
 * missing or belongs to someone else.
 */
export class PermissionDeniedError extends ForbiddenException {
  constructor() {
    super({
      statusCode: 403,
      error: 'PermissionDenied',
      message: 'You do not have permission to perform this operation.',
    });
  }
}

/** A data-integrity rule failed for `field`. Never retryable. */
export class ConstraintViolationError extends BadRequestException {
  constructor(
    readonly field: string,
    message: string,
  ) {
    super({
      statusCode: 400,
      error: 'ConstraintViolation',
      field,
      message,
    });
  }
}

export class EntityNotFoundError extends NotFoundException {
  constructor(
    readonly kind: EntityKind,
    readonly id: string,
  ) {
    super({
      statusCode: 404,
      error: 'NotFound',
      message: `${kind} with id ${id} not found`,
    });
  }
}
