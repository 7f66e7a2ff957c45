/**
 * Custom error classes for rota scheduling and shift swaps
 *
 * Every condition here is recoverable and user-facing. Handlers translate
 * them into HTTP responses through `handleError`.
 */

export type SchedulingErrorCode =
  | 'INSUFFICIENT_ROSTER'
  | 'INVALID_RANGE'
  | 'INVALID_SLOT_DATE'
  | 'INVALID_PARTNER'
  | 'DUPLICATE_SLOT'
  | 'SELF_SWAP'
  | 'PAST_SHIFT'
  | 'DUPLICATE_PROPOSAL'
  | 'NOT_PENDING'
  | 'NOT_AUTHORIZED'
  | 'STALE_SWAP'
  | 'VERSION_CONFLICT'
  | 'INACTIVE_PERSON'
  | 'NOT_FOUND';

/**
 * Base class for all scheduling errors
 */
export abstract class SchedulingError extends Error {
  abstract readonly code: SchedulingErrorCode;
  abstract readonly statusCode: number;

  details(): Record<string, unknown> {
    return {};
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      ...this.details(),
    };
  }
}

/**
 * Fewer active people than a rotation needs
 */
export class InsufficientRosterError extends SchedulingError {
  public readonly code = 'INSUFFICIENT_ROSTER';
  public readonly statusCode = 422;

  constructor(
    public readonly activeCount: number,
    public readonly required: number
  ) {
    super(`At least ${required} active people are required, found ${activeCount}`);
    this.name = 'InsufficientRosterError';
    Object.setPrototypeOf(this, InsufficientRosterError.prototype);
  }

  override details(): Record<string, unknown> {
    return { activeCount: this.activeCount, required: this.required };
  }
}

export class InvalidRangeError extends SchedulingError {
  public readonly code = 'INVALID_RANGE';
  public readonly statusCode = 400;

  constructor(
    public readonly cycleCount: number,
    public readonly min: number,
    public readonly max: number
  ) {
    super(`Cycle count must be between ${min} and ${max}, got ${cycleCount}`);
    this.name = 'InvalidRangeError';
    Object.setPrototypeOf(this, InvalidRangeError.prototype);
  }

  override details(): Record<string, unknown> {
    return { cycleCount: this.cycleCount, min: this.min, max: this.max };
  }
}

/**
 * Date does not fall on the weekday a slot (or the cycle anchor) requires
 */
export class InvalidSlotDateError extends SchedulingError {
  public readonly code = 'INVALID_SLOT_DATE';
  public readonly statusCode = 400;

  constructor(
    public readonly date: string,
    public readonly expected: string
  ) {
    super(`Date ${date} is not a valid ${expected}`);
    this.name = 'InvalidSlotDateError';
    Object.setPrototypeOf(this, InvalidSlotDateError.prototype);
  }

  override details(): Record<string, unknown> {
    return { date: this.date, expected: this.expected };
  }
}

export class InvalidPartnerError extends SchedulingError {
  public readonly code = 'INVALID_PARTNER';
  public readonly statusCode = 400;

  constructor(reason: string) {
    super(reason);
    this.name = 'InvalidPartnerError';
    Object.setPrototypeOf(this, InvalidPartnerError.prototype);
  }
}

/**
 * A shift already occupies the (date, slot) pair
 */
export class DuplicateSlotError extends SchedulingError {
  public readonly code = 'DUPLICATE_SLOT';
  public readonly statusCode = 409;

  constructor(
    public readonly date?: string,
    public readonly slotType?: string
  ) {
    super(
      date && slotType
        ? `Slot ${slotType} on ${date} is already assigned`
        : 'One or more slots in this schedule are already assigned'
    );
    this.name = 'DuplicateSlotError';
    Object.setPrototypeOf(this, DuplicateSlotError.prototype);
  }

  override details(): Record<string, unknown> {
    return this.date && this.slotType ? { date: this.date, slotType: this.slotType } : {};
  }
}

export class SelfSwapError extends SchedulingError {
  public readonly code = 'SELF_SWAP';
  public readonly statusCode = 422;

  constructor() {
    super('Both shifts belong to the same person');
    this.name = 'SelfSwapError';
    Object.setPrototypeOf(this, SelfSwapError.prototype);
  }
}

export class PastShiftError extends SchedulingError {
  public readonly code = 'PAST_SHIFT';
  public readonly statusCode = 422;

  constructor(public readonly date: string) {
    super(`Shift on ${date} is in the past`);
    this.name = 'PastShiftError';
    Object.setPrototypeOf(this, PastShiftError.prototype);
  }

  override details(): Record<string, unknown> {
    return { date: this.date };
  }
}

export class DuplicateProposalError extends SchedulingError {
  public readonly code = 'DUPLICATE_PROPOSAL';
  public readonly statusCode = 409;

  constructor() {
    super('A pending swap request for these shifts already exists');
    this.name = 'DuplicateProposalError';
    Object.setPrototypeOf(this, DuplicateProposalError.prototype);
  }
}

/**
 * Swap request already reached a terminal status
 */
export class NotPendingError extends SchedulingError {
  public readonly code = 'NOT_PENDING';
  public readonly statusCode = 409;

  constructor(
    public readonly swapId: string,
    public readonly status: string
  ) {
    super(`Swap request ${swapId} is ${status}, not PENDING`);
    this.name = 'NotPendingError';
    Object.setPrototypeOf(this, NotPendingError.prototype);
  }

  override details(): Record<string, unknown> {
    return { swapId: this.swapId, status: this.status };
  }
}

export class NotAuthorizedError extends SchedulingError {
  public readonly code = 'NOT_AUTHORIZED';
  public readonly statusCode = 403;

  constructor(message = 'You are not allowed to perform this action') {
    super(message);
    this.name = 'NotAuthorizedError';
    Object.setPrototypeOf(this, NotAuthorizedError.prototype);
  }
}

/**
 * A shift referenced by a pending swap changed owner before resolution
 */
export class StaleSwapError extends SchedulingError {
  public readonly code = 'STALE_SWAP';
  public readonly statusCode = 409;

  constructor(public readonly swapId: string) {
    super(`Shifts of swap request ${swapId} changed owner since it was proposed`);
    this.name = 'StaleSwapError';
    Object.setPrototypeOf(this, StaleSwapError.prototype);
  }

  override details(): Record<string, unknown> {
    return { swapId: this.swapId };
  }
}

export class NotFoundError extends SchedulingError {
  public readonly code = 'NOT_FOUND';
  public readonly statusCode = 404;

  constructor(
    public readonly entityType: 'Person' | 'Shift' | 'SwapRequest' | 'Notification',
    public readonly entityId: string
  ) {
    super(`${entityType} with ID "${entityId}" not found`);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }

  override details(): Record<string, unknown> {
    return { entityType: this.entityType, entityId: this.entityId };
  }
}

/**
 * Optimistic locking failed: the entity changed since it was read
 */
export class VersionConflictError extends SchedulingError {
  public readonly code = 'VERSION_CONFLICT';
  public readonly statusCode = 409;

  constructor(
    public readonly entityType: 'Shift' | 'SwapRequest',
    public readonly entityId: string,
    public readonly expectedVersion: number
  ) {
    super(`${entityType} ${entityId} was modified by another user (expected version ${expectedVersion})`);
    this.name = 'VersionConflictError';
    Object.setPrototypeOf(this, VersionConflictError.prototype);
  }

  override details(): Record<string, unknown> {
    return { entityType: this.entityType, entityId: this.entityId, expectedVersion: this.expectedVersion };
  }
}

/**
 * Inactive people keep their history but take no new shifts
 */
export class InactivePersonError extends SchedulingError {
  public readonly code = 'INACTIVE_PERSON';
  public readonly statusCode = 422;

  constructor(public readonly personId: string) {
    super(`Person ${personId} is not active`);
    this.name = 'InactivePersonError';
    Object.setPrototypeOf(this, InactivePersonError.prototype);
  }

  override details(): Record<string, unknown> {
    return { personId: this.personId };
  }
}
