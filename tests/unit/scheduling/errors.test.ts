import {
  DuplicateSlotError,
  InsufficientRosterError,
  NotAuthorizedError,
  NotFoundError,
  NotPendingError,
  SchedulingError,
  StaleSwapError,
} from '../../../src/lib/scheduling/errors';

describe('Scheduling errors', () => {
  it('carries code, status and details', () => {
    const error = new InsufficientRosterError(1, 2);

    expect(error).toBeInstanceOf(SchedulingError);
    expect(error).toBeInstanceOf(Error);
    expect(error.statusCode).toBe(422);
    expect(error.toJSON()).toEqual({
      error: 'INSUFFICIENT_ROSTER',
      message: 'At least 2 active people are required, found 1',
      activeCount: 1,
      required: 2,
    });
  });

  it('names the taken slot when known', () => {
    expect(new DuplicateSlotError('2099-01-03', 'SABADO_TARDE1').toJSON()).toEqual({
      error: 'DUPLICATE_SLOT',
      message: 'Slot SABADO_TARDE1 on 2099-01-03 is already assigned',
      date: '2099-01-03',
      slotType: 'SABADO_TARDE1',
    });
    expect(new DuplicateSlotError().details()).toEqual({});
  });

  it('maps each kind to its HTTP status', () => {
    expect(new NotPendingError('s1', 'ACCEPTED').statusCode).toBe(409);
    expect(new NotAuthorizedError().statusCode).toBe(403);
    expect(new StaleSwapError('s1').statusCode).toBe(409);
    expect(new NotFoundError('Shift', 'x').statusCode).toBe(404);
  });

  it('uses a default message for NotAuthorized', () => {
    expect(new NotAuthorizedError().message).toBe('You are not allowed to perform this action');
  });
});
