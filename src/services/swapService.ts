/**
 * Swap Service - shift swap workflow
 *
 * PENDING -> ACCEPTED | REJECTED | CANCELLED. Each transition commits the
 * status change, its shift updates and the counterparty notification as
 * one DynamoDB transaction.
 *
 * Only the target answers a request and only the requester withdraws it.
 * Admins may open a request on behalf of a shift's owner.
 */

import { SwapRequestModel, SwapResolution } from '../models/swapRequest';
import { ShiftModel } from '../models/shift';
import { NotificationModel } from '../models/notification';
import { ShiftService } from './shiftService';
import { buildSwapNotification, SwapShifts } from './notifications/swapNotifications';
import { logger } from '../lib/logger';
import { isAdmin, PersonRole } from '../lib/auth';
import { getRotaToday } from '../config/rota';
import { assertOwnersExchangeable } from '../lib/scheduling/shiftRules';
import {
  DuplicateProposalError,
  NotAuthorizedError,
  NotFoundError,
  NotPendingError,
  PastShiftError,
  SelfSwapError,
  StaleSwapError,
} from '../lib/scheduling/errors';
import type { NotificationKind, SwapRequest } from '../types/entities';
import type { ProposeSwapRequest } from '../types/schemas';

/**
 * Which side of a request may perform a transition
 */
type SwapParty = 'requester' | 'target';

const partyId = (swap: SwapRequest, party: SwapParty): string =>
  party === 'requester' ? swap.requesterId : swap.targetId;

/**
 * @throws NotAuthorizedError unless the actor is the given party
 */
const assertParty = (actor: PersonRole, swap: SwapRequest, party: SwapParty): void => {
  if (isAdmin(actor) || actor.personId !== partyId(swap, party)) {
    throw new NotAuthorizedError(
      party === 'target'
        ? 'Only the person asked for the swap can answer it'
        : 'Only the person who asked for the swap can cancel it'
    );
  }
};

const loadShifts = async (swap: SwapRequest): Promise<SwapShifts> => {
  const [requesterShift, targetShift] = await Promise.all([
    ShiftModel.getById(swap.requesterShiftId),
    ShiftModel.getById(swap.targetShiftId),
  ]);
  return { requesterShift, targetShift };
};

export class SwapService {
  /**
   * @throws NotFoundError if the request does not exist
   */
  static async getSwap(swapId: string): Promise<SwapRequest> {
    const swap = await SwapRequestModel.getById(swapId);
    if (!swap) {
      throw new NotFoundError('SwapRequest', swapId);
    }
    return swap;
  }

  /**
   * Offer the requester's shift in exchange for the target's shift
   *
   * @throws NotAuthorizedError if the actor does not own the offered shift
   * @throws SelfSwapError if both shifts belong to the same person
   * @throws InvalidPartnerError if a shift's partner owns the other shift
   * @throws PastShiftError if the offered shift already happened
   * @throws DuplicateProposalError if the same request is already pending
   */
  static async propose(actor: PersonRole, request: ProposeSwapRequest, now: Date = new Date()): Promise<SwapRequest> {
    const [requesterShift, targetShift] = await Promise.all([
      ShiftService.getShift(request.requesterShiftId),
      ShiftService.getShift(request.targetShiftId),
    ]);

    if (!isAdmin(actor) && requesterShift.personId !== actor.personId) {
      throw new NotAuthorizedError('You can only offer your own shifts');
    }

    if (requesterShift.domain !== targetShift.domain) {
      throw new NotAuthorizedError('Shifts from different rotas cannot be swapped');
    }

    if (requesterShift.personId === targetShift.personId) {
      throw new SelfSwapError();
    }

    assertOwnersExchangeable(requesterShift, targetShift);

    if (requesterShift.date < getRotaToday(now)) {
      throw new PastShiftError(requesterShift.date);
    }

    if (await SwapRequestModel.hasPending(requesterShift.personId, requesterShift.shiftId, targetShift.shiftId)) {
      throw new DuplicateProposalError();
    }

    const swap = await SwapRequestModel.create(
      {
        domain: requesterShift.domain,
        requesterId: requesterShift.personId,
        requesterName: requesterShift.personName,
        requesterShiftId: requesterShift.shiftId,
        targetId: targetShift.personId,
        targetName: targetShift.personName,
        targetShiftId: targetShift.shiftId,
        message: request.message ?? null,
      },
      (created) =>
        NotificationModel.buildPut(
          buildSwapNotification('TROCA_SOLICITADA', created, { requesterShift, targetShift }),
          created.createdAt
        ).item
    );

    logger.info('Swap proposed', {
      swapId: swap.swapId,
      requesterShiftId: swap.requesterShiftId,
      targetShiftId: swap.targetShiftId,
      onBehalf: isAdmin(actor),
    });
    return swap;
  }

  /**
   * Target accepts: both shifts change owner atomically
   *
   * @throws NotPendingError if the request is already resolved
   * @throws NotAuthorizedError unless the actor is the target
   * @throws StaleSwapError if either shift no longer belongs to the expected person
   * @throws InvalidPartnerError if a partner changed so that the exchange would pair someone with themselves
   */
  static async accept(actor: PersonRole, swapId: string): Promise<SwapRequest> {
    const swap = await this.getPendingSwap(swapId);
    assertParty(actor, swap, 'target');

    const { requesterShift, targetShift } = await loadShifts(swap);
    if (
      !requesterShift ||
      !targetShift ||
      requesterShift.personId !== swap.requesterId ||
      targetShift.personId !== swap.targetId
    ) {
      throw new StaleSwapError(swap.swapId);
    }
    assertOwnersExchangeable(requesterShift, targetShift);

    const now = new Date().toISOString();
    const notification = NotificationModel.buildPut(
      buildSwapNotification('TROCA_ACEITA', swap, { requesterShift, targetShift }),
      now
    );

    return SwapRequestModel.resolve(
      swap,
      'ACCEPTED',
      {
        shiftItems: ShiftModel.exchangeOwnersItems(requesterShift, targetShift, now),
        notificationItem: notification.item,
      },
      now
    );
  }

  /**
   * Target declines; shifts are untouched
   */
  static async reject(actor: PersonRole, swapId: string): Promise<SwapRequest> {
    const swap = await this.getPendingSwap(swapId);
    assertParty(actor, swap, 'target');
    return this.close(swap, 'REJECTED', 'TROCA_RECUSADA');
  }

  /**
   * Requester withdraws; shifts are untouched
   */
  static async cancel(actor: PersonRole, swapId: string): Promise<SwapRequest> {
    const swap = await this.getPendingSwap(swapId);
    assertParty(actor, swap, 'requester');
    return this.close(swap, 'CANCELLED', 'TROCA_CANCELADA');
  }

  /**
   * Requests a person sent or received, newest first.
   * Admins name the person; members only see their own.
   */
  static async listForPerson(actor: PersonRole, personId?: string): Promise<SwapRequest[]> {
    if (isAdmin(actor)) {
      return personId ? SwapRequestModel.listForPerson(personId) : [];
    }

    if (personId && personId !== actor.personId) {
      throw new NotAuthorizedError("You cannot view another person's swap requests");
    }
    return SwapRequestModel.listForPerson(actor.personId);
  }

  private static async getPendingSwap(swapId: string): Promise<SwapRequest> {
    const swap = await this.getSwap(swapId);
    if (swap.status !== 'PENDING') {
      throw new NotPendingError(swap.swapId, swap.status);
    }
    return swap;
  }

  private static async close(
    swap: SwapRequest,
    status: Exclude<SwapResolution, 'ACCEPTED'>,
    kind: NotificationKind
  ): Promise<SwapRequest> {
    const now = new Date().toISOString();
    const shifts = await loadShifts(swap);
    const notification = NotificationModel.buildPut(buildSwapNotification(kind, swap, shifts), now);

    return SwapRequestModel.resolve(swap, status, { notificationItem: notification.item }, now);
  }
}
