/**
 * Swap notification texts
 *
 * Every swap transition notifies the counterparty of whoever acted:
 * proposals and cancellations go to the target, answers go to the requester.
 */

import { findSlot } from '../../config/slots';
import type { NotificationEvent } from '../../models/notification';
import type { NotificationKind, Shift, SwapRequest } from '../../types/entities';

const formatDate = (isoDate: string): string => {
  const [year, month, day] = isoDate.split('-');
  return `${day}/${month}/${year}`;
};

/**
 * Short human label for a shift, e.g. "13/06/2026 (Sábado 13:00 - 17:00)".
 * A shift deleted while the request was pending reads as "um plantão removido".
 */
export const describeShift = (shift: Pick<Shift, 'domain' | 'date' | 'slotType'> | null): string => {
  if (!shift) {
    return 'um plantão removido';
  }
  const slot = findSlot(shift.domain, shift.slotType);
  return `${formatDate(shift.date)} (${slot?.label ?? shift.slotType})`;
};

export interface SwapShifts {
  requesterShift: Shift | null;
  targetShift: Shift | null;
}

/**
 * Build the notification for a swap transition
 */
export const buildSwapNotification = (
  kind: NotificationKind,
  swap: SwapRequest,
  shifts: SwapShifts
): NotificationEvent => {
  const offered = describeShift(shifts.requesterShift);
  const wanted = describeShift(shifts.targetShift);

  switch (kind) {
    case 'TROCA_SOLICITADA':
      return {
        recipientId: swap.targetId,
        kind,
        title: 'Nova solicitação de troca',
        body: `${swap.requesterName} quer trocar o plantão de ${offered} pelo seu plantão de ${wanted}.`,
        relatedSwapId: swap.swapId,
      };
    case 'TROCA_ACEITA':
      return {
        recipientId: swap.requesterId,
        kind,
        title: 'Troca aceita',
        body: `${swap.targetName} aceitou a troca. Seu novo plantão é ${wanted}.`,
        relatedSwapId: swap.swapId,
      };
    case 'TROCA_RECUSADA':
      return {
        recipientId: swap.requesterId,
        kind,
        title: 'Troca recusada',
        body: `${swap.targetName} recusou a troca do plantão de ${offered}.`,
        relatedSwapId: swap.swapId,
      };
    case 'TROCA_CANCELADA':
      return {
        recipientId: swap.targetId,
        kind,
        title: 'Troca cancelada',
        body: `${swap.requesterName} cancelou a solicitação de troca do plantão de ${wanted}.`,
        relatedSwapId: swap.swapId,
      };
  }
};
