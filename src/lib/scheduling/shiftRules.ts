/**
 * Shift derivation and grouping rules shared by the registry and reports
 */

import { findSlot } from '../../config/slots';
import type { SlotDefinition } from '../../config/slots';
import { addDays, dayOfWeek, SATURDAY, SUNDAY, startOfWeek } from '../dates';
import type { RotaDomain, Shift } from '../../types/entities';
import { InvalidPartnerError, InvalidSlotDateError } from './errors';

const WEEKDAY_NUMBERS = { SAB: SATURDAY, DOM: SUNDAY } as const;

/**
 * Resolve the slot for a date, checking the date falls on the slot's weekday
 *
 * @throws InvalidSlotDateError when the slot is unknown for the domain or the weekday differs
 */
export const resolveSlot = (domain: RotaDomain, slotType: string, date: string): SlotDefinition => {
  const slot = findSlot(domain, slotType);
  if (!slot) {
    throw new InvalidSlotDateError(date, `${domain} slot (unknown slot ${slotType})`);
  }

  if (dayOfWeek(date) !== WEEKDAY_NUMBERS[slot.weekday]) {
    throw new InvalidSlotDateError(date, `${slot.weekday === 'SAB' ? 'Saturday' : 'Sunday'} for ${slotType}`);
  }

  return slot;
};

/**
 * A partner is only valid on paired slots and must be someone else
 */
export const assertPartnerAllowed = (
  slot: SlotDefinition,
  personId: string,
  partnerId: string | null | undefined
): void => {
  if (!partnerId) {
    return;
  }
  if (!slot.paired) {
    throw new InvalidPartnerError(`Slot ${slot.slotType} does not take a second person`);
  }
  if (partnerId === personId) {
    throw new InvalidPartnerError('Partner must be a different person');
  }
};

/**
 * Exchanging owners must not make either new owner the partner on their own shift
 *
 * @throws InvalidPartnerError when a shift's partner is the other shift's owner
 */
export const assertOwnersExchangeable = (first: Shift, second: Shift): void => {
  if (first.partnerId === second.personId || second.partnerId === first.personId) {
    throw new InvalidPartnerError('A swap cannot make someone the partner on their own shift');
  }
};

/**
 * Shifts of one Monday-to-Sunday week
 */
export interface WeekGroup {
  weekStart: string;
  weekEnd: string;
  shifts: Shift[];
}

/**
 * Group shifts by week, weeks ascending, shifts by date then start time
 */
export const groupByWeek = (shifts: readonly Shift[]): WeekGroup[] => {
  const groups = new Map<string, WeekGroup>();

  const ordered = [...shifts].sort(
    (a, b) => a.date.localeCompare(b.date) || a.startTime.localeCompare(b.startTime)
  );

  for (const shift of ordered) {
    const weekStart = startOfWeek(shift.date);
    let group = groups.get(weekStart);
    if (!group) {
      group = { weekStart, weekEnd: addDays(weekStart, 6), shifts: [] };
      groups.set(weekStart, group);
    }
    group.shifts.push(shift);
  }

  return [...groups.values()].sort((a, b) => a.weekStart.localeCompare(b.weekStart));
};
