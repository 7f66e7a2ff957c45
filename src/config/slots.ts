/**
 * Slot Calendars
 *
 * Fixed weekend slots for each rotation domain. Start and end times are
 * derived from the slot type and are never edited independently.
 */

import type {
  RotaDomain,
  SlotType,
  CollaboratorSlotType,
  TechnicianSlotType,
  ShiftWeekday,
} from '../types/entities';

/**
 * A fixed time window inside the weekend cycle
 */
export interface SlotDefinition<T extends SlotType = SlotType> {
  slotType: T;
  /** Day offset from the cycle anchor (Saturday = 0, Sunday = 1) */
  dayOffset: 0 | 1;
  weekday: ShiftWeekday;
  startTime: string;
  endTime: string;
  /** Paired slots carry a second person */
  paired: boolean;
  label: string;
}

export const COLLABORATOR_SLOTS: readonly SlotDefinition<CollaboratorSlotType>[] = [
  { slotType: 'SABADO_TARDE1', dayOffset: 0, weekday: 'SAB', startTime: '13:00', endTime: '17:00', paired: false, label: 'Sábado 13:00 - 17:00' },
  { slotType: 'SABADO_TARDE2', dayOffset: 0, weekday: 'SAB', startTime: '17:00', endTime: '21:00', paired: false, label: 'Sábado 17:00 - 21:00' },
  { slotType: 'DOMINGO_MANHA', dayOffset: 1, weekday: 'DOM', startTime: '08:00', endTime: '13:00', paired: false, label: 'Domingo 08:00 - 13:00' },
  { slotType: 'DOMINGO_TARDE1', dayOffset: 1, weekday: 'DOM', startTime: '13:00', endTime: '17:00', paired: false, label: 'Domingo 13:00 - 17:00' },
  { slotType: 'DOMINGO_TARDE2', dayOffset: 1, weekday: 'DOM', startTime: '17:00', endTime: '21:00', paired: false, label: 'Domingo 17:00 - 21:00' },
];

export const TECHNICIAN_SLOTS: readonly SlotDefinition<TechnicianSlotType>[] = [
  { slotType: 'SABADO_DUPLA', dayOffset: 0, weekday: 'SAB', startTime: '08:00', endTime: '17:00', paired: true, label: 'Sábado 08:00 - 17:00 (dupla)' },
  { slotType: 'DOMINGO_AVULSO', dayOffset: 1, weekday: 'DOM', startTime: '08:00', endTime: '12:00', paired: false, label: 'Domingo 08:00 - 12:00' },
];

const CALENDARS: Record<RotaDomain, readonly SlotDefinition[]> = {
  collaborator: COLLABORATOR_SLOTS,
  technician: TECHNICIAN_SLOTS,
};

const toMinutes = (time: string): number => {
  const [hours, minutes] = time.split(':').map(Number);
  return (hours ?? 0) * 60 + (minutes ?? 0);
};

/**
 * Check that every slot ends after it starts
 *
 * @throws Error naming the first malformed slot
 */
export const assertCalendarIsValid = (slots: readonly SlotDefinition[]): void => {
  for (const slot of slots) {
    if (toMinutes(slot.endTime) <= toMinutes(slot.startTime)) {
      throw new Error(`Slot ${slot.slotType} must end after it starts`);
    }
  }
};

assertCalendarIsValid(COLLABORATOR_SLOTS);
assertCalendarIsValid(TECHNICIAN_SLOTS);

/**
 * All slots of a domain in cycle order
 */
export const getCalendar = (domain: RotaDomain): readonly SlotDefinition[] => CALENDARS[domain];

/**
 * Look up a slot within a domain, or undefined when the type belongs elsewhere
 */
export const findSlot = (domain: RotaDomain, slotType: string): SlotDefinition | undefined =>
  CALENDARS[domain].find((slot) => slot.slotType === slotType);
