/**
 * Round-robin rotation
 *
 * Pure planning functions: no I/O, no clock. The rotation pointer is an
 * explicit input and output of each cycle step so a run can be checked one
 * weekend at a time.
 */

import { getCalendar } from '../../config/slots';
import { GENERATION_LIMITS } from '../../config/rota';
import { addDays, isSaturday } from '../dates';
import type { RotaDomain, SlotType, ShiftWeekday } from '../../types/entities';
import {
  InsufficientRosterError,
  InvalidRangeError,
  InvalidSlotDateError,
} from './errors';

/**
 * Roster entry as the scheduler sees it
 */
export interface RosterEntry {
  personId: string;
  fullName: string;
  queueOrder: number;
  active: boolean;
}

/**
 * One planned assignment, ready to be persisted
 */
export interface PlannedShift {
  domain: RotaDomain;
  date: string;
  weekday: ShiftWeekday;
  slotType: SlotType;
  startTime: string;
  endTime: string;
  personId: string;
  personName: string;
  partnerId: string | null;
  partnerName: string | null;
}

export interface CycleStep {
  assignments: PlannedShift[];
  nextPointer: number;
}

export interface RotationPlan {
  assignments: PlannedShift[];
  finalPointer: number;
}

type StepFunction = (roster: readonly RosterEntry[], pointer: number, saturday: string) => CycleStep;

const pick = (roster: readonly RosterEntry[], index: number): RosterEntry => {
  const entry = roster[index % roster.length];
  if (!entry) {
    throw new InsufficientRosterError(roster.length, GENERATION_LIMITS.minRosterSize);
  }
  return entry;
};

const plan = (
  domain: RotaDomain,
  saturday: string,
  slotType: SlotType,
  person: RosterEntry,
  partner: RosterEntry | null = null
): PlannedShift => {
  const slot = getCalendar(domain).find((s) => s.slotType === slotType);
  if (!slot) {
    throw new Error(`Slot ${slotType} is not part of the ${domain} calendar`);
  }

  return {
    domain,
    date: addDays(saturday, slot.dayOffset),
    weekday: slot.weekday,
    slotType,
    startTime: slot.startTime,
    endTime: slot.endTime,
    personId: person.personId,
    personName: person.fullName,
    partnerId: partner?.personId ?? null,
    partnerName: partner?.fullName ?? null,
  };
};

/**
 * One collaborator weekend.
 *
 * A covers Saturday afternoon and Sunday afternoon, B covers Saturday
 * evening and Sunday morning, C covers Sunday evening. The pointer moves
 * by two, so C of this weekend becomes A of the next.
 */
export const stepCollaboratorCycle: StepFunction = (roster, pointer, saturday) => {
  const a = pick(roster, pointer);
  const b = pick(roster, pointer + 1);
  const c = pick(roster, pointer + 2);

  return {
    assignments: [
      plan('collaborator', saturday, 'SABADO_TARDE1', a),
      plan('collaborator', saturday, 'SABADO_TARDE2', b),
      plan('collaborator', saturday, 'DOMINGO_MANHA', b),
      plan('collaborator', saturday, 'DOMINGO_TARDE1', a),
      plan('collaborator', saturday, 'DOMINGO_TARDE2', c),
    ],
    nextPointer: pointer + 2,
  };
};

/**
 * One technician weekend: a pair on Saturday, a third person alone on Sunday
 */
export const stepTechnicianCycle: StepFunction = (roster, pointer, saturday) => {
  const principal = pick(roster, pointer);
  const partner = pick(roster, pointer + 1);
  const sunday = pick(roster, pointer + 2);

  return {
    assignments: [
      plan('technician', saturday, 'SABADO_DUPLA', principal, partner),
      plan('technician', saturday, 'DOMINGO_AVULSO', sunday),
    ],
    nextPointer: pointer + 3,
  };
};

const STEPS: Record<RotaDomain, StepFunction> = {
  collaborator: stepCollaboratorCycle,
  technician: stepTechnicianCycle,
};

export const getCycleStep = (domain: RotaDomain): StepFunction => STEPS[domain];

/**
 * Keep active entries and order them by queue position, then name
 */
export const orderRoster = (entries: readonly RosterEntry[]): RosterEntry[] =>
  entries
    .filter((entry) => entry.active)
    .sort((x, y) => x.queueOrder - y.queueOrder || x.fullName.localeCompare(y.fullName));

/**
 * Check generation inputs before anything is planned
 */
export const validateGenerationRequest = (
  startDate: string,
  cycleCount: number,
  activeCount: number
): void => {
  const { minCycles, maxCycles, minRosterSize } = GENERATION_LIMITS;

  if (!Number.isInteger(cycleCount) || cycleCount < minCycles || cycleCount > maxCycles) {
    throw new InvalidRangeError(cycleCount, minCycles, maxCycles);
  }

  if (!isSaturday(startDate)) {
    throw new InvalidSlotDateError(startDate, 'Saturday cycle start');
  }

  if (activeCount < minRosterSize) {
    throw new InsufficientRosterError(activeCount, minRosterSize);
  }
};

/**
 * Plan a whole run in memory.
 *
 * The roster is used in the order given; callers pass it through
 * `orderRoster` first.
 */
export const planRotation = (
  domain: RotaDomain,
  startDate: string,
  cycleCount: number,
  roster: readonly RosterEntry[]
): RotationPlan => {
  validateGenerationRequest(startDate, cycleCount, roster.length);

  const step = getCycleStep(domain);
  const assignments: PlannedShift[] = [];
  let pointer = 0;

  for (let cycle = 0; cycle < cycleCount; cycle++) {
    const result = step(roster, pointer, addDays(startDate, 7 * cycle));
    assignments.push(...result.assignments);
    pointer = result.nextPointer;
  }

  return { assignments, finalPointer: pointer };
};
