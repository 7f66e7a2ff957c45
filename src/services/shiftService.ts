/**
 * Shift Service - manual shift registry and dashboard listings
 *
 * Admins edit the registry. Collaborators and technicians only read, and
 * only ever see the shifts they work (as principal or partner).
 */

import { ShiftModel, ShiftInput } from '../models/shift';
import { RosterService } from './rosterService';
import { logger } from '../lib/logger';
import { PersonRole, isAdmin, requireAdmin } from '../lib/auth';
import { DASHBOARD_DEFAULTS, getRotaToday } from '../config/rota';
import { addDays } from '../lib/dates';
import {
  InactivePersonError,
  InvalidPartnerError,
  NotAuthorizedError,
  NotFoundError,
  VersionConflictError,
} from '../lib/scheduling/errors';
import { assertPartnerAllowed, groupByWeek, resolveSlot, WeekGroup } from '../lib/scheduling/shiftRules';
import type { Person, RotaDomain, Shift } from '../types/entities';
import type {
  CreateShiftRequest,
  ListShiftsQuery,
  ReassignShiftRequest,
  UpdateShiftRequest,
} from '../types/schemas';

/**
 * Resolved listing window and filters
 */
export interface ShiftListing {
  domain: RotaDomain;
  from: string;
  to: string;
  personId?: string;
  shifts: Shift[];
}

/**
 * Load a person who can take new shifts
 */
const getAssignablePerson = async (domain: RotaDomain, personId: string): Promise<Person> => {
  const person = await RosterService.getPerson(domain, personId);
  if (!person.active) {
    throw new InactivePersonError(personId);
  }
  return person;
};

const assertVersion = (shift: Shift, expectedVersion: number): void => {
  if (shift.version !== expectedVersion) {
    throw new VersionConflictError('Shift', shift.shiftId, expectedVersion);
  }
};

export class ShiftService {
  /**
   * @throws NotFoundError if the shift does not exist
   */
  static async getShift(shiftId: string): Promise<Shift> {
    const shift = await ShiftModel.getById(shiftId);
    if (!shift) {
      throw new NotFoundError('Shift', shiftId);
    }
    return shift;
  }

  /**
   * Register one shift by hand
   *
   * @throws InvalidSlotDateError if the date is not the slot's weekday
   * @throws InvalidPartnerError if a partner is given for a solo slot
   * @throws DuplicateSlotError if the slot is already taken on that date
   */
  static async createShift(actor: PersonRole, request: CreateShiftRequest): Promise<Shift> {
    requireAdmin(actor);

    const slot = resolveSlot(request.domain, request.slotType, request.date);
    const partnerId = request.partnerId ?? null;
    assertPartnerAllowed(slot, request.personId, partnerId);

    const person = await getAssignablePerson(request.domain, request.personId);
    const partner = partnerId ? await getAssignablePerson(request.domain, partnerId) : null;

    return ShiftModel.create({
      domain: request.domain,
      date: request.date,
      weekday: slot.weekday,
      slotType: slot.slotType,
      startTime: slot.startTime,
      endTime: slot.endTime,
      personId: person.personId,
      personName: person.fullName,
      partnerId: partner?.personId ?? null,
      partnerName: partner?.fullName ?? null,
      notes: request.notes ?? null,
    });
  }

  /**
   * Edit a shift; changing date or slot moves it to the new key
   *
   * @throws VersionConflictError if the caller's version is outdated
   */
  static async updateShift(actor: PersonRole, shiftId: string, request: UpdateShiftRequest): Promise<Shift> {
    requireAdmin(actor);

    const current = await this.getShift(shiftId);
    assertVersion(current, request.version);

    const date = request.date ?? current.date;
    const slot = resolveSlot(current.domain, request.slotType ?? current.slotType, date);
    const personId = request.personId ?? current.personId;
    const partnerId = request.partnerId === undefined ? current.partnerId : request.partnerId;
    assertPartnerAllowed(slot, personId, partnerId);

    const person =
      personId === current.personId
        ? { personId, fullName: current.personName }
        : await getAssignablePerson(current.domain, personId);

    let partner: { personId: string; fullName: string } | null = null;
    if (partnerId) {
      partner =
        partnerId === current.partnerId && current.partnerName !== null
          ? { personId: partnerId, fullName: current.partnerName }
          : await getAssignablePerson(current.domain, partnerId);
    }

    const next: ShiftInput = {
      domain: current.domain,
      date,
      weekday: slot.weekday,
      slotType: slot.slotType,
      startTime: slot.startTime,
      endTime: slot.endTime,
      personId: person.personId,
      personName: person.fullName,
      partnerId: partner?.personId ?? null,
      partnerName: partner?.fullName ?? null,
      notes: request.notes === undefined ? current.notes : request.notes,
    };

    return ShiftModel.replace(current, next);
  }

  /**
   * Hand a shift to someone else in the same pool
   */
  static async reassignShift(actor: PersonRole, shiftId: string, request: ReassignShiftRequest): Promise<Shift> {
    requireAdmin(actor);

    const current = await this.getShift(shiftId);
    assertVersion(current, request.version);

    if (request.personId === current.partnerId) {
      throw new InvalidPartnerError('New owner is already the partner on this shift');
    }

    const person = await getAssignablePerson(current.domain, request.personId);
    return ShiftModel.reassign(current, { personId: person.personId, personName: person.fullName });
  }

  static async deleteShift(actor: PersonRole, shiftId: string): Promise<void> {
    requireAdmin(actor);

    const current = await this.getShift(shiftId);
    await ShiftModel.delete(current);
  }

  /**
   * Dashboard listing.
   *
   * Without dates the window is today through four weeks ahead. Members
   * are pinned to their own pool and their own shifts.
   */
  static async listShifts(actor: PersonRole, query: ListShiftsQuery, now: Date = new Date()): Promise<ShiftListing> {
    let domain: RotaDomain;
    let personId = query.personId;

    if (isAdmin(actor)) {
      domain = query.domain ?? 'collaborator';
    } else {
      if (query.domain && query.domain !== actor.kind) {
        throw new NotAuthorizedError('You can only view shifts of your own rota');
      }
      if (personId && personId !== actor.personId) {
        throw new NotAuthorizedError("You cannot view another person's shifts");
      }
      domain = actor.kind;
      personId = actor.personId;
    }

    const from = query.from ?? getRotaToday(now);
    const to = query.to ?? addDays(from, DASHBOARD_DEFAULTS.weeksAhead * 7);

    const shifts = await ShiftModel.query({
      domain,
      from,
      to,
      ...(personId && { personId }),
      ...(query.weekday && { weekday: query.weekday }),
    });

    shifts.sort((a, b) => a.date.localeCompare(b.date) || a.startTime.localeCompare(b.startTime));

    logger.debug('Shifts listed', { domain, from, to, personId, count: shifts.length });
    return { domain, from, to, ...(personId && { personId }), shifts };
  }

  /**
   * Same listing grouped into Monday-start weeks, for reports
   */
  static async exportWeeks(
    actor: PersonRole,
    query: ListShiftsQuery,
    now: Date = new Date()
  ): Promise<{ domain: RotaDomain; from: string; to: string; weeks: WeekGroup[] }> {
    const listing = await this.listShifts(actor, query, now);
    return { domain: listing.domain, from: listing.from, to: listing.to, weeks: groupByWeek(listing.shifts) };
  }
}
