/**
 * Schedule Service - automatic weekend rotation
 *
 * Plans a whole run in memory, then writes every shift together with the
 * run record in one transaction. A clash with an existing slot rejects the
 * whole run.
 */

import { ShiftModel } from '../models/shift';
import { GenerationRunModel } from '../models/generationRun';
import { RosterService } from './rosterService';
import { logger } from '../lib/logger';
import { PersonRole, requireAdmin } from '../lib/auth';
import { GENERATION_LIMITS, getRotaToday } from '../config/rota';
import { nextSaturday } from '../lib/dates';
import { planRotation, PlannedShift } from '../lib/scheduling/rotation';
import type { GenerationRun, RotaDomain, Shift } from '../types/entities';

export interface GenerateScheduleInput {
  domain: RotaDomain;
  startDate?: string;
  cycleCount?: number;
  dryRun?: boolean;
}

export type GenerationResult =
  | {
      dryRun: true;
      startDate: string;
      cycleCount: number;
      assignments: PlannedShift[];
    }
  | {
      dryRun: false;
      startDate: string;
      cycleCount: number;
      run: GenerationRun;
      shifts: Shift[];
    };

export class ScheduleService {
  /**
   * First Saturday strictly after today in the rota timezone
   */
  static defaultStartDate(now: Date = new Date()): string {
    return nextSaturday(getRotaToday(now));
  }

  /**
   * Generate (or preview) a rotation for one pool
   *
   * @throws NotAuthorizedError unless the actor is an admin
   * @throws InvalidRangeError, InvalidSlotDateError, InsufficientRosterError on bad input
   * @throws DuplicateSlotError if any planned slot is already taken
   */
  static async generateSchedule(actor: PersonRole, input: GenerateScheduleInput): Promise<GenerationResult> {
    requireAdmin(actor);

    const startDate = input.startDate ?? this.defaultStartDate();
    const cycleCount = input.cycleCount ?? GENERATION_LIMITS.defaultCycles;
    const roster = await RosterService.getActiveRoster(input.domain);
    const plan = planRotation(input.domain, startDate, cycleCount, roster);

    if (input.dryRun) {
      logger.info('Schedule previewed', { domain: input.domain, startDate, cycleCount });
      return { dryRun: true, startDate, cycleCount, assignments: plan.assignments };
    }

    const { run, item } = GenerationRunModel.buildPut({
      domain: input.domain,
      startDate,
      cycleCount,
      shiftsCreated: plan.assignments.length,
      createdBy: actor.userId,
    });
    const shifts = await ShiftModel.createBatch(plan.assignments, [item]);

    logger.info('Schedule generated', {
      domain: input.domain,
      runId: run.runId,
      startDate,
      cycleCount,
      shiftsCreated: shifts.length,
      rosterSize: roster.length,
    });

    return { dryRun: false, startDate, cycleCount, run, shifts };
  }

  /**
   * Recent generation runs of a pool
   */
  static async listRuns(actor: PersonRole, domain: RotaDomain): Promise<GenerationRun[]> {
    requireAdmin(actor);
    return GenerationRunModel.listByDomain(domain);
  }
}
