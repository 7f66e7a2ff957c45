/**
 * Shift Model - Duty Rota Service
 *
 * Handles DynamoDB operations for Shift entities. The primary key is the
 * (domain, date, slot) triple, so the table itself enforces one assignment
 * per slot per date: every insert is conditioned on the key being free.
 */

import {
  DeleteCommand,
  PutCommand,
  QueryCommand,
  QueryCommandInput,
  TransactWriteCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import {
  docClient,
  getTableName,
  getCancellationCodes,
  findFailedCondition,
  TransactItem,
} from '../lib/dynamodb';
import { logger } from '../lib/logger';
import { generateUUID } from '../lib/uuid';
import { DuplicateSlotError, VersionConflictError } from '../lib/scheduling/errors';
import { KeyBuilder, RotaDomain, Shift, ShiftWeekday, SlotType } from '../types/entities';

/**
 * Fields that make up a new shift; times and weekday are already derived
 */
export interface ShiftInput {
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
  notes?: string | null;
}

/**
 * Registry query filters; dates are inclusive
 */
export interface ShiftQuery {
  domain: RotaDomain;
  from: string;
  to: string;
  personId?: string;
  weekday?: ShiftWeekday;
}

/**
 * New owner of a shift
 */
export interface ShiftOwner {
  personId: string;
  personName: string;
}

/**
 * Build a full Shift item from its input
 */
export const buildShift = (input: ShiftInput, shiftId: string, now: string): Shift => ({
  ...KeyBuilder.shift(input.domain, input.date, input.slotType, shiftId),
  shiftId,
  domain: input.domain,
  personId: input.personId,
  personName: input.personName,
  partnerId: input.partnerId,
  partnerName: input.partnerName,
  date: input.date,
  weekday: input.weekday,
  slotType: input.slotType,
  startTime: input.startTime,
  endTime: input.endTime,
  notes: input.notes ?? null,
  version: 1,
  entityType: 'Shift',
  createdAt: now,
  updatedAt: now,
});

/**
 * Conditional put that fails when the slot is taken
 */
const putIfSlotFree = (tableName: string, shift: Shift): TransactItem => ({
  Put: {
    TableName: tableName,
    Item: shift,
    ConditionExpression: 'attribute_not_exists(PK)',
  },
});

/**
 * ShiftModel
 * Handles DynamoDB operations for shift assignments
 */
export class ShiftModel {
  /**
   * Insert one shift
   *
   * @throws DuplicateSlotError if the (date, slot) pair is taken
   */
  static async create(input: ShiftInput): Promise<Shift> {
    const shift = buildShift(input, generateUUID(), new Date().toISOString());

    try {
      await docClient.send(
        new PutCommand({
          TableName: getTableName(),
          Item: shift,
          ConditionExpression: 'attribute_not_exists(PK)',
        })
      );

      logger.info('Shift created', {
        shiftId: shift.shiftId,
        domain: shift.domain,
        date: shift.date,
        slotType: shift.slotType,
      });
      return shift;
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new DuplicateSlotError(input.date, input.slotType);
      }
      logger.error('Failed to create shift', error as Error, { date: input.date, slotType: input.slotType });
      throw error;
    }
  }

  /**
   * Insert many shifts, plus any extra items, in one transaction.
   * Either every shift is written or none is.
   *
   * @throws DuplicateSlotError naming the first slot that was taken
   */
  static async createBatch(inputs: readonly ShiftInput[], extraItems: TransactItem[] = []): Promise<Shift[]> {
    const tableName = getTableName();
    const now = new Date().toISOString();
    const shifts = inputs.map((input) => buildShift(input, generateUUID(), now));

    try {
      await docClient.send(
        new TransactWriteCommand({
          TransactItems: [...shifts.map((shift) => putIfSlotFree(tableName, shift)), ...extraItems],
        })
      );

      logger.info('Shift batch created', { count: shifts.length });
      return shifts;
    } catch (error) {
      const codes = getCancellationCodes(error);
      if (codes) {
        const failed = shifts[findFailedCondition(codes)];
        if (failed) {
          logger.warn('Shift batch rejected: slot already taken', {
            date: failed.date,
            slotType: failed.slotType,
          });
          throw new DuplicateSlotError(failed.date, failed.slotType);
        }
      }
      logger.error('Failed to create shift batch', error as Error, { count: shifts.length });
      throw error;
    }
  }

  /**
   * Get shift by ID via GSI1
   */
  static async getById(shiftId: string): Promise<Shift | null> {
    try {
      const result = await docClient.send(
        new QueryCommand({
          TableName: getTableName(),
          IndexName: 'GSI1',
          KeyConditionExpression: 'GSI1PK = :gsi1pk',
          ExpressionAttributeValues: {
            ':gsi1pk': `SHIFT#${shiftId}`,
          },
          Limit: 1,
        })
      );

      const item = result.Items?.[0];
      return item ? (item as Shift) : null;
    } catch (error) {
      logger.error('Failed to get shift', error as Error, { shiftId });
      throw error;
    }
  }

  /**
   * Shifts of a domain within a date range, optionally for one person
   * (as principal or partner) and one weekday
   */
  static async query(filters: ShiftQuery): Promise<Shift[]> {
    const values: Record<string, unknown> = {
      ':pk': `DOMAIN#${filters.domain}#SHIFTS`,
      ':from': `SLOT#${filters.from}#`,
      ':to': `SLOT#${filters.to}#~`,
    };
    const conditions: string[] = [];

    if (filters.personId) {
      values[':personId'] = filters.personId;
      conditions.push('(personId = :personId OR partnerId = :personId)');
    }
    if (filters.weekday) {
      values[':weekday'] = filters.weekday;
      conditions.push('weekday = :weekday');
    }

    const shifts: Shift[] = [];
    let exclusiveStartKey: QueryCommandInput['ExclusiveStartKey'];

    try {
      do {
        const result = await docClient.send(
          new QueryCommand({
            TableName: getTableName(),
            KeyConditionExpression: 'PK = :pk AND SK BETWEEN :from AND :to',
            ...(conditions.length > 0 && { FilterExpression: conditions.join(' AND ') }),
            ExpressionAttributeValues: values,
            ExclusiveStartKey: exclusiveStartKey,
          })
        );

        shifts.push(...((result.Items || []) as Shift[]));
        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey);

      return shifts;
    } catch (error) {
      logger.error('Failed to query shifts', error as Error, { ...filters });
      throw error;
    }
  }

  /**
   * Rewrite a shift in place, or move it to another (date, slot) key.
   * Moving deletes the old key and claims the new one in one transaction.
   *
   * @throws DuplicateSlotError if the target slot is taken
   * @throws VersionConflictError if the shift changed since it was read
   */
  static async replace(current: Shift, next: ShiftInput): Promise<Shift> {
    const tableName = getTableName();
    const updated: Shift = {
      ...buildShift(next, current.shiftId, current.createdAt),
      version: current.version + 1,
      updatedAt: new Date().toISOString(),
    };
    const moving = updated.PK !== current.PK || updated.SK !== current.SK;

    try {
      if (moving) {
        await docClient.send(
          new TransactWriteCommand({
            TransactItems: [
              {
                Delete: {
                  TableName: tableName,
                  Key: { PK: current.PK, SK: current.SK },
                  ConditionExpression: '#version = :expectedVersion',
                  ExpressionAttributeNames: { '#version': 'version' },
                  ExpressionAttributeValues: { ':expectedVersion': current.version },
                },
              },
              putIfSlotFree(tableName, updated),
            ],
          })
        );
      } else {
        await docClient.send(
          new PutCommand({
            TableName: tableName,
            Item: updated,
            ConditionExpression: '#version = :expectedVersion',
            ExpressionAttributeNames: { '#version': 'version' },
            ExpressionAttributeValues: { ':expectedVersion': current.version },
          })
        );
      }

      logger.info('Shift updated', { shiftId: current.shiftId, moved: moving, version: updated.version });
      return updated;
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new VersionConflictError('Shift', current.shiftId, current.version);
      }
      const codes = getCancellationCodes(error);
      if (codes) {
        throw findFailedCondition(codes) === 1
          ? new DuplicateSlotError(updated.date, updated.slotType)
          : new VersionConflictError('Shift', current.shiftId, current.version);
      }
      logger.error('Failed to update shift', error as Error, { shiftId: current.shiftId });
      throw error;
    }
  }

  /**
   * Hand a shift to another person
   *
   * @throws VersionConflictError if the shift changed since it was read
   */
  static async reassign(current: Shift, owner: ShiftOwner): Promise<Shift> {
    try {
      const result = await docClient.send(
        new UpdateCommand({
          TableName: getTableName(),
          Key: { PK: current.PK, SK: current.SK },
          UpdateExpression:
            'SET personId = :personId, personName = :personName, ' +
            '#version = #version + :one, updatedAt = :now',
          ConditionExpression: '#version = :expectedVersion',
          ExpressionAttributeNames: { '#version': 'version' },
          ExpressionAttributeValues: {
            ':personId': owner.personId,
            ':personName': owner.personName,
            ':one': 1,
            ':expectedVersion': current.version,
            ':now': new Date().toISOString(),
          },
          ReturnValues: 'ALL_NEW',
        })
      );

      logger.info('Shift reassigned', {
        shiftId: current.shiftId,
        from: current.personId,
        to: owner.personId,
      });
      return result.Attributes as Shift;
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new VersionConflictError('Shift', current.shiftId, current.version);
      }
      logger.error('Failed to reassign shift', error as Error, { shiftId: current.shiftId });
      throw error;
    }
  }

  /**
   * Transaction items that exchange the owners of two shifts.
   *
   * Each update only applies while the shift still belongs to the owner
   * the caller read and its partner is not the incoming owner; dates,
   * slots and times are left untouched.
   */
  static exchangeOwnersItems(first: Shift, second: Shift, now: string): [TransactItem, TransactItem] {
    const tableName = getTableName();

    const handOver = (shift: Shift, from: ShiftOwner, to: ShiftOwner): TransactItem => ({
      Update: {
        TableName: tableName,
        Key: { PK: shift.PK, SK: shift.SK },
        UpdateExpression:
          'SET personId = :personId, personName = :personName, ' +
          '#version = #version + :one, updatedAt = :now',
        ConditionExpression:
          'personId = :expectedOwner AND (attribute_not_exists(partnerId) OR partnerId <> :personId)',
        ExpressionAttributeNames: { '#version': 'version' },
        ExpressionAttributeValues: {
          ':personId': to.personId,
          ':personName': to.personName,
          ':expectedOwner': from.personId,
          ':one': 1,
          ':now': now,
        },
      },
    });

    return [handOver(first, first, second), handOver(second, second, first)];
  }

  /**
   * Remove a shift
   */
  static async delete(current: Shift): Promise<void> {
    try {
      await docClient.send(
        new DeleteCommand({
          TableName: getTableName(),
          Key: { PK: current.PK, SK: current.SK },
          ConditionExpression: 'attribute_exists(PK)',
        })
      );

      logger.info('Shift deleted', { shiftId: current.shiftId, date: current.date, slotType: current.slotType });
    } catch (error) {
      logger.error('Failed to delete shift', error as Error, { shiftId: current.shiftId });
      throw error;
    }
  }
}
