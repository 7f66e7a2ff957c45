/**
 * SwapRequest Model - Duty Rota Service
 *
 * Handles DynamoDB operations for shift swap requests.
 *
 * A PENDING request owns a guard item keyed by (requester shift, target
 * shift, requester). The guard is claimed when the request is created and
 * released in the same transaction that resolves it, so two identical
 * pending proposals can never coexist.
 */

import { GetCommand, QueryCommand, QueryCommandInput, TransactWriteCommand } from '@aws-sdk/lib-dynamodb';
import {
  docClient,
  getTableName,
  getCancellationCodes,
  findFailedCondition,
  TransactItem,
} from '../lib/dynamodb';
import { logger } from '../lib/logger';
import { generateUUID } from '../lib/uuid';
import {
  DuplicateProposalError,
  NotPendingError,
  StaleSwapError,
} from '../lib/scheduling/errors';
import { KeyBuilder, RotaDomain, SwapRequest, SwapStatus } from '../types/entities';

/**
 * Input for creating a swap request
 */
export interface CreateSwapInput {
  domain: RotaDomain;
  requesterId: string;
  requesterName: string;
  requesterShiftId: string;
  targetId: string;
  targetName: string;
  targetShiftId: string;
  message: string | null;
}

/**
 * Terminal status a PENDING request can move to
 */
export type SwapResolution = Exclude<SwapStatus, 'PENDING'>;

/**
 * Transaction items that travel with a resolution
 */
export interface ResolutionEffects {
  /** Shift updates applied only on acceptance */
  shiftItems?: TransactItem[];
  notificationItem: TransactItem;
}

export class SwapRequestModel {
  /**
   * Create a PENDING request, claim its guard and write the notification
   *
   * @throws DuplicateProposalError if an identical request is already pending
   */
  static async create(
    input: CreateSwapInput,
    buildNotification: (swap: SwapRequest) => TransactItem
  ): Promise<SwapRequest> {
    const tableName = getTableName();
    const swapId = generateUUID();
    const now = new Date().toISOString();

    const swap: SwapRequest = {
      ...KeyBuilder.swapRequest(swapId, input.requesterId, input.targetId, now),
      swapId,
      domain: input.domain,
      requesterId: input.requesterId,
      requesterName: input.requesterName,
      requesterShiftId: input.requesterShiftId,
      targetId: input.targetId,
      targetName: input.targetName,
      targetShiftId: input.targetShiftId,
      status: 'PENDING',
      message: input.message,
      version: 1,
      resolvedAt: null,
      entityType: 'SwapRequest',
      createdAt: now,
    };

    try {
      await docClient.send(
        new TransactWriteCommand({
          TransactItems: [
            {
              Put: {
                TableName: tableName,
                Item: swap,
                ConditionExpression: 'attribute_not_exists(PK)',
              },
            },
            {
              Put: {
                TableName: tableName,
                Item: {
                  ...KeyBuilder.swapGuard(input.requesterShiftId, input.targetShiftId, input.requesterId),
                  swapId,
                  entityType: 'SwapGuard',
                  createdAt: now,
                },
                ConditionExpression: 'attribute_not_exists(PK)',
              },
            },
            buildNotification(swap),
          ],
        })
      );

      logger.info('Swap request created', {
        swapId,
        requesterId: input.requesterId,
        targetId: input.targetId,
      });
      return swap;
    } catch (error) {
      const codes = getCancellationCodes(error);
      if (codes && findFailedCondition(codes) === 1) {
        throw new DuplicateProposalError();
      }
      logger.error('Failed to create swap request', error as Error, { requesterId: input.requesterId });
      throw error;
    }
  }

  /**
   * Get swap request by ID
   */
  static async getById(swapId: string): Promise<SwapRequest | null> {
    try {
      const result = await docClient.send(
        new GetCommand({
          TableName: getTableName(),
          Key: { PK: `SWAP#${swapId}`, SK: 'METADATA' },
          ConsistentRead: true,
        })
      );

      return result.Item ? (result.Item as SwapRequest) : null;
    } catch (error) {
      logger.error('Failed to get swap request', error as Error, { swapId });
      throw error;
    }
  }

  /**
   * Whether a PENDING request for this requester and shift pair exists
   */
  static async hasPending(requesterId: string, requesterShiftId: string, targetShiftId: string): Promise<boolean> {
    try {
      const result = await docClient.send(
        new GetCommand({
          TableName: getTableName(),
          Key: KeyBuilder.swapGuard(requesterShiftId, targetShiftId, requesterId),
          ConsistentRead: true,
        })
      );

      return !!result.Item;
    } catch (error) {
      logger.error('Failed to check pending swap', error as Error, { requesterId, requesterShiftId, targetShiftId });
      throw error;
    }
  }

  /**
   * Requests a person sent or received, newest first
   */
  static async listForPerson(personId: string): Promise<SwapRequest[]> {
    const queryIndex = async (indexName: 'GSI1' | 'GSI2'): Promise<SwapRequest[]> => {
      const swaps: SwapRequest[] = [];
      let exclusiveStartKey: QueryCommandInput['ExclusiveStartKey'];

      do {
        const result = await docClient.send(
          new QueryCommand({
            TableName: getTableName(),
            IndexName: indexName,
            KeyConditionExpression: `${indexName}PK = :pk`,
            ExpressionAttributeValues: {
              ':pk': `PERSON#${personId}#SWAPS`,
            },
            ScanIndexForward: false,
            ExclusiveStartKey: exclusiveStartKey,
          })
        );

        swaps.push(...((result.Items || []) as SwapRequest[]));
        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey);

      return swaps;
    };

    try {
      const [sent, received] = await Promise.all([queryIndex('GSI1'), queryIndex('GSI2')]);
      return [...sent, ...received].sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    } catch (error) {
      logger.error('Failed to list swap requests', error as Error, { personId });
      throw error;
    }
  }

  /**
   * Move a PENDING request to a terminal status in one transaction with
   * its guard release, notification and (on acceptance) the shift updates
   *
   * @throws NotPendingError if the request was resolved concurrently
   * @throws StaleSwapError if a shift changed owner since it was read
   */
  static async resolve(
    swap: SwapRequest,
    status: SwapResolution,
    effects: ResolutionEffects,
    now: string = new Date().toISOString()
  ): Promise<SwapRequest> {
    const tableName = getTableName();
    const shiftItems = effects.shiftItems ?? [];

    try {
      await docClient.send(
        new TransactWriteCommand({
          TransactItems: [
            {
              Update: {
                TableName: tableName,
                Key: { PK: swap.PK, SK: swap.SK },
                UpdateExpression:
                  'SET #status = :status, resolvedAt = :now, #version = :newVersion',
                ConditionExpression: '#status = :pending AND #version = :currentVersion',
                ExpressionAttributeNames: {
                  '#status': 'status',
                  '#version': 'version',
                },
                ExpressionAttributeValues: {
                  ':status': status,
                  ':now': now,
                  ':pending': 'PENDING',
                  ':newVersion': swap.version + 1,
                  ':currentVersion': swap.version,
                },
              },
            },
            {
              Delete: {
                TableName: tableName,
                Key: KeyBuilder.swapGuard(swap.requesterShiftId, swap.targetShiftId, swap.requesterId),
              },
            },
            ...shiftItems,
            effects.notificationItem,
          ],
        })
      );

      logger.info('Swap request resolved', { swapId: swap.swapId, status });
      return { ...swap, status, resolvedAt: now, version: swap.version + 1 };
    } catch (error) {
      const codes = getCancellationCodes(error);
      if (codes) {
        const failedIndex = findFailedCondition(codes);
        if (failedIndex === 0) {
          const current = await this.getById(swap.swapId);
          logger.warn('Swap request already resolved', { swapId: swap.swapId, status: current?.status });
          throw new NotPendingError(swap.swapId, current?.status ?? 'unknown');
        }
        if (failedIndex >= 2 && failedIndex < 2 + shiftItems.length) {
          logger.warn('Swap request is stale', { swapId: swap.swapId });
          throw new StaleSwapError(swap.swapId);
        }
      }
      logger.error('Failed to resolve swap request', error as Error, { swapId: swap.swapId, status });
      throw error;
    }
  }
}
