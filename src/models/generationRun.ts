/**
 * GenerationRun Model - Duty Rota Service
 *
 * Audit records of automatic schedule generation. A run record is only
 * ever written inside the same transaction as the shifts it produced.
 */

import { QueryCommand } from '@aws-sdk/lib-dynamodb';
import { docClient, getTableName, TransactItem } from '../lib/dynamodb';
import { logger } from '../lib/logger';
import { generateUUID } from '../lib/uuid';
import { GenerationRun, KeyBuilder, RotaDomain } from '../types/entities';

export interface GenerationRunInput {
  domain: RotaDomain;
  startDate: string;
  cycleCount: number;
  shiftsCreated: number;
  createdBy: string;
}

export class GenerationRunModel {
  /**
   * Build a run record and the transaction item that writes it
   */
  static buildPut(input: GenerationRunInput): { run: GenerationRun; item: TransactItem } {
    const runId = generateUUID();
    const now = new Date().toISOString();

    const run: GenerationRun = {
      ...KeyBuilder.generationRun(input.domain, runId, now),
      runId,
      domain: input.domain,
      startDate: input.startDate,
      cycleCount: input.cycleCount,
      shiftsCreated: input.shiftsCreated,
      createdBy: input.createdBy,
      entityType: 'GenerationRun',
      createdAt: now,
    };

    return {
      run,
      item: {
        Put: {
          TableName: getTableName(),
          Item: run,
          ConditionExpression: 'attribute_not_exists(PK)',
        },
      },
    };
  }

  /**
   * Most recent runs of a domain first
   */
  static async listByDomain(domain: RotaDomain, limit = 20): Promise<GenerationRun[]> {
    try {
      const result = await docClient.send(
        new QueryCommand({
          TableName: getTableName(),
          KeyConditionExpression: 'PK = :pk AND begins_with(SK, :sk)',
          ExpressionAttributeValues: {
            ':pk': `DOMAIN#${domain}#RUNS`,
            ':sk': 'RUN#',
          },
          ScanIndexForward: false,
          Limit: limit,
        })
      );

      return (result.Items || []) as GenerationRun[];
    } catch (error) {
      logger.error('Failed to list generation runs', error as Error, { domain });
      throw error;
    }
  }
}
