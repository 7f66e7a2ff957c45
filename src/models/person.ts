/**
 * Person Model - Duty Rota Service
 *
 * Handles DynamoDB operations for Person entities (collaborators and
 * field technicians). Deactivating a person keeps the record and their
 * shift history; it only removes them from future rotations.
 */

import { GetCommand, PutCommand, QueryCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import { docClient, getTableName } from '../lib/dynamodb';
import { logger } from '../lib/logger';
import { generateUUID } from '../lib/uuid';
import { KeyBuilder, Person, RotaDomain } from '../types/entities';

/**
 * Input for creating a person
 */
export interface CreatePersonInput {
  domain: RotaDomain;
  fullName: string;
  active: boolean;
  queueOrder: number;
  userId?: string | null;
  phone?: string | null;
  email?: string | null;
}

/**
 * Editable person attributes
 */
export interface UpdatePersonInput {
  fullName?: string;
  active?: boolean;
  queueOrder?: number;
  userId?: string | null;
  phone?: string | null;
  email?: string | null;
}

const EDITABLE_FIELDS = ['fullName', 'active', 'queueOrder', 'userId', 'phone', 'email'] as const;

/**
 * PersonModel
 * Handles DynamoDB operations for rotation pool members
 */
export class PersonModel {
  /**
   * Create a new person
   */
  static async create(input: CreatePersonInput): Promise<Person> {
    const personId = generateUUID();
    const now = new Date().toISOString();
    const userId = input.userId ?? null;

    const person: Person = {
      ...KeyBuilder.person(input.domain, personId),
      ...(userId ? KeyBuilder.personUserIndex(userId, input.domain) : {}),
      personId,
      domain: input.domain,
      fullName: input.fullName,
      active: input.active,
      queueOrder: input.queueOrder,
      userId,
      phone: input.phone ?? null,
      email: input.email ?? null,
      entityType: 'Person',
      createdAt: now,
      updatedAt: now,
    };

    try {
      await docClient.send(
        new PutCommand({
          TableName: getTableName(),
          Item: person,
          ConditionExpression: 'attribute_not_exists(PK)',
        })
      );

      logger.info('Person created', { personId, domain: input.domain });
      return person;
    } catch (error) {
      logger.error('Failed to create person', error as Error, { domain: input.domain });
      throw error;
    }
  }

  /**
   * Get person by ID
   */
  static async getById(domain: RotaDomain, personId: string): Promise<Person | null> {
    try {
      const result = await docClient.send(
        new GetCommand({
          TableName: getTableName(),
          Key: KeyBuilder.person(domain, personId),
        })
      );

      return result.Item ? (result.Item as Person) : null;
    } catch (error) {
      logger.error('Failed to get person', error as Error, { domain, personId });
      throw error;
    }
  }

  /**
   * List everyone in a domain, active or not
   */
  static async listByDomain(domain: RotaDomain): Promise<Person[]> {
    try {
      const result = await docClient.send(
        new QueryCommand({
          TableName: getTableName(),
          KeyConditionExpression: 'PK = :pk AND begins_with(SK, :sk)',
          ExpressionAttributeValues: {
            ':pk': `DOMAIN#${domain}`,
            ':sk': 'PERSON#',
          },
        })
      );

      return (result.Items || []) as Person[];
    } catch (error) {
      logger.error('Failed to list people', error as Error, { domain });
      throw error;
    }
  }

  /**
   * Find the person records linked to a login, across both pools
   */
  static async listByUserId(userId: string): Promise<Person[]> {
    try {
      const result = await docClient.send(
        new QueryCommand({
          TableName: getTableName(),
          IndexName: 'GSI1',
          KeyConditionExpression: 'GSI1PK = :gsi1pk AND begins_with(GSI1SK, :gsi1sk)',
          ExpressionAttributeValues: {
            ':gsi1pk': `USER#${userId}`,
            ':gsi1sk': 'PERSON#',
          },
        })
      );

      return (result.Items || []) as Person[];
    } catch (error) {
      logger.error('Failed to list people by user', error as Error, { userId });
      throw error;
    }
  }

  /**
   * Update editable attributes
   */
  static async update(
    domain: RotaDomain,
    personId: string,
    changes: UpdatePersonInput
  ): Promise<Person> {
    const now = new Date().toISOString();
    const names: Record<string, string> = { '#updatedAt': 'updatedAt' };
    const values: Record<string, unknown> = { ':updatedAt': now };
    const sets: string[] = ['#updatedAt = :updatedAt'];
    const removes: string[] = [];

    for (const field of EDITABLE_FIELDS) {
      const value = changes[field];
      if (value === undefined) {
        continue;
      }
      names[`#${field}`] = field;
      values[`:${field}`] = value;
      sets.push(`#${field} = :${field}`);
    }

    // Keep the login index in step with userId
    if (changes.userId !== undefined) {
      names['#GSI1PK'] = 'GSI1PK';
      names['#GSI1SK'] = 'GSI1SK';
      if (changes.userId) {
        const index = KeyBuilder.personUserIndex(changes.userId, domain);
        values[':GSI1PK'] = index.GSI1PK;
        values[':GSI1SK'] = index.GSI1SK;
        sets.push('#GSI1PK = :GSI1PK', '#GSI1SK = :GSI1SK');
      } else {
        removes.push('#GSI1PK', '#GSI1SK');
      }
    }

    const updateExpression =
      `SET ${sets.join(', ')}` + (removes.length > 0 ? ` REMOVE ${removes.join(', ')}` : '');

    try {
      const result = await docClient.send(
        new UpdateCommand({
          TableName: getTableName(),
          Key: KeyBuilder.person(domain, personId),
          UpdateExpression: updateExpression,
          ConditionExpression: 'attribute_exists(PK)',
          ExpressionAttributeNames: names,
          ExpressionAttributeValues: values,
          ReturnValues: 'ALL_NEW',
        })
      );

      logger.info('Person updated', { personId, domain, fields: Object.keys(changes) });
      return result.Attributes as Person;
    } catch (error) {
      logger.error('Failed to update person', error as Error, { domain, personId });
      throw error;
    }
  }
}
