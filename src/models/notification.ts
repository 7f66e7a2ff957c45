/**
 * Notification Model - Duty Rota Service
 *
 * Handles DynamoDB operations for in-app notifications. Notifications are
 * created only as part of a swap transition transaction; this model builds
 * the transaction item and serves the recipient's inbox.
 */

import { QueryCommand, QueryCommandInput, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import { docClient, getTableName, TransactItem } from '../lib/dynamodb';
import { logger } from '../lib/logger';
import { generateUUID } from '../lib/uuid';
import { NotFoundError } from '../lib/scheduling/errors';
import { KeyBuilder, Notification, NotificationKind } from '../types/entities';

/**
 * Event handed to the notification sink
 */
export interface NotificationEvent {
  recipientId: string;
  kind: NotificationKind;
  title: string;
  body: string;
  relatedSwapId: string;
}

export class NotificationModel {
  /**
   * Build a notification and the transaction item that writes it
   */
  static buildPut(event: NotificationEvent, now: string): { notification: Notification; item: TransactItem } {
    const notificationId = generateUUID();

    const notification: Notification = {
      ...KeyBuilder.notification(event.recipientId, notificationId),
      notificationId,
      recipientId: event.recipientId,
      kind: event.kind,
      title: event.title,
      body: event.body,
      relatedSwapId: event.relatedSwapId,
      read: false,
      readAt: null,
      entityType: 'Notification',
      createdAt: now,
    };

    return {
      notification,
      item: {
        Put: {
          TableName: getTableName(),
          Item: notification,
          ConditionExpression: 'attribute_not_exists(PK)',
        },
      },
    };
  }

  /**
   * A person's notifications, newest first
   */
  static async listByRecipient(recipientId: string, unreadOnly = false): Promise<Notification[]> {
    const notifications: Notification[] = [];
    let exclusiveStartKey: QueryCommandInput['ExclusiveStartKey'];

    try {
      do {
        const result = await docClient.send(
          new QueryCommand({
            TableName: getTableName(),
            KeyConditionExpression: 'PK = :pk AND begins_with(SK, :sk)',
            ...(unreadOnly && { FilterExpression: '#read = :false' }),
            ...(unreadOnly && { ExpressionAttributeNames: { '#read': 'read' } }),
            ExpressionAttributeValues: {
              ':pk': `PERSON#${recipientId}`,
              ':sk': 'NOTIFICATION#',
              ...(unreadOnly && { ':false': false }),
            },
            ExclusiveStartKey: exclusiveStartKey,
          })
        );

        notifications.push(...((result.Items || []) as Notification[]));
        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey);

      return notifications.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    } catch (error) {
      logger.error('Failed to list notifications', error as Error, { recipientId });
      throw error;
    }
  }

  /**
   * Mark one notification as read
   *
   * @throws NotFoundError if the recipient has no such notification
   */
  static async markRead(recipientId: string, notificationId: string): Promise<Notification> {
    try {
      const result = await docClient.send(
        new UpdateCommand({
          TableName: getTableName(),
          Key: KeyBuilder.notification(recipientId, notificationId),
          UpdateExpression: 'SET #read = :true, readAt = :now',
          ConditionExpression: 'attribute_exists(PK)',
          ExpressionAttributeNames: { '#read': 'read' },
          ExpressionAttributeValues: {
            ':true': true,
            ':now': new Date().toISOString(),
          },
          ReturnValues: 'ALL_NEW',
        })
      );

      logger.info('Notification marked as read', { recipientId, notificationId });
      return result.Attributes as Notification;
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new NotFoundError('Notification', notificationId);
      }
      logger.error('Failed to mark notification as read', error as Error, { recipientId, notificationId });
      throw error;
    }
  }
}
