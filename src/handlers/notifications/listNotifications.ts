/**
 * List Notifications Handler - Duty Rota Service
 *
 * GET /notifications
 * The caller's swap notifications, newest first.
 *
 * Query Parameters:
 * - unreadOnly (optional): 'true' to leave out read notifications
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { NotificationService } from '../../services/notificationService';
import { listNotificationsQuerySchema } from '../../types/schemas';
import { handleError, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole } from '../../lib/auth';

export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('listNotifications', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    const { unreadOnly } = listNotificationsQuerySchema.parse(event.queryStringParameters ?? {});

    const notifications = await NotificationService.listNotifications(actor, unreadOnly);

    logger.info('Notifications retrieved', { count: notifications.length, unreadOnly });
    logLambdaCompletion('listNotifications', Date.now() - startTime, context.awsRequestId);

    return successResponse({ notifications });
  } catch (error) {
    logger.error('Failed to list notifications', error as Error);
    return handleError(error);
  }
};
