import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { NotificationService } from '../../services/notificationService';
import { getPathParameter, handleError, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole } from '../../lib/auth';

/**
 * POST /notifications/{notificationId}/read
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('markNotificationRead', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    const notificationId = getPathParameter(event.pathParameters, 'notificationId');

    const notification = await NotificationService.markRead(actor, notificationId);

    logLambdaCompletion('markNotificationRead', Date.now() - startTime, context.awsRequestId);
    return successResponse(notification, 'Notification marked as read');
  } catch (error) {
    logger.error('Failed to mark notification as read', error as Error);
    return handleError(error);
  }
};
