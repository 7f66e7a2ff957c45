import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { SwapService } from '../../services/swapService';
import { getPathParameter, handleError, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole } from '../../lib/auth';

/**
 * POST /swaps/{swapId}/reject
 * Decline a swap request you received
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('rejectSwap', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    const swapId = getPathParameter(event.pathParameters, 'swapId');

    const swap = await SwapService.reject(actor, swapId);

    logLambdaCompletion('rejectSwap', Date.now() - startTime, context.awsRequestId);
    return successResponse(swap, 'Swap request rejected');
  } catch (error) {
    logger.error('Failed to reject swap', error as Error, { swapId: event.pathParameters?.['swapId'] });
    return handleError(error);
  }
};
