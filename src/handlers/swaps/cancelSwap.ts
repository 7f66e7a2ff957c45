import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { SwapService } from '../../services/swapService';
import { getPathParameter, handleError, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole } from '../../lib/auth';

/**
 * POST /swaps/{swapId}/cancel
 * Withdraw a swap request you sent
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('cancelSwap', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    const swapId = getPathParameter(event.pathParameters, 'swapId');

    const swap = await SwapService.cancel(actor, swapId);

    logLambdaCompletion('cancelSwap', Date.now() - startTime, context.awsRequestId);
    return successResponse(swap, 'Swap request cancelled');
  } catch (error) {
    logger.error('Failed to cancel swap', error as Error, { swapId: event.pathParameters?.['swapId'] });
    return handleError(error);
  }
};
