import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { SwapService } from '../../services/swapService';
import { getPathParameter, handleError, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole } from '../../lib/auth';

/**
 * POST /swaps/{swapId}/accept
 * Accept a swap request you received
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('acceptSwap', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    const swapId = getPathParameter(event.pathParameters, 'swapId');

    const swap = await SwapService.accept(actor, swapId);

    logLambdaCompletion('acceptSwap', Date.now() - startTime, context.awsRequestId);
    return successResponse(swap, 'Swap request accepted');
  } catch (error) {
    logger.error('Failed to accept swap', error as Error, { swapId: event.pathParameters?.['swapId'] });
    return handleError(error);
  }
};
