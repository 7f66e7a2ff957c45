import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { SwapService } from '../../services/swapService';
import { handleError, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole } from '../../lib/auth';

/**
 * GET /swaps
 * Swap requests the caller sent or received. Admins pass ?personId=.
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('listSwaps', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    const swaps = await SwapService.listForPerson(actor, event.queryStringParameters?.['personId']);

    logLambdaCompletion('listSwaps', Date.now() - startTime, context.awsRequestId);
    return successResponse({ swaps });
  } catch (error) {
    logger.error('Failed to list swaps', error as Error);
    return handleError(error);
  }
};
