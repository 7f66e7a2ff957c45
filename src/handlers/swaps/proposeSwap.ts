import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { SwapService } from '../../services/swapService';
import { proposeSwapRequestSchema } from '../../types/schemas';
import { createdResponse, handleError, parseJsonBody } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole } from '../../lib/auth';

/**
 * POST /swaps
 * Offer one of your shifts in exchange for someone else's
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('proposeSwap', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    const request = proposeSwapRequestSchema.parse(parseJsonBody(event.body));

    const swap = await SwapService.propose(actor, request);

    logger.info('Swap request created successfully', { swapId: swap.swapId });
    logLambdaCompletion('proposeSwap', Date.now() - startTime, context.awsRequestId);

    return createdResponse(swap, 'Swap request sent');
  } catch (error) {
    logger.error('Failed to propose swap', error as Error);
    return handleError(error);
  }
};
