import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { ShiftService } from '../../services/shiftService';
import { getPathParameter, handleError, noContentResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole } from '../../lib/auth';

/**
 * DELETE /shifts/{shiftId}
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('deleteShift', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    const shiftId = getPathParameter(event.pathParameters, 'shiftId');

    await ShiftService.deleteShift(actor, shiftId);

    logger.info('Shift deleted successfully', { shiftId });
    logLambdaCompletion('deleteShift', Date.now() - startTime, context.awsRequestId);

    return noContentResponse();
  } catch (error) {
    logger.error('Failed to delete shift', error as Error);
    return handleError(error);
  }
};
