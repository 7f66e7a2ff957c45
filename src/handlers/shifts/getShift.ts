import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { ShiftService } from '../../services/shiftService';
import { getPathParameter, handleError, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole, isAdmin } from '../../lib/auth';
import { NotAuthorizedError } from '../../lib/scheduling/errors';

/**
 * GET /shifts/{shiftId}
 * Members may read shifts of their own rota
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('getShift', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    const shiftId = getPathParameter(event.pathParameters, 'shiftId');

    const shift = await ShiftService.getShift(shiftId);
    if (!isAdmin(actor) && shift.domain !== actor.kind) {
      throw new NotAuthorizedError('You can only view shifts of your own rota');
    }

    logLambdaCompletion('getShift', Date.now() - startTime, context.awsRequestId);
    return successResponse(shift);
  } catch (error) {
    logger.error('Failed to get shift', error as Error);
    return handleError(error);
  }
};
