import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { ShiftService } from '../../services/shiftService';
import { reassignShiftRequestSchema } from '../../types/schemas';
import { getPathParameter, handleError, parseJsonBody, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole } from '../../lib/auth';

/**
 * PUT /shifts/{shiftId}/owner
 * Hand a shift to another person (admin only)
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('reassignShift', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    const shiftId = getPathParameter(event.pathParameters, 'shiftId');
    const request = reassignShiftRequestSchema.parse(parseJsonBody(event.body));

    const shift = await ShiftService.reassignShift(actor, shiftId, request);

    logLambdaCompletion('reassignShift', Date.now() - startTime, context.awsRequestId);
    return successResponse(shift, 'Shift reassigned successfully');
  } catch (error) {
    logger.error('Failed to reassign shift', error as Error);
    return handleError(error);
  }
};
