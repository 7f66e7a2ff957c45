import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { ShiftService } from '../../services/shiftService';
import { updateShiftRequestSchema } from '../../types/schemas';
import { getPathParameter, handleError, parseJsonBody, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole } from '../../lib/auth';

/**
 * PATCH /shifts/{shiftId}
 * Edit date, slot, people or notes of a shift (admin only).
 * The body carries the version the caller read.
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('updateShift', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    const shiftId = getPathParameter(event.pathParameters, 'shiftId');
    const request = updateShiftRequestSchema.parse(parseJsonBody(event.body));

    const shift = await ShiftService.updateShift(actor, shiftId, request);

    logger.info('Shift updated successfully', { shiftId, version: shift.version });
    logLambdaCompletion('updateShift', Date.now() - startTime, context.awsRequestId);

    return successResponse(shift, 'Shift updated successfully');
  } catch (error) {
    logger.error('Failed to update shift', error as Error);
    return handleError(error);
  }
};
