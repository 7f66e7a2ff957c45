import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { ShiftService } from '../../services/shiftService';
import { createShiftRequestSchema } from '../../types/schemas';
import { createdResponse, handleError, parseJsonBody } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole } from '../../lib/auth';

/**
 * POST /shifts
 * Register a shift by hand (admin only)
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('createShift', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    const request = createShiftRequestSchema.parse(parseJsonBody(event.body));

    const shift = await ShiftService.createShift(actor, request);

    logger.info('Shift created successfully', { shiftId: shift.shiftId, date: shift.date });
    logLambdaCompletion('createShift', Date.now() - startTime, context.awsRequestId);

    return createdResponse(shift, 'Shift created successfully');
  } catch (error) {
    logger.error('Failed to create shift', error as Error);
    return handleError(error);
  }
};
