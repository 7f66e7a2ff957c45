import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { ShiftService } from '../../services/shiftService';
import { listShiftsQuerySchema } from '../../types/schemas';
import { handleError, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole } from '../../lib/auth';

/**
 * GET /shifts/export
 * Same filters as GET /shifts, grouped into Monday-start weeks for reports
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('exportShifts', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    const query = listShiftsQuerySchema.parse(event.queryStringParameters ?? {});

    const report = await ShiftService.exportWeeks(actor, query);

    logLambdaCompletion('exportShifts', Date.now() - startTime, context.awsRequestId);
    return successResponse(report);
  } catch (error) {
    logger.error('Failed to export shifts', error as Error);
    return handleError(error);
  }
};
