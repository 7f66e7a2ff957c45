import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { ShiftService } from '../../services/shiftService';
import { listShiftsQuerySchema } from '../../types/schemas';
import { handleError, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole } from '../../lib/auth';

/**
 * GET /shifts
 * Dashboard listing
 *
 * Query Parameters (all optional):
 * - domain: 'collaborator' | 'technician' (admins only; members get their own)
 * - from, to: YYYY-MM-DD, inclusive; defaults to today .. today + 4 weeks
 * - personId: shifts worked by one person (admins only)
 * - weekday: 'SAB' | 'DOM'
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('listShifts', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    const query = listShiftsQuerySchema.parse(event.queryStringParameters ?? {});

    const listing = await ShiftService.listShifts(actor, query);

    logLambdaCompletion('listShifts', Date.now() - startTime, context.awsRequestId);
    return successResponse(listing);
  } catch (error) {
    logger.error('Failed to list shifts', error as Error);
    return handleError(error);
  }
};
