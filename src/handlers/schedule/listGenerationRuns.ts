import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { ScheduleService } from '../../services/scheduleService';
import { rotaDomainSchema } from '../../types/schemas';
import { handleError, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole } from '../../lib/auth';

/**
 * GET /schedules/runs?domain=collaborator
 * Recent generation runs, newest first
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('listGenerationRuns', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    const domain = rotaDomainSchema.parse(event.queryStringParameters?.['domain'] ?? 'collaborator');

    const runs = await ScheduleService.listRuns(actor, domain);

    logLambdaCompletion('listGenerationRuns', Date.now() - startTime, context.awsRequestId);
    return successResponse({ runs });
  } catch (error) {
    logger.error('Failed to list generation runs', error as Error);
    return handleError(error);
  }
};
