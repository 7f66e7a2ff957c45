import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { ScheduleService } from '../../services/scheduleService';
import { generateScheduleRequestSchema } from '../../types/schemas';
import { createdResponse, handleError, parseJsonBody, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole } from '../../lib/auth';

/**
 * POST /schedules/generate
 * Generate weekend shifts for one pool. With `dryRun` the plan is returned
 * without being written.
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('generateSchedule', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    const request = generateScheduleRequestSchema.parse(parseJsonBody(event.body));

    const result = await ScheduleService.generateSchedule(actor, request);

    logLambdaCompletion('generateSchedule', Date.now() - startTime, context.awsRequestId);

    if (result.dryRun) {
      return successResponse(result, 'Schedule preview');
    }

    logger.info('Schedule generated successfully', {
      runId: result.run.runId,
      shiftsCreated: result.shifts.length,
    });
    return createdResponse(result, 'Schedule generated successfully');
  } catch (error) {
    logger.error('Failed to generate schedule', error as Error);
    return handleError(error);
  }
};
