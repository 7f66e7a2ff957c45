import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { RosterService } from '../../services/rosterService';
import { createPersonRequestSchema } from '../../types/schemas';
import { createdResponse, handleError, parseJsonBody } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole, requireAdmin } from '../../lib/auth';

/**
 * POST /people
 * Add a collaborator or technician to a pool (admin only)
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('createPerson', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    requireAdmin(actor);

    const request = createPersonRequestSchema.parse(parseJsonBody(event.body));
    const person = await RosterService.createPerson(request);

    logLambdaCompletion('createPerson', Date.now() - startTime, context.awsRequestId);
    return createdResponse(person, 'Person created successfully');
  } catch (error) {
    logger.error('Failed to create person', error as Error);
    return handleError(error);
  }
};
