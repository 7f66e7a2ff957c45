import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { RosterService } from '../../services/rosterService';
import { rotaDomainSchema, updatePersonRequestSchema } from '../../types/schemas';
import { getPathParameter, handleError, parseJsonBody, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole, requireAdmin } from '../../lib/auth';

/**
 * PATCH /people/{domain}/{personId}
 * Rename, reorder, (de)activate or link a login (admin only).
 * Deactivated people keep their existing shifts.
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('updatePerson', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    requireAdmin(actor);

    const domain = rotaDomainSchema.parse(getPathParameter(event.pathParameters, 'domain'));
    const personId = getPathParameter(event.pathParameters, 'personId');
    const changes = updatePersonRequestSchema.parse(parseJsonBody(event.body));

    const person = await RosterService.updatePerson(domain, personId, changes);

    logLambdaCompletion('updatePerson', Date.now() - startTime, context.awsRequestId);
    return successResponse(person, 'Person updated successfully');
  } catch (error) {
    logger.error('Failed to update person', error as Error);
    return handleError(error);
  }
};
