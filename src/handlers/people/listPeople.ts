import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { RosterService } from '../../services/rosterService';
import { rotaDomainSchema } from '../../types/schemas';
import { getPathParameter, handleError, successResponse } from '../../lib/response';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { getPersonRole, requireAdmin } from '../../lib/auth';

/**
 * GET /people/{domain}
 * Roster of one pool in queue order (admin only).
 * Pass ?active=true to leave out inactive people.
 */
export const handler = async (event: APIGatewayProxyEvent, context: Context): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);

  logLambdaInvocation('listPeople', event, context.awsRequestId);

  try {
    const actor = await getPersonRole(event, logger);
    requireAdmin(actor);

    const domain = rotaDomainSchema.parse(getPathParameter(event.pathParameters, 'domain'));
    const activeOnly = event.queryStringParameters?.['active'] === 'true';

    const people = await RosterService.listPeople(domain, !activeOnly);

    logLambdaCompletion('listPeople', Date.now() - startTime, context.awsRequestId);
    return successResponse({ people });
  } catch (error) {
    logger.error('Failed to list people', error as Error);
    return handleError(error);
  }
};
