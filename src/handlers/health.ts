import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { successResponse } from '../lib/response';
import { logger } from '../lib/logger';
import { getRotaConfig } from '../config/rota';

/**
 * Health check endpoint handler
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  const { applicationName, stage, timeZone } = getRotaConfig();

  logger.info('Health check request', {
    requestId: event.requestContext.requestId,
  });

  return successResponse({
    status: 'healthy',
    application: applicationName,
    stage,
    timeZone,
    timestamp: new Date().toISOString(),
  });
};
