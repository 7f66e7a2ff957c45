/**
 * API Response Helpers - Duty Rota Service
 *
 * Envelopes for API Gateway proxy results: `{data, message?}` on success and
 * `{error: {code, message, details?}}` on failure, always with CORS headers.
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { ZodError } from 'zod';
import { logger } from './logger';
import { SchedulingError } from './scheduling/errors';

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export interface SuccessResponse<T = unknown> {
  data: T;
  message?: string;
}

const corsHeaders = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,X-Amz-Date,Authorization,X-Api-Key,X-Amz-Security-Token',
  'Access-Control-Allow-Methods': 'GET,POST,PUT,PATCH,DELETE,OPTIONS',
  'Content-Type': 'application/json',
};

const jsonResponse = (statusCode: number, body: SuccessResponse | ErrorResponse): APIGatewayProxyResult => ({
  statusCode,
  headers: { ...corsHeaders },
  body: JSON.stringify(body),
});

const errorResponse = (
  statusCode: number,
  code: string,
  message: string,
  details?: unknown
): APIGatewayProxyResult =>
  jsonResponse(statusCode, { error: { code, message, ...(details !== undefined && { details }) } });

export const successResponse = <T>(data: T, message?: string): APIGatewayProxyResult =>
  jsonResponse(200, { data, ...(message && { message }) });

export const createdResponse = <T>(data: T, message = 'Resource created successfully'): APIGatewayProxyResult =>
  jsonResponse(201, { data, message });

export const noContentResponse = (): APIGatewayProxyResult => ({
  statusCode: 204,
  headers: { ...corsHeaders },
  body: '',
});

/**
 * Field-level messages of a failed zod parse
 */
export const validationErrorResponse = (zodError: ZodError): APIGatewayProxyResult => {
  const fields = zodError.errors.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));

  logger.warn('Validation error', { errors: fields });
  return errorResponse(400, 'VALIDATION_ERROR', 'Request validation failed', fields);
};

/**
 * A broken rota rule; the error decides code and status
 */
export const schedulingErrorResponse = (error: SchedulingError): APIGatewayProxyResult => {
  const details = error.details();
  return errorResponse(
    error.statusCode,
    error.code,
    error.message,
    Object.keys(details).length > 0 ? details : undefined
  );
};

/**
 * Malformed request that never reached validation (bad JSON, missing path parameter)
 */
export class RequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestError';
    Object.setPrototypeOf(this, RequestError.prototype);
  }
}

/**
 * Translate anything a handler caught into a response.
 * Unexpected failures are logged and reported without their cause.
 */
export const handleError = (error: unknown): APIGatewayProxyResult => {
  if (error instanceof ZodError) {
    return validationErrorResponse(error);
  }

  if (error instanceof SchedulingError) {
    return schedulingErrorResponse(error);
  }

  if (error instanceof RequestError) {
    logger.warn('Bad request', { message: error.message });
    return errorResponse(400, 'BAD_REQUEST', error.message);
  }

  if (error instanceof Error) {
    logger.error('Internal server error', error);
    return errorResponse(500, 'INTERNAL_SERVER_ERROR', 'An internal error occurred');
  }

  logger.error('Unknown error type', new Error(String(error)));
  return errorResponse(500, 'INTERNAL_SERVER_ERROR', 'An unexpected error occurred');
};

/**
 * @throws RequestError when the body is missing or not JSON
 */
export const parseJsonBody = (body: string | null): unknown => {
  if (!body) {
    throw new RequestError('Request body is required');
  }

  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    throw new RequestError('Invalid JSON in request body');
  }
};

/**
 * @throws RequestError when the parameter is absent or empty
 */
export const getPathParameter = (
  pathParameters: Record<string, string | undefined> | null,
  paramName: string
): string => {
  const value = pathParameters?.[paramName];
  if (!value) {
    throw new RequestError(`Missing required path parameter: ${paramName}`);
  }

  return value;
};
