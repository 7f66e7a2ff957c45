/**
 * DynamoDB Client Utility - Duty Rota Service
 *
 * Centralized DynamoDB Document Client using AWS SDK v3.
 * Provides client configuration for the Lambda execution environment.
 */

import {
  DynamoDBClient,
  DynamoDBClientConfig,
  TransactionCanceledException,
} from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  TransactWriteCommandInput,
  TranslateConfig,
} from '@aws-sdk/lib-dynamodb';

// For local development, always use dummy credentials to bypass AWS IAM
const isLocalDevelopment = process.env['AWS_SAM_LOCAL'] === 'true' || !!process.env['DYNAMODB_ENDPOINT'];

const clientConfig: DynamoDBClientConfig = {
  region: process.env['AWS_REGION'] || 'us-east-1',
  maxAttempts: 3,
};

// Use DYNAMODB_ENDPOINT if provided, otherwise the docker host endpoint when AWS_SAM_LOCAL is true
const localEndpoint =
  process.env['DYNAMODB_ENDPOINT'] ||
  (process.env['AWS_SAM_LOCAL'] === 'true' ? 'http://host.docker.internal:8000' : undefined);

if (localEndpoint) {
  clientConfig.endpoint = localEndpoint;
  clientConfig.tls = false;
}

// Must come last to override any credentials from the environment
if (isLocalDevelopment) {
  clientConfig.credentials = {
    accessKeyId: 'local',
    secretAccessKey: 'local',
  };
}

const dynamoDBClient = new DynamoDBClient(clientConfig);

const marshallOptions: TranslateConfig['marshallOptions'] = {
  removeUndefinedValues: true,
  convertEmptyValues: false,
  convertClassInstanceToMap: true,
};

const unmarshallOptions: TranslateConfig['unmarshallOptions'] = {
  wrapNumbers: false,
};

/**
 * DynamoDB Document Client instance
 *
 * Singleton - reused across Lambda invocations
 */
export const docClient = DynamoDBDocumentClient.from(dynamoDBClient, {
  marshallOptions,
  unmarshallOptions,
});

/**
 * Get the DynamoDB table name from environment variable
 */
export const getTableName = (): string => {
  const tableName = process.env['TABLE_NAME'];

  if (!tableName) {
    throw new Error('TABLE_NAME environment variable is not set');
  }

  return tableName;
};

/**
 * Per-item cancellation codes of a cancelled transaction, in TransactItems order.
 * Returns null when the error is not a transaction cancellation.
 */
export const getCancellationCodes = (error: unknown): string[] | null => {
  if (!(error instanceof TransactionCanceledException)) {
    return null;
  }
  return (error.CancellationReasons ?? []).map((reason) => reason.Code ?? 'None');
};

/**
 * Index of the first item whose condition check failed, or -1
 */
export const findFailedCondition = (codes: readonly string[]): number =>
  codes.findIndex((code) => code === 'ConditionalCheckFailed');

/**
 * One entry of a TransactWriteCommand
 */
export type TransactItem = NonNullable<TransactWriteCommandInput['TransactItems']>[number];
