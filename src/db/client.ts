import { DynamoDB } from 'aws-sdk';

/**
 * DynamoDB DocumentClient configuration
 * Uses environment variables for configuration with sensible defaults
 */
const dynamoDbConfig: DynamoDB.DocumentClient.DocumentClientOptions & DynamoDB.Types.ClientConfiguration = {
  region: process.env.AWS_REGION || 'us-east-1',
  ...(process.env.DYNAMODB_ENDPOINT && {
    endpoint: process.env.DYNAMODB_ENDPOINT
  })
};

/**
 * The subset of the DocumentClient the repositories use.
 * Repositories take one of these so tests can pass an in-process stand-in.
 */
export interface DocumentStore {
  get(params: DynamoDB.DocumentClient.GetItemInput): {
    promise(): Promise<DynamoDB.DocumentClient.GetItemOutput>;
  };
  put(params: DynamoDB.DocumentClient.PutItemInput): {
    promise(): Promise<DynamoDB.DocumentClient.PutItemOutput>;
  };
  delete(params: DynamoDB.DocumentClient.DeleteItemInput): {
    promise(): Promise<DynamoDB.DocumentClient.DeleteItemOutput>;
  };
  query(params: DynamoDB.DocumentClient.QueryInput): {
    promise(): Promise<DynamoDB.DocumentClient.QueryOutput>;
  };
  scan(params: DynamoDB.DocumentClient.ScanInput): {
    promise(): Promise<DynamoDB.DocumentClient.ScanOutput>;
  };
}

/**
 * Singleton DynamoDB DocumentClient instance
 */
export const documentClient = new DynamoDB.DocumentClient(dynamoDbConfig);

/**
 * Whether an error is DynamoDB's failed-condition error
 */
export function isConditionalCheckFailed(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ConditionalCheckFailedException'
  );
}
