/**
 * DynamoDB client configuration
 */

import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";

/** Region the care tables live in */
export const DEFAULT_REGION = "eu-west-2";

/**
 * Create a DynamoDB Document Client.
 * Region falls back to AWS_REGION (set by the Lambda runtime), then eu-west-2.
 */
export function createDocClient(region?: string): DynamoDBDocumentClient {
  const client = new DynamoDBClient({
    region: region ?? process.env.AWS_REGION ?? DEFAULT_REGION,
  });
  return DynamoDBDocumentClient.from(client, {
    marshallOptions: {
      removeUndefinedValues: true,
    },
  });
}
