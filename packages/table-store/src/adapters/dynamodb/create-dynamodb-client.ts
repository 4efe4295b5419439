import { DynamoDBClient } from "@aws-sdk/client-dynamodb"

export type DynamoDbClientSettings = {
  region: string
  /** Overrides the regional endpoint, e.g. for DynamoDB Local. */
  endpoint?: string
  /** SDK attempts per call, including the first. */
  maxAttempts?: number
}

export function createDynamoDbClient(settings: DynamoDbClientSettings): DynamoDBClient {
  return new DynamoDBClient({
    region: settings.region,
    ...(settings.endpoint !== undefined && { endpoint: settings.endpoint }),
    ...(settings.maxAttempts !== undefined && { maxAttempts: settings.maxAttempts }),
  })
}
