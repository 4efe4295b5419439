import {
  DeleteItemCommand,
  type DeleteItemCommandInput,
  type DynamoDBClient,
  GetItemCommand,
  type GetItemCommandInput,
  QueryCommand,
  type QueryCommandInput,
  UpdateItemCommand,
  type UpdateItemCommandInput,
} from "@aws-sdk/client-dynamodb"

import type {
  DeleteItemResponse,
  GetItemResponse,
  QueryResponse,
  TableBackend,
  UpdateItemResponse,
} from "../../ports/table-backend"

export type DynamoDbTableBackendDeps = {
  client: DynamoDBClient
}

/**
 * {@link TableBackend} over the AWS SDK. Retries and backoff follow the
 * client's own configuration.
 */
export class DynamoDbTableBackend implements TableBackend {
  constructor(private readonly deps: DynamoDbTableBackendDeps) {}

  async getItem(input: GetItemCommandInput, signal?: AbortSignal): Promise<GetItemResponse> {
    return await this.deps.client.send(new GetItemCommand(input), { abortSignal: signal })
  }

  async updateItem(input: UpdateItemCommandInput, signal?: AbortSignal): Promise<UpdateItemResponse> {
    return await this.deps.client.send(new UpdateItemCommand(input), { abortSignal: signal })
  }

  async deleteItem(input: DeleteItemCommandInput, signal?: AbortSignal): Promise<DeleteItemResponse> {
    return await this.deps.client.send(new DeleteItemCommand(input), { abortSignal: signal })
  }

  async query(input: QueryCommandInput, signal?: AbortSignal): Promise<QueryResponse> {
    return await this.deps.client.send(new QueryCommand(input), { abortSignal: signal })
  }
}
