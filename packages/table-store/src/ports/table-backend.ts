import type {
  DeleteItemCommandInput,
  DeleteItemCommandOutput,
  GetItemCommandInput,
  GetItemCommandOutput,
  QueryCommandInput,
  QueryCommandOutput,
  UpdateItemCommandInput,
  UpdateItemCommandOutput,
} from "@aws-sdk/client-dynamodb"

export type GetItemResponse = Pick<GetItemCommandOutput, "Item" | "ConsumedCapacity">

export type UpdateItemResponse = Pick<UpdateItemCommandOutput, "Attributes" | "ConsumedCapacity">

export type DeleteItemResponse = Pick<DeleteItemCommandOutput, "Attributes" | "ConsumedCapacity">

export type QueryResponse = Pick<
  QueryCommandOutput,
  "Items" | "Count" | "LastEvaluatedKey" | "ConsumedCapacity"
>

export type TableRequest =
  | GetItemCommandInput
  | UpdateItemCommandInput
  | DeleteItemCommandInput
  | QueryCommandInput

export type TableResponse =
  | GetItemResponse
  | UpdateItemResponse
  | DeleteItemResponse
  | QueryResponse

/**
 * The table service the store dispatches to.
 *
 * @remarks
 * Requests and responses use DynamoDB's wire shapes. Implementations must:
 * - evaluate `ConditionExpression` atomically with the write it guards
 * - reject a failed condition with `ConditionalCheckFailedException`
 * - honour `ReturnValues: "ALL_NEW"` on updates
 * - page queries with `Limit` / `ExclusiveStartKey` / `LastEvaluatedKey`
 *
 * Retries and backoff belong here, not in the store.
 */
export interface TableBackend {
  getItem(input: GetItemCommandInput, signal?: AbortSignal): Promise<GetItemResponse>

  updateItem(input: UpdateItemCommandInput, signal?: AbortSignal): Promise<UpdateItemResponse>

  deleteItem(input: DeleteItemCommandInput, signal?: AbortSignal): Promise<DeleteItemResponse>

  query(input: QueryCommandInput, signal?: AbortSignal): Promise<QueryResponse>
}
