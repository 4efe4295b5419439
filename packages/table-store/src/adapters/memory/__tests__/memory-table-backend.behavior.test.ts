import { ConditionalCheckFailedException, ResourceNotFoundException } from "@aws-sdk/client-dynamodb"

import { createMemoryBackend, GLOBAL_INDEX, TEST_TABLE } from "../../../tests/utils/table-test-helpers"
import type { MemoryTableBackend } from "../memory-table-backend"
import { MemoryTableValidationError } from "../memory-table-error"

function key(id: string, name: string) {
  return { id: { S: id }, name: { S: name } }
}

describe("MemoryTableBackend behavior", () => {
  let backend: MemoryTableBackend

  beforeEach(() => {
    backend = createMemoryBackend()
  })

  async function put(id: string, name: string, extra: Record<string, string> = {}) {
    const names: Record<string, string> = { "#p": "payload" }
    const values: Record<string, { S: string }> = { ":p": { S: `${id}:${name}` } }
    const sets = ["#p = :p"]

    Object.entries(extra).forEach(([attr, value], i) => {
      names[`#e${i}`] = attr
      values[`:e${i}`] = { S: value }
      sets.push(`#e${i} = :e${i}`)
    })

    await backend.updateItem({
      TableName: TEST_TABLE,
      Key: key(id, name),
      UpdateExpression: `SET ${sets.join(", ")}`,
      ExpressionAttributeNames: names,
      ExpressionAttributeValues: values,
    })
  }

  it("creates the item from its key on first update and returns the new image", async () => {
    const res = await backend.updateItem({
      TableName: TEST_TABLE,
      Key: key("a", "1"),
      UpdateExpression: "ADD #v :one SET #p = :p",
      ExpressionAttributeNames: { "#v": "version", "#p": "payload" },
      ExpressionAttributeValues: { ":one": { N: "1" }, ":p": { S: "hello" } },
      ReturnValues: "ALL_NEW",
    })

    expect(res.Attributes).toStrictEqual({
      id: { S: "a" },
      name: { S: "1" },
      version: { N: "1" },
      payload: { S: "hello" },
    })
    expect(backend.size).toBe(1)
  })

  it("returns copies that do not alias stored items", async () => {
    await put("a", "1")

    const first = await backend.getItem({ TableName: TEST_TABLE, Key: key("a", "1") })
    if (first.Item) first.Item.payload = { S: "mutated" }
    const second = await backend.getItem({ TableName: TEST_TABLE, Key: key("a", "1") })

    expect(second.Item?.payload).toStrictEqual({ S: "a:1" })
  })

  it("throws ConditionalCheckFailedException when the condition does not hold", async () => {
    await expect(
      backend.deleteItem({
        TableName: TEST_TABLE,
        Key: key("a", "1"),
        ConditionExpression: "attribute_exists(#id)",
        ExpressionAttributeNames: { "#id": "id" },
      }),
    ).rejects.toBeInstanceOf(ConditionalCheckFailedException)
  })

  it("rejects requests for another table", async () => {
    await expect(
      backend.getItem({ TableName: "other", Key: key("a", "1") }),
    ).rejects.toBeInstanceOf(ResourceNotFoundException)
  })

  it("rejects keys that do not match the schema", async () => {
    await expect(
      backend.getItem({ TableName: TEST_TABLE, Key: { id: { S: "a" } } }),
    ).rejects.toBeInstanceOf(MemoryTableValidationError)
  })

  it("rejects updates to key attributes", async () => {
    await expect(
      backend.updateItem({
        TableName: TEST_TABLE,
        Key: key("a", "1"),
        UpdateExpression: "SET #n = :n",
        ExpressionAttributeNames: { "#n": "name" },
        ExpressionAttributeValues: { ":n": { S: "2" } },
      }),
    ).rejects.toThrow('cannot update key attribute "name"')
  })

  it("keeps numeric keys apart that differ only past 2^53", async () => {
    const create = (id: string, payload: string) =>
      backend.updateItem({
        TableName: TEST_TABLE,
        Key: { id: { N: id }, name: { S: "s" } },
        UpdateExpression: "SET #p = :p",
        ConditionExpression: "attribute_not_exists(#id)",
        ExpressionAttributeNames: { "#p": "payload", "#id": "id" },
        ExpressionAttributeValues: { ":p": { S: payload } },
      })

    await create("9007199254740992", "a")
    await create("9007199254740993", "b")

    const second = await backend.getItem({
      TableName: TEST_TABLE,
      Key: { id: { N: "9007199254740993" }, name: { S: "s" } },
    })
    expect(backend.size).toBe(2)
    expect(second.Item?.payload).toStrictEqual({ S: "b" })
  })

  it("orders large numeric sort keys exactly", async () => {
    for (const name of ["9007199254740993", "9007199254740992", "-1"]) {
      await backend.updateItem({
        TableName: TEST_TABLE,
        Key: { id: { S: "p" }, name: { N: name } },
        UpdateExpression: "SET #p = :p",
        ExpressionAttributeNames: { "#p": "payload" },
        ExpressionAttributeValues: { ":p": { S: name } },
      })
    }

    const res = await backend.query({
      TableName: TEST_TABLE,
      KeyConditionExpression: "#pk = :pk",
      ExpressionAttributeNames: { "#pk": "id" },
      ExpressionAttributeValues: { ":pk": { S: "p" } },
    })

    expect(res.Items?.map((item) => item.name)).toStrictEqual([
      { N: "-1" },
      { N: "9007199254740992" },
      { N: "9007199254740993" },
    ])
  })

  it("rejects a limit that is not a positive integer", async () => {
    await put("p", "a")

    for (const limit of [2.5, 0, -1]) {
      await expect(
        backend.query({
          TableName: TEST_TABLE,
          KeyConditionExpression: "#pk = :pk",
          ExpressionAttributeNames: { "#pk": "id" },
          ExpressionAttributeValues: { ":pk": { S: "p" } },
          Limit: limit,
        }),
      ).rejects.toThrow(`Limit must be a positive integer, got ${limit}`)
    }
  })

  it("returns the last evaluated key when the limit is reached", async () => {
    await put("p", "a")
    await put("p", "b")
    await put("p", "c")

    const res = await backend.query({
      TableName: TEST_TABLE,
      KeyConditionExpression: "#pk = :pk",
      ExpressionAttributeNames: { "#pk": "id" },
      ExpressionAttributeValues: { ":pk": { S: "p" } },
      Limit: 2,
    })

    expect(res.Count).toBe(2)
    expect(res.LastEvaluatedKey).toStrictEqual(key("p", "b"))
  })

  it("reads in descending order when ScanIndexForward is false", async () => {
    await put("p", "a")
    await put("p", "b")
    await put("p", "c")

    const first = await backend.query({
      TableName: TEST_TABLE,
      KeyConditionExpression: "#pk = :pk",
      ExpressionAttributeNames: { "#pk": "id" },
      ExpressionAttributeValues: { ":pk": { S: "p" } },
      ScanIndexForward: false,
      Limit: 1,
    })
    const rest = await backend.query({
      TableName: TEST_TABLE,
      KeyConditionExpression: "#pk = :pk",
      ExpressionAttributeNames: { "#pk": "id" },
      ExpressionAttributeValues: { ":pk": { S: "p" } },
      ScanIndexForward: false,
      ExclusiveStartKey: first.LastEvaluatedKey,
    })

    expect(first.Items?.map((i) => i.name?.S)).toStrictEqual(["c"])
    expect(rest.Items?.map((i) => i.name?.S)).toStrictEqual(["b", "a"])
  })

  it("leaves items without the index keys out of a sparse index", async () => {
    await put("a", "1", { pk1: "g", sk1: "k1" })
    await put("b", "2", { pk1: "g" })

    const res = await backend.query({
      TableName: TEST_TABLE,
      IndexName: GLOBAL_INDEX.name,
      KeyConditionExpression: "#pk = :pk",
      ExpressionAttributeNames: { "#pk": "pk1" },
      ExpressionAttributeValues: { ":pk": { S: "g" } },
    })

    expect(res.Items?.map((i) => i.payload)).toStrictEqual([{ S: "a:1" }])
  })

  it("includes table and index keys in an index's last evaluated key", async () => {
    await put("a", "1", { pk1: "g", sk1: "k1" })
    await put("b", "2", { pk1: "g", sk1: "k2" })

    const res = await backend.query({
      TableName: TEST_TABLE,
      IndexName: GLOBAL_INDEX.name,
      KeyConditionExpression: "#pk = :pk",
      ExpressionAttributeNames: { "#pk": "pk1" },
      ExpressionAttributeValues: { ":pk": { S: "g" } },
      Limit: 1,
    })

    expect(res.LastEvaluatedKey).toStrictEqual({
      id: { S: "a" },
      name: { S: "1" },
      pk1: { S: "g" },
      sk1: { S: "k1" },
    })
  })

  it("rejects an unknown index", async () => {
    await expect(
      backend.query({
        TableName: TEST_TABLE,
        IndexName: "missing",
        KeyConditionExpression: "#pk = :pk",
        ExpressionAttributeNames: { "#pk": "id" },
        ExpressionAttributeValues: { ":pk": { S: "p" } },
      }),
    ).rejects.toThrow('table has no index named "missing"')
  })

  it("rejects key conditions on non-key attributes", async () => {
    await expect(
      backend.query({
        TableName: TEST_TABLE,
        KeyConditionExpression: "#pk = :pk AND begins_with(#other, :prefix)",
        ExpressionAttributeNames: { "#pk": "id", "#other": "payload" },
        ExpressionAttributeValues: { ":pk": { S: "p" }, ":prefix": { S: "x" } },
      }),
    ).rejects.toBeInstanceOf(MemoryTableValidationError)
  })

  it("stops before touching the table once the signal is aborted", async () => {
    const controller = new AbortController()
    controller.abort(new Error("caller went away"))

    await expect(
      backend.getItem({ TableName: TEST_TABLE, Key: key("a", "1") }, controller.signal),
    ).rejects.toThrow("caller went away")
  })
})
