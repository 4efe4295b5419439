import { z } from "zod"
import { ObjectSource } from "../../adapters/object/object-source"
import { ConfigValidationError, loadConfig } from "../load"

const schema = z.object({
  TABLE_NAME: z.string().min(1),
  AWS_REGION: z.string().default("us-east-1"),
  PAGE_SIZE: z.coerce.number().int().positive().default(25),
})

describe("loadConfig", () => {
  it("validates, coerces and applies defaults", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ TABLE_NAME: "orders", PAGE_SIZE: "50" }, "object:a")],
    })

    expect(config.value).toStrictEqual({
      TABLE_NAME: "orders",
      AWS_REGION: "us-east-1",
      PAGE_SIZE: 50,
    })
    expect(config.get("PAGE_SIZE")).toBe(50)
  })

  it("later sources override earlier ones and provenance follows", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ TABLE_NAME: "orders", AWS_REGION: "eu-west-1" }, "object:a"),
        new ObjectSource({ AWS_REGION: "ap-southeast-2" }, "object:b"),
      ],
    })

    expect(config.get("AWS_REGION")).toBe("ap-southeast-2")
    expect(config.explain("AWS_REGION")).toBe("object:b")
    expect(config.explain("TABLE_NAME")).toBe("object:a")
    expect(config.explain("PAGE_SIZE")).toBe("default")
  })

  it("ignores undefined values from a source", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ TABLE_NAME: "orders" }, "object:a"),
        new ObjectSource({ TABLE_NAME: undefined }, "object:b"),
      ],
    })

    expect(config.get("TABLE_NAME")).toBe("orders")
    expect(config.explain("TABLE_NAME")).toBe("object:a")
  })

  it("reports keys the schema does not know", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ TABLE_NAME: "orders", TABEL_NAME: "typo" })],
    })

    expect(config.unknownKeys()).toStrictEqual(["TABEL_NAME"])
  })

  it("throws ConfigValidationError when validation fails", async () => {
    const load = loadConfig({ schema, sources: [new ObjectSource({ PAGE_SIZE: "-1" })] })

    await expect(load).rejects.toBeInstanceOf(ConfigValidationError)
    await expect(load).rejects.toMatchObject({
      code: "config_invalid",
      context: { sources: ["object:overrides"] },
    })
  })

  it("freezes the loaded values", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ TABLE_NAME: "orders" })],
    })

    expect(Object.isFrozen(config.value)).toBe(true)
  })
})
