import { EnvSource } from "../env-source"

describe("EnvSource", () => {
  it("returns a copy of the whole environment without a prefix", async () => {
    const env = { TABLE_NAME: "orders", HOME: "/home/test" }
    const source = new EnvSource({ env })

    const values = await source.load()

    expect(values).toStrictEqual(env)
    expect(values).not.toBe(env)
    expect(source.name).toBe("env")
  })

  it("filters by prefix and strips it", async () => {
    const source = new EnvSource({
      prefix: "TABLEKIT_",
      env: { TABLEKIT_TABLE_NAME: "orders", TABLE_NAME: "other", TABLEKIT_AWS_REGION: "eu-west-1" },
    })

    expect(await source.load()).toStrictEqual({ TABLE_NAME: "orders", AWS_REGION: "eu-west-1" })
    expect(source.name).toBe("env:TABLEKIT_")
  })

  it("reads process.env by default", async () => {
    process.env.TABLEKIT_ENV_SOURCE_PROBE = "yes"

    try {
      const values = await new EnvSource({ prefix: "TABLEKIT_ENV_SOURCE_" }).load()

      expect(values).toStrictEqual({ PROBE: "yes" })
    } finally {
      delete process.env.TABLEKIT_ENV_SOURCE_PROBE
    }
  })
})
