import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource", () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "tablekit-dotenv-"))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it("parses the file relative to cwd", async () => {
    await fs.writeFile(path.join(dir, ".env"), "TABLE_NAME=orders\n# comment\nAWS_REGION=eu-west-1\n")

    const source = new DotenvSource({ file: ".env", required: true, cwd: dir })

    expect(await source.load()).toStrictEqual({ TABLE_NAME: "orders", AWS_REGION: "eu-west-1" })
    expect(source.name).toBe("dotenv:.env")
  })

  it("applies a prefix filter", async () => {
    await fs.writeFile(path.join(dir, ".env"), "TABLEKIT_TABLE_NAME=orders\nOTHER=1\n")

    const source = new DotenvSource({ file: ".env", required: true, cwd: dir, prefix: "TABLEKIT_" })

    expect(await source.load()).toStrictEqual({ TABLE_NAME: "orders" })
  })

  it("returns nothing for a missing optional file", async () => {
    const source = new DotenvSource({ file: ".env.missing", required: false, cwd: dir })

    expect(await source.load()).toStrictEqual({})
  })

  it("throws for a missing required file", async () => {
    const source = new DotenvSource({ file: ".env.missing", required: true, cwd: dir })

    await expect(source.load()).rejects.toMatchObject({ code: "ENOENT" })
  })
})
