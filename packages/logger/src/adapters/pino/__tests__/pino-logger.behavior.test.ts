import { Writable } from "node:stream"
import { PinoLogger } from "../pino-logger"

function lineSink() {
  const lines: unknown[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(JSON.parse(line))
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON lines with bindings to the destination", () => {
    const { lines, destination } = lineSink()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { service: "records-api" })

    logger.info("table request built", { tableName: "records" })

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "table request built",
      service: "records-api",
      tableName: "records",
      time: expect.any(Number),
    })
  })

  it("serializes err with its cause", () => {
    const { lines, destination } = lineSink()
    const logger = new PinoLogger({ destination }, { level: "trace" })

    logger.error("backend call failed", { err: new Error("outer", { cause: new Error("inner") }) })

    expect(lines[0]).toMatchObject({
      err: { type: "Error", message: "outer", cause: { message: "inner" } },
    })
  })

  it("child() shares the parent's sink and level", () => {
    const { lines, destination } = lineSink()

    const base = new PinoLogger({ destination }, { level: "warn" }, { service: "records-api" })
    const child = base.child({ operation: "Update" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      msg: "logged",
      service: "records-api",
      operation: "Update",
    })
  })

  it("children write at the root level and above", () => {
    const { lines, destination } = lineSink()
    const root = new PinoLogger({ destination }, { level: "debug" })

    root.child({ module: "table-store" }).debug("derived")

    expect(lines[0]).toMatchObject({ level: 20, msg: "derived", module: "table-store" })
  })
})
