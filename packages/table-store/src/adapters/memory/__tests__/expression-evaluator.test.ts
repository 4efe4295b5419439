import { and, attributeExists, beginsWith, equals } from "../../../core/expression/condition"
import { applyUpdate, evaluateCondition, parseCondition, parseUpdate } from "../expression-evaluator"
import { MemoryTableValidationError } from "../memory-table-error"

describe("expression evaluator", () => {
  const attrs = {
    names: { "#n0": "id", "#n1": "version", "#n2": "name" },
    values: { ":v0": { N: "3" }, ":v1": { S: "cust/" } },
  }

  describe("parseCondition", () => {
    it("resolves placeholders in a conjunction", () => {
      const condition = parseCondition("attribute_exists(#n0) AND #n1 = :v0", attrs)

      expect(condition).toStrictEqual(and(attributeExists("id"), equals("version", { N: "3" })))
    })

    it("accepts parenthesised terms and begins_with", () => {
      const condition = parseCondition("(begins_with(#n2, :v1))", attrs)

      expect(condition).toStrictEqual(beginsWith("name", "cust/"))
    })

    it("rejects unsupported syntax", () => {
      expect(() => parseCondition("#n0 > :v0", attrs)).toThrow(MemoryTableValidationError)
    })

    it("rejects undefined placeholders", () => {
      expect(() => parseCondition("attribute_exists(#zz)", attrs)).toThrow(
        "undefined expression attribute name: #zz",
      )
    })
  })

  describe("evaluateCondition", () => {
    const item = { id: { S: "a" }, version: { N: "3" }, name: { S: "cust/1" } }

    it("treats a missing item as having no attributes", () => {
      expect(evaluateCondition(attributeExists("id"), undefined)).toBe(false)
      expect(evaluateCondition(parseCondition("attribute_not_exists(#n0)", attrs), undefined)).toBe(true)
    })

    it("compares numbers by value", () => {
      expect(evaluateCondition(equals("version", { N: "3.0" }), item)).toBe(true)
      expect(evaluateCondition(equals("version", { N: "4" }), item)).toBe(false)
    })

    it("requires every operand of a conjunction", () => {
      expect(evaluateCondition(and(attributeExists("id"), beginsWith("name", "cust/")), item)).toBe(true)
      expect(evaluateCondition(and(attributeExists("id"), beginsWith("name", "order/")), item)).toBe(false)
    })
  })

  describe("updates", () => {
    it("parses ADD and SET clauses", () => {
      const actions = parseUpdate("ADD #n1 :v0 SET #n2 = :v1", attrs)

      expect(actions).toStrictEqual([
        { kind: "add", name: "version", value: { N: "3" } },
        { kind: "set", name: "name", value: { S: "cust/" } },
      ])
    })

    it("rejects REMOVE clauses", () => {
      expect(() => parseUpdate("REMOVE #n1", attrs)).toThrow(MemoryTableValidationError)
    })

    it("adds to an existing number and initialises a missing one", () => {
      const add = [{ kind: "add" as const, name: "version", value: { N: "1" } }]

      expect(applyUpdate({ version: { N: "4" } }, add)).toStrictEqual({ version: { N: "5" } })
      expect(applyUpdate({}, add)).toStrictEqual({ version: { N: "1" } })
    })

    it("refuses to add to a non-numeric attribute", () => {
      expect(() =>
        applyUpdate({ version: { S: "x" } }, [{ kind: "add", name: "version", value: { N: "1" } }]),
      ).toThrow('cannot ADD to non-numeric attribute "version"')
    })
  })
})
