/**
 * Query Step Specification
 *
 * Positional substitution of step parameters into format tokens.
 */

import { describe, it, expect } from "vitest"
import { QueryStep } from "../../src/query"
import { QueryFormatError } from "../../src/errors"

describe("QueryStep", () => {
  describe("serialize", () => {
    it("returns the token verbatim without parameters", () => {
      expect(new QueryStep("All()").serialize()).toBe("All()")
    })

    it("does not interpret placeholders when there are no parameters", () => {
      expect(new QueryStep("g.V('50%s off')").serialize()).toBe("g.V('50%s off')")
    })

    it("substitutes parameters in order", () => {
      expect(new QueryStep("%s(%s, %s)", "Out", "'follows'", "'t'").serialize()).toBe("Out('follows', 't')")
    })

    it("writes %d parameters as integers", () => {
      expect(new QueryStep("GetLimit(%d)", 10).serialize()).toBe("GetLimit(10)")
      expect(new QueryStep("GetLimit(%d)", 3.9).serialize()).toBe("GetLimit(3)")
      expect(new QueryStep("GetLimit(%d)", -2.5).serialize()).toBe("GetLimit(-2)")
    })

    it("writes %% as a literal percent sign", () => {
      expect(new QueryStep("%s %% done", "50").serialize()).toBe("50 % done")
    })

    it("toString() is the serialized step", () => {
      expect(String(new QueryStep("Back('%s')", "start"))).toBe("Back('start')")
    })
  })

  describe("Format Errors", () => {
    it("fails when there are fewer parameters than placeholders", () => {
      expect(() => new QueryStep("%s(%s)", "Out").serialize()).toThrow(QueryFormatError)
    })

    it("fails when there are more parameters than placeholders", () => {
      expect(() => new QueryStep("All(%s)", "a", "b").serialize()).toThrow(QueryFormatError)
    })

    it("fails when %d gets something other than a finite number", () => {
      expect(() => new QueryStep("GetLimit(%d)", "ten").serialize()).toThrow(QueryFormatError)
      expect(() => new QueryStep("GetLimit(%d)", Number.NaN).serialize()).toThrow(QueryFormatError)
    })

    it("carries the offending token", () => {
      try {
        new QueryStep("%s(%s)", "Out").serialize()
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(QueryFormatError)
        if (error instanceof QueryFormatError) {
          expect(error.token).toBe("%s(%s)")
        }
      }
    })
  })

  it("freezes its parameters", () => {
    const step = new QueryStep("%s", "x")

    expect(Object.isFrozen(step.parameters)).toBe(true)
    expect(step.parameters).toEqual(["x"])
  })
})
