/**
 * Query Building Specification - Traversal
 *
 * Tests for Out / In / Both, Is, Has, Tag, Back and Save.
 */

import { describe, it, expect } from "vitest"
import { createGraph, formatBoundValue } from "../../src/query"

const g = createGraph()

describe("Query Building: Traversal", () => {
  // ===========================================================================
  // DIRECTIONAL TRAVERSAL
  // ===========================================================================

  describe("Out / In / Both", () => {
    it("emits the zero-argument form when predicate and tags are absent", () => {
      expect(g.vertices("alice").Out().build()).toBe("g.V('alice').Out()")
      expect(g.vertices("alice").Out(null, null).build()).toBe("g.V('alice').Out()")
    })

    it("emits the one-argument form when only tags are absent", () => {
      expect(g.vertices("alice").Out("follows").build()).toBe("g.V('alice').Out('follows')")
    })

    it("emits the two-argument form when tags are given", () => {
      expect(g.vertices("alice").Out("follows", "rel").build()).toBe("g.V('alice').Out('follows', 'rel')")
    })

    it("writes an absent predicate as null when tags are given", () => {
      expect(g.vertices("alice").Out(undefined, "rel").build()).toBe("g.V('alice').Out(null, 'rel')")
    })

    it("JSON-encodes a plain object argument", () => {
      expect(g.vertices("alice").Out({ type: "follows", weight: 2 }).build()).toBe(
        'g.V(\'alice\').Out({"type": "follows", "weight": 2})',
      )
    })

    it("embeds a chain argument as its query text", () => {
      expect(g.vertices("alice").Out(g.vertices("status")).build()).toBe("g.V('alice').Out(g.V('status'))")
    })

    it("embeds numbers and booleans as written", () => {
      expect(g.vertices().Out(42).build()).toBe("g.V().Out(42)")
      expect(g.vertices().Out(true).build()).toBe("g.V().Out(true)")
    })

    it("writes a tag list as a bracketed list of quoted tags", () => {
      expect(g.vertices("alice").Out("follows", ["friends", "coworkers"]).build()).toBe(
        "g.V('alice').Out('follows', ['friends', 'coworkers'])",
      )
      expect(g.vertices("alice").Out(["follows", "likes"]).build()).toBe("g.V('alice').Out(['follows', 'likes'])")
    })

    it("writes an empty tag list as empty brackets", () => {
      expect(g.vertices("alice").Both("follows", []).build()).toBe("g.V('alice').Both('follows', [])")
    })

    it("supports In and Both with the same forms", () => {
      expect(g.vertices("bob").In("follows").build()).toBe("g.V('bob').In('follows')")
      expect(g.vertices("bob").In().build()).toBe("g.V('bob').In()")
      expect(g.vertices("bob").Both("follows", "t").build()).toBe("g.V('bob').Both('follows', 't')")
      expect(g.vertices("bob").Both().build()).toBe("g.V('bob').Both()")
    })
  })

  describe("formatBoundValue", () => {
    it("formats each kind of value", () => {
      expect(formatBoundValue("x")).toBe("'x'")
      expect(formatBoundValue(null)).toBe("null")
      expect(formatBoundValue(undefined)).toBe("null")
      expect(formatBoundValue({ a: [1, "b"] })).toBe('{"a": [1, "b"]}')
      expect(formatBoundValue(["a", "b"])).toBe("a,b")
      expect(formatBoundValue(7)).toBe("7")
    })
  })

  // ===========================================================================
  // FILTERS AND TAGS
  // ===========================================================================

  describe("Is", () => {
    it("quotes a single id", () => {
      expect(g.vertices().Is("bob").build()).toBe("g.V().Is('bob')")
    })

    it("joins several ids inside one pair of quotes", () => {
      expect(g.vertices().Is("bob", "carol").build()).toBe("g.V().Is('bob', 'carol')")
    })

    it("writes empty quotes without ids", () => {
      expect(g.vertices().Is().build()).toBe("g.V().Is('')")
    })
  })

  describe("Has", () => {
    it("quotes both arguments", () => {
      expect(g.vertices().Has("status", "cool_person").build()).toBe("g.V().Has('status', 'cool_person')")
    })
  })

  describe("Tag", () => {
    it("writes the tags as a JSON array", () => {
      expect(g.vertices("alice").Out().Tag("t1", "t2").build()).toBe('g.V(\'alice\').Out().Tag(["t1", "t2"])')
    })

    it("writes an empty array without tags", () => {
      expect(g.vertices().Tag().build()).toBe("g.V().Tag([])")
    })

    it("escapes quotes inside tag names", () => {
      expect(g.vertices().Tag('say "hi"').build()).toBe('g.V().Tag(["say \\"hi\\""])')
    })
  })

  describe("Back / Save", () => {
    it("quotes the tag for Back", () => {
      expect(g.vertices("alice").Tag("start").Out("follows").Back("start").build()).toBe(
        "g.V('alice').Tag([\"start\"]).Out('follows').Back('start')",
      )
    })

    it("quotes predicate and tag for Save", () => {
      expect(g.vertices("alice").Save("name", "n").build()).toBe("g.V('alice').Save('name', 'n')")
    })
  })

  // ===========================================================================
  // CHAINING
  // ===========================================================================

  describe("Chaining", () => {
    it("returns the same chain from every call", () => {
      const chain = g.vertices("alice")

      expect(chain.Out("follows")).toBe(chain)
      expect(chain.Is("bob")).toBe(chain)
      expect(chain.Tag("t")).toBe(chain)
      expect(chain.All()).toBe(chain)
    })

    it("appends exactly one step per call", () => {
      const chain = g.vertices("alice")
      expect(chain.steps).toHaveLength(1)

      chain.Out("follows").In().Has("a", "b")
      expect(chain.steps).toHaveLength(4)
      expect(chain.steps.map((step) => step.serialize())).toEqual([
        "g.V('alice')",
        "Out('follows')",
        "In()",
        "Has('a', 'b')",
      ])
    })

    it("builds the same text on every call", () => {
      const chain = g.vertices("alice").Out("follows")

      expect(chain.build()).toBe(chain.build())
      expect(String(chain)).toBe("g.V('alice').Out('follows')")
    })

    it("keeps separately built chains independent", () => {
      const first = g.vertices("alice")
      const second = g.vertices("alice")
      first.Out("follows")

      expect(second.build()).toBe("g.V('alice')")
    })
  })
})
