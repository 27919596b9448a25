import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { parseObjectList } from "../../src/core/object-list.js"

describe("parseObjectList", () => {
  it.effect("trims each line and keeps blank lines", () =>
    Effect.sync(() => {
      expect(parseObjectList("  a.o\n\nb.o  \n")).toEqual(["a.o", "", "b.o"])
    }))

  it.effect("does not add an entry for the final line terminator", () =>
    Effect.sync(() => {
      expect(parseObjectList("a.o\nb.o")).toEqual(["a.o", "b.o"])
      expect(parseObjectList("a.o\n\n")).toEqual(["a.o", ""])
    }))

  it.effect("strips carriage returns of CRLF files", () =>
    Effect.sync(() => {
      expect(parseObjectList("a.o\r\nb.o\r\n")).toEqual(["a.o", "b.o"])
    }))

  it.effect("splits lines ended by a bare carriage return", () =>
    Effect.sync(() => {
      expect(parseObjectList("a.o\rb.o\r")).toEqual(["a.o", "b.o"])
      expect(parseObjectList("a.o\r\rb.o\nc.o")).toEqual(["a.o", "", "b.o", "c.o"])
    }))

  it.effect("yields nothing for an empty file", () =>
    Effect.sync(() => {
      expect(parseObjectList("")).toEqual([])
    }))
})
