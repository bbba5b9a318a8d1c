import { describe, it, expect, vi } from "vitest"
import { NamespaceCompleter } from "../completer.js"

const NAMES: Record<string, string[]> = {
  "": ["process", "print", "items", "Array", "print"],
  items: ["push", "pop", "length", "map"],
  "a.b": ["zeta", "alpha"],
}

const createLookup = () => vi.fn(async (path: string | null) => NAMES[path ?? ""] ?? [])

describe("NamespaceCompleter", () => {
  const completer = new NamespaceCompleter()

  it("completes top-level names by prefix", async () => {
    const lookup = createLookup()
    await expect(completer.complete("pr", lookup)).resolves.toEqual(["print", "process"])
    expect(lookup).toHaveBeenCalledWith(null)
  })

  it("completes members of the trailing path", async () => {
    const lookup = createLookup()
    await expect(completer.complete("x = items.p", lookup)).resolves.toEqual(["pop", "push"])
    expect(lookup).toHaveBeenCalledWith("items")
  })

  it("lists every member after a trailing dot", async () => {
    const lookup = createLookup()
    await expect(completer.complete("a.b.", lookup)).resolves.toEqual(["alpha", "zeta"])
  })

  it("offers nothing without a reference to complete", async () => {
    const lookup = createLookup()
    await expect(completer.complete("1 + ", lookup)).resolves.toEqual([])
    await expect(completer.complete("", lookup)).resolves.toEqual([])
    expect(lookup).not.toHaveBeenCalled()
  })
})
