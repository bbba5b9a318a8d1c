/** Names at the top level (`null`) or the members of the value at a dotted path. */
export type NameLookup = (path: string | null) => Promise<string[]>

export interface Completer {
  complete(line: string, lookup: NameLookup): Promise<string[]>
}

const TRAILING_REFERENCE = /(?:([A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*)\.)?([A-Za-z_$][\w$]*)?$/

/**
 * Completes the identifier or member access at the end of the line. Returns full candidate names
 * (not suffixes), sorted, without duplicates.
 */
export class NamespaceCompleter implements Completer {
  async complete(line: string, lookup: NameLookup): Promise<string[]> {
    const match = TRAILING_REFERENCE.exec(line)
    if (!match) return []
    const path = match[1] ?? null
    const prefix = match[2] ?? ""
    if (path === null && prefix === "") return []
    const names = await lookup(path)
    return [...new Set(names.filter((name) => name.startsWith(prefix)))].sort()
  }
}
