/**
 * Source analysis for submitted console input.
 *
 * Uses acorn to decide whether a submission is complete, incomplete (more lines needed) or
 * invalid, and to split a complete submission into top-level statements that the interpreter
 * runs one at a time. Statements containing top-level `await` are planned so that they can be
 * evaluated outside a module.
 */

import * as acorn from "acorn"

export interface DeclaratorPlan {
  /** Binding pattern source, e.g. `x` or `{ a, b }`. */
  readonly target: string
  readonly init: string | null
  readonly awaits: boolean
}

export type StatementPlan =
  | { readonly kind: "plain"; readonly source: string; readonly expression: boolean; readonly names: string[] }
  | { readonly kind: "await-expression"; readonly expression: string }
  | {
      readonly kind: "await-declaration"
      readonly declarationKind: string
      readonly declarators: DeclaratorPlan[]
      readonly names: string[]
    }
  | { readonly kind: "await-block"; readonly source: string }

export type SourceAnalysis =
  | { readonly status: "incomplete" }
  | { readonly status: "invalid"; readonly message: string }
  | { readonly status: "complete"; readonly statements: StatementPlan[] }

const PARSE_OPTIONS: acorn.Options = {
  ecmaVersion: "latest",
  sourceType: "script",
  allowAwaitOutsideFunction: true,
  allowHashBang: true,
}

const FUNCTION_TYPES = new Set(["FunctionDeclaration", "FunctionExpression", "ArrowFunctionExpression"])

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null

type AcornSyntaxError = SyntaxError & { pos: number }

const isAcornSyntaxError = (error: unknown): error is AcornSyntaxError =>
  error instanceof SyntaxError && "pos" in error && typeof error.pos === "number"

export const hasTopLevelAwait = (node: unknown): boolean => {
  if (Array.isArray(node)) return node.some(hasTopLevelAwait)
  if (!isRecord(node)) return false
  if (typeof node.type === "string") {
    if (FUNCTION_TYPES.has(node.type)) return false
    if (node.type === "AwaitExpression") return true
    if (node.type === "ForOfStatement" && node.await === true) return true
  }
  return Object.values(node).some(hasTopLevelAwait)
}

const identifierNames = (nodes: ReadonlyArray<{ readonly id: unknown }>): string[] =>
  nodes.flatMap(({ id }) => (isRecord(id) && id.type === "Identifier" && typeof id.name === "string" ? [id.name] : []))

const declaredNames = (node: acorn.Statement | acorn.ModuleDeclaration): string[] => {
  switch (node.type) {
    case "VariableDeclaration":
      return identifierNames(node.declarations)
    case "FunctionDeclaration":
    case "ClassDeclaration":
      return identifierNames([node])
    default:
      return []
  }
}

const planStatement = (source: string, node: acorn.Statement | acorn.ModuleDeclaration): StatementPlan => {
  const text = source.slice(node.start, node.end)
  if (!hasTopLevelAwait(node)) {
    return { kind: "plain", source: text, expression: node.type === "ExpressionStatement", names: declaredNames(node) }
  }
  if (node.type === "ExpressionStatement") {
    return { kind: "await-expression", expression: source.slice(node.expression.start, node.expression.end) }
  }
  if (node.type === "VariableDeclaration") {
    return {
      kind: "await-declaration",
      declarationKind: node.kind,
      declarators: node.declarations.map((declarator) => ({
        target: source.slice(declarator.id.start, declarator.id.end),
        init: declarator.init ? source.slice(declarator.init.start, declarator.init.end) : null,
        awaits: declarator.init ? hasTopLevelAwait(declarator.init) : false,
      })),
      names: declaredNames(node),
    }
  }
  return { kind: "await-block", source: text }
}

export const analyzeSource = (source: string): SourceAnalysis => {
  let program: acorn.Program
  try {
    program = acorn.parse(source, PARSE_OPTIONS)
  } catch (error) {
    if (!isAcornSyntaxError(error)) throw error
    // an error at the very end of the input means the statement simply is not finished yet
    const atEnd = error.pos >= source.trimEnd().length
    if (atEnd || /^Unterminated (template|comment)/.test(error.message)) {
      return { status: "incomplete" }
    }
    return { status: "invalid", message: error.message }
  }
  return { status: "complete", statements: program.body.map((node) => planStatement(source, node)) }
}

export const needsMoreInput = (source: string): boolean => analyzeSource(source).status === "incomplete"
