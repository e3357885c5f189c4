/**
 * SQL fragment generation.
 *
 * Works directly on the AST: the condition and both branches are copied into a
 * `SELECT CASE WHEN ... THEN ... ELSE ... FROM <table>` fragment as their
 * verbatim source text. No quoting, escaping or operator translation happens
 * here, and the table name is inserted as given.
 */

import { childrenOf, type RuleNode } from './ast.js'
import { parseRule } from './grammar.js'

/** Returns `""` unless `ast` has exactly three children (condition, then, else). */
export function toSql(ast: RuleNode, tableName: string): string {
  const children = childrenOf(ast)
  if (children.length !== 3) return ''

  const [condition, thenBranch, elseBranch] = children
  return `SELECT CASE WHEN ${condition.source} THEN ${thenBranch.source} ELSE ${elseBranch.source} FROM ${tableName}`
}

/** Parse `text` and generate its fragment. */
export function ruleToSql(text: string, tableName: string): string {
  return toSql(parseRule(text), tableName)
}
