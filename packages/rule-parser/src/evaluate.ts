/**
 * Rule evaluation against a single entity record.
 */

import type { LiteralNode } from './ast.js'
import { extractRule } from './extract.js'
import { parseRule } from './grammar.js'
import { recordPredicates, type EntityRecord } from './record-predicates.js'

/**
 * Returns the `then` value when the condition holds for `entity`, the `else`
 * value otherwise. A bare `null` branch evaluates to `null`.
 *
 * @throws ErrInvalidExpressionSyntax
 */
export function evaluateRule(text: string, entity: EntityRecord): string | null {
  const ast = parseRule(text)
  const { predicate } = extractRule(ast, recordPredicates)
  return branchValue(predicate(entity) ? ast.then : ast.else)
}

function branchValue(branch: LiteralNode): string | null {
  if (!branch.quoted && branch.raw === 'null') return null
  return branch.raw
}
