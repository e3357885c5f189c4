/**
 * Rule serialization: structured rule → expression text.
 *
 * The inverse of extraction. Every literal written out passes the whitelist
 * first; one bad literal aborts the whole serialization.
 */

import { isNumericLiteral } from './coerce.js'
import { ErrUnsafeFieldName } from './errors.js'
import { LogicalOperator, StatementGroup, type Statement, type StructuredRule } from './rule.js'
import { validateLiteral } from './validate.js'

const QUESTION_MARK = ' ? '
const COLON = ' : '
const EMPTY_ELSE = 'null'
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

/**
 * Render a structured rule as expression text.
 *
 * Returns `""` when the `if` or `then` group is incomplete. An incomplete
 * `else` group is written as `null`.
 *
 * @throws ErrUnsafeLiteralValue when a literal is outside the whitelist
 * @throws ErrUnsafeFieldName when a field is not a plain identifier
 */
export function serializeRule(rule: StructuredRule): string {
  if (!StatementGroup.isComplete(rule.if, 'condition') || !StatementGroup.isComplete(rule.then, 'branch')) {
    return ''
  }

  const ruleIf = renderGroup(rule.if)
  const ruleThen = renderGroup(rule.then)
  const ruleElse = StatementGroup.isComplete(rule.else, 'branch') ? renderGroup(rule.else) : EMPTY_ELSE

  return ruleIf + QUESTION_MARK + ruleThen + COLON + ruleElse
}

function renderGroup(group: StatementGroup): string {
  let text = ''
  let first = true
  for (const statement of group) {
    if (StatementGroup.isEmpty(statement)) continue
    if (!first) {
      text += LogicalOperator.text(statement.logicalOperator ?? 'and')
    }
    text += renderStatement(statement)
    first = false
  }
  return text
}

function renderStatement(statement: Statement): string {
  const { operator } = statement
  const value = statement.value ?? ''

  // Literal branch
  if (operator === undefined) {
    return quote(value)
  }

  const field = checkField(statement.field ?? '')

  switch (operator) {
    case 'containsSet': {
      const members = value.split(',').map((member) => quote(member.trim()))
      return `{${members.join(',')}}.contains(${field})`
    }
    case 'containsSubstring':
      return `${field}.contains(${quote(value)})`
    case 'equals':
      return `${field} == ${quote(value)}`
    case 'notEquals':
      return `${field} != ${quote(value)}`
    case 'greaterThan':
      return `${field} > ${orderedLiteral(value)}`
    case 'lessThan':
      return `${field} < ${orderedLiteral(value)}`
  }
}

function quote(value: string): string {
  return `'${validateLiteral(value)}'`
}

/** Numbers are written bare so `age > 18` stays a numeric comparison. */
function orderedLiteral(value: string): string {
  return isNumericLiteral(value) ? validateLiteral(value) : quote(value)
}

function checkField(field: string): string {
  if (!IDENTIFIER.test(field)) {
    throw ErrUnsafeFieldName.create({ field })
  }
  return field
}
