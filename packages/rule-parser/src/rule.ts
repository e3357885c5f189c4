/**
 * Structured rule — the typed, serializable form of a parsed rule.
 *
 * A rule has three ordered statement groups (`if`, `then`, `else`). A statement's
 * position in its group is its ordinal and encodes left-to-right source order;
 * a connective is stored on the statement that follows it.
 *
 * @example
 * ```ts
 * // age > 18 and country == 'US' ? 'eligible' : 'ineligible'
 * const rule: StructuredRule = {
 *   if: [
 *     { field: 'age', operator: 'greaterThan', value: '18' },
 *     { logicalOperator: 'and', field: 'country', operator: 'equals', value: 'US' },
 *   ],
 *   then: [{ value: 'eligible' }],
 *   else: [{ value: 'ineligible' }],
 * }
 * ```
 */

import { StaticTypeCompanion } from '@quill/core'
import type { ComparisonOp, LogicalOp } from './ast.js'
import { ErrInvalidRuleShape } from './errors.js'

// ============================================================================
// Operators
// ============================================================================

export type RuleOperator =
  | 'equals'
  | 'notEquals'
  | 'greaterThan'
  | 'lessThan'
  | 'containsSubstring'
  | 'containsSet'

const RULE_OPERATORS: readonly RuleOperator[] = [
  'equals', 'notEquals', 'greaterThan', 'lessThan', 'containsSubstring', 'containsSet',
]

export const RuleOperator = StaticTypeCompanion({
  all: RULE_OPERATORS,

  is(value: unknown): value is RuleOperator {
    return RULE_OPERATORS.some((op) => op === value)
  },

  /** Map a comparison token to its operator. */
  fromComparison(op: ComparisonOp): RuleOperator {
    switch (op) {
      case '==': return 'equals'
      case '!=': return 'notEquals'
      case '>': return 'greaterThan'
      case '<': return 'lessThan'
    }
  },
})

export type LogicalOperator = LogicalOp

export const LogicalOperator = StaticTypeCompanion({
  is(value: unknown): value is LogicalOperator {
    return value === 'and' || value === 'or'
  },

  /** Expression text joining a statement to the previous one. */
  text(op: LogicalOperator): string {
    return op === 'and' ? ' and ' : ' or '
  },
})

// ============================================================================
// Statements
// ============================================================================

export type Statement = {
  readonly logicalOperator?: LogicalOperator
  readonly field?: string
  readonly operator?: RuleOperator
  /** For `containsSet`, the member literals joined with commas. */
  readonly value?: string
}

export type StatementGroup = readonly Statement[]

export type GroupKind = 'condition' | 'branch'

export const StatementGroup = StaticTypeCompanion({
  /**
   * Copy-on-write update: returns a new group with `patch` merged into the
   * statement at `index`. Missing ordinals up to `index` are filled with empty
   * statements.
   */
  with(group: StatementGroup, index: number, patch: Statement): StatementGroup {
    const next = [...group]
    while (next.length <= index) next.push({})
    next[index] = { ...next[index], ...patch }
    return next
  },

  /**
   * A condition group is complete when its first statement has an operator;
   * a branch group also accepts a bare literal value.
   */
  isComplete(group: StatementGroup, kind: GroupKind): boolean {
    const first = group[0]
    if (first === undefined) return false
    if (first.operator !== undefined) return true
    return kind === 'branch' && first.value !== undefined
  },

  /** True when a statement carries neither an operator nor a value. */
  isEmpty(statement: Statement): boolean {
    return statement.operator === undefined && statement.value === undefined
  },
})

// ============================================================================
// Structured rule
// ============================================================================

export type StructuredRule = {
  readonly if: StatementGroup
  readonly then: StatementGroup
  readonly else: StatementGroup
}

export type GroupName = keyof StructuredRule

const GROUP_NAMES: readonly GroupName[] = ['if', 'then', 'else']

export const StructuredRule = StaticTypeCompanion({
  /** A rule with one empty statement per group. */
  empty(): StructuredRule {
    return { if: [{}], then: [{}], else: [{}] }
  },

  /**
   * Validate a plain record (e.g. parsed JSON) into a StructuredRule.
   *
   * Groups may be arrays of statements or records keyed by ordinal
   * (`{ "0": {...}, "1": {...} }`). Ordinal records are read in key order.
   * A missing `else` group becomes an empty one.
   *
   * @throws ErrInvalidRuleShape
   */
  fromJSON(value: unknown): StructuredRule {
    if (!isRecord(value)) {
      throw ErrInvalidRuleShape.create({ path: '$', reason: 'expected an object' })
    }
    const [ifGroup, thenGroup, elseGroup] = GROUP_NAMES.map((name) =>
      readGroup(value[name], `$.${name}`, name === 'else'))
    return { if: ifGroup, then: thenGroup, else: elseGroup }
  },
})

/** Every value the rule mentions; set members are split apart. */
export function ruleValues(rule: StructuredRule): Set<string> {
  const values = new Set<string>()
  for (const name of GROUP_NAMES) {
    for (const statement of rule[name]) {
      if (statement.value === undefined) continue
      for (const part of statement.value.split(',')) values.add(part)
    }
  }
  return values
}

// ============================================================================
// JSON reading (internal)
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readGroup(value: unknown, path: string, optional: boolean): StatementGroup {
  if (value === undefined || value === null) {
    if (optional) return [{}]
    throw ErrInvalidRuleShape.create({ path, reason: 'group is missing' })
  }

  if (Array.isArray(value)) {
    return value.map((entry, i) => readStatement(entry, `${path}[${i}]`))
  }

  if (isRecord(value)) {
    const entries = Object.entries(value)
    for (const [key] of entries) {
      if (!/^\d+$/.test(key)) {
        throw ErrInvalidRuleShape.create({ path: `${path}.${key}`, reason: 'statement keys must be ordinals' })
      }
    }
    // Only the order of the ordinals matters; gaps are closed up
    const group = entries
      .sort(([a], [b]) => Number(a) - Number(b))
      .map(([key, entry]) => readStatement(entry, `${path}.${key}`))
    return group.length > 0 ? group : [{}]
  }

  throw ErrInvalidRuleShape.create({ path, reason: 'expected an array or an ordinal-keyed object' })
}

function readStatement(value: unknown, path: string): Statement {
  if (!isRecord(value)) {
    throw ErrInvalidRuleShape.create({ path, reason: 'expected a statement object' })
  }

  const statement: {
    logicalOperator?: LogicalOperator
    field?: string
    operator?: RuleOperator
    value?: string
  } = {}

  const { logicalOperator, field, operator, value: literal } = value

  if (logicalOperator !== undefined && logicalOperator !== null) {
    if (!LogicalOperator.is(logicalOperator)) {
      throw ErrInvalidRuleShape.create({ path: `${path}.logicalOperator`, reason: 'expected "and" or "or"' })
    }
    statement.logicalOperator = logicalOperator
  }
  if (field !== undefined && field !== null) {
    if (typeof field !== 'string') {
      throw ErrInvalidRuleShape.create({ path: `${path}.field`, reason: 'expected a string' })
    }
    statement.field = field
  }
  if (operator !== undefined && operator !== null) {
    if (!RuleOperator.is(operator)) {
      throw ErrInvalidRuleShape.create({
        path: `${path}.operator`,
        reason: `expected one of ${RULE_OPERATORS.join(', ')}`,
      })
    }
    statement.operator = operator
  }
  if (literal !== undefined && literal !== null) {
    if (typeof literal !== 'string' && typeof literal !== 'number') {
      throw ErrInvalidRuleShape.create({ path: `${path}.value`, reason: 'expected a string' })
    }
    statement.value = String(literal)
  }

  return statement
}
