/**
 * In-memory predicates over plain entity records.
 *
 * Literals are compared with the attribute's runtime type: numbers and
 * booleans against the coerced literal, strings as text. A missing (null or
 * undefined) attribute matches nothing, not even `!=`.
 */

import { coerceLiteral, isNumericLiteral } from './coerce.js'
import type { PredicateBuilder } from './predicate.js'

export type EntityRecord = Readonly<Record<string, unknown>>
export type AttributeReader = (entity: EntityRecord) => unknown
export type RecordPredicate = (entity: EntityRecord) => boolean

function matchesLiteral(actual: unknown, literal: string): boolean {
  if (actual === null || actual === undefined) return false
  if (typeof actual === 'number' || typeof actual === 'boolean') {
    return coerceLiteral(literal) === actual
  }
  return String(actual) === literal
}

/** Sign of `actual - literal`, or undefined when the two cannot be ordered. */
function compareToLiteral(actual: unknown, literal: string): number | undefined {
  const coerced = coerceLiteral(literal)
  if (typeof actual === 'number') {
    return typeof coerced === 'number' ? Math.sign(actual - coerced) : undefined
  }
  if (typeof actual === 'string') {
    if (typeof coerced === 'number' && isNumericLiteral(actual)) {
      return Math.sign(Number(actual) - coerced)
    }
    return actual < literal ? -1 : actual > literal ? 1 : 0
  }
  return undefined
}

function likeToRegExp(pattern: string): RegExp {
  let source = ''
  for (const ch of pattern) {
    if (ch === '%') source += '.*'
    else if (ch === '_') source += '.'
    else source += ch.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
  }
  return new RegExp(`^${source}$`, 's')
}

export const recordPredicates: PredicateBuilder<RecordPredicate, AttributeReader> = {
  attribute: (name) => (entity) => entity[name],

  equal: (read, value) => (entity) => matchesLiteral(read(entity), value),

  notEqual: (read, value) => (entity) => {
    const actual = read(entity)
    return actual !== null && actual !== undefined && !matchesLiteral(actual, value)
  },

  greaterThan: (read, value) => (entity) => (compareToLiteral(read(entity), value) ?? 0) > 0,

  lessThan: (read, value) => (entity) => (compareToLiteral(read(entity), value) ?? 0) < 0,

  like: (read, pattern) => {
    const re = likeToRegExp(pattern)
    return (entity) => {
      const actual = read(entity)
      return (typeof actual === 'string' || typeof actual === 'number') && re.test(String(actual))
    }
  },

  in: (read, values) => (entity) => {
    const actual = read(entity)
    return values.some((value) => matchesLiteral(actual, value))
  },

  and: (left, right) => (entity) => left(entity) && right(entity),

  or: (left, right) => (entity) => left(entity) || right(entity),

  disjunction: () => () => false,
}
