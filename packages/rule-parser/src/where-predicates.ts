/**
 * Predicates as WhereClause filter trees.
 *
 * Same-kind groups are flattened, so `a and b and c` becomes one AND group of
 * three leaves rather than nested pairs.
 */

import { WhereClause } from '@quill/core'
import type { PredicateBuilder } from './predicate.js'

function group(kind: 'and' | 'or', left: WhereClause, right: WhereClause): WhereClause {
  const clauses = [left, right].flatMap((clause) =>
    !WhereClause.isLeaf(clause) && clause.kind === kind ? clause.clauses : [clause])
  return kind === 'and' ? WhereClause.and(...clauses) : WhereClause.or(...clauses)
}

export const whereClausePredicates: PredicateBuilder<WhereClause, string> = {
  attribute: (name) => name,
  equal: (field, value) => ({ field, op: '=', value }),
  notEqual: (field, value) => ({ field, op: '!=', value }),
  greaterThan: (field, value) => ({ field, op: '>', value }),
  lessThan: (field, value) => ({ field, op: '<', value }),
  like: (field, pattern) => ({ field, op: 'like', value: pattern }),
  in: (field, values) => ({ field, op: 'in', value: [...values] }),
  and: (left, right) => group('and', left, right),
  or: (left, right) => group('or', left, right),
  disjunction: () => WhereClause.none(),
}
