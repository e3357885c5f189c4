/**
 * @quill/rule-parser - Parse, extract, serialize and compile rule expressions.
 *
 * @example
 * ```ts
 * import { readRule, serializeRule, ruleToSql } from '@quill/rule-parser'
 *
 * const rule = readRule("status == 'active' ? 'enabled' : 'disabled'")
 * serializeRule(rule)                       // round-trips the text
 * ruleToSql("age > 18 ? 'adult' : 'minor'", 'users')
 * ```
 */

// AST
export type {
  RuleNode,
  ConditionalNode,
  ConditionNode,
  LogicalNode,
  LogicalOp,
  ComparisonNode,
  ComparisonOp,
  ContainsCallNode,
  FieldRefNode,
  ListLiteralNode,
  LiteralNode,
} from './ast.js'
export { childrenOf } from './ast.js'

// Parsing
export { parseRule } from './grammar.js'

// Structured rules
export { RuleOperator, LogicalOperator, StatementGroup, StructuredRule, ruleValues } from './rule.js'
export type { Statement, GroupKind, GroupName } from './rule.js'
export { extractRule, readRule } from './extract.js'
export type { Extraction } from './extract.js'
export { serializeRule } from './serialize.js'

// SQL fragments
export { toSql, ruleToSql } from './sql.js'

// Validation
export { validateLiteral, isSafeLiteral, isValidSyntax } from './validate.js'

// Predicates
export type { PredicateBuilder } from './predicate.js'
export { noPredicates } from './predicate.js'
export { recordPredicates } from './record-predicates.js'
export type { EntityRecord, AttributeReader, RecordPredicate } from './record-predicates.js'
export { whereClausePredicates } from './where-predicates.js'
export { evaluateRule } from './evaluate.js'

// Coercion
export { coerceLiteral, isNumericLiteral } from './coerce.js'

// Errors
export {
  ErrInvalidExpressionSyntax,
  ErrUnsafeLiteralValue,
  ErrUnsafeFieldName,
  ErrInvalidRuleShape,
} from './errors.js'
