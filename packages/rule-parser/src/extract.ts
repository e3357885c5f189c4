/**
 * Rule extraction: AST → structured rule (+ predicate).
 *
 * One recursive walk per statement group builds the statements and, in the
 * same pass, the predicate, so the two can never disagree about shape. The
 * statement group is threaded through the walk as a value: every step returns
 * a new group and nothing is shared between sibling calls.
 */

import type { ComparisonOp, ConditionalNode, RuleNode } from './ast.js'
import { parseRule } from './grammar.js'
import { noPredicates, type PredicateBuilder } from './predicate.js'
import { RuleOperator, StatementGroup, StructuredRule } from './rule.js'

export type Extraction<P> = {
  readonly rule: StructuredRule
  readonly predicate: P
}

type Walked<P> = {
  readonly statements: StatementGroup
  readonly predicate: P
}

/**
 * Extract the structured rule from a parsed expression. With a builder, also
 * compose the predicate of the `if` condition.
 */
export function extractRule(ast: ConditionalNode): { readonly rule: StructuredRule }
export function extractRule<P, A>(ast: ConditionalNode, builder: PredicateBuilder<P, A>): Extraction<P>
export function extractRule<P, A>(
  ast: ConditionalNode,
  builder?: PredicateBuilder<P, A>,
): { readonly rule: StructuredRule; readonly predicate?: P } {
  if (builder === undefined) {
    return { rule: extractWith(ast, noPredicates).rule }
  }
  return extractWith(ast, builder)
}

/** Parse and extract in one step. Empty text gives an empty rule. */
export function readRule(text: string): StructuredRule {
  if (text.trim() === '') return StructuredRule.empty()
  return extractRule(parseRule(text)).rule
}

function extractWith<P, A>(ast: ConditionalNode, builder: PredicateBuilder<P, A>): Extraction<P> {
  const condition = walk(ast.condition, 0, [], builder)
  const thenBranch = walk(ast.then, 0, [], noPredicates)
  const elseBranch = walk(ast.else, 0, [], noPredicates)

  return {
    rule: {
      if: condition.statements,
      then: thenBranch.statements,
      else: elseBranch.statements,
    },
    predicate: condition.predicate,
  }
}

function walk<P, A>(
  node: RuleNode,
  at: number,
  statements: StatementGroup,
  builder: PredicateBuilder<P, A>,
): Walked<P> {
  switch (node.type) {
    case 'logical': {
      const left = walk(node.left, at, statements, builder)
      // The right operand starts one past everything the left operand produced
      const next = left.statements.length
      const linked = StatementGroup.with(left.statements, next, { logicalOperator: node.operator })
      const right = walk(node.right, next, linked, builder)
      return {
        statements: right.statements,
        predicate: node.operator === 'and'
          ? builder.and(left.predicate, right.predicate)
          : builder.or(left.predicate, right.predicate),
      }
    }

    case 'comparison': {
      const field = node.left.name
      const value = node.right.raw
      const attribute = builder.attribute(field)
      return {
        statements: StatementGroup.with(statements, at, {
          field,
          operator: RuleOperator.fromComparison(node.op),
          value,
        }),
        predicate: compare(builder, node.op, attribute, value),
      }
    }

    case 'contains': {
      const field = node.target.name
      const attribute = builder.attribute(field)

      if (node.argument.type === 'list') {
        const members = node.argument.items.map((item) => item.raw.trim())
        return {
          statements: StatementGroup.with(statements, at, {
            field,
            operator: 'containsSet',
            value: members.join(','),
          }),
          predicate: builder.in(attribute, members),
        }
      }

      const value = node.argument.raw
      return {
        statements: StatementGroup.with(statements, at, {
          field,
          operator: 'containsSubstring',
          value,
        }),
        predicate: builder.like(attribute, `%${value}%`),
      }
    }

    case 'literal':
      // A bare `null` branch stands for "no value"
      if (!node.quoted && node.raw === 'null') {
        return unsupported(at, statements, builder)
      }
      return {
        statements: StatementGroup.with(statements, at, { value: node.raw }),
        predicate: builder.disjunction(),
      }

    case 'field':
    case 'list':
    case 'conditional':
      return unsupported(at, statements, builder)
  }
}

function compare<P, A>(
  builder: PredicateBuilder<P, A>,
  op: ComparisonOp,
  attribute: A,
  value: string,
): P {
  switch (op) {
    case '==': return builder.equal(attribute, value)
    case '!=': return builder.notEqual(attribute, value)
    case '>': return builder.greaterThan(attribute, value)
    case '<': return builder.lessThan(attribute, value)
  }
}

/** No handled leaf on this path: an empty statement and a predicate that never matches. */
function unsupported<P, A>(at: number, statements: StatementGroup, builder: PredicateBuilder<P, A>): Walked<P> {
  return {
    statements: StatementGroup.with(statements, at, {}),
    predicate: builder.disjunction(),
  }
}
