/**
 * Arcsecond grammar for rule expressions.
 *
 * Grammar:
 *   rule       := condition '?' literal ':' literal
 *   condition  := predicate ((and | or) predicate)*
 *   predicate  := field '.contains(' (list | literal) ')'
 *               | list '.contains(' field ')'
 *               | field compareOp literal
 *   compareOp  := '==' | '!=' | '>' | '<'
 *   literal    := quotedString | bareToken
 *   list       := '{' literal (',' literal)* '}'
 *   field      := identifier
 *
 * Every production rebuilds the exact text it consumed, so nodes carry their
 * verbatim `source`.
 */

import {
  str,
  char,
  choice,
  many,
  coroutine,
  optionalWhitespace,
  whitespace,
  regex,
  endOfInput,
  type Parser,
} from 'arcsecond'

import type {
  ComparisonNode,
  ComparisonOp,
  ConditionNode,
  ConditionalNode,
  ContainsCallNode,
  FieldRefNode,
  ListLiteralNode,
  LiteralNode,
  LogicalOp,
} from './ast.js'
import { ErrInvalidExpressionSyntax } from './errors.js'

/** Join consumed pieces back into source text. Optional whitespace may come back as null. */
function span(...parts: (string | null)[]): string {
  return parts.map((part) => part ?? '').join('')
}

// ============================================================================
// Atoms
// ============================================================================

/** Quoted literal: '...' — no escapes, the quote character cannot appear inside. */
const quotedLiteral: Parser<LiteralNode> = regex(/^'[^']*'/).map(
  (text): LiteralNode => ({ type: 'literal', raw: text.slice(1, -1), quoted: true, source: text })
)

/** Bare literal: numbers, words, dotted or dashed tokens. */
const bareLiteral: Parser<LiteralNode> = regex(/^[A-Za-z0-9_.\-]+/).map(
  (text): LiteralNode => ({ type: 'literal', raw: text, quoted: false, source: text })
)

const literal: Parser<LiteralNode> = choice([quotedLiteral, bareLiteral])

/** Field names: letters, digits, underscores; starts with a letter or underscore. */
const fieldRef: Parser<FieldRefNode> = regex(/^[A-Za-z_][A-Za-z0-9_]*/).map(
  (name): FieldRefNode => ({ type: 'field', name, source: name })
)

/** Comparison operators. No operator is a prefix of another. */
const compareOp: Parser<ComparisonOp> = choice([
  str('==').map((): ComparisonOp => '=='),
  str('!=').map((): ComparisonOp => '!='),
  str('>').map((): ComparisonOp => '>'),
  str('<').map((): ComparisonOp => '<'),
])

type Keyword = { readonly operator: LogicalOp; readonly text: string }

/** Logical connectives (lower or upper case). Normalised to lowercase in the AST. */
const logicalOp: Parser<Keyword> = choice([
  choice([str('and'), str('AND')]).map((text): Keyword => ({ operator: 'and', text })),
  choice([str('or'), str('OR')]).map((text): Keyword => ({ operator: 'or', text })),
])

// ============================================================================
// Grammar
// ============================================================================

/** `{ 'a', 'b' }` */
const listLiteral: Parser<ListLiteralNode> = coroutine((run): ListLiteralNode => {
  const open = run(char('{'))
  const lead = run(optionalWhitespace)
  const first = run(literal)
  const rest = run(many(coroutine((run2): { text: string; item: LiteralNode } => {
    const before = run2(optionalWhitespace)
    const comma = run2(char(','))
    const after = run2(optionalWhitespace)
    const item = run2(literal)
    return { text: span(before, comma, after, item.source), item }
  })))
  const trail = run(optionalWhitespace)
  const close = run(char('}'))

  return {
    type: 'list',
    items: [first, ...rest.map((entry) => entry.item)],
    source: span(open, lead, first.source, ...rest.map((entry) => entry.text), trail, close),
  }
})

/** `.contains(` with the whitespace inside the parenthesis. */
const containsOpen: Parser<string> = coroutine((run): string => {
  const call = run(str('.contains'))
  const gap = run(optionalWhitespace)
  const paren = run(char('('))
  const inner = run(optionalWhitespace)
  return span(call, gap, paren, inner)
})

const containsClose: Parser<string> = coroutine((run): string => {
  const inner = run(optionalWhitespace)
  const paren = run(char(')'))
  return span(inner, paren)
})

/** `field.contains('x')` (substring) or `field.contains({'a','b'})` (set membership). */
const fieldContains: Parser<ContainsCallNode> = coroutine((run): ContainsCallNode => {
  const target = run(fieldRef)
  const open = run(containsOpen)
  const argument = run(choice([listLiteral, literal]))
  const close = run(containsClose)

  return {
    type: 'contains',
    target,
    argument,
    source: span(target.source, open, argument.source, close),
  }
})

/** `{'a','b'}.contains(field)` — set membership spelled list-first. */
const listContains: Parser<ContainsCallNode> = coroutine((run): ContainsCallNode => {
  const argument = run(listLiteral)
  const open = run(containsOpen)
  const target = run(fieldRef)
  const close = run(containsClose)

  return {
    type: 'contains',
    target,
    argument,
    source: span(argument.source, open, target.source, close),
  }
})

/** A comparison: field op literal */
const comparison: Parser<ComparisonNode> = coroutine((run): ComparisonNode => {
  const left = run(fieldRef)
  const before = run(optionalWhitespace)
  const op = run(compareOp)
  const after = run(optionalWhitespace)
  const right = run(literal)

  return {
    type: 'comparison',
    op,
    left,
    right,
    source: span(left.source, before, op, after, right.source),
  }
})

const predicate: Parser<ComparisonNode | ContainsCallNode> = choice([fieldContains, listContains, comparison])

type Link = { readonly operator: LogicalOp; readonly text: string; readonly right: ComparisonNode | ContainsCallNode }

/** ` and <predicate>` — the keyword needs whitespace on both sides. */
const link: Parser<Link> = coroutine((run): Link => {
  const before = run(whitespace)
  const keyword = run(logicalOp)
  const after = run(whitespace)
  const right = run(predicate)
  return { operator: keyword.operator, text: span(before, keyword.text, after), right }
})

/** Predicates joined by AND/OR, left-associative. */
const condition: Parser<ConditionNode> = coroutine((run): ConditionNode => {
  const first = run(predicate)
  const rest = run(many(link))

  let node: ConditionNode = first
  for (const { operator, text, right } of rest) {
    node = {
      type: 'logical',
      operator,
      left: node,
      right,
      source: span(node.source, text, right.source),
    }
  }
  return node
})

const rule: Parser<ConditionalNode> = coroutine((run): ConditionalNode => {
  const test = run(condition)
  const beforeQuestion = run(optionalWhitespace)
  const question = run(char('?'))
  const afterQuestion = run(optionalWhitespace)
  const thenBranch = run(literal)
  const beforeColon = run(optionalWhitespace)
  const colon = run(char(':'))
  const afterColon = run(optionalWhitespace)
  const elseBranch = run(literal)
  run(endOfInput)

  return {
    type: 'conditional',
    condition: test,
    then: thenBranch,
    else: elseBranch,
    source: span(
      test.source, beforeQuestion, question, afterQuestion,
      thenBranch.source, beforeColon, colon, afterColon, elseBranch.source,
    ),
  }
})

// ============================================================================
// Public API
// ============================================================================

/**
 * Parse a rule expression string into a ConditionalNode AST.
 *
 * @throws ErrInvalidExpressionSyntax on malformed input
 */
export function parseRule(input: string): ConditionalNode {
  const trimmed = input.trim()
  if (!trimmed) {
    throw ErrInvalidExpressionSyntax.create({
      expression: input,
      reason: 'Empty rule expression',
      index: 0,
    })
  }

  const result = rule.run(trimmed)

  if (result.isError) {
    // Positions are reported against the untrimmed input
    const offset = input.length - input.trimStart().length
    throw ErrInvalidExpressionSyntax.create({
      expression: input,
      reason: result.error,
      index: offset + result.index,
    })
  }

  return result.result
}
