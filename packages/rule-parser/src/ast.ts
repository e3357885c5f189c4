/**
 * AST types for parsed rule expressions.
 *
 * The parser produces this tree; downstream consumers (the rule extractor and
 * the SQL fragment generator) walk it. Every node keeps the exact source text
 * it was parsed from.
 */

/** A literal — carries the text between the quotes (or the bare token) and whether it was quoted. */
export type LiteralNode = {
  readonly type: 'literal'
  readonly raw: string
  readonly quoted: boolean
  readonly source: string
}

/** A reference to an entity attribute. */
export type FieldRefNode = {
  readonly type: 'field'
  readonly name: string
  readonly source: string
}

/** Brace-delimited literal list: `{'a','b'}`. */
export type ListLiteralNode = {
  readonly type: 'list'
  readonly items: readonly LiteralNode[]
  readonly source: string
}

/** Comparison tokens recognised in the grammar. */
export type ComparisonOp = '==' | '!=' | '>' | '<'

/** A single `field op literal` comparison. */
export type ComparisonNode = {
  readonly type: 'comparison'
  readonly op: ComparisonOp
  readonly left: FieldRefNode
  readonly right: LiteralNode
  readonly source: string
}

/** `field.contains(literal)` or `field.contains({...})`. */
export type ContainsCallNode = {
  readonly type: 'contains'
  readonly target: FieldRefNode
  readonly argument: LiteralNode | ListLiteralNode
  readonly source: string
}

export type LogicalOp = 'and' | 'or'

/** AND / OR connective joining two sub-conditions. */
export type LogicalNode = {
  readonly type: 'logical'
  readonly operator: LogicalOp
  readonly left: ConditionNode
  readonly right: ConditionNode
  readonly source: string
}

/** `condition ? then : else` — the top-level node of every rule. */
export type ConditionalNode = {
  readonly type: 'conditional'
  readonly condition: ConditionNode
  readonly then: LiteralNode
  readonly else: LiteralNode
  readonly source: string
}

/** Anything that can stand left of the `?`. */
export type ConditionNode = ComparisonNode | ContainsCallNode | LogicalNode

/** Every node kind the parser produces. */
export type RuleNode =
  | ConditionalNode
  | LogicalNode
  | ComparisonNode
  | ContainsCallNode
  | FieldRefNode
  | ListLiteralNode
  | LiteralNode

/** Direct children of a node, in source order. */
export function childrenOf(node: RuleNode): readonly RuleNode[] {
  switch (node.type) {
    case 'conditional':
      return [node.condition, node.then, node.else]
    case 'logical':
      return [node.left, node.right]
    case 'comparison':
      return [node.left, node.right]
    case 'contains':
      return [node.target, node.argument]
    case 'list':
      return node.items
    case 'field':
    case 'literal':
      return []
  }
}
