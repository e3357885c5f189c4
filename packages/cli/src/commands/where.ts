import { object } from '@optique/core/constructs'
import { constant } from '@optique/core/primitives'
import { SqlWhereRenderer } from '@quill/core'
import { extractRule, parseRule, whereClausePredicates } from '@quill/rule-parser'
import { renderWhere } from '../output.js'
import { expressionArg, outputOption, type OutputFormat } from '../parsers.js'

export const whereCommand = object({
  cmd: constant('where' as const),
  expression: expressionArg,
  output: outputOption,
})

/** Parameterized WHERE clause for the rule's condition. */
export function handleWhere(opts: { expression: string; output?: OutputFormat }): string {
  const { predicate } = extractRule(parseRule(opts.expression), whereClausePredicates)
  return renderWhere(new SqlWhereRenderer().render(predicate), opts.output ?? 'text')
}
