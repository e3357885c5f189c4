import { object } from '@optique/core/constructs'
import { constant } from '@optique/core/primitives'
import { readRule } from '@quill/rule-parser'
import { renderRule } from '../output.js'
import { expressionArg, outputOption, type OutputFormat } from '../parsers.js'

export const parseCommand = object({
  cmd: constant('parse' as const),
  expression: expressionArg,
  output: outputOption,
})

export function handleParse(opts: { expression: string; output?: OutputFormat }): string {
  return renderRule(readRule(opts.expression), opts.output ?? 'text')
}
