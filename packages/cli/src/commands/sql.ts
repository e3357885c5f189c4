import { object } from '@optique/core/constructs'
import { constant, option } from '@optique/core/primitives'
import { optional } from '@optique/core/modifiers'
import { string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import { ruleToSql } from '@quill/rule-parser'
import { RulesConfig } from '../config.js'
import { ErrMissingTable } from '../errors.js'
import { configOption, expressionArg } from '../parsers.js'

export const sqlCommand = object({
  cmd: constant('sql' as const),
  expression: expressionArg,
  table: optional(option('-t', '--table', string({ metavar: 'TABLE' }), {
    description: message`Table for the FROM clause (defaults to the rules file's table)`,
  })),
  config: configOption,
})

export function handleSql(
  opts: { expression: string; table?: string; config?: string },
  cwd: string = process.cwd(),
): string {
  const table = opts.table ?? RulesConfig.resolve(opts.config, cwd)?.table
  if (table === undefined) {
    throw ErrMissingTable.create({})
  }
  return ruleToSql(opts.expression, table)
}
