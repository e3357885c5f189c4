import { object } from '@optique/core/constructs'
import { constant } from '@optique/core/primitives'
import { optional } from '@optique/core/modifiers'
import { ErrInvalidExpressionSyntax, parseRule } from '@quill/rule-parser'
import { RulesConfig } from '../config.js'
import { configOption, expressionArg } from '../parsers.js'

export const checkCommand = object({
  cmd: constant('check' as const),
  expression: optional(expressionArg),
  config: configOption,
})

export interface CheckReport {
  output: string
  failures: number
}

/** The syntax error for `expression`, or undefined when it parses. */
function syntaxProblem(expression: string): string | undefined {
  try {
    parseRule(expression)
    return undefined
  } catch (err) {
    if (ErrInvalidExpressionSyntax.is(err)) return `${err.data.reason} (at position ${err.data.index})`
    throw err
  }
}

/**
 * Syntax-check one expression, or every rule in the rules file when no
 * expression is given.
 */
export function handleCheck(
  opts: { expression?: string; config?: string },
  cwd: string = process.cwd(),
): CheckReport {
  if (opts.expression !== undefined) {
    const problem = syntaxProblem(opts.expression)
    return problem === undefined
      ? { output: '✓ valid', failures: 0 }
      : { output: `✗ ${problem}`, failures: 1 }
  }

  const config = RulesConfig.require(opts.config, cwd)
  const lines: string[] = []
  let failures = 0
  for (const rule of config.rules) {
    const problem = syntaxProblem(rule.expression)
    if (problem === undefined) {
      lines.push(`✓ ${rule.name}`)
    } else {
      lines.push(`✗ ${rule.name}: ${problem}`)
      failures++
    }
  }
  lines.push(`${config.rules.length - failures} of ${config.rules.length} rule${config.rules.length !== 1 ? 's' : ''} valid`)
  return { output: lines.join('\n'), failures }
}
