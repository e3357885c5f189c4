/**
 * Text rendering for command results.
 */

import type { SqlFilterResult } from '@quill/core'
import type { GroupName, Statement, StructuredRule } from '@quill/rule-parser'
import type { OutputFormat } from './parsers.js'

const GROUPS: readonly GroupName[] = ['if', 'then', 'else']

function renderStatement(statement: Statement): string {
  const parts: string[] = []
  if (statement.logicalOperator) parts.push(statement.logicalOperator)
  if (statement.field !== undefined) parts.push(statement.field)
  if (statement.operator) parts.push(statement.operator)
  if (statement.value !== undefined) parts.push(`'${statement.value}'`)
  return parts.length > 0 ? parts.join(' ') : '(empty)'
}

export function renderRule(rule: StructuredRule, format: OutputFormat = 'text'): string {
  if (format === 'json') {
    return JSON.stringify(rule, null, 2)
  }

  const lines: string[] = []
  for (const name of GROUPS) {
    lines.push(`${name}:`)
    rule[name].forEach((statement, i) => {
      lines.push(`  ${i}: ${renderStatement(statement)}`)
    })
  }
  return lines.join('\n')
}

export function renderWhere(result: SqlFilterResult, format: OutputFormat = 'text'): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2)
  }
  return `WHERE ${result.sql}\nparams: ${JSON.stringify(result.params)}`
}
