import { object } from '@optique/core/constructs'
import { constant, option } from '@optique/core/primitives'
import { string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import { evaluateRule, type EntityRecord } from '@quill/rule-parser'
import { ErrInvalidEntity } from '../errors.js'
import { expressionArg } from '../parsers.js'

export const evalCommand = object({
  cmd: constant('eval' as const),
  expression: expressionArg,
  entity: option('-e', '--entity', string({ metavar: 'JSON' }), {
    description: message`Entity attributes as a JSON object`,
  }),
})

function parseEntity(json: string): EntityRecord {
  let value: unknown
  try {
    value = JSON.parse(json)
  } catch (err) {
    throw ErrInvalidEntity.create({ reason: err instanceof Error ? err.message : String(err) }, err)
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw ErrInvalidEntity.create({ reason: 'expected a JSON object' })
  }
  return Object.fromEntries(Object.entries(value))
}

/** The branch value the rule picks for the entity; `null` prints as `null`. */
export function handleEval(opts: { expression: string; entity: string }): string {
  return evaluateRule(opts.expression, parseEntity(opts.entity)) ?? 'null'
}
