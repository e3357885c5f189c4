import { optional } from '@optique/core/modifiers'
import { argument, option } from '@optique/core/primitives'
import { choice, string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'

// Output format choice
export const outputFormat = choice(['text', 'json'] as const)

export type OutputFormat = 'text' | 'json'

// Common output option
export const outputOption = optional(option('-o', '--output', outputFormat, { description: message`Output format (text, json)` }))

export const configOption = optional(option('-c', '--config', string({ metavar: 'FILE' }), {
  description: message`Rules file (defaults to the nearest quill.yaml)`,
}))

export const expressionArg = argument(string({ metavar: 'EXPR' }), {
  description: message`Rule expression, e.g. "status == 'active' ? 'on' : 'off'"`,
})
