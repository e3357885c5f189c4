import * as fs from 'node:fs'
import * as path from 'node:path'
import { object } from '@optique/core/constructs'
import { argument, constant } from '@optique/core/primitives'
import { string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import { StructuredRule, serializeRule } from '@quill/rule-parser'
import { ErrFileNotFound, ErrIncompleteRule, ErrInvalidRuleFile } from '../errors.js'

export const formatCommand = object({
  cmd: constant('format' as const),
  file: argument(string({ metavar: 'FILE' }), { description: message`JSON file holding a structured rule` }),
})

/** Read a structured rule from JSON and write it back as expression text. */
export function handleFormat(opts: { file: string }, cwd: string = process.cwd()): string {
  const filePath = path.resolve(cwd, opts.file)
  if (!fs.existsSync(filePath)) {
    throw ErrFileNotFound.create({ file: opts.file })
  }

  let json: unknown
  try {
    json = JSON.parse(fs.readFileSync(filePath, 'utf-8'))
  } catch (err) {
    throw ErrInvalidRuleFile.create({ file: opts.file, reason: err instanceof Error ? err.message : String(err) }, err)
  }

  const text = serializeRule(StructuredRule.fromJSON(json))
  if (text === '') {
    throw ErrIncompleteRule.create({ file: opts.file })
  }
  return text
}
