import { or } from '@optique/core/constructs'
import { command } from '@optique/core/primitives'
import { message } from '@optique/core/message'
import { print, printError, run } from '@optique/run'
import * as util from 'node:util'
import { QuillError } from '@quill/core'

import { parseCommand, handleParse } from './commands/parse.js'
import { formatCommand, handleFormat } from './commands/format.js'
import { sqlCommand, handleSql } from './commands/sql.js'
import { checkCommand, handleCheck } from './commands/check.js'
import { evalCommand, handleEval } from './commands/eval.js'
import { whereCommand, handleWhere } from './commands/where.js'

// Main parser with all commands
const parser = or(
  command('parse', parseCommand, { description: message`Show the structured form of a rule` }),
  command('format', formatCommand, { description: message`Write a structured rule (JSON) as expression text` }),
  command('sql', sqlCommand, { description: message`Generate a SELECT CASE WHEN fragment` }),
  command('check', checkCommand, { description: message`Check rule syntax` }),
  command('eval', evalCommand, { description: message`Evaluate a rule against an entity` }),
  command('where', whereCommand, { description: message`Generate a parameterized WHERE clause for the condition` }),
)

const result = run(parser, {
  programName: 'quill',
  version: '0.1.0',
  description: message`Parse, format and compile conditional rule expressions`,
  help: 'both',
})

try {
  switch (result.cmd) {
    case 'parse':
      console.log(handleParse(result))
      break
    case 'format':
      console.log(handleFormat(result))
      break
    case 'sql':
      console.log(handleSql(result))
      break
    case 'check': {
      const report = handleCheck(result)
      console.log(report.output)
      if (report.failures > 0) {
        printError(message`${report.failures.toString()} expression(s) failed to parse`, { exitCode: 1 })
      } else {
        print(message`All expressions parse`)
      }
      break
    }
    case 'eval':
      console.log(handleEval(result))
      break
    case 'where':
      console.log(handleWhere(result))
      break
  }
} catch (err) {
  const color = process.stderr.isTTY ?? false
  console.error(QuillError.isQuillError(err) ? err.prettyPrint({ color }) : util.inspect(err))
  process.exit(1)
}
