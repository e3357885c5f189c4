import { afterEach, beforeEach, describe, test, expect } from 'vitest'
import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { ErrInvalidRuleShape } from '@quill/rule-parser'
import { handleParse } from '../commands/parse.js'
import { handleFormat } from '../commands/format.js'
import { handleSql } from '../commands/sql.js'
import { handleCheck } from '../commands/check.js'
import { handleEval } from '../commands/eval.js'
import { handleWhere } from '../commands/where.js'
import {
  ErrFileNotFound,
  ErrIncompleteRule,
  ErrInvalidEntity,
  ErrInvalidRuleFile,
  ErrMissingTable,
} from '../errors.js'

const ELIGIBILITY = "age > 18 and country == 'US' ? 'eligible' : 'ineligible'"

function thrown(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('expected an error to be thrown')
}

let dir: string

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'quill-cli-'))
})

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true })
})

describe('parse', () => {
  test('text output lists statements per group', () => {
    expect(handleParse({ expression: ELIGIBILITY })).toBe([
      'if:',
      "  0: age greaterThan '18'",
      "  1: and country equals 'US'",
      'then:',
      "  0: 'eligible'",
      'else:',
      "  0: 'ineligible'",
    ].join('\n'))
  })

  test('null branch shows as empty', () => {
    const output = handleParse({ expression: "status == 'active' ? 'on' : null" })
    expect(output.split('\n').slice(-2)).toEqual(['else:', '  0: (empty)'])
  })

  test('json output', () => {
    expect(JSON.parse(handleParse({ expression: ELIGIBILITY, output: 'json' }))).toEqual({
      if: [
        { field: 'age', operator: 'greaterThan', value: '18' },
        { logicalOperator: 'and', field: 'country', operator: 'equals', value: 'US' },
      ],
      then: [{ value: 'eligible' }],
      else: [{ value: 'ineligible' }],
    })
  })
})

describe('format', () => {
  test('serializes a rule file', () => {
    fs.writeFileSync(path.join(dir, 'rule.json'), JSON.stringify({
      if: { '0': { field: 'role', operator: 'containsSet', value: 'admin,owner' } },
      then: { '0': { value: 'privileged' } },
      else: { '0': { value: 'standard' } },
    }))
    expect(handleFormat({ file: 'rule.json' }, dir)).toBe("{'admin','owner'}.contains(role) ? 'privileged' : 'standard'")
  })

  test('missing file', () => {
    expect(ErrFileNotFound.is(thrown(() => handleFormat({ file: 'nope.json' }, dir)))).toBe(true)
  })

  test('malformed JSON', () => {
    fs.writeFileSync(path.join(dir, 'rule.json'), '{ not json')
    expect(ErrInvalidRuleFile.is(thrown(() => handleFormat({ file: 'rule.json' }, dir)))).toBe(true)
  })

  test('wrong shape', () => {
    fs.writeFileSync(path.join(dir, 'rule.json'), JSON.stringify({ if: 'x', then: [] }))
    expect(ErrInvalidRuleShape.is(thrown(() => handleFormat({ file: 'rule.json' }, dir)))).toBe(true)
  })

  test('incomplete rule', () => {
    fs.writeFileSync(path.join(dir, 'rule.json'), JSON.stringify({
      if: [{ field: 'status', operator: 'equals', value: 'active' }],
      then: [{}],
    }))
    expect(ErrIncompleteRule.is(thrown(() => handleFormat({ file: 'rule.json' }, dir)))).toBe(true)
  })
})

describe('sql', () => {
  const expression = "status == 'active' ? 'on' : 'off'"

  test('explicit table', () => {
    expect(handleSql({ expression, table: 'users' }, dir))
      .toBe("SELECT CASE WHEN status == 'active' THEN 'on' ELSE 'off' FROM users")
  })

  test('table from the rules file', () => {
    fs.writeFileSync(path.join(dir, 'quill.yaml'), 'table: accounts\n')
    expect(handleSql({ expression }, dir))
      .toBe("SELECT CASE WHEN status == 'active' THEN 'on' ELSE 'off' FROM accounts")
  })

  test('option overrides the rules file', () => {
    fs.writeFileSync(path.join(dir, 'quill.yaml'), 'table: accounts\n')
    expect(handleSql({ expression, table: 'people' }, dir)).toMatch(/ FROM people$/)
  })

  test('no table anywhere', () => {
    fs.writeFileSync(path.join(dir, 'rules.yaml'), 'rules: []\n')
    expect(ErrMissingTable.is(thrown(() => handleSql({ expression, config: 'rules.yaml' }, dir)))).toBe(true)
  })
})

describe('check', () => {
  test('valid expression', () => {
    expect(handleCheck({ expression: ELIGIBILITY }, dir)).toEqual({ output: '✓ valid', failures: 0 })
  })

  test('invalid expression', () => {
    const report = handleCheck({ expression: 'status' }, dir)
    expect(report.failures).toBe(1)
    expect(report.output.startsWith('✗ ')).toBe(true)
  })

  test('every rule in the rules file', () => {
    fs.writeFileSync(path.join(dir, 'quill.yaml'), `rules:
  - name: eligibility
    expression: "${ELIGIBILITY}"
  - name: broken
    expression: "status ? 'x' : 'y'"
`)
    const report = handleCheck({}, dir)
    const lines = report.output.split('\n')
    expect(report.failures).toBe(1)
    expect(lines[0]).toBe('✓ eligibility')
    expect(lines[1]?.startsWith('✗ broken: ')).toBe(true)
    expect(lines[2]).toBe('1 of 2 rules valid')
  })
})

describe('eval', () => {
  test('picks the branch for the entity', () => {
    expect(handleEval({ expression: ELIGIBILITY, entity: '{"age": 30, "country": "US"}' })).toBe('eligible')
    expect(handleEval({ expression: ELIGIBILITY, entity: '{"age": 12, "country": "US"}' })).toBe('ineligible')
  })

  test('null branch prints null', () => {
    expect(handleEval({ expression: "name.contains('smith') ? 'match' : null", entity: '{"name": "jones"}' })).toBe('null')
  })

  test('entity must be a JSON object', () => {
    const err = thrown(() => handleEval({ expression: ELIGIBILITY, entity: '[1, 2]' }))
    expect(ErrInvalidEntity.is(err)).toBe(true)
    if (ErrInvalidEntity.is(err)) {
      expect(err.message).toBe('Invalid entity: expected a JSON object')
    }
    expect(ErrInvalidEntity.is(thrown(() => handleEval({ expression: ELIGIBILITY, entity: '{age' })))).toBe(true)
  })
})

describe('where', () => {
  test('text output', () => {
    expect(handleWhere({ expression: ELIGIBILITY })).toBe('WHERE ("age" > ?) AND ("country" = ?)\nparams: ["18","US"]')
  })

  test('json output', () => {
    expect(JSON.parse(handleWhere({ expression: ELIGIBILITY, output: 'json' }))).toEqual({
      sql: '("age" > ?) AND ("country" = ?)',
      params: ['18', 'US'],
    })
  })
})
