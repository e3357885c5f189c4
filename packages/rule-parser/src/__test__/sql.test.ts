import { describe, test, expect } from 'vitest'
import { parseRule } from '../grammar.js'
import { toSql, ruleToSql } from '../sql.js'
import { ErrInvalidExpressionSyntax } from '../errors.js'

describe('toSql', () => {
  test('case when fragment from verbatim sources', () => {
    expect(toSql(parseRule("status == 'active' ? 'on' : 'off'"), 'users'))
      .toBe("SELECT CASE WHEN status == 'active' THEN 'on' ELSE 'off' FROM users")
  })

  test('keeps the condition exactly as written', () => {
    expect(toSql(parseRule("age>18  AND  country=='US' ? 'a' : 'b'"), 'people'))
      .toBe("SELECT CASE WHEN age>18  AND  country=='US' THEN 'a' ELSE 'b' FROM people")
  })

  test('set membership and bare null branch', () => {
    expect(toSql(parseRule("role.contains({'admin','owner'}) ? 'privileged' : null"), 'accounts'))
      .toBe("SELECT CASE WHEN role.contains({'admin','owner'}) THEN 'privileged' ELSE null FROM accounts")
  })

  test('nodes without three children give an empty string', () => {
    const ast = parseRule("a == 'x' and b == 'y' ? 'p' : 'q'")
    expect(toSql(ast.condition, 'users')).toBe('')
    expect(toSql(ast.then, 'users')).toBe('')
  })
})

describe('ruleToSql', () => {
  test('parses then generates', () => {
    expect(ruleToSql("tier == 'gold' ? 'vip' : 'regular'", 'customers'))
      .toBe("SELECT CASE WHEN tier == 'gold' THEN 'vip' ELSE 'regular' FROM customers")
  })

  test('invalid text throws a syntax error', () => {
    let caught: unknown
    try {
      ruleToSql('not a rule', 'users')
    } catch (err) {
      caught = err
    }
    expect(ErrInvalidExpressionSyntax.is(caught)).toBe(true)
  })
})
