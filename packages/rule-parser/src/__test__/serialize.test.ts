import { describe, test, expect } from 'vitest'
import { serializeRule } from '../serialize.js'
import { readRule } from '../extract.js'
import { ErrUnsafeFieldName, ErrUnsafeLiteralValue } from '../errors.js'
import type { StructuredRule } from '../rule.js'

function thrown(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('expected an error to be thrown')
}

describe('serializeRule', () => {
  test('equality rule', () => {
    const rule: StructuredRule = {
      if: [{ field: 'status', operator: 'equals', value: 'active' }],
      then: [{ value: 'enabled' }],
      else: [{ value: 'disabled' }],
    }
    expect(serializeRule(rule)).toBe("status == 'active' ? 'enabled' : 'disabled'")
  })

  test('set membership', () => {
    const rule: StructuredRule = {
      if: [{ field: 'role', operator: 'containsSet', value: 'admin, owner' }],
      then: [{ value: 'privileged' }],
      else: [{ value: 'standard' }],
    }
    expect(serializeRule(rule)).toBe("{'admin','owner'}.contains(role) ? 'privileged' : 'standard'")
  })

  test('ordering comparisons keep numbers bare', () => {
    const rule: StructuredRule = {
      if: [
        { field: 'age', operator: 'greaterThan', value: '18' },
        { logicalOperator: 'or', field: 'name', operator: 'lessThan', value: 'm' },
      ],
      then: [{ value: 'a' }],
      else: [{ value: 'b' }],
    }
    expect(serializeRule(rule)).toBe("age > 18 or name < 'm' ? 'a' : 'b'")
  })

  test('incomplete else is written as null', () => {
    const rule: StructuredRule = {
      if: [{ field: 'status', operator: 'notEquals', value: 'archived' }],
      then: [{ value: 'visible' }],
      else: [{}],
    }
    expect(serializeRule(rule)).toBe("status != 'archived' ? 'visible' : null")
  })

  test('incomplete then gives an empty string', () => {
    const rule: StructuredRule = {
      if: [{ field: 'status', operator: 'equals', value: 'active' }],
      then: [{}],
      else: [{ value: 'disabled' }],
    }
    expect(serializeRule(rule)).toBe('')
  })

  test('if without an operator gives an empty string', () => {
    const rule: StructuredRule = {
      if: [{ field: 'status', value: 'active' }],
      then: [{ value: 'on' }],
      else: [{ value: 'off' }],
    }
    expect(serializeRule(rule)).toBe('')
  })

  test('empty rule gives an empty string', () => {
    expect(serializeRule({ if: [], then: [], else: [] })).toBe('')
  })

  test('statements without a connective are joined with and', () => {
    const rule: StructuredRule = {
      if: [
        { field: 'a', operator: 'equals', value: '1' },
        { field: 'b', operator: 'equals', value: '2' },
      ],
      then: [{ value: 'p' }],
      else: [{ value: 'q' }],
    }
    expect(serializeRule(rule)).toBe("a == '1' and b == '2' ? 'p' : 'q'")
  })

  test('empty statements inside a group are skipped', () => {
    const rule: StructuredRule = {
      if: [
        { field: 'a', operator: 'equals', value: '1' },
        {},
        { logicalOperator: 'or', field: 'b', operator: 'containsSubstring', value: 'x' },
      ],
      then: [{ value: 'p' }],
      else: [{ value: 'q' }],
    }
    expect(serializeRule(rule)).toBe("a == '1' or b.contains('x') ? 'p' : 'q'")
  })

  test('unsafe literal aborts serialization', () => {
    const rule: StructuredRule = {
      if: [{ field: 'name', operator: 'equals', value: "x' or '1'=='1" }],
      then: [{ value: 'p' }],
      else: [{ value: 'q' }],
    }
    const err = thrown(() => serializeRule(rule))
    expect(ErrUnsafeLiteralValue.is(err)).toBe(true)
    if (ErrUnsafeLiteralValue.is(err)) {
      expect(err.code).toBe('rule-parser.unsafe_literal')
      expect(err.data.value).toBe("x' or '1'=='1")
    }
  })

  test('unsafe literal in a branch aborts serialization', () => {
    const rule: StructuredRule = {
      if: [{ field: 'name', operator: 'equals', value: 'x' }],
      then: [{ value: 'p' }],
      else: [{ value: 'q;drop' }],
    }
    expect(ErrUnsafeLiteralValue.is(thrown(() => serializeRule(rule)))).toBe(true)
  })

  test('empty set member is rejected', () => {
    const rule: StructuredRule = {
      if: [{ field: 'role', operator: 'containsSet', value: 'admin,' }],
      then: [{ value: 'p' }],
      else: [{ value: 'q' }],
    }
    const err = thrown(() => serializeRule(rule))
    expect(ErrUnsafeLiteralValue.is(err)).toBe(true)
    if (ErrUnsafeLiteralValue.is(err)) {
      expect(err.data.value).toBe('')
    }
  })

  test('field must be an identifier', () => {
    const rule: StructuredRule = {
      if: [{ field: 'first name', operator: 'equals', value: 'x' }],
      then: [{ value: 'p' }],
      else: [{ value: 'q' }],
    }
    const err = thrown(() => serializeRule(rule))
    expect(ErrUnsafeFieldName.is(err)).toBe(true)
    if (ErrUnsafeFieldName.is(err)) {
      expect(err.message).toBe('Rule statement field "first name" is not a valid identifier')
    }
  })

  test('missing field with an operator is rejected', () => {
    const rule: StructuredRule = {
      if: [{ operator: 'equals', value: 'x' }],
      then: [{ value: 'p' }],
      else: [{ value: 'q' }],
    }
    expect(ErrUnsafeFieldName.is(thrown(() => serializeRule(rule)))).toBe(true)
  })
})

describe('round trip', () => {
  const expressions = [
    "status == 'active' ? 'enabled' : 'disabled'",
    "status != 'archived' ? 'visible' : 'hidden'",
    "age > 18 ? 'adult' : 'minor'",
    "age < 65 ? 'working' : 'retired'",
    "name.contains('smith') ? 'match' : 'none'",
    "{'admin','owner'}.contains(role) ? 'privileged' : 'standard'",
    "age > 18 and country == 'US' ? 'eligible' : 'ineligible'",
    "tier == 'gold' or tier == 'platinum' ? 'vip' : 'regular'",
    "status == 'active' ? 'on' : null",
  ]

  for (const text of expressions) {
    test(text, () => {
      expect(serializeRule(readRule(text))).toBe(text)
    })
  }

  test('normalises spacing and keyword case', () => {
    expect(serializeRule(readRule("age>18 AND country=='US'?'eligible':'ineligible'")))
      .toBe("age > 18 and country == 'US' ? 'eligible' : 'ineligible'")
  })

  test('field-first set membership is written list-first', () => {
    expect(serializeRule(readRule("role.contains({'admin', 'owner'}) ? 'p' : 'q'")))
      .toBe("{'admin','owner'}.contains(role) ? 'p' : 'q'")
  })

  test('structured rule survives serialize and read', () => {
    const rule: StructuredRule = {
      if: [
        { field: 'name', operator: 'greaterThan', value: 'm' },
        { logicalOperator: 'or', field: 'name', operator: 'lessThan', value: 'c' },
        { logicalOperator: 'and', field: 'role', operator: 'containsSet', value: 'admin,owner' },
        { logicalOperator: 'or', field: 'bio', operator: 'containsSubstring', value: 'tea' },
        { logicalOperator: 'and', field: 'status', operator: 'notEquals', value: 'archived' },
        { logicalOperator: 'or', field: 'age', operator: 'equals', value: '30' },
      ],
      then: [{ value: 'listed' }],
      else: [{ value: 'hidden' }],
    }
    expect(readRule(serializeRule(rule))).toEqual(rule)
  })
})
