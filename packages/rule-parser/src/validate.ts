/**
 * Literal whitelist and syntax checks.
 *
 * The parser accepts any quoted text; the whitelist is enforced only where
 * literals are written back into expression text (the serializer).
 */

import { parseRule } from './grammar.js'
import { ErrInvalidExpressionSyntax, ErrUnsafeLiteralValue } from './errors.js'

const SAFE_LITERAL = /^[a-zA-Z0-9,. _-]+$/

export function isSafeLiteral(value: string): boolean {
  return SAFE_LITERAL.test(value)
}

/**
 * Returns `value` unchanged when it is non-empty and made only of letters,
 * digits, spaces and `, . _ -`.
 *
 * @throws ErrUnsafeLiteralValue
 */
export function validateLiteral(value: string): string {
  if (!isSafeLiteral(value)) {
    throw ErrUnsafeLiteralValue.create({ value })
  }
  return value
}

/** Whether `text` parses. No whitelist or semantic check. */
export function isValidSyntax(text: string): boolean {
  try {
    parseRule(text)
    return true
  } catch (err) {
    if (ErrInvalidExpressionSyntax.is(err)) return false
    throw err
  }
}
