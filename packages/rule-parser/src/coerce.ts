/**
 * Value coercion for rule literals.
 *
 * Literals reach predicates as text. When they are compared with typed entity
 * attributes they are coerced to their natural type:
 *   "true" / "false" → boolean
 *   decimal numbers   → number
 *   everything else   → string
 */

export function coerceLiteral(raw: string): string | number | boolean {
  const lower = raw.toLowerCase()
  if (lower === 'true') return true
  if (lower === 'false') return false

  if (isNumericLiteral(raw)) return Number(raw)

  return raw
}

/** True for plain decimal numbers such as `18`, `-1` or `3.5`. */
export function isNumericLiteral(raw: string): boolean {
  return /^-?\d+(\.\d+)?$/.test(raw)
}
