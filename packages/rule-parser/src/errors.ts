/**
 * Error boundary for the rule parser.
 */

import { BadInput, ErrFacet, HasField, QuillError } from '@quill/core'

const RuleParserBoundary = QuillError.boundary('rule-parser')

/** The rule expression could not be parsed. */
export const ErrInvalidExpressionSyntax = RuleParserBoundary.define('invalid_syntax', {
  customProps: ErrFacet.props<{ expression: string; reason: string; index: number }>(),
  facets: [BadInput],
  message: (d) => `Invalid rule "${d.expression}": ${d.reason} (at position ${d.index})`,
})

/** A literal contains characters outside the safe whitelist. */
export const ErrUnsafeLiteralValue = RuleParserBoundary.define('unsafe_literal', {
  customProps: ErrFacet.props<{ value: string }>(),
  facets: [BadInput],
  message: (d) => `Rule statement value "${d.value}" is not allowed; use letters, digits, spaces and , . _ -`,
})

/** A statement names a field that is not a plain identifier. */
export const ErrUnsafeFieldName = RuleParserBoundary.define('unsafe_field', {
  facets: [BadInput, HasField],
  message: (d) => `Rule statement field "${d.field}" is not a valid identifier`,
})

/** A stored rule record does not have the structured-rule shape. */
export const ErrInvalidRuleShape = RuleParserBoundary.define('invalid_rule_shape', {
  customProps: ErrFacet.props<{ path: string; reason: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid structured rule at ${d.path}: ${d.reason}`,
})
