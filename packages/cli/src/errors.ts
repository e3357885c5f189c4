/**
 * CLI error boundary — errors owned by the command layer.
 */

import { BadInput, ErrFacet, NotFound, QuillError } from '@quill/core'

export const CliBoundary = QuillError.boundary('cli')

export const ErrConfigNotFound = CliBoundary.define('config_not_found', {
  customProps: ErrFacet.props<{ searched: string }>(),
  facets: [NotFound],
  message: (d) => `No quill.yaml found (searched from ${d.searched})`,
})

export const ErrInvalidConfig = CliBoundary.define('invalid_config', {
  customProps: ErrFacet.props<{ file: string; reason: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid rules file ${d.file}: ${d.reason}`,
})

export const ErrInvalidEntity = CliBoundary.define('invalid_entity', {
  customProps: ErrFacet.props<{ reason: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid entity: ${d.reason}`,
})

export const ErrFileNotFound = CliBoundary.define('file_not_found', {
  customProps: ErrFacet.props<{ file: string }>(),
  facets: [NotFound],
  message: (d) => `File not found: ${d.file}`,
})

export const ErrInvalidRuleFile = CliBoundary.define('invalid_rule_file', {
  customProps: ErrFacet.props<{ file: string; reason: string }>(),
  facets: [BadInput],
  message: (d) => `Cannot read rule from ${d.file}: ${d.reason}`,
})

export const ErrIncompleteRule = CliBoundary.define('incomplete_rule', {
  customProps: ErrFacet.props<{ file: string }>(),
  facets: [BadInput],
  message: (d) => `Rule in ${d.file} is incomplete: "if" needs an operator and "then" a value`,
})

export const ErrMissingTable = CliBoundary.define('missing_table', {
  facets: [BadInput],
  message: () => `No table given; pass --table or set "table" in quill.yaml`,
})
