/**
 * Standard facets and domain-owned error definitions for the core boundary.
 *
 * Facets are reusable markers/data traits composed into any ErrorDef.
 * Every error here is owned by the Core boundary — no generic catch-alls.
 */

import {ErrFacet, QuillError} from "../quill-error.js";

// ============================================================================
// Core Boundary
// ============================================================================

export const Core = QuillError.boundary("core");

// ============================================================================
// Standard Facets
// ============================================================================

/** Something expected was not found */
export const NotFound = ErrFacet.marker("NotFound");

/** Caller provided invalid input */
export const BadInput = ErrFacet.marker("BadInput");

/** Carries the field a filter or statement refers to */
export const HasField = ErrFacet.data<{ field: string }>("HasField");

// ============================================================================
// Standard Error Definitions
// ============================================================================

/** A filter leaf carries a value its operator cannot take */
export const ErrInvalidFilterValue = Core.define("invalid_filter_value", {
  customProps: ErrFacet.props<{ op: string; expected: string }>(),
  facets: [BadInput, HasField],
  message: (d) => `Filter on '${d.field}' with operator ${d.op} expects ${d.expected}`,
});
