/**
 * @quill/core - Errors, companions and filter trees shared by the Quill packages
 */

// Companion marker
export { StaticTypeCompanion } from "./companion.js";

// Type utilities
export type { UnionToIntersection } from "./type-system-utils.js";

// Errors
export { QuillError, ErrFacet } from "./quill-error.js";
export type {
  PrettyPrintOptions,
  ErrorDef,
  ErrorBoundary,
  ErrMarkerFacet,
  ErrDataFacet,
  ErrFacetAny,
  ErrProps,
  FacetProps,
  MergeFacetProps,
} from "./quill-error.js";
export {
  Core,
  NotFound,
  BadInput,
  HasField,
  ErrInvalidFilterValue,
} from "./errors/basic-errors.js";

// Filter trees
export { WhereClause } from "./where-clause.js";
export type { QueryFilter, FilterOp } from "./where-clause.js";
export { SqlWhereRenderer, quotedIdentifierMapper } from "./where-sql.js";
export type { FieldMapper, SqlFilterResult } from "./where-sql.js";

// Inspect
export { Inspect, inspect } from "./inspect.js";
