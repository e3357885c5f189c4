/**
 * WhereClause - serializable filter tree.
 *
 * Leaves are single-field comparisons; inner nodes group them with AND / OR.
 * The tree is pure data: renderers (SQL, in-memory) walk it.
 *
 * @example
 * const where = WhereClause.and(
 *   { field: "age", op: ">", value: "18" },
 *   { field: "country", op: "in", value: ["US", "CA"] },
 * )
 */

import {StaticTypeCompanion} from "./companion.js";

export type FilterOp = "=" | "!=" | ">" | "<" | "like" | "in";

export type QueryFilter = {
  readonly field: string;
  readonly op: FilterOp;
  readonly value: unknown;
};

/** Recursive filter tree - AND/OR grouping over leaf comparisons. */
export type WhereClause =
  | QueryFilter
  | { readonly kind: 'and'; readonly clauses: WhereClause[] }
  | { readonly kind: 'or';  readonly clauses: WhereClause[] }

/** Type + companion for WhereClause. */
export const WhereClause = StaticTypeCompanion({
  /** Create an AND group. */
  and(...clauses: WhereClause[]): WhereClause {
    return { kind: 'and', clauses }
  },
  /** Create an OR group. */
  or(...clauses: WhereClause[]): WhereClause {
    return { kind: 'or', clauses }
  },
  /** Type guard: is this a leaf QueryFilter (not an and/or node)? */
  isLeaf(w: WhereClause): w is QueryFilter {
    return !('kind' in w)
  },
  /** Empty OR (matches nothing). */
  none(): WhereClause {
    return { kind: 'or', clauses: [] }
  },
})
