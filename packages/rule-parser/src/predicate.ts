/**
 * The query-side collaborator of the rule extractor.
 *
 * A PredicateBuilder resolves attribute names to handles and composes
 * predicates over them. `P` is the host's predicate type (a function, a filter
 * tree, an ORM criteria object…), `A` its attribute handle.
 */
export interface PredicateBuilder<P, A = string> {
  attribute(name: string): A
  equal(attribute: A, value: string): P
  notEqual(attribute: A, value: string): P
  greaterThan(attribute: A, value: string): P
  lessThan(attribute: A, value: string): P
  /** SQL LIKE pattern: `%` any run of characters, `_` any single character. */
  like(attribute: A, pattern: string): P
  in(attribute: A, values: readonly string[]): P
  and(left: P, right: P): P
  or(left: P, right: P): P
  /** The empty disjunction — never matches. */
  disjunction(): P
}

/** Builder used when the caller only wants the structured rule. */
export const noPredicates: PredicateBuilder<undefined, undefined> = {
  attribute: () => undefined,
  equal: () => undefined,
  notEqual: () => undefined,
  greaterThan: () => undefined,
  lessThan: () => undefined,
  like: () => undefined,
  in: () => undefined,
  and: () => undefined,
  or: () => undefined,
  disjunction: () => undefined,
}
