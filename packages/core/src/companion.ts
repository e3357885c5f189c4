/**
 * Marks an object as the companion of a same-named type, e.g. `WhereClause`
 * (the filter tree type) and `WhereClause` (its constructors and guards).
 *
 * Identity at runtime; it exists so companions are easy to find.
 */
export function StaticTypeCompanion<const Companion>(companion: Companion): Companion {
  return companion
}
