import util, {type InspectOptions} from 'node:util'

/**
 * Assign a custom inspect renderer to a class prototype.
 * Call inside a `static {}` block — assigns once to the prototype, not per instance.
 *
 * The `fn` receives the instance as `self` and returns a format string with params.
 * Format specifiers (%s, %O, %d, etc.) are handled by `util.formatWithOptions`.
 *
 * ```typescript
 * class Span {
 *   static {
 *     Inspect(this, (self, opts) => ({
 *       format: "Span( %s | %O )",
 *       params: [self.source, self.range],
 *     }));
 *   }
 * }
 * ```
 */
export function Inspect<T>(cls: { prototype: T }, fn: (self: T, options: InspectOptions) => { format: string; params: unknown[] }): void {
  Object.defineProperty(cls.prototype, inspect, {
    value: function (this: T, depth: number, options: InspectOptions): string {
      const opts = { ...options, depth: (depth ?? 2) - 1 }
      const data = fn(this, opts)
      return util.formatWithOptions(opts, data.format, ...data.params)
    },
  })
}

export const inspect: unique symbol = Symbol.for('nodejs.util.inspect.custom')
