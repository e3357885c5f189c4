/**
 * QuillError - errors composed from facets and owned by per-package boundaries.
 *
 * A definition fixes the code, the facets it carries and how its message reads
 * from the data. Callers tell errors apart by definition (`ErrX.is(err)`) or by
 * facet (`QuillError.has(err, BadInput)`). A lower-level failure can be kept as
 * the `cause` and shows up in the pretty-printed chain.
 */

import {StaticTypeCompanion} from "./companion.js";
import type {UnionToIntersection} from "./type-system-utils.js";
import {Inspect} from "./inspect.js";

// ============================================================================
// Facets
// ============================================================================

export interface ErrMarkerFacet {
  readonly kind: "marker";
  readonly name: string;
}

export interface ErrDataFacet<TData extends Record<string, unknown> = Record<string, unknown>> {
  readonly kind: "data";
  readonly name: string;
  readonly _data?: TData; // phantom
}

export type ErrFacetAny = ErrMarkerFacet | ErrDataFacet;

/** Phantom carrier for the data a single definition adds on top of its facets */
export interface ErrProps<T extends Record<string, unknown> = {}> {
  readonly _kind: "props";
  readonly _phantom?: T;
}

type InferPropsData<P> = P extends ErrProps<infer T> ? T : {};

export const ErrFacet = StaticTypeCompanion({
  marker(name: string): ErrMarkerFacet {
    return Object.freeze({ kind: "marker" as const, name });
  },

  data<TData extends Record<string, unknown>>(name: string): ErrDataFacet<TData> {
    return Object.freeze({ kind: "data" as const, name });
  },

  props<T extends Record<string, unknown>>(): ErrProps<T> {
    return { _kind: "props" };
  },
});

/** Data contributed by one facet; markers contribute nothing */
export type FacetProps<F> = F extends ErrDataFacet<infer D> ? D : {};

export type MergeFacetProps<Fs extends readonly ErrFacetAny[]> = UnionToIntersection<
  FacetProps<Fs[number]>
>;

// ============================================================================
// Definitions and boundaries
// ============================================================================

export interface ErrorDef<
  Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[],
  D extends Record<string, unknown> = {},
> {
  readonly code: string;
  create(data: MergeFacetProps<Fs> & D, cause?: unknown): QuillError<Fs>;
  is(err: unknown): err is QuillError<Fs> & { readonly data: MergeFacetProps<Fs> & D };
}

export interface ErrorBoundary {
  readonly domain: string;
  /** Define an error owned by this boundary; its code becomes `<domain>.<code>`. */
  define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
    code: string,
    opts: { customProps?: P; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string },
  ): ErrorDef<Fs, InferPropsData<P>>;
}

export interface QuillError<Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[]> extends Error {
  readonly code: string;
  readonly domain: string;
  readonly data: MergeFacetProps<Fs>;
  readonly facetNames: ReadonlySet<string>;
  prettyPrint(opts?: PrettyPrintOptions): string;
}

export interface PrettyPrintOptions {
  color?: boolean;
  includeStackTrace?: boolean;
}

// ============================================================================
// Implementation (internal)
// ============================================================================

interface Palette {
  red: string;
  dim: string;
  reset: string;
}

const ANSI: Palette = { red: "\x1b[31m", dim: "\x1b[2m", reset: "\x1b[0m" };
const PLAIN: Palette = { red: "", dim: "", reset: "" };

class QuillErrorImpl extends Error implements QuillError {
  readonly code: string;
  readonly domain: string;
  readonly data: Record<string, unknown>;
  readonly facetNames: ReadonlySet<string>;

  static {
    Inspect(this, (self, opts) => ({
      format: "%s",
      params: [self.prettyPrint({ color: opts.colors, includeStackTrace: true })],
    }));
  }

  constructor(
    code: string,
    domain: string,
    message: string,
    facetNames: ReadonlySet<string>,
    data: object,
    cause: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = `QuillError[${code}]`;
    this.code = code;
    this.domain = domain;
    this.data = Object.fromEntries(Object.entries(data));
    this.facetNames = facetNames;
  }

  prettyPrint(opts: PrettyPrintOptions = {}): string {
    const paint = opts.color ? ANSI : PLAIN;
    const lines = [`QuillError: ${describeError(this, "", paint)}`];

    let indent = "  ";
    let cause = this.cause;
    while (cause !== undefined) {
      lines.push(`${indent}${paint.dim}└ caused by:${paint.reset} ${describeCause(cause, indent, paint)}`);
      cause = cause instanceof Error ? cause.cause : undefined;
      indent += "  ";
    }

    if (opts.includeStackTrace) {
      const frames = stackFrames(this.stack);
      if (frames.length > 0) {
        lines.push(`  ${paint.dim}➝ Stack trace:${paint.reset}`);
        for (const frame of frames) lines.push(`${paint.dim}${frame}${paint.reset}`);
      }
    }

    return lines.join("\n");
  }
}

function describeError(err: QuillErrorImpl, indent: string, paint: Palette): string {
  let line = `${paint.red}${err.code}${paint.reset}: ${err.message}`;
  if (Object.keys(err.data).length > 0) {
    line += `\n${indent}  ${paint.dim}data: ${JSON.stringify(err.data)}${paint.reset}`;
  }
  return line;
}

function describeCause(cause: unknown, indent: string, paint: Palette): string {
  if (cause instanceof QuillErrorImpl) return describeError(cause, indent, paint);
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`;
  return String(cause);
}

/** The `at ...` lines of a stack, without the message header. */
function stackFrames(stack: string | undefined): string[] {
  if (!stack) return [];
  return stack.split("\n").filter((line) => line.trimStart().startsWith("at "));
}

function defineError<const Fs extends readonly ErrFacetAny[], D extends Record<string, unknown> = {}>(
  code: string,
  domain: string,
  opts: { facets: Fs; message: (data: MergeFacetProps<Fs> & D) => string },
): ErrorDef<Fs, D> {
  const facetNames = Object.freeze(new Set(opts.facets.map((f) => f.name)));

  function create(data: MergeFacetProps<Fs> & D, cause?: unknown): QuillError<Fs> {
    const err = new QuillErrorImpl(code, domain, opts.message(data), facetNames, data, cause);
    Error.captureStackTrace(err, create);
    // data is typed by the facets at the definition site; the impl stores it as a plain record
    return err as unknown as QuillError<Fs>;
  }

  return Object.freeze({
    code,
    create,
    is(err: unknown): err is QuillError<Fs> & { readonly data: MergeFacetProps<Fs> & D } {
      return err instanceof QuillErrorImpl && err.code === code;
    },
  });
}

// ============================================================================
// Companion
// ============================================================================

export const QuillError = StaticTypeCompanion({
  /** Open a boundary: the definitions of one package, sharing its domain. */
  boundary(domain: string): ErrorBoundary {
    return {
      domain,
      define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
        code: string,
        opts: { customProps?: P; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string },
      ): ErrorDef<Fs, InferPropsData<P>> {
        return defineError(`${domain}.${code}`, domain, opts);
      },
    };
  },

  isQuillError(err: unknown): err is QuillError {
    return err instanceof QuillErrorImpl;
  },

  /**
   * True when `err` is a QuillError carrying `facet`.
   * For a data facet, narrows `err.data` to include the facet's data.
   */
  has<F extends ErrFacetAny>(
    err: unknown,
    facet: F,
  ): err is QuillError & { readonly data: FacetProps<F> } {
    return err instanceof QuillErrorImpl && err.facetNames.has(facet.name);
  },
});
