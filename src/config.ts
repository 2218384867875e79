import { z } from 'zod'

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

/**
 * Controls how a `GraphPath` renders itself through `toString()`.
 */
const pathSchema = z
  .object({
    /**
     * Number of vertices printed at each end of a long path. Paths with more
     * than `displayCut * 2` vertices are rendered with "..." in the middle.
     * @default 10
     */
    displayCut: z
      .number()
      .int()
      .min(1, 'path.displayCut must be at least 1')
      .default(10),
    /** Decimals used when printing the total weight. */
    weightDecimals: z
      .number()
      .int()
      .min(0, 'path.weightDecimals must be >= 0')
      .max(10, 'path.weightDecimals must be <= 10')
      .default(2),
  })
  .strip()

/**
 * Controls the adjacency-list view produced by `formatAdjacencyList`.
 */
const adjacencySchema = z
  .object({
    /** First line of the formatted output. Empty string = no header line. */
    header: z.string().default('Graph adjacency list:'),
  })
  .strip()

/**
 * Controls diagnostics around caller-supplied weight functions.
 */
const weightsSchema = z
  .object({
    /**
     * Log a warning the first time a weighted search sees a negative edge
     * weight. The search result is not altered: negative weights stay an
     * unchecked precondition of the shortest-path search.
     */
    warnOnNegative: z.boolean().default(true),
  })
  .strip()

/**
 * Controls structured metric output. Metrics go to stderr via console.warn
 * with a `[vsearch:metrics]` prefix.
 */
const metricsSchema = z
  .object({
    enabled: z.boolean().default(false),
  })
  .strip()

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

/**
 * Zod schema for the searcher configuration.
 *
 * - Unknown keys are stripped, not rejected.
 * - Every field has a default; `{}` produces a fully-valid config.
 */
export const searchConfigSchema = z
  .object({
    path: pathSchema.default({}),
    adjacency: adjacencySchema.default({}),
    weights: weightsSchema.default({}),
    metrics: metricsSchema.default({}),
  })
  .strip()

/** Known keys per sub-schema, used to report typos in nested objects. */
const SUB_SCHEMA_SHAPES: Record<string, ReadonlySet<string>> = {
  path: new Set(Object.keys(pathSchema.shape)),
  adjacency: new Set(Object.keys(adjacencySchema.shape)),
  weights: new Set(Object.keys(weightsSchema.shape)),
  metrics: new Set(Object.keys(metricsSchema.shape)),
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Returns unknown key paths in `raw` at the top level and one level deep
 * inside recognised sub-objects (e.g. `"path.typo"`).
 */
function collectUnknownConfigKeys(raw: Record<string, unknown>): readonly string[] {
  const topLevelKnown = new Set(Object.keys(searchConfigSchema.shape))
  const result: string[] = []
  for (const key of Object.keys(raw)) {
    if (!topLevelKnown.has(key)) {
      result.push(key)
      continue
    }
    const subShape = SUB_SCHEMA_SHAPES[key]
    const nested = raw[key]
    if (subShape === undefined || !isPlainObject(nested)) continue
    for (const subKey of Object.keys(nested)) {
      if (!subShape.has(subKey)) result.push(`${key}.${subKey}`)
    }
  }
  return result
}

/** Options accepted by {@link parseConfig}. */
export interface ParseConfigOptions {
  /**
   * Called with all unknown key paths (e.g. `["unknownTop", "path.typo"]`)
   * when the raw input contains keys the schema does not recognise.
   */
  onUnknownKeys?: (keys: readonly string[]) => void
}

// ---------------------------------------------------------------------------
// Exported types
// ---------------------------------------------------------------------------

type DeepReadonly<T> =
  T extends (infer U)[]
    ? ReadonlyArray<DeepReadonly<U>>
    : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T

/** Fully-resolved searcher configuration with all defaults applied. */
export type SearchConfig = DeepReadonly<z.infer<typeof searchConfigSchema>>

/** Raw configuration accepted before defaults are applied. */
export type SearchConfigInput = z.input<typeof searchConfigSchema>

// ---------------------------------------------------------------------------
// ConfigValidationError
// ---------------------------------------------------------------------------

/** `  path.displayCut: <message>`, or `  (root): <message>` for the input itself. */
function describeIssue(issue: z.ZodIssue): string {
  const field = issue.path.length === 0 ? '(root)' : issue.path.join('.')
  return `  ${field}: ${issue.message}`
}

/**
 * Thrown by `parseConfig` when the input contains invalid values.
 *
 * The message lists every failing field path. The original `ZodError` is
 * kept as `Error.cause`.
 */
export class ConfigValidationError extends Error {
  /** One entry per invalid field. */
  readonly issues: readonly z.ZodIssue[]

  constructor(zodError: z.ZodError) {
    super(
      `Search configuration is invalid:\n${zodError.errors.map(describeIssue).join('\n')}`,
      { cause: zodError },
    )
    this.name = 'ConfigValidationError'
    this.issues = zodError.errors
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

// ---------------------------------------------------------------------------
// Parse function
// ---------------------------------------------------------------------------

/**
 * Parses and validates raw config input, applying all defaults.
 *
 * `undefined` is treated as `{}`. Unknown keys are stripped and, when
 * `options.onUnknownKeys` is provided, reported through it.
 *
 * @throws {ConfigValidationError} if the input contains invalid values.
 */
export function parseConfig(raw: unknown, options: ParseConfigOptions = {}): SearchConfig {
  const result = searchConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new ConfigValidationError(result.error)
  }

  if (isPlainObject(raw) && options.onUnknownKeys !== undefined) {
    const unknownKeys = collectUnknownConfigKeys(raw)
    if (unknownKeys.length > 0) options.onUnknownKeys(unknownKeys)
  }

  return result.data
}
