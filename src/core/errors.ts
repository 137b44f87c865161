export type CoreErrorKind = "load" | "resolve" | "expand" | "execution"

export const CoreErrorCodes = {
  MALFORMED_DOCUMENT: "MALFORMED_DOCUMENT",
  UNSUPPORTED_VERSION: "UNSUPPORTED_VERSION",
  SCHEMA_VIOLATION: "SCHEMA_VIOLATION",
  PRESET_NOT_FOUND: "PRESET_NOT_FOUND",
  PRESET_HIDDEN: "PRESET_HIDDEN",
  MISSING_CONFIGURE_PRESET: "MISSING_CONFIGURE_PRESET",
  INHERITANCE_CYCLE: "INHERITANCE_CYCLE",
  CONDITION_UNSATISFIED: "CONDITION_UNSATISFIED",
  INVALID_CONDITION: "INVALID_CONDITION",
  UNRESOLVED_VARIABLE: "UNRESOLVED_VARIABLE",
  EXPANSION_CYCLE: "EXPANSION_CYCLE",
  PRECONDITION_FAILED: "PRECONDITION_FAILED",
  LAUNCH_FAILURE: "LAUNCH_FAILURE",
  STEP_FAILED: "STEP_FAILED",
} as const

export type CoreErrorCode = (typeof CoreErrorCodes)[keyof typeof CoreErrorCodes]

/**
 * Error record thrown by the preset engine and the pipeline runner.
 * `source` names the preset involved and `path` the field, token or step.
 */
export type CoreError = {
  readonly kind: CoreErrorKind
  readonly code: CoreErrorCode
  readonly message: string
  readonly source?: string
  readonly path?: string
  readonly details?: Readonly<Record<string, unknown>>
}

export const createCoreError = (
  kind: CoreErrorKind,
  error: {
    readonly code: CoreErrorCode
    readonly message: string
    readonly source?: string
    readonly path?: string
    readonly details?: Readonly<Record<string, unknown>>
  },
): CoreError => ({
  kind,
  code: error.code,
  message: error.message,
  source: error.source,
  path: error.path,
  details: error.details,
})

const CORE_ERROR_CODES: ReadonlySet<string> = new Set(Object.values(CoreErrorCodes))

export const isCoreError = (value: unknown): value is CoreError => {
  if (typeof value !== "object" || value === null) {
    return false
  }
  if (!("kind" in value) || !("code" in value) || !("message" in value)) {
    return false
  }
  return (
    (value.kind === "load" || value.kind === "resolve" || value.kind === "expand" || value.kind === "execution") &&
    typeof value.code === "string" &&
    CORE_ERROR_CODES.has(value.code) &&
    typeof value.message === "string"
  )
}
