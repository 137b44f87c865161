import path from "path"
import { z } from "zod"
import { PresetDocumentSchema } from "../models/schema"
import type {
  Condition,
  PresetKind,
  RawBuildPreset,
  RawConfigurePreset,
  RawPresetDocument,
  RawRunPreset,
} from "../models/types"
import { createCoreError, CoreErrorCodes, type CoreError, type CoreErrorCode } from "./errors"

export const MIN_PRESETS_VERSION = 1
export const MAX_PRESETS_VERSION = 10

export type PresetCondition = boolean | Condition

/**
 * Inheritable preset fields.
 * Each one is tri-state: `undefined` inherits, `null` unsets, a value sets.
 */
export type PresetFields = {
  readonly generator?: string | null
  readonly binaryDir?: string | null
  readonly targetExecutable?: string | null
  readonly configurePreset?: string | null
  readonly configuration?: string | null
  readonly workingDirectory?: string | null
  readonly jobs?: number | null
  readonly cleanFirst?: boolean | null
  readonly verbose?: boolean | null
  readonly targets?: ReadonlyArray<string> | null
  readonly args?: ReadonlyArray<string> | null
  readonly cacheVariables?: Readonly<Record<string, string | null>>
  readonly environment?: Readonly<Record<string, string | null>>
}

export type PresetOrigin = "project" | "user"

export type PresetDefinition = PresetFields & {
  readonly kind: PresetKind
  readonly name: string
  readonly displayName?: string
  readonly description?: string
  readonly hidden: boolean
  readonly inherits: ReadonlyArray<string>
  readonly condition?: PresetCondition
  readonly origin: PresetOrigin
}

export type PresetDocument = {
  readonly version: number
  readonly filePath: string
  readonly sourceDir: string
  readonly configurePresets: ReadonlyArray<PresetDefinition>
  readonly buildPresets: ReadonlyArray<PresetDefinition>
  readonly runPresets: ReadonlyArray<PresetDefinition>
}

export type LoadPresetDocumentInput = {
  readonly text: string
  readonly filePath: string
  readonly user?: {
    readonly text: string
    readonly filePath: string
  }
}

export const presetsOfKind = (document: PresetDocument, kind: PresetKind): ReadonlyArray<PresetDefinition> => {
  switch (kind) {
    case "configure":
      return document.configurePresets
    case "build":
      return document.buildPresets
    case "run":
      return document.runPresets
  }
}

/**
 * Parses a presets file, plus an optional user presets file, into a PresetDocument.
 * User presets are appended after project presets of the same kind.
 */
export const loadPresetDocument = ({ text, filePath, user }: LoadPresetDocumentInput): PresetDocument => {
  const project = parseSingleDocument(text, filePath, "project")
  const userPresets = user === undefined ? undefined : parseSingleDocument(user.text, user.filePath, "user")

  const document: PresetDocument = {
    version: project.version,
    filePath,
    sourceDir: path.dirname(path.resolve(filePath)),
    configurePresets: [...project.configurePresets, ...(userPresets?.configurePresets ?? [])],
    buildPresets: [...project.buildPresets, ...(userPresets?.buildPresets ?? [])],
    runPresets: [...project.runPresets, ...(userPresets?.runPresets ?? [])],
  }

  ensureUniqueNames(document.configurePresets, "configurePresets", filePath)
  ensureUniqueNames(document.buildPresets, "buildPresets", filePath)
  ensureUniqueNames(document.runPresets, "runPresets", filePath)

  return document
}

type ParsedDocument = {
  readonly version: number
  readonly configurePresets: ReadonlyArray<PresetDefinition>
  readonly buildPresets: ReadonlyArray<PresetDefinition>
  readonly runPresets: ReadonlyArray<PresetDefinition>
}

const parseSingleDocument = (text: string, filePath: string, origin: PresetOrigin): ParsedDocument => {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (error) {
    throw loadError(CoreErrorCodes.MALFORMED_DOCUMENT, {
      source: filePath,
      message: `Failed to parse presets file: ${error instanceof Error ? error.message : String(error)}`,
    })
  }

  if (!isRecord(parsed)) {
    throw loadError(CoreErrorCodes.MALFORMED_DOCUMENT, {
      source: filePath,
      message: "Presets document must be a JSON object",
    })
  }

  ensureSupportedVersion(parsed.version, filePath)

  const result = PresetDocumentSchema.safeParse(parsed)
  if (!result.success) {
    throw schemaViolation(result.error, filePath)
  }

  const raw: RawPresetDocument = result.data
  if (raw.configurePresets !== undefined && raw.presets !== undefined) {
    throw loadError(CoreErrorCodes.SCHEMA_VIOLATION, {
      source: filePath,
      path: "presets",
      message: "Use either configurePresets or presets, not both",
    })
  }

  const configurePresets = raw.configurePresets ?? raw.presets ?? []

  return {
    version: raw.version,
    configurePresets: configurePresets.map((preset) => fromConfigurePreset(preset, origin)),
    buildPresets: (raw.buildPresets ?? []).map((preset) => fromBuildPreset(preset, origin)),
    runPresets: (raw.runPresets ?? []).map((preset) => fromRunPreset(preset, origin)),
  }
}

const ensureSupportedVersion = (version: unknown, filePath: string): void => {
  if (version === undefined) {
    throw loadError(CoreErrorCodes.SCHEMA_VIOLATION, {
      source: filePath,
      path: "version",
      message: "version field is required",
    })
  }

  if (
    typeof version !== "number" ||
    !Number.isInteger(version) ||
    version < MIN_PRESETS_VERSION ||
    version > MAX_PRESETS_VERSION
  ) {
    throw loadError(CoreErrorCodes.UNSUPPORTED_VERSION, {
      source: filePath,
      path: "version",
      message: `Unsupported presets version ${JSON.stringify(version)} (supported: ${MIN_PRESETS_VERSION}-${MAX_PRESETS_VERSION})`,
      details: { version, min: MIN_PRESETS_VERSION, max: MAX_PRESETS_VERSION },
    })
  }
}

const schemaViolation = (error: z.ZodError, filePath: string): CoreError => {
  const issues = error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }))
  const [first] = issues

  return loadError(CoreErrorCodes.SCHEMA_VIOLATION, {
    source: filePath,
    path: first?.path,
    message: first !== undefined ? `${first.path}: ${first.message}` : "Presets document does not match the schema",
    details: { issues },
  })
}

const ensureUniqueNames = (presets: ReadonlyArray<PresetDefinition>, field: string, filePath: string): void => {
  const seen = new Set<string>()
  presets.forEach((preset, index) => {
    if (seen.has(preset.name)) {
      throw loadError(CoreErrorCodes.SCHEMA_VIOLATION, {
        source: filePath,
        path: `${field}.${index}.name`,
        message: `Duplicate ${preset.kind} preset name "${preset.name}"`,
        details: { name: preset.name, origin: preset.origin },
      })
    }
    seen.add(preset.name)
  })
}

type RawPresetBase = Pick<
  RawConfigurePreset,
  "name" | "displayName" | "description" | "hidden" | "inherits" | "condition" | "environment"
>

const fromBase = (kind: PresetKind, preset: RawPresetBase, origin: PresetOrigin): PresetDefinition => ({
  kind,
  origin,
  name: preset.name,
  displayName: preset.displayName,
  description: preset.description,
  hidden: preset.hidden === true,
  inherits: normalizeList(preset.inherits) ?? [],
  condition: preset.condition ?? undefined,
  environment: preset.environment,
})

const fromConfigurePreset = (preset: RawConfigurePreset, origin: PresetOrigin): PresetDefinition => ({
  ...fromBase("configure", preset, origin),
  generator: preset.generator,
  binaryDir: preset.binaryDir,
  targetExecutable: preset.targetExecutable,
  cacheVariables: normalizeCacheVariables(preset.cacheVariables),
})

const fromBuildPreset = (preset: RawBuildPreset, origin: PresetOrigin): PresetDefinition => ({
  ...fromBase("build", preset, origin),
  configurePreset: preset.configurePreset,
  targets: normalizeList(preset.targets),
  jobs: preset.jobs,
  configuration: preset.configuration,
  cleanFirst: preset.cleanFirst,
  verbose: preset.verbose,
})

const fromRunPreset = (preset: RawRunPreset, origin: PresetOrigin): PresetDefinition => ({
  ...fromBase("run", preset, origin),
  configurePreset: preset.configurePreset,
  targetExecutable: preset.targetExecutable,
  args: preset.args,
  workingDirectory: preset.workingDirectory,
})

const normalizeList = (
  value: string | ReadonlyArray<string> | null | undefined,
): ReadonlyArray<string> | null | undefined => {
  if (typeof value === "string") {
    return [value]
  }
  return value
}

const normalizeCacheVariables = (
  variables: RawConfigurePreset["cacheVariables"],
): Readonly<Record<string, string | null>> | undefined => {
  if (variables === undefined) {
    return undefined
  }

  const normalized: Record<string, string | null> = {}
  for (const [key, value] of Object.entries(variables)) {
    if (value === null) {
      normalized[key] = null
    } else if (typeof value === "object") {
      normalized[key] = cacheValueToString(value.value)
    } else {
      normalized[key] = cacheValueToString(value)
    }
  }
  return normalized
}

const cacheValueToString = (value: string | boolean): string => {
  if (typeof value === "boolean") {
    return value ? "TRUE" : "FALSE"
  }
  return value
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

const loadError = (
  code: CoreErrorCode,
  error: {
    readonly message: string
    readonly source: string
    readonly path?: string
    readonly details?: Readonly<Record<string, unknown>>
  },
): CoreError => createCoreError("load", { code, ...error })
