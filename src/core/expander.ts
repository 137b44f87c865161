import path from "path"
import type { PresetKind } from "../models/types"
import { createCoreError, CoreErrorCodes, type CoreError } from "./errors"
import type { HostContext } from "./host"
import type { MergedFields, MergedPreset } from "./resolver"

/**
 * Macro tokens follow the CMake presets convention:
 * - ${sourceDir}, ${sourceParentDir}, ${sourceDirName}, ${presetName}, ${generator},
 *   ${hostSystemName}, ${fileDir}, ${pathListSep}
 * - $env{NAME} - preset environment first, then the inherited and process environment
 * - $penv{NAME} - process environment only
 */
const TOKEN_PATTERN = /\$(env|penv)\{([^}]*)\}|\$\{([^}]*)\}/g
const TOKEN_PROBE = /\$(?:env|penv)\{[^}]*\}|\$\{[^}]*\}/

/**
 * Values a build or run preset takes over from its configure preset.
 */
export type InheritedScope = {
  readonly generator?: string
  readonly environment: Readonly<Record<string, string>>
}

export type ExpansionScope = {
  readonly host: HostContext
  readonly presetName: string
  readonly inherited?: InheritedScope
}

export type ResolvedConfiguration = {
  readonly kind: PresetKind
  readonly presetName: string
  readonly sourceDir: string
  readonly fields: MergedFields
}

type ExpansionEntry = {
  readonly path: string
  readonly value: string
}

type ExpansionLookup = {
  readonly environment: ReadonlyMap<string, string>
  readonly generator?: string
}

/**
 * Expands every macro token of a merged preset.
 * @throws {CoreError} UNRESOLVED_VARIABLE or EXPANSION_CYCLE
 */
export const expandPreset = ({
  preset,
  scope,
}: {
  readonly preset: MergedPreset
  readonly scope: ExpansionScope
}): ResolvedConfiguration => {
  const expanded = new Map(
    expandEntries(flattenFields(preset.fields), scope).map((entry) => [entry.path, entry.value] as const),
  )
  const take = (entryPath: string, original: string): string => expanded.get(entryPath) ?? original

  const { fields } = preset
  const environment = mapRecord(fields.environment, (key, value) => take(`environment.${key}`, value))

  return Object.freeze({
    kind: preset.kind,
    presetName: preset.name,
    sourceDir: scope.host.sourceDir,
    fields: Object.freeze({
      ...fields,
      generator: mapOptional(fields.generator, (value) => take("generator", value)),
      binaryDir: mapOptional(fields.binaryDir, (value) => take("binaryDir", value)),
      targetExecutable: mapOptional(fields.targetExecutable, (value) => take("targetExecutable", value)),
      configuration: mapOptional(fields.configuration, (value) => take("configuration", value)),
      workingDirectory: mapOptional(fields.workingDirectory, (value) => take("workingDirectory", value)),
      targets: mapOptional(fields.targets, (values) => values.map((value, index) => take(`targets.${index}`, value))),
      args: mapOptional(fields.args, (values) => values.map((value, index) => take(`args.${index}`, value))),
      cacheVariables: mapRecord(fields.cacheVariables, (key, value) => take(`cacheVariables.${key}`, value)),
      environment: { ...scope.inherited?.environment, ...environment },
    }),
  })
}

/**
 * Expands a single string against a merged preset, e.g. a condition operand.
 * Only the operand is expanded; preset fields it refers to are read as written
 * and their own tokens are expanded on later passes.
 */
export const expandString = ({
  value,
  path: valuePath,
  preset,
  scope,
}: {
  readonly value: string
  readonly path: string
  readonly preset: MergedPreset
  readonly scope: ExpansionScope
}): string => {
  const lookup = buildLookup(flattenFields(preset.fields), scope)
  const maxPasses = lookup.environment.size + 2
  let entry: ExpansionEntry = { path: valuePath, value }

  for (let pass = 0; pass < maxPasses; pass += 1) {
    const next = expandOnce(entry, lookup, scope)
    if (next === entry.value) {
      if (TOKEN_PROBE.test(next)) {
        throw expansionCycle(entry, scope)
      }
      return next
    }
    entry = { path: valuePath, value: next }
  }

  throw expansionCycle(entry, scope)
}

/**
 * Each pass rewrites every entry in one left-to-right sweep, reading the previous pass.
 * An acyclic chain settles within one pass per entry, so the cap only trips on cycles.
 */
const expandEntries = (entries: ReadonlyArray<ExpansionEntry>, scope: ExpansionScope): ExpansionEntry[] => {
  const maxPasses = entries.length + 2
  let current: ExpansionEntry[] = [...entries]

  for (let pass = 0; pass < maxPasses; pass += 1) {
    const lookup = buildLookup(current, scope)
    const next = current.map((entry) => ({ path: entry.path, value: expandOnce(entry, lookup, scope) }))
    const settled = next.every((entry, index) => entry.value === current[index]?.value)
    current = next

    if (settled) {
      const residual = current.find((entry) => TOKEN_PROBE.test(entry.value))
      if (residual !== undefined) {
        throw expansionCycle(residual, scope)
      }
      return current
    }
  }

  const unsettled = current.find((entry) => TOKEN_PROBE.test(entry.value)) ?? current[0]
  throw expansionCycle(unsettled ?? { path: "", value: "" }, scope)
}

const buildLookup = (entries: ReadonlyArray<ExpansionEntry>, scope: ExpansionScope): ExpansionLookup => {
  const environment = new Map<string, string>()
  let generator = scope.inherited?.generator

  for (const entry of entries) {
    if (entry.path.startsWith("environment.")) {
      environment.set(entry.path.slice("environment.".length), entry.value)
    } else if (entry.path === "generator") {
      generator = entry.value
    }
  }

  return { environment, generator }
}

const expandOnce = (entry: ExpansionEntry, lookup: ExpansionLookup, scope: ExpansionScope): string => {
  return entry.value.replace(
    TOKEN_PATTERN,
    (match: string, namespace: string | undefined, envName: string | undefined, macroName: string | undefined) => {
      const resolved =
        namespace !== undefined
          ? resolveEnvironmentToken(namespace, envName ?? "", lookup, scope)
          : resolveMacro(macroName ?? "", lookup, scope)

      if (resolved === undefined) {
        throw createCoreError("expand", {
          code: CoreErrorCodes.UNRESOLVED_VARIABLE,
          message: `Unresolved macro ${match} in ${entry.path}`,
          source: scope.presetName,
          path: entry.path,
          details: { token: match, field: entry.path },
        })
      }

      return resolved
    },
  )
}

const resolveEnvironmentToken = (
  namespace: string,
  name: string,
  lookup: ExpansionLookup,
  scope: ExpansionScope,
): string | undefined => {
  if (name.length === 0) {
    return undefined
  }

  if (namespace === "penv") {
    return scope.host.processEnv[name]
  }

  return lookup.environment.get(name) ?? scope.inherited?.environment[name] ?? scope.host.processEnv[name]
}

const resolveMacro = (name: string, lookup: ExpansionLookup, scope: ExpansionScope): string | undefined => {
  const { host } = scope
  switch (name) {
    case "sourceDir":
      return host.sourceDir
    case "sourceParentDir":
      return path.dirname(host.sourceDir)
    case "sourceDirName":
      return path.basename(host.sourceDir)
    case "presetName":
      return scope.presetName
    case "generator":
      return lookup.generator
    case "hostSystemName":
      return host.hostSystemName
    case "fileDir":
      return host.fileDir
    case "pathListSep":
      return host.pathListSep
    default:
      return undefined
  }
}

const flattenFields = (fields: MergedFields): ExpansionEntry[] => {
  const entries: ExpansionEntry[] = []
  const push = (entryPath: string, value: string | undefined): void => {
    if (value !== undefined) {
      entries.push({ path: entryPath, value })
    }
  }

  push("generator", fields.generator)
  push("binaryDir", fields.binaryDir)
  Object.entries(fields.environment).forEach(([key, value]) => push(`environment.${key}`, value))
  Object.entries(fields.cacheVariables).forEach(([key, value]) => push(`cacheVariables.${key}`, value))
  push("targetExecutable", fields.targetExecutable)
  push("configuration", fields.configuration)
  push("workingDirectory", fields.workingDirectory)
  fields.targets?.forEach((value, index) => push(`targets.${index}`, value))
  fields.args?.forEach((value, index) => push(`args.${index}`, value))

  return entries
}

const expansionCycle = (entry: ExpansionEntry, scope: ExpansionScope): CoreError => {
  const token = entry.value.match(TOKEN_PROBE)?.[0]
  return createCoreError("expand", {
    code: CoreErrorCodes.EXPANSION_CYCLE,
    message: `Macro expansion of ${entry.path} refers back to itself${token !== undefined ? ` via ${token}` : ""}`,
    source: scope.presetName,
    path: entry.path,
    details: { token, field: entry.path },
  })
}

const mapOptional = <T, U>(value: T | undefined, map: (value: T) => U): U | undefined => {
  return value === undefined ? undefined : map(value)
}

const mapRecord = (
  record: Readonly<Record<string, string>>,
  map: (key: string, value: string) => string,
): Record<string, string> => {
  return Object.fromEntries(Object.entries(record).map(([key, value]) => [key, map(key, value)]))
}
