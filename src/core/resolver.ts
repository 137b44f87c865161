import type { PresetKind } from "../models/types"
import { evaluateCondition } from "./condition"
import { presetsOfKind, type PresetCondition, type PresetDefinition, type PresetDocument, type PresetFields } from "./document"
import { createCoreError, CoreErrorCodes } from "./errors"
import { expandString, type InheritedScope } from "./expander"
import type { HostContext } from "./host"

/**
 * Preset fields after inheritance. Unset fields are absent; maps are always present.
 */
export type MergedFields = {
  readonly generator?: string
  readonly binaryDir?: string
  readonly targetExecutable?: string
  readonly configurePreset?: string
  readonly configuration?: string
  readonly workingDirectory?: string
  readonly jobs?: number
  readonly cleanFirst?: boolean
  readonly verbose?: boolean
  readonly targets?: ReadonlyArray<string>
  readonly args?: ReadonlyArray<string>
  readonly cacheVariables: Readonly<Record<string, string>>
  readonly environment: Readonly<Record<string, string>>
}

export type MergedPreset = {
  readonly kind: PresetKind
  readonly name: string
  readonly displayName?: string
  readonly description?: string
  readonly fields: MergedFields
  readonly condition?: PresetCondition
}

export type ResolvePresetInput = {
  readonly document: PresetDocument
  readonly kind: PresetKind
  readonly name: string
  readonly host: HostContext
  readonly inherited?: InheritedScope
  readonly allowHidden?: boolean
}

export const EMPTY_FIELDS: MergedFields = Object.freeze({
  cacheVariables: Object.freeze({}),
  environment: Object.freeze({}),
})

/**
 * Merges the inheritance chain of one preset without selecting it.
 *
 * The preset's own fields come first, then each parent's merged chain in declaration
 * order; the first layer that defines a field or key wins, an explicit `null` included.
 * Nulls are dropped only from the final result.
 * @throws {CoreError} PRESET_NOT_FOUND or INHERITANCE_CYCLE
 */
export const mergePresetChain = ({
  document,
  kind,
  name,
}: Pick<ResolvePresetInput, "document" | "kind" | "name">): MergedPreset => {
  const presets = new Map(presetsOfKind(document, kind).map((preset) => [preset.name, preset] as const))
  const target = presets.get(name)

  if (target === undefined) {
    throw createCoreError("resolve", {
      code: CoreErrorCodes.PRESET_NOT_FOUND,
      message: `${capitalize(kind)} preset "${name}" not found`,
      source: name,
      details: {
        kind,
        available: [...presets.values()].filter((preset) => !preset.hidden).map((preset) => preset.name),
      },
    })
  }

  const memo = new Map<string, PresetFields>()

  const walk = (preset: PresetDefinition, onPath: ReadonlyArray<string>): PresetFields => {
    const cached = memo.get(preset.name)
    if (cached !== undefined) {
      return cached
    }

    const path = [...onPath, preset.name]
    let merged = fieldsOf(preset)
    for (const parentName of preset.inherits) {
      if (path.includes(parentName)) {
        const cycle = [...path.slice(path.indexOf(parentName)), parentName]
        throw createCoreError("resolve", {
          code: CoreErrorCodes.INHERITANCE_CYCLE,
          message: `Inheritance cycle detected: ${cycle.join(" -> ")}`,
          source: name,
          path: `${preset.name}.inherits`,
          details: { kind, cycle },
        })
      }

      const parent = presets.get(parentName)
      if (parent === undefined) {
        throw createCoreError("resolve", {
          code: CoreErrorCodes.PRESET_NOT_FOUND,
          message: `${capitalize(kind)} preset "${preset.name}" inherits unknown preset "${parentName}"`,
          source: name,
          path: `${preset.name}.inherits`,
          details: { kind, parent: parentName },
        })
      }

      merged = underlayFields(merged, walk(parent, path))
    }

    memo.set(preset.name, merged)
    return merged
  }

  return {
    kind,
    name: target.name,
    displayName: target.displayName,
    description: target.description,
    fields: mergeFields(EMPTY_FIELDS, walk(target, [])),
    condition: target.condition,
  }
}

/**
 * Resolves a selectable preset: merges its inheritance chain, then checks its condition.
 * @throws {CoreError} PRESET_NOT_FOUND, PRESET_HIDDEN, INHERITANCE_CYCLE,
 *   CONDITION_UNSATISFIED, INVALID_CONDITION
 */
export const resolvePreset = ({
  document,
  kind,
  name,
  host,
  inherited,
  allowHidden = false,
}: ResolvePresetInput): MergedPreset => {
  const merged = mergePresetChain({ document, kind, name })
  const hidden = presetsOfKind(document, kind).some((preset) => preset.name === name && preset.hidden)

  if (hidden && !allowHidden) {
    throw createCoreError("resolve", {
      code: CoreErrorCodes.PRESET_HIDDEN,
      message: `${capitalize(kind)} preset "${name}" is hidden and can only be inherited`,
      source: name,
      details: { kind },
    })
  }

  if (!conditionHolds(merged, host, inherited)) {
    throw createCoreError("resolve", {
      code: CoreErrorCodes.CONDITION_UNSATISFIED,
      message: `${capitalize(kind)} preset "${name}" is not enabled on this host`,
      source: name,
      path: "condition",
      details: { kind, hostSystemName: host.hostSystemName },
    })
  }

  return merged
}

/**
 * Whether a preset's own condition holds on this host. Hidden presets are not rejected.
 * @throws {CoreError} PRESET_NOT_FOUND, INHERITANCE_CYCLE or INVALID_CONDITION
 */
export const isPresetEnabled = ({
  document,
  kind,
  name,
  host,
}: Pick<ResolvePresetInput, "document" | "kind" | "name" | "host">): boolean => {
  return conditionHolds(mergePresetChain({ document, kind, name }), host)
}

const conditionHolds = (merged: MergedPreset, host: HostContext, inherited?: InheritedScope): boolean => {
  const scope = { host, presetName: merged.name, inherited }
  return evaluateCondition(merged.condition, (value, path) => expandString({ value, path, preset: merged, scope }))
}

const fieldsOf = (preset: PresetFields): PresetFields => underlayFields({}, preset)

/**
 * Fills the fields and map keys `top` leaves undefined from `bottom`.
 * A `null` in `top` is kept as an unset marker.
 */
const underlayFields = (top: PresetFields, bottom: PresetFields): PresetFields => ({
  generator: top.generator !== undefined ? top.generator : bottom.generator,
  binaryDir: top.binaryDir !== undefined ? top.binaryDir : bottom.binaryDir,
  targetExecutable: top.targetExecutable !== undefined ? top.targetExecutable : bottom.targetExecutable,
  configurePreset: top.configurePreset !== undefined ? top.configurePreset : bottom.configurePreset,
  configuration: top.configuration !== undefined ? top.configuration : bottom.configuration,
  workingDirectory: top.workingDirectory !== undefined ? top.workingDirectory : bottom.workingDirectory,
  jobs: top.jobs !== undefined ? top.jobs : bottom.jobs,
  cleanFirst: top.cleanFirst !== undefined ? top.cleanFirst : bottom.cleanFirst,
  verbose: top.verbose !== undefined ? top.verbose : bottom.verbose,
  targets: top.targets !== undefined ? top.targets : bottom.targets,
  args: top.args !== undefined ? top.args : bottom.args,
  cacheVariables: underlayMap(top.cacheVariables, bottom.cacheVariables),
  environment: underlayMap(top.environment, bottom.environment),
})

const underlayMap = (
  top: Readonly<Record<string, string | null>> | undefined,
  bottom: Readonly<Record<string, string | null>> | undefined,
): Readonly<Record<string, string | null>> | undefined => {
  if (top === undefined || bottom === undefined) {
    return top ?? bottom
  }
  return { ...bottom, ...top }
}

/**
 * Applies one layer over an already merged base.
 * `undefined` keeps the base value, `null` removes it, anything else replaces it.
 */
export const mergeFields = (base: MergedFields, layer: PresetFields): MergedFields => ({
  generator: mergeScalar(base.generator, layer.generator),
  binaryDir: mergeScalar(base.binaryDir, layer.binaryDir),
  targetExecutable: mergeScalar(base.targetExecutable, layer.targetExecutable),
  configurePreset: mergeScalar(base.configurePreset, layer.configurePreset),
  configuration: mergeScalar(base.configuration, layer.configuration),
  workingDirectory: mergeScalar(base.workingDirectory, layer.workingDirectory),
  jobs: mergeScalar(base.jobs, layer.jobs),
  cleanFirst: mergeScalar(base.cleanFirst, layer.cleanFirst),
  verbose: mergeScalar(base.verbose, layer.verbose),
  targets: mergeScalar(base.targets, layer.targets),
  args: mergeScalar(base.args, layer.args),
  cacheVariables: mergeMap(base.cacheVariables, layer.cacheVariables),
  environment: mergeMap(base.environment, layer.environment),
})

const mergeScalar = <T>(base: T | undefined, layer: T | null | undefined): T | undefined => {
  if (layer === undefined) {
    return base
  }
  return layer ?? undefined
}

const mergeMap = (
  base: Readonly<Record<string, string>>,
  layer: Readonly<Record<string, string | null>> | undefined,
): Readonly<Record<string, string>> => {
  if (layer === undefined) {
    return base
  }

  const merged: Record<string, string> = { ...base }
  for (const [key, value] of Object.entries(layer)) {
    if (value === null) {
      delete merged[key]
    } else {
      merged[key] = value
    }
  }
  return merged
}

const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1)
