import type { z } from "zod"
import type {
  BuildPresetSchema,
  ConditionTypeSchema,
  ConfigurePresetSchema,
  PresetDocumentSchema,
  PresetKindSchema,
  RunPresetSchema,
  ToolConfigFileSchema,
} from "./schema"

// Raw shapes as they appear on disk, inferred from the zod schemas
export type ToolConfigFile = z.infer<typeof ToolConfigFileSchema>
export type RawPresetDocument = z.infer<typeof PresetDocumentSchema>
export type RawConfigurePreset = z.infer<typeof ConfigurePresetSchema>
export type RawBuildPreset = z.infer<typeof BuildPresetSchema>
export type RawRunPreset = z.infer<typeof RunPresetSchema>
export type PresetKind = z.infer<typeof PresetKindSchema>
export type ConditionType = z.infer<typeof ConditionTypeSchema>

export type Condition = {
  readonly type: ConditionType
  readonly value?: boolean
  readonly lhs?: string
  readonly rhs?: string
  readonly string?: string
  readonly list?: ReadonlyArray<string>
  readonly regex?: string
  readonly conditions?: ReadonlyArray<Condition>
  readonly condition?: Condition
}

/**
 * Tool-wide settings, loaded once at startup and passed explicitly.
 */
export type ToolConfig = {
  readonly presetsPath: string
  readonly defaultGenerator: string
  readonly dockerComposeFile: string
  readonly defaultContainerName: string
  // Compose service started by spinup
  readonly dockerService: string
}

// CLI display information
export type PresetInfo = {
  readonly kind: PresetKind
  readonly name: string
  readonly displayName?: string
  readonly description?: string
}
