import { z } from "zod"
import type { Condition } from "./types"

// Tool configuration (cppforge.yaml)
export const ToolConfigFileSchema = z
  .object({
    cmake: z
      .object({
        presets_path: z.string().min(1).optional(),
        default_generator: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    docker: z
      .object({
        docker_compose_file: z.string().min(1).optional(),
        default_container_name: z.string().min(1).optional(),
        service: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()

export const PresetKindSchema = z.enum(["configure", "build", "run"])

export const ConditionTypeSchema = z.enum([
  "const",
  "equals",
  "notEquals",
  "inList",
  "notInList",
  "matches",
  "notMatches",
  "anyOf",
  "allOf",
  "not",
])

// Recursive condition object; operand presence is checked when the condition is evaluated
export const ConditionSchema: z.ZodType<Condition> = z.lazy(() =>
  z.object({
    type: ConditionTypeSchema,
    value: z.boolean().optional(),
    lhs: z.string().optional(),
    rhs: z.string().optional(),
    string: z.string().optional(),
    list: z.array(z.string()).optional(),
    regex: z.string().optional(),
    conditions: z.array(ConditionSchema).optional(),
    condition: ConditionSchema.optional(),
  }),
)

const NullableString = z.string().nullable().optional()
const NullableBoolean = z.boolean().nullable().optional()

export const EnvironmentSchema = z.record(z.string().nullable())

export const CacheVariableSchema = z
  .union([
    z.string(),
    z.boolean(),
    z.object({
      type: z.string().optional(),
      value: z.union([z.string(), z.boolean()]),
    }),
  ])
  .nullable()

const PresetBaseSchema = z.object({
  name: z.string().min(1),
  displayName: z.string().optional(),
  description: z.string().optional(),
  hidden: z.boolean().optional(),
  inherits: z.union([z.string(), z.array(z.string())]).optional(),
  condition: z.union([z.boolean(), ConditionSchema]).nullable().optional(),
  environment: EnvironmentSchema.optional(),
  vendor: z.record(z.unknown()).optional(),
})

export const ConfigurePresetSchema = PresetBaseSchema.extend({
  generator: NullableString,
  binaryDir: NullableString,
  cacheVariables: z.record(CacheVariableSchema).optional(),
  targetExecutable: NullableString,
})

export const BuildPresetSchema = PresetBaseSchema.extend({
  configurePreset: NullableString,
  targets: z.union([z.string(), z.array(z.string())]).nullable().optional(),
  jobs: z.number().int().positive().nullable().optional(),
  configuration: NullableString,
  cleanFirst: NullableBoolean,
  verbose: NullableBoolean,
})

export const RunPresetSchema = PresetBaseSchema.extend({
  configurePreset: NullableString,
  targetExecutable: NullableString,
  args: z.array(z.string()).nullable().optional(),
  workingDirectory: NullableString,
})

export const PresetDocumentSchema = z.object({
  version: z.number().int(),
  configurePresets: z.array(ConfigurePresetSchema).optional(),
  // Accepted alias for configurePresets
  presets: z.array(ConfigurePresetSchema).optional(),
  buildPresets: z.array(BuildPresetSchema).optional(),
  runPresets: z.array(RunPresetSchema).optional(),
})
