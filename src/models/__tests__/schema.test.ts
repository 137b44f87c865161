import { describe, expect, it } from "vitest"
import {
  BuildPresetSchema,
  CacheVariableSchema,
  ConditionSchema,
  ConfigurePresetSchema,
  PresetDocumentSchema,
  ToolConfigFileSchema,
} from "../schema"

describe("Zod schema validation", () => {
  describe("ToolConfigFileSchema", () => {
    it("accepts the cmake and docker sections", () => {
      const result = ToolConfigFileSchema.safeParse({
        cmake: { presets_path: "CMakePresets.json", default_generator: "Ninja" },
        docker: { docker_compose_file: "compose.yml", default_container_name: "dev" },
      })

      expect(result.success).toBe(true)
    })

    it("rejects unknown keys inside a section", () => {
      const result = ToolConfigFileSchema.safeParse({ cmake: { generator: "Ninja" } })

      expect(result.success).toBe(false)
    })

    it("rejects empty strings", () => {
      expect(ToolConfigFileSchema.safeParse({ docker: { docker_compose_file: "" } }).success).toBe(false)
    })
  })

  describe("ConditionSchema", () => {
    it("accepts nested conditions", () => {
      const condition = {
        type: "allOf",
        conditions: [
          { type: "equals", lhs: "${hostSystemName}", rhs: "Linux" },
          { type: "not", condition: { type: "inList", string: "a", list: ["b", "c"] } },
        ],
      }

      expect(ConditionSchema.parse(condition)).toEqual(condition)
    })

    it("rejects unknown condition types", () => {
      expect(ConditionSchema.safeParse({ type: "greaterThan" }).success).toBe(false)
    })
  })

  describe("preset schemas", () => {
    it("accepts string, boolean and typed cache variables", () => {
      expect(CacheVariableSchema.parse("ON")).toBe("ON")
      expect(CacheVariableSchema.parse(true)).toBe(true)
      expect(CacheVariableSchema.parse({ type: "BOOL", value: "OFF" })).toEqual({ type: "BOOL", value: "OFF" })
      expect(CacheVariableSchema.parse(null)).toBeNull()
    })

    it("keeps explicit nulls on configure presets", () => {
      const preset = ConfigurePresetSchema.parse({ name: "child", binaryDir: null, inherits: ["a", "b"] })

      expect(preset.binaryDir).toBeNull()
      expect(preset.inherits).toEqual(["a", "b"])
    })

    it("requires positive integer jobs on build presets", () => {
      expect(BuildPresetSchema.safeParse({ name: "b", jobs: 0 }).success).toBe(false)
      expect(BuildPresetSchema.safeParse({ name: "b", jobs: 2.5 }).success).toBe(false)
      expect(BuildPresetSchema.safeParse({ name: "b", jobs: 4 }).success).toBe(true)
    })

    it("requires a non-empty name", () => {
      expect(ConfigurePresetSchema.safeParse({ name: "" }).success).toBe(false)
    })

    it("requires an integer version", () => {
      expect(PresetDocumentSchema.safeParse({ version: "6" }).success).toBe(false)
      expect(PresetDocumentSchema.safeParse({ version: 6 }).success).toBe(true)
    })
  })
})
