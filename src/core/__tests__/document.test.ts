import { describe, expect, it } from "vitest"
import { loadPresetDocument } from "../document"
import { isCoreError } from "../errors"
import { captureError, createDocument, PRESETS_FILE } from "./fixtures"

const load = (value: unknown): unknown => {
  return captureError(() => loadPresetDocument({ text: JSON.stringify(value), filePath: PRESETS_FILE }))
}

describe("loadPresetDocument", () => {
  it("parses presets of every kind and derives the source directory", () => {
    const document = createDocument({
      configurePresets: [
        {
          name: "base",
          hidden: true,
          generator: "Ninja",
          cacheVariables: {
            CMAKE_BUILD_TYPE: "Release",
            BUILD_TESTING: true,
            CMAKE_CXX_STANDARD: { type: "STRING", value: "20" },
            UNSET_ME: null,
          },
        },
        { name: "debug", inherits: "base" },
      ],
      buildPresets: [{ name: "debug", configurePreset: "debug", targets: "app", jobs: 4 }],
      runPresets: [{ name: "debug", configurePreset: "debug", args: ["--flag"] }],
    })

    expect(document.version).toBe(6)
    expect(document.sourceDir).toBe("/work/project")
    expect(document.configurePresets.map((preset) => preset.name)).toEqual(["base", "debug"])
    expect(document.configurePresets[0]?.hidden).toBe(true)
    expect(document.configurePresets[0]?.cacheVariables).toEqual({
      CMAKE_BUILD_TYPE: "Release",
      BUILD_TESTING: "TRUE",
      CMAKE_CXX_STANDARD: "20",
      UNSET_ME: null,
    })
    expect(document.configurePresets[1]?.inherits).toEqual(["base"])
    expect(document.buildPresets[0]?.targets).toEqual(["app"])
    expect(document.buildPresets[0]?.jobs).toBe(4)
    expect(document.runPresets[0]?.args).toEqual(["--flag"])
  })

  it("accepts presets as an alias of configurePresets", () => {
    const document = createDocument({ presets: [{ name: "legacy" }] })

    expect(document.configurePresets.map((preset) => preset.name)).toEqual(["legacy"])
    expect(document.buildPresets).toEqual([])
  })

  it("rejects documents declaring both presets and configurePresets", () => {
    const error = load({ version: 3, presets: [{ name: "a" }], configurePresets: [{ name: "b" }] })

    expect(error).toMatchObject({ kind: "load", code: "SCHEMA_VIOLATION", path: "presets" })
  })

  it("reports malformed JSON", () => {
    const error = captureError(() => loadPresetDocument({ text: "{ not json", filePath: PRESETS_FILE }))

    expect(isCoreError(error)).toBe(true)
    expect(error).toMatchObject({ kind: "load", code: "MALFORMED_DOCUMENT", source: PRESETS_FILE })
  })

  it("reports a top-level value that is not an object", () => {
    expect(load([1, 2])).toMatchObject({ code: "MALFORMED_DOCUMENT" })
  })

  it.each([0, 11, 2.5, "3"])("rejects unsupported version %j", (version) => {
    expect(load({ version })).toMatchObject({ kind: "load", code: "UNSUPPORTED_VERSION", path: "version" })
  })

  it("requires a version", () => {
    expect(load({ configurePresets: [] })).toMatchObject({ code: "SCHEMA_VIOLATION", path: "version" })
  })

  it("reports the offending path on schema violations", () => {
    const error = load({ version: 6, configurePresets: [{ name: "a", generator: 42 }] })

    expect(error).toMatchObject({
      kind: "load",
      code: "SCHEMA_VIOLATION",
      path: "configurePresets.0.generator",
    })
  })

  it("rejects duplicate preset names within a kind", () => {
    const error = load({ version: 6, configurePresets: [{ name: "a" }, { name: "a" }] })

    expect(error).toMatchObject({
      code: "SCHEMA_VIOLATION",
      path: "configurePresets.1.name",
      message: 'Duplicate configure preset name "a"',
    })
  })

  it("allows the same name across kinds", () => {
    const document = createDocument({
      configurePresets: [{ name: "dev" }],
      buildPresets: [{ name: "dev", configurePreset: "dev" }],
    })

    expect(document.buildPresets[0]?.configurePreset).toBe("dev")
  })

  it("appends user presets after project presets", () => {
    const document = loadPresetDocument({
      text: JSON.stringify({ version: 6, configurePresets: [{ name: "project" }] }),
      filePath: PRESETS_FILE,
      user: {
        text: JSON.stringify({ version: 6, configurePresets: [{ name: "mine", inherits: ["project"] }] }),
        filePath: "/work/project/CMakeUserPresets.json",
      },
    })

    expect(document.configurePresets.map((preset) => [preset.name, preset.origin])).toEqual([
      ["project", "project"],
      ["mine", "user"],
    ])
  })

  it("rejects user presets that reuse a project preset name", () => {
    const error = captureError(() =>
      loadPresetDocument({
        text: JSON.stringify({ version: 6, configurePresets: [{ name: "dev" }] }),
        filePath: PRESETS_FILE,
        user: {
          text: JSON.stringify({ version: 6, configurePresets: [{ name: "dev" }] }),
          filePath: "/work/project/CMakeUserPresets.json",
        },
      }),
    )

    expect(error).toMatchObject({ code: "SCHEMA_VIOLATION", details: { name: "dev", origin: "user" } })
  })
})
