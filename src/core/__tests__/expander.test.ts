import { describe, expect, it } from "vitest"
import { createHostContext } from "../host"
import { expandPreset, expandString, type ExpansionScope } from "../expander"
import { EMPTY_FIELDS, type MergedFields, type MergedPreset } from "../resolver"
import { captureError } from "./fixtures"

const host = createHostContext({
  document: { filePath: "/work/project/CMakePresets.json", sourceDir: "/work/project" },
  env: { HOME: "/home/dev", TOOLCHAIN: "/opt/${presetName}" },
  platform: "linux",
})

const scope: ExpansionScope = { host, presetName: "dev" }

const preset = (fields: Partial<MergedFields>): MergedPreset => ({
  kind: "configure",
  name: "dev",
  fields: { ...EMPTY_FIELDS, ...fields },
})

describe("expandPreset", () => {
  it("substitutes every built-in macro", () => {
    const resolved = expandPreset({
      preset: preset({
        generator: "Ninja",
        cacheVariables: {
          SOURCE: "${sourceDir}",
          PARENT: "${sourceParentDir}",
          NAME: "${sourceDirName}",
          PRESET: "${presetName}",
          GEN: "${generator}",
          HOST: "${hostSystemName}",
          FILE_DIR: "${fileDir}",
          SEP: "a${pathListSep}b",
        },
      }),
      scope,
    })

    expect(resolved.fields.cacheVariables).toEqual({
      SOURCE: "/work/project",
      PARENT: "/work",
      NAME: "project",
      PRESET: "dev",
      GEN: "Ninja",
      HOST: "Linux",
      FILE_DIR: "/work/project",
      SEP: "a:b",
    })
    expect(resolved.sourceDir).toBe("/work/project")
    expect(resolved.presetName).toBe("dev")
  })

  it("looks up $env in the preset environment before the process environment", () => {
    const resolved = expandPreset({
      preset: preset({
        environment: { HOME: "/preset/home", BIN: "$env{HOME}/bin" },
        binaryDir: "$penv{HOME}/build",
      }),
      scope,
    })

    expect(resolved.fields.environment).toEqual({ HOME: "/preset/home", BIN: "/preset/home/bin" })
    expect(resolved.fields.binaryDir).toBe("/home/dev/build")
  })

  it("expands chains across fields regardless of declaration order", () => {
    const resolved = expandPreset({
      preset: preset({
        binaryDir: "$env{OUT}/bin",
        environment: { OUT: "$env{ROOT}/out", ROOT: "${sourceDir}" },
      }),
      scope,
    })

    expect(resolved.fields.binaryDir).toBe("/work/project/out/bin")
    expect(resolved.fields.environment.OUT).toBe("/work/project/out")
  })

  it("uses the inherited generator and environment of a configure preset", () => {
    const resolved = expandPreset({
      preset: { kind: "build", name: "dev-build", fields: { ...EMPTY_FIELDS, targets: ["${generator}", "$env{CC}"] } },
      scope: { host, presetName: "dev-build", inherited: { generator: "Ninja", environment: { CC: "clang" } } },
    })

    expect(resolved.fields.targets).toEqual(["Ninja", "clang"])
    expect(resolved.fields.environment).toEqual({ CC: "clang" })
  })

  it("leaves literal values untouched and is idempotent", () => {
    const first = expandPreset({
      preset: preset({ binaryDir: "${sourceDir}/build", args: ["--literal", "$HOME"], jobs: 4 }),
      scope,
    })
    const second = expandPreset({ preset: { kind: "configure", name: "dev", fields: first.fields }, scope })

    expect(first.fields.args).toEqual(["--literal", "$HOME"])
    expect(first.fields.jobs).toBe(4)
    expect(second.fields).toEqual(first.fields)
  })

  it("reports the first unresolved token with its field", () => {
    const error = captureError(() =>
      expandPreset({ preset: preset({ binaryDir: "${sourceDir}/${unknownMacro}" }), scope }),
    )

    expect(error).toMatchObject({
      kind: "expand",
      code: "UNRESOLVED_VARIABLE",
      path: "binaryDir",
      source: "dev",
      details: { token: "${unknownMacro}", field: "binaryDir" },
    })
  })

  it("treats an undefined environment variable as unresolved", () => {
    const error = captureError(() =>
      expandPreset({ preset: preset({ cacheVariables: { X: "$env{NOT_SET}" } }), scope }),
    )

    expect(error).toMatchObject({ code: "UNRESOLVED_VARIABLE", path: "cacheVariables.X" })
  })

  it("re-scans process environment values", () => {
    const resolved = expandPreset({ preset: preset({ binaryDir: "$penv{TOOLCHAIN}" }), scope })

    expect(resolved.fields.binaryDir).toBe("/opt/dev")
  })

  it("reports a self-referencing variable as a cycle", () => {
    const error = captureError(() => expandPreset({ preset: preset({ environment: { FOO: "$env{FOO}" } }), scope }))

    expect(error).toMatchObject({
      kind: "expand",
      code: "EXPANSION_CYCLE",
      path: "environment.FOO",
      details: { token: "$env{FOO}" },
    })
  })

  it("reports mutually referencing variables as a cycle", () => {
    const error = captureError(() =>
      expandPreset({ preset: preset({ environment: { A: "x$env{B}", B: "y$env{A}" } }), scope }),
    )

    expect(error).toMatchObject({ code: "EXPANSION_CYCLE" })
  })
})

describe("expandString", () => {
  it("expands a value against the preset fields", () => {
    const value = expandString({
      value: "$env{CC}-${presetName}",
      path: "condition.lhs",
      preset: preset({ environment: { CC: "gcc" } }),
      scope,
    })

    expect(value).toBe("gcc-dev")
  })

  it("leaves fields the value does not refer to unexpanded", () => {
    const value = expandString({
      value: "${hostSystemName}",
      path: "condition.lhs",
      preset: preset({ environment: { VS: "$env{VSINSTALLDIR}" } }),
      scope,
    })

    expect(value).toBe("Linux")
  })

  it("follows environment entries that refer to other entries", () => {
    const value = expandString({
      value: "$env{OUT}",
      path: "condition.lhs",
      preset: preset({ generator: "Ninja", environment: { OUT: "$env{ROOT}/${generator}", ROOT: "$penv{HOME}" } }),
      scope,
    })

    expect(value).toBe("/home/dev/Ninja")
  })

  it("reports an operand that refers back to itself", () => {
    const error = captureError(() =>
      expandString({ value: "$env{A}", path: "condition.lhs", preset: preset({ environment: { A: "$env{A}" } }), scope }),
    )

    expect(error).toMatchObject({ code: "EXPANSION_CYCLE", path: "condition.lhs" })
  })
})
