import path from "path"
import type { PresetKind } from "../models/types"
import { resolveConfiguration } from "./configuration"
import type { PresetDocument } from "./document"
import { createCoreError, CoreErrorCodes } from "./errors"
import type { ResolvedConfiguration } from "./expander"
import type { HostContext } from "./host"
import { mergePresetChain } from "./resolver"

export type PipelineVerb = "generate" | "build" | "run" | "build-run"
export type PipelineStepName = "configure" | "build" | "run"

export const PIPELINE_VERBS: ReadonlyArray<PipelineVerb> = ["generate", "build", "run", "build-run"]

export const VERB_STEPS: Readonly<Record<PipelineVerb, ReadonlyArray<PipelineStepName>>> = {
  generate: ["configure"],
  build: ["build"],
  run: ["run"],
  "build-run": ["build", "run"],
}

export const CMAKE_COMMAND = "cmake"
export const DEFAULT_BINARY_DIR = "build"
export const CMAKE_LISTS_FILE = "CMakeLists.txt"

export type ProcessInvocation = {
  readonly file: string
  readonly args: ReadonlyArray<string>
  readonly cwd: string
  readonly env: Readonly<Record<string, string>>
}

export type ToolStep = {
  readonly name: "configure" | "build"
  readonly presetName: string
  readonly invocation: ProcessInvocation
  readonly requiresDirectory?: string
}

/**
 * Where the run step finds its executable.
 * `project` defers to the project() name in CMakeLists.txt, read when the step runs.
 */
export type ExecutableTarget =
  | { readonly source: "option" | "preset"; readonly path: string }
  | { readonly source: "project"; readonly binaryDir: string; readonly cmakeListsPath: string }

export type RunStep = {
  readonly name: "run"
  readonly presetName: string
  readonly target: ExecutableTarget
  readonly args: ReadonlyArray<string>
  readonly cwd: string
  readonly env: Readonly<Record<string, string>>
}

export type PipelineStep = ToolStep | RunStep

export type PipelinePlan = {
  readonly verb: PipelineVerb
  readonly presetName: string
  readonly steps: ReadonlyArray<PipelineStep>
}

export type PipelineSettings = {
  readonly defaultGenerator: string
  readonly exportCompileCommands?: boolean
  readonly executable?: string
}

export type PlanPipelineInput = {
  readonly verb: PipelineVerb
  readonly presetName: string
  readonly document: PresetDocument
  readonly host: HostContext
  readonly settings: PipelineSettings
}

/**
 * Maps a verb to its ordered steps and resolves each step's invocation.
 * Nothing is executed here; preconditions are recorded on the steps.
 */
export const planPipeline = ({ verb, presetName, document, host, settings }: PlanPipelineInput): PipelinePlan => {
  const steps = VERB_STEPS[verb].map((name): PipelineStep => {
    switch (name) {
      case "configure":
        return planConfigureStep(presetName, document, host, settings)
      case "build":
        return planBuildStep(presetName, document, host)
      case "run":
        return planRunStep(presetName, document, host, settings)
    }
  })

  return { verb, presetName, steps }
}

const planConfigureStep = (
  presetName: string,
  document: PresetDocument,
  host: HostContext,
  settings: PipelineSettings,
): ToolStep => {
  const configure = resolveConfiguration({ document, kind: "configure", name: presetName, host })
  const { fields } = configure

  const args = [
    "-S",
    configure.sourceDir,
    "-B",
    binaryDirOf(configure),
    "-G",
    fields.generator ?? settings.defaultGenerator,
    ...Object.entries(fields.cacheVariables).map(([key, value]) => `-D${key}=${value}`),
  ]
  if (settings.exportCompileCommands === true) {
    args.push("-DCMAKE_EXPORT_COMPILE_COMMANDS=ON")
  }

  return {
    name: "configure",
    presetName: configure.presetName,
    invocation: {
      file: CMAKE_COMMAND,
      args,
      cwd: configure.sourceDir,
      env: invocationEnv(host, fields.environment),
    },
  }
}

const planBuildStep = (presetName: string, document: PresetDocument, host: HostContext): ToolStep => {
  const { configure, preset: build } = resolveWithConfigure("build", presetName, document, host)
  const binaryDir = binaryDirOf(configure)
  const fields = build?.fields

  const args = ["--build", binaryDir]
  if (fields?.configuration !== undefined) {
    args.push("--config", fields.configuration)
  }
  if (fields?.targets !== undefined && fields.targets.length > 0) {
    args.push("--target", ...fields.targets)
  }
  if (fields?.jobs !== undefined) {
    args.push("--parallel", String(fields.jobs))
  }
  if (fields?.cleanFirst === true) {
    args.push("--clean-first")
  }
  if (fields?.verbose === true) {
    args.push("--verbose")
  }

  return {
    name: "build",
    presetName: build?.presetName ?? configure.presetName,
    invocation: {
      file: CMAKE_COMMAND,
      args,
      cwd: configure.sourceDir,
      env: invocationEnv(host, (build ?? configure).fields.environment),
    },
    requiresDirectory: binaryDir,
  }
}

const planRunStep = (
  presetName: string,
  document: PresetDocument,
  host: HostContext,
  settings: PipelineSettings,
): RunStep => {
  const { configure, preset: run } = resolveWithConfigure("run", presetName, document, host)
  const sourceDir = configure.sourceDir
  const targetExecutable = run?.fields.targetExecutable ?? configure.fields.targetExecutable

  let target: ExecutableTarget
  if (settings.executable !== undefined) {
    target = { source: "option", path: path.resolve(sourceDir, settings.executable) }
  } else if (targetExecutable !== undefined) {
    target = { source: "preset", path: path.resolve(sourceDir, targetExecutable) }
  } else {
    target = {
      source: "project",
      binaryDir: binaryDirOf(configure),
      cmakeListsPath: path.join(sourceDir, CMAKE_LISTS_FILE),
    }
  }

  const workingDirectory = run?.fields.workingDirectory
  return {
    name: "run",
    presetName: run?.presetName ?? configure.presetName,
    target,
    args: run?.fields.args ?? [],
    cwd: workingDirectory !== undefined ? path.resolve(sourceDir, workingDirectory) : sourceDir,
    env: invocationEnv(host, (run ?? configure).fields.environment),
  }
}

/**
 * A build or run preset of the requested name takes precedence and names its configure preset.
 * Otherwise the configure preset of that name is used on its own.
 */
const resolveWithConfigure = (
  kind: Exclude<PresetKind, "configure">,
  presetName: string,
  document: PresetDocument,
  host: HostContext,
): { readonly configure: ResolvedConfiguration; readonly preset?: ResolvedConfiguration } => {
  const candidates = kind === "build" ? document.buildPresets : document.runPresets
  if (!candidates.some((preset) => preset.name === presetName)) {
    return { configure: resolveConfiguration({ document, kind: "configure", name: presetName, host }) }
  }

  const configurePresetName = mergePresetChain({ document, kind, name: presetName }).fields.configurePreset
  if (configurePresetName === undefined) {
    throw createCoreError("resolve", {
      code: CoreErrorCodes.MISSING_CONFIGURE_PRESET,
      message: `${kind === "build" ? "Build" : "Run"} preset "${presetName}" does not name a configurePreset`,
      source: presetName,
      path: "configurePreset",
      details: { kind },
    })
  }

  const configure = resolveConfiguration({ document, kind: "configure", name: configurePresetName, host })
  const preset = resolveConfiguration({
    document,
    kind,
    name: presetName,
    host,
    inherited: { generator: configure.fields.generator, environment: configure.fields.environment },
  })

  return { configure, preset }
}

export const binaryDirOf = (configuration: ResolvedConfiguration): string => {
  return path.resolve(configuration.sourceDir, configuration.fields.binaryDir ?? DEFAULT_BINARY_DIR)
}

const invocationEnv = (
  host: HostContext,
  environment: Readonly<Record<string, string>>,
): Readonly<Record<string, string>> => {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(host.processEnv)) {
    if (value !== undefined) {
      env[key] = value
    }
  }
  return { ...env, ...environment }
}
