import { Command, CommanderError } from "commander"
import { createRequire } from "module"
import type { PresetManager, ProcessExecutor } from "../contracts"
import { createConfigLoader } from "../config/loader"
import { writeDefaultConfig } from "../config/setup"
import {
  createHostContext,
  isPresetEnabled,
  planPipeline,
  type PipelinePlan,
  type PipelineVerb,
} from "../core/index"
import { spinup, type DockerProbe } from "../docker/spinup"
import { createDryRunExecutor, createRealExecutor, executePipeline } from "../executor/index"
import type { ToolConfig } from "../models/types"
import { createPresetManager } from "../presets/preset-manager"
import { createLogger, LogLevel, type Logger } from "../utils/logger"
import { parsePresetKind, renderDryRun, renderPresetList } from "./command-helpers"
import { createCliErrorHandlers } from "./error-handling"
import { loadPackageVersion } from "./package-version"

export type CLIOptions = {
  readonly presetManager?: PresetManager
  readonly createProcessExecutor?: (options: { verbose: boolean; dryRun: boolean }) => ProcessExecutor
  readonly loadToolConfig?: (configPath: string | undefined) => Promise<ToolConfig>
  readonly dockerProbe?: DockerProbe
  readonly cwd?: string
  readonly env?: Readonly<Record<string, string | undefined>>
  readonly platform?: NodeJS.Platform
}

export type CLI = {
  run(args?: string[]): Promise<number>
}

type RuntimeOptions = {
  readonly verbose?: boolean
  readonly dryRun?: boolean
  readonly config?: string
  readonly presets?: string
}

type PipelineCommandOptions = {
  readonly preset: string
  readonly exportCompileCommands?: boolean
  readonly executable?: string
}

const VERB_DESCRIPTIONS: Readonly<Record<PipelineVerb, string>> = {
  generate: "Configure the build tree for a preset",
  build: "Build a preset's binary directory",
  run: "Run the executable built for a preset",
  "build-run": "Build a preset, then run its executable",
}

export const createCli = (options: CLIOptions = {}): CLI => {
  const cwd = options.cwd ?? process.cwd()
  const env = options.env ?? process.env
  const platform = options.platform ?? process.platform
  const presetManager = options.presetManager ?? createPresetManager({ cwd })
  const createProcessExecutor =
    options.createProcessExecutor ??
    ((opts: { verbose: boolean; dryRun: boolean }): ProcessExecutor => {
      if (opts.dryRun) {
        return createDryRunExecutor({ verbose: opts.verbose })
      }
      return createRealExecutor({ verbose: opts.verbose })
    })
  const loadToolConfig =
    options.loadToolConfig ??
    ((configPath: string | undefined): Promise<ToolConfig> => createConfigLoader({ configPath }).loadConfig())

  const program = new Command()
  const require = createRequire(import.meta.url)
  const version = loadPackageVersion(require)
  let logger: Logger = createLogger()
  let runtime: RuntimeOptions = {}
  const errorHandlers = createCliErrorHandlers({
    getLogger: () => logger,
  })

  const applyRuntimeOptions = (runtimeOptions: RuntimeOptions): void => {
    runtime = runtimeOptions
    if (runtimeOptions.verbose === true) {
      logger = createLogger({ level: LogLevel.INFO })
    } else {
      logger = createLogger()
    }
  }

  const createExecutor = (): ProcessExecutor => {
    return createProcessExecutor({
      verbose: runtime.verbose === true,
      dryRun: runtime.dryRun === true,
    })
  }

  /**
   * `--presets` wins over the tool config's presets_path.
   */
  const loadPresets = async (toolConfig: ToolConfig): Promise<void> => {
    const presetsPath = runtime.presets ?? toolConfig.presetsPath
    if (typeof presetManager.setPresetsPath === "function") {
      presetManager.setPresetsPath(presetsPath)
    }
    await presetManager.loadDocument()
  }

  const listPresets = async (kindOption: string | undefined): Promise<number> => {
    try {
      const kind = parsePresetKind(kindOption)
      await loadPresets(await loadToolConfig(runtime.config))
      const document = presetManager.getDocument()
      const host = createHostContext({ document, env, platform })
      // Presets whose condition is false on this host cannot be selected here
      const presets = presetManager
        .listPresets(kind)
        .filter((preset) => isPresetEnabled({ document, kind: preset.kind, name: preset.name, host }))

      if (presets.length === 0) {
        logger.warn("No presets defined")
        return 0
      }

      renderPresetList(presets)
      return 0
    } catch (error) {
      return errorHandlers.handlePipelineFailure(error)
    }
  }

  const executeVerb = async (verb: PipelineVerb, commandOptions: PipelineCommandOptions): Promise<number> => {
    try {
      const toolConfig = await loadToolConfig(runtime.config)
      await loadPresets(toolConfig)
      const document = presetManager.getDocument()

      let plan: PipelinePlan
      try {
        plan = planPipeline({
          verb,
          presetName: commandOptions.preset,
          document,
          host: createHostContext({ document, env, platform }),
          settings: {
            defaultGenerator: toolConfig.defaultGenerator,
            exportCompileCommands: commandOptions.exportCompileCommands === true,
            executable: commandOptions.executable,
          },
        })
      } catch (error) {
        return errorHandlers.handlePipelineFailure(error)
      }

      const executor = createExecutor()
      if (executor.isDryRun()) {
        console.log("[DRY RUN] No actual commands will be executed")
        renderDryRun(plan)
      }

      try {
        const result = await executePipeline({ plan, executor, logger })
        logger.info(`Executed ${result.executedSteps} step(s)`)
      } catch (error) {
        return errorHandlers.handlePipelineFailure(error)
      }

      logger.success(`Finished ${verb} for preset "${plan.presetName}"`)
      return 0
    } catch (error) {
      return errorHandlers.handlePipelineFailure(error)
    }
  }

  const setupConfig = async (): Promise<number> => {
    try {
      const result = await writeDefaultConfig(runtime.config)
      if (result.created) {
        logger.success(`Created ${result.filePath}`)
      } else {
        logger.warn(`Configuration file already exists: ${result.filePath}`)
      }
      return 0
    } catch (error) {
      return errorHandlers.handleError(error)
    }
  }

  const startContainer = async (): Promise<number> => {
    try {
      const toolConfig = await loadToolConfig(runtime.config)
      await spinup({
        toolConfig,
        cwd,
        env,
        executor: createExecutor(),
        logger,
        probe: options.dockerProbe,
      })
      return 0
    } catch (error) {
      return errorHandlers.handleError(error)
    }
  }

  const registerVerb = (verb: PipelineVerb): Command => {
    return program
      .command(verb)
      .description(VERB_DESCRIPTIONS[verb])
      .requiredOption("--preset <name>", "Preset name")
      .action(async (commandOptions: PipelineCommandOptions) => {
        lastExitCode = await executeVerb(verb, commandOptions)
      })
  }

  const setupProgram = (): void => {
    program.exitOverride()

    program
      .name("cppforge")
      .description("CMake preset resolution and build orchestration for C++ projects")
      .version(version, "-v, --version", "Show version")
      .helpOption("-h, --help", "Show help")

    program.option("--verbose", "Show detailed logs", false)
    program.option("--dry-run", "Display commands without executing", false)
    program.option("--config <path>", "Path to cppforge.yaml")
    program.option("--presets <path>", "Path to the CMake presets file")
    program.hook("preAction", (_thisCommand, actionCommand) => {
      applyRuntimeOptions(actionCommand.optsWithGlobals<RuntimeOptions>())
    })

    registerVerb("generate").option(
      "--export-compile-commands",
      "Write compile_commands.json into the binary directory",
      false,
    )
    registerVerb("build")
    registerVerb("run").option("--executable <path>", "Executable to run, relative to the source directory")
    registerVerb("build-run").option("--executable <path>", "Executable to run, relative to the source directory")

    program
      .command("list")
      .description("List available presets")
      .option("--kind <kind>", "Only list presets of this kind (configure, build or run)")
      .action(async (commandOptions: { kind?: string }) => {
        lastExitCode = await listPresets(commandOptions.kind)
      })

    program
      .command("setup")
      .description("Write the default cppforge.yaml")
      .action(async () => {
        lastExitCode = await setupConfig()
      })

    program
      .command("spinup")
      .description("Start the development container with docker compose")
      .action(async () => {
        lastExitCode = await startContainer()
      })
  }

  let lastExitCode = 0
  setupProgram()

  const run = async (args: string[] = process.argv.slice(2)): Promise<number> => {
    lastExitCode = 0
    runtime = {}
    logger = createLogger()

    try {
      await program.parseAsync(args, { from: "user" })
    } catch (error) {
      if (error instanceof CommanderError) {
        return error.exitCode
      }
      return errorHandlers.handleError(error)
    }

    return lastExitCode
  }

  return { run }
}
