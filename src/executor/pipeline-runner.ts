import fs from "fs-extra"
import path from "path"
import type { ProcessExecutor, ProcessInvocation } from "../contracts"
import { createCoreError, CoreErrorCodes, isCoreError, type CoreError } from "../core/errors"
import type { PipelinePlan, PipelineStep, RunStep, ToolStep } from "../core/pipeline"
import type { Logger } from "../utils/logger"
import { formatCommand } from "./invocation"
import { resolveProjectExecutable } from "./project-executable"

type ExecutePipelineInput = {
  readonly plan: PipelinePlan
  readonly executor: ProcessExecutor
  readonly logger: Logger
}

type ExecutePipelineSuccess = {
  readonly executedSteps: number
}

/**
 * Runs the planned steps strictly in order and stops at the first failure.
 * Preconditions are enforced before each step; a dry-run executor only reports them.
 */
export const executePipeline = async ({
  plan,
  executor,
  logger,
}: ExecutePipelineInput): Promise<ExecutePipelineSuccess> => {
  let executedSteps = 0

  for (const step of plan.steps) {
    const invocation = await prepareStep(step, executor, logger)
    const command = formatCommand(invocation.file, invocation.args)

    logger.info(`[${step.name}] ${command}`)
    const exitCode = await executeCommand(executor, invocation, step)

    if (exitCode !== 0) {
      raiseExecutionError(CoreErrorCodes.STEP_FAILED, {
        message: `${capitalize(step.name)} step failed with exit code ${exitCode}`,
        source: step.presetName,
        path: step.name,
        details: { step: step.name, exitCode, command },
      })
    }

    executedSteps += 1
  }

  return { executedSteps }
}

const prepareStep = async (
  step: PipelineStep,
  executor: ProcessExecutor,
  logger: Logger,
): Promise<ProcessInvocation> => {
  if (step.name === "run") {
    return prepareRunStep(step, executor, logger)
  }
  await checkToolStep(step, executor, logger)
  return step.invocation
}

const checkToolStep = async (step: ToolStep, executor: ProcessExecutor, logger: Logger): Promise<void> => {
  const directory = step.requiresDirectory
  if (directory === undefined || (await fs.pathExists(directory))) {
    return
  }

  enforcePrecondition(
    executor,
    logger,
    createCoreError("execution", {
      code: CoreErrorCodes.PRECONDITION_FAILED,
      message: `Binary directory ${directory} does not exist. Run generate for this preset first`,
      source: step.presetName,
      path: step.name,
      details: { step: step.name, directory },
    }),
  )
}

const prepareRunStep = async (step: RunStep, executor: ProcessExecutor, logger: Logger): Promise<ProcessInvocation> => {
  const executable = await locateExecutable(step, executor, logger)

  if (!(await fs.pathExists(executable))) {
    enforcePrecondition(
      executor,
      logger,
      createCoreError("execution", {
        code: CoreErrorCodes.PRECONDITION_FAILED,
        message: `Executable ${executable} does not exist. Did the build succeed?`,
        source: step.presetName,
        path: step.name,
        details: { step: step.name, executable, source: step.target.source },
      }),
    )
  }

  return { file: executable, args: step.args, cwd: step.cwd, env: step.env }
}

const locateExecutable = async (step: RunStep, executor: ProcessExecutor, logger: Logger): Promise<string> => {
  const { target } = step
  if (target.source !== "project") {
    return target.path
  }

  try {
    return await resolveProjectExecutable(target)
  } catch (error) {
    if (executor.isDryRun() && isCoreError(error)) {
      logger.warn(`[dry-run] ${error.message}`)
      return path.join(target.binaryDir, "<project>")
    }
    throw error
  }
}

const enforcePrecondition = (executor: ProcessExecutor, logger: Logger, error: CoreError): void => {
  if (executor.isDryRun()) {
    logger.warn(`[dry-run] ${error.message}`)
    return
  }
  throw error
}

const executeCommand = async (
  executor: ProcessExecutor,
  invocation: ProcessInvocation,
  step: PipelineStep,
): Promise<number> => {
  try {
    return await executor.execute(invocation)
  } catch (error) {
    if (isCoreError(error)) {
      throw createCoreError(error.kind, {
        code: error.code,
        message: error.message,
        source: error.source ?? step.presetName,
        path: error.path ?? step.name,
        details: { ...error.details, step: step.name },
      })
    }

    return raiseExecutionError(CoreErrorCodes.LAUNCH_FAILURE, {
      message: `Failed to launch ${invocation.file}: ${error instanceof Error ? error.message : String(error)}`,
      source: step.presetName,
      path: step.name,
      details: { step: step.name, command: formatCommand(invocation.file, invocation.args) },
    })
  }
}

const raiseExecutionError = (
  code: typeof CoreErrorCodes.STEP_FAILED | typeof CoreErrorCodes.LAUNCH_FAILURE,
  error: {
    readonly message: string
    readonly source: string
    readonly path: string
    readonly details?: Record<string, unknown>
  },
): never => {
  throw createCoreError("execution", { code, ...error })
}

const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1)
