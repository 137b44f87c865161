import chalk from "chalk"

import type { ExecutableTarget, PipelinePlan, PipelineStep } from "../core/index"
import { formatCommand } from "../executor/invocation"
import type { PresetInfo, PresetKind } from "../models/types"
import { createValidationError, ErrorCodes } from "../utils/errors"

const PRESET_KINDS: ReadonlyArray<PresetKind> = ["configure", "build", "run"]

const describeTarget = (target: ExecutableTarget): string => {
  if (target.source === "project") {
    return `${target.binaryDir}/<project() name from ${target.cmakeListsPath}>`
  }
  return target.path
}

const describeStep = (step: PipelineStep): string => {
  if (step.name === "run") {
    return formatCommand(describeTarget(step.target), step.args)
  }
  return formatCommand(step.invocation.file, step.invocation.args)
}

export const renderDryRun = (
  plan: PipelinePlan,
  output: (message: string) => void = (message): void => console.log(message),
): void => {
  output(chalk.bold(`\nPlanned ${plan.verb} steps for preset "${plan.presetName}" (dry-run)`))
  plan.steps.forEach((step, index) => {
    output(` ${index + 1}. [${step.name}] ${describeStep(step)}`)
  })
}

export const parsePresetKind = (value: string | undefined): PresetKind | undefined => {
  if (value === undefined) {
    return undefined
  }
  const kind = PRESET_KINDS.find((candidate) => candidate === value)
  if (kind === undefined) {
    throw createValidationError(
      `Unknown preset kind "${value}". Expected one of: ${PRESET_KINDS.join(", ")}`,
      ErrorCodes.INVALID_ARGUMENT,
      { value, expected: PRESET_KINDS },
    )
  }
  return kind
}

export const renderPresetList = (
  presets: ReadonlyArray<PresetInfo>,
  output: (message: string) => void = (message): void => console.log(message),
): void => {
  output(chalk.bold("Available presets:\n"))

  const maxNameLength = Math.max(...presets.map((preset) => preset.name.length))

  presets.forEach((preset) => {
    const paddedName = preset.name.padEnd(maxNameLength + 2)
    const description = preset.description ?? preset.displayName ?? ""
    output(`  ${chalk.dim(`[${preset.kind}]`.padEnd(12))}${chalk.cyan(paddedName)} ${description}`.trimEnd())
  })
}
