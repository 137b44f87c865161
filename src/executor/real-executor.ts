import os from "os"
import { execa } from "execa"
import type { ProcessExecutor, ProcessInvocation } from "../contracts"
import { createCoreError, CoreErrorCodes } from "../core/errors"
import { createLogger, LogLevel } from "../utils/logger"
import { formatCommand } from "./invocation"

export type RealExecutorOptions = {
  readonly verbose?: boolean
}

const SIGNAL_EXIT_BASE = 128

const signalExitCode = (signal: string): number | undefined => {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal)
  return entry === undefined ? undefined : SIGNAL_EXIT_BASE + entry[1]
}

/**
 * Exit status of a finished child, or undefined when it never started.
 */
const exitStatusOf = (error: unknown): number | undefined => {
  if (typeof error !== "object" || error === null) {
    return undefined
  }
  if ("exitCode" in error && typeof error.exitCode === "number") {
    return error.exitCode
  }
  if ("signal" in error && typeof error.signal === "string") {
    return signalExitCode(error.signal)
  }
  return undefined
}

export const createRealExecutor = (options: RealExecutorOptions = {}): ProcessExecutor => {
  const verbose = options.verbose ?? false
  const logger = createLogger({
    level: verbose ? LogLevel.INFO : LogLevel.WARN,
    prefix: "[exec]",
  })

  const execute = async (invocation: ProcessInvocation): Promise<number> => {
    const command = formatCommand(invocation.file, invocation.args)
    logger.info(`Executing: ${command}`)

    const child = execa(invocation.file, [...invocation.args], {
      cwd: invocation.cwd,
      env: invocation.env,
      extendEnv: false,
      stdio: "inherit",
    })

    // Forward interrupts to the running child instead of exiting first
    const forwardInterrupt = (): void => {
      child.kill("SIGINT")
    }
    process.on("SIGINT", forwardInterrupt)

    try {
      const result = await child
      return result.exitCode ?? 0
    } catch (error) {
      const status = exitStatusOf(error)
      if (status !== undefined) {
        return status
      }

      throw createCoreError("execution", {
        code: CoreErrorCodes.LAUNCH_FAILURE,
        message: `Failed to launch ${invocation.file}: ${error instanceof Error ? error.message : String(error)}`,
        path: invocation.file,
        details: { command, cwd: invocation.cwd },
      })
    } finally {
      process.off("SIGINT", forwardInterrupt)
    }
  }

  return {
    execute,
    isDryRun(): boolean {
      return false
    },
  }
}
