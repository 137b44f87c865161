import type { ProcessExecutor, ProcessInvocation } from "../contracts"
import { createLogger, LogLevel } from "../utils/logger"
import { formatCommand } from "./invocation"

export interface DryRunExecutorOptions {
  readonly verbose?: boolean
}

export const createDryRunExecutor = (options: DryRunExecutorOptions = {}): ProcessExecutor => {
  const verbose = options.verbose ?? false
  const logger = createLogger({
    level: verbose ? LogLevel.INFO : LogLevel.WARN,
    prefix: "[exec] [DRY RUN]",
  })

  return {
    async execute(invocation: ProcessInvocation): Promise<number> {
      logger.info(`Would execute: ${formatCommand(invocation.file, invocation.args)} (cwd: ${invocation.cwd})`)
      return 0
    },
    isDryRun(): boolean {
      return true
    },
  }
}
