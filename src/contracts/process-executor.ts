import type { ProcessInvocation } from "../core/pipeline"

export type { ProcessInvocation }

export type ProcessExecutor = {
  /** Runs one toolchain process to completion and resolves with its exit status. */
  readonly execute: (invocation: ProcessInvocation) => Promise<number>
  readonly isDryRun: () => boolean
}
