import type { ProcessExecutor, ProcessInvocation } from "../contracts"

export type MockExecutor = ProcessExecutor & {
  readonly getExecutedInvocations: () => ProcessInvocation[]
  readonly getExecutedCommands: () => string[][]
  /** Exit status returned for invocations whose file or first argument matches `match`. */
  readonly setExitCode: (match: string, exitCode: number) => void
  readonly setLaunchFailure: (match: string, error: unknown) => void
}

export const createMockExecutor = (): MockExecutor => {
  const executed: ProcessInvocation[] = []
  const exitCodes = new Map<string, number>()
  const launchFailures = new Map<string, unknown>()

  const keysOf = (invocation: ProcessInvocation): string[] => {
    const [first] = invocation.args
    return first === undefined ? [invocation.file] : [`${invocation.file} ${first}`, invocation.file]
  }

  return {
    async execute(invocation: ProcessInvocation): Promise<number> {
      executed.push(invocation)
      const keys = keysOf(invocation)

      const failureKey = keys.find((key) => launchFailures.has(key))
      if (failureKey !== undefined) {
        throw launchFailures.get(failureKey)
      }

      const exitKey = keys.find((key) => exitCodes.has(key))
      return exitKey === undefined ? 0 : (exitCodes.get(exitKey) ?? 0)
    },
    isDryRun(): boolean {
      return false
    },
    getExecutedInvocations(): ProcessInvocation[] {
      return executed
    },
    getExecutedCommands(): string[][] {
      return executed.map((invocation) => [invocation.file, ...invocation.args])
    },
    setExitCode(match: string, exitCode: number): void {
      exitCodes.set(match, exitCode)
    },
    setLaunchFailure(match: string, error: unknown): void {
      launchFailures.set(match, error)
    },
  }
}
