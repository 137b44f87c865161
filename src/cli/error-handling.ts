import { isCoreError, type CoreError } from "../core/index"
import { formatError, isCppforgeError } from "../utils/errors"
import type { Logger } from "../utils/logger"

type CliErrorHandlers = {
  handleCoreError: (error: CoreError) => number
  handleError: (error: unknown) => number
  handlePipelineFailure: (error: unknown) => number
}

/**
 * A failed step exits with the child's own status; everything else exits with 1.
 */
const exitCodeOf = (error: CoreError): number => {
  const exitCode = error.details?.exitCode
  return typeof exitCode === "number" && Number.isInteger(exitCode) && exitCode > 0 ? exitCode : 1
}

export const createCliErrorHandlers = ({ getLogger }: { getLogger: () => Logger }): CliErrorHandlers => {
  const handleCoreError = (error: CoreError): number => {
    const header = [`[${error.kind}]`, `[${error.code}]`]
    if (typeof error.path === "string" && error.path.length > 0) {
      header.push(`[${error.path}]`)
    }

    const lines = [`${header.join(" ")} ${error.message}`.trim()]

    if (typeof error.source === "string" && error.source.length > 0) {
      lines.push(`preset: ${error.source}`)
    }

    const commandDetail = error.details?.command
    if (Array.isArray(commandDetail)) {
      const parts = commandDetail.filter((segment): segment is string => typeof segment === "string")
      if (parts.length > 0) {
        lines.push(`command: ${parts.join(" ")}`)
      }
    } else if (typeof commandDetail === "string" && commandDetail.length > 0) {
      lines.push(`command: ${commandDetail}`)
    }

    const exitCodeDetail = error.details?.exitCode
    if (typeof exitCodeDetail === "number") {
      lines.push(`exitCode: ${exitCodeDetail}`)
    }

    getLogger().error(lines.join("\n"))
    return exitCodeOf(error)
  }

  const handleError = (error: unknown): number => {
    if (isCppforgeError(error)) {
      // The logger adds its own "Error:" prefix
      getLogger().error(formatError(error).replace(/^Error: /, ""), error)
    } else if (error instanceof Error) {
      getLogger().error(error.message, error)
    } else {
      getLogger().error("An unexpected error occurred")
    }

    return 1
  }

  const handlePipelineFailure = (error: unknown): number => {
    if (isCoreError(error)) {
      return handleCoreError(error)
    }
    return handleError(error)
  }

  return {
    handleCoreError,
    handleError,
    handlePipelineFailure,
  }
}
