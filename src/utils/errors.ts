export type CppforgeError = Error & {
  readonly code: string
  readonly details: Readonly<Record<string, unknown>>
}

export const ErrorCodes = {
  CONFIG_NOT_FOUND: "CONFIG_NOT_FOUND",
  CONFIG_PARSE_ERROR: "CONFIG_PARSE_ERROR",
  CONFIG_PERMISSION_ERROR: "CONFIG_PERMISSION_ERROR",
  PRESETS_FILE_NOT_FOUND: "PRESETS_FILE_NOT_FOUND",
  PRESETS_FILE_UNREADABLE: "PRESETS_FILE_UNREADABLE",
  INVALID_ARGUMENT: "INVALID_ARGUMENT",
  DOCKER_NOT_INSTALLED: "DOCKER_NOT_INSTALLED",
  COMPOSE_FILE_NOT_FOUND: "COMPOSE_FILE_NOT_FOUND",
  DOCKER_COMMAND_FAILED: "DOCKER_COMMAND_FAILED",
} as const

const createBaseError = (
  name: string,
  message: string,
  code: string,
  details: Readonly<Record<string, unknown>> = {},
): CppforgeError => {
  return Object.assign(new Error(message), { name, code, details })
}

export const createConfigError = (
  message: string,
  code: string,
  details: Readonly<Record<string, unknown>> = {},
): CppforgeError => {
  return createBaseError("ConfigError", message, code, details)
}

export const createValidationError = (
  message: string,
  code: string,
  details: Readonly<Record<string, unknown>> = {},
): CppforgeError => {
  return createBaseError("ValidationError", message, code, details)
}

export const createEnvironmentError = (
  message: string,
  code: string,
  details: Readonly<Record<string, unknown>> = {},
): CppforgeError => {
  return createBaseError("EnvironmentError", message, code, details)
}

export const isCppforgeError = (error: unknown): error is CppforgeError => {
  if (!(error instanceof Error)) {
    return false
  }

  if (!("code" in error) || typeof error.code !== "string") {
    return false
  }

  return "details" in error && typeof error.details === "object" && error.details !== null
}

const formatters: Record<string, (error: CppforgeError) => string> = {
  [ErrorCodes.CONFIG_NOT_FOUND]: (error) => {
    const searchPaths = error.details.searchPaths
    if (!Array.isArray(searchPaths)) {
      return ""
    }

    const lines = ["", "Searched in the following locations:"]
    searchPaths.forEach((location) => lines.push(`  - ${String(location)}`))
    lines.push("", "To create a default configuration file, run:")
    lines.push("  cppforge setup")
    return lines.join("\n")
  },
  [ErrorCodes.PRESETS_FILE_NOT_FOUND]: (error) => {
    const filePath = error.details.filePath
    if (typeof filePath !== "string") {
      return ""
    }
    return `\nExpected a presets file at: ${filePath}\nPass --presets <path> or set cmake.presets_path in cppforge.yaml\n`
  },
  [ErrorCodes.DOCKER_NOT_INSTALLED]: () => {
    return "\nDocker with the compose plugin is required.\nCheck that `docker compose version` works in this shell.\n"
  },
  [ErrorCodes.COMPOSE_FILE_NOT_FOUND]: (error) => {
    const composeFile = error.details.composeFile
    if (typeof composeFile !== "string") {
      return ""
    }
    return `\nCompose file: ${composeFile}\nSet docker.docker_compose_file in cppforge.yaml\n`
  },
}

export const formatError = (error: Error): string => {
  if (!isCppforgeError(error)) {
    return `${error.name}: ${error.message}`
  }

  let message = `Error: ${error.message}`

  const formatter = formatters[error.code]
  if (formatter) {
    message += `\n${formatter(error)}`
  }

  const commandDetail = error.details.command
  if (commandDetail !== undefined) {
    message += `\nCommand: ${JSON.stringify(commandDetail)}`
  }

  const stderrDetail = error.details.stderr
  if (stderrDetail !== undefined) {
    message += `\nstderr: ${String(stderrDetail)}`
  }

  const nestedErrors = error.details.issues
  if (Array.isArray(nestedErrors) && nestedErrors.length > 0) {
    message += "\nValidation errors:\n"
    nestedErrors.forEach((item) => {
      message += `  - ${formatIssue(item)}\n`
    })
  }

  return message
}

const formatIssue = (item: unknown): string => {
  if (typeof item === "object" && item !== null && "path" in item && "message" in item) {
    const path = String(item.path)
    return path.length > 0 ? `${path}: ${String(item.message)}` : String(item.message)
  }
  return String(item)
}
