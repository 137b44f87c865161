import * as YAML from "yaml"
import type { z } from "zod"
import { ToolConfigFileSchema } from "../models/schema"
import type { ToolConfig } from "../models/types"
import { createValidationError, ErrorCodes } from "../utils/errors"
import { toToolConfig } from "./defaults"

/**
 * Parse YAML text into an object
 * @throws {ValidationError} When YAML parsing fails
 */
const parseYAML = (yamlText: string): unknown => {
  try {
    return YAML.parse(yamlText)
  } catch (error) {
    throw createValidationError("Failed to parse YAML", ErrorCodes.CONFIG_PARSE_ERROR, {
      parseError: error instanceof Error ? error.message : String(error),
      yamlSnippet: yamlText.substring(0, 200),
    })
  }
}

const formatZodErrors = (error: z.ZodError): Array<{ path: string; message: string; code: string }> => {
  return error.issues.map((issue) => {
    const path = issue.path.join(".")
    let message = issue.message

    if (issue.code === "unrecognized_keys") {
      message = `Unknown ${issue.keys.length === 1 ? "key" : "keys"}: ${issue.keys.join(", ")}`
    } else if (issue.code === "invalid_type" && issue.expected === "string") {
      message = `${path} must be a string`
    } else if (issue.code === "too_small" && issue.type === "string") {
      message = `${path} must not be empty`
    }

    return { path, message, code: issue.code }
  })
}

/**
 * Validates cppforge.yaml text and converts it to a frozen ToolConfig.
 * An empty document yields the defaults.
 * @throws {ValidationError} When the YAML is malformed or does not match the schema
 */
export const validateYAML = (yamlText: string): ToolConfig => {
  const parsed = parseYAML(yamlText) ?? {}

  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw createValidationError("Configuration must be a YAML mapping", ErrorCodes.CONFIG_PARSE_ERROR, {
      received: Array.isArray(parsed) ? "array" : typeof parsed,
    })
  }

  const result = ToolConfigFileSchema.safeParse(parsed)
  if (!result.success) {
    const issues = formatZodErrors(result.error)
    const primaryMessage = issues[0]?.message ?? "Configuration validation failed"

    throw createValidationError(primaryMessage, ErrorCodes.CONFIG_PARSE_ERROR, {
      issues,
    })
  }

  return toToolConfig(result.data)
}
