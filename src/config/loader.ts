import fs from "fs-extra"
import path from "path"
import os from "os"
import type { ToolConfig } from "../models/types"
import { createConfigError, ErrorCodes } from "../utils/errors"
import { CONFIG_FILE_NAME, DEFAULT_TOOL_CONFIG } from "./defaults"
import { validateYAML } from "./validator"

export interface ConfigLoaderOptions {
  readonly configPath?: string
}

export type ConfigLoader = {
  readonly loadConfig: () => Promise<ToolConfig>
  readonly findConfigFile: () => Promise<string | null>
  readonly getSearchPaths: () => string[]
}

/**
 * Search order: CPPFORGE_CONFIG_PATH, then XDG_CONFIG_HOME (or ~/.config).
 */
export const buildDefaultSearchPaths = (): string[] => {
  const paths: string[] = []

  const configDir = process.env.CPPFORGE_CONFIG_PATH
  if (configDir !== undefined && configDir.length > 0) {
    paths.push(path.join(configDir, CONFIG_FILE_NAME))
  }

  paths.push(userConfigPath())

  return [...new Set(paths)]
}

export const userConfigPath = (): string => {
  const homeDir = process.env.HOME ?? os.homedir()
  const xdgConfigHome = process.env.XDG_CONFIG_HOME ?? path.join(homeDir, ".config")
  return path.join(xdgConfigHome, "cppforge", CONFIG_FILE_NAME)
}

export const createConfigLoader = (options: ConfigLoaderOptions = {}): ConfigLoader => {
  const explicitPath = options.configPath

  const getSearchPaths = (): string[] => {
    return explicitPath !== undefined ? [explicitPath] : buildDefaultSearchPaths()
  }

  const findConfigFile = async (): Promise<string | null> => {
    for (const candidate of getSearchPaths()) {
      if (await fs.pathExists(candidate)) {
        return candidate
      }
    }
    return null
  }

  /**
   * Loads the first configuration file found.
   * @throws {ConfigError} When an explicit path does not exist or a file cannot be read
   * @throws {ValidationError} When the file content is invalid
   */
  const loadConfig = async (): Promise<ToolConfig> => {
    const filePath = await findConfigFile()
    if (filePath === null) {
      if (explicitPath !== undefined) {
        throw createConfigError("Configuration file not found", ErrorCodes.CONFIG_NOT_FOUND, {
          searchPaths: getSearchPaths(),
        })
      }
      return DEFAULT_TOOL_CONFIG
    }

    return validateYAML(await safeReadFile(filePath))
  }

  return { loadConfig, findConfigFile, getSearchPaths }
}

const safeReadFile = async (filePath: string): Promise<string> => {
  try {
    return await fs.readFile(filePath, "utf8")
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error)
    throw createConfigError(`Failed to read configuration file`, ErrorCodes.CONFIG_PERMISSION_ERROR, {
      filePath,
      error: errorMessage,
    })
  }
}
