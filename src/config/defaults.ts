import type { ToolConfig, ToolConfigFile } from "../models/types"

export const CONFIG_FILE_NAME = "cppforge.yaml"

export const DEFAULT_TOOL_CONFIG: ToolConfig = Object.freeze({
  presetsPath: "CMakePresets.json",
  defaultGenerator: "Ninja",
  dockerComposeFile: "docker-compose.yml",
  defaultContainerName: "gcc-clang-dev",
  dockerService: "dev",
})

/**
 * Applies defaults to a validated file and freezes the result.
 */
export const toToolConfig = (file: ToolConfigFile): ToolConfig => {
  return Object.freeze({
    presetsPath: file.cmake?.presets_path ?? DEFAULT_TOOL_CONFIG.presetsPath,
    defaultGenerator: file.cmake?.default_generator ?? DEFAULT_TOOL_CONFIG.defaultGenerator,
    dockerComposeFile: file.docker?.docker_compose_file ?? DEFAULT_TOOL_CONFIG.dockerComposeFile,
    defaultContainerName: file.docker?.default_container_name ?? DEFAULT_TOOL_CONFIG.defaultContainerName,
    dockerService: file.docker?.service ?? DEFAULT_TOOL_CONFIG.dockerService,
  })
}

/**
 * YAML written by `cppforge setup`.
 */
export const renderDefaultConfig = (): string => {
  return [
    "cmake:",
    `  presets_path: ${DEFAULT_TOOL_CONFIG.presetsPath}`,
    `  default_generator: ${DEFAULT_TOOL_CONFIG.defaultGenerator}`,
    "docker:",
    `  docker_compose_file: ${DEFAULT_TOOL_CONFIG.dockerComposeFile}`,
    `  default_container_name: ${DEFAULT_TOOL_CONFIG.defaultContainerName}`,
    `  service: ${DEFAULT_TOOL_CONFIG.dockerService}`,
    "",
  ].join("\n")
}
