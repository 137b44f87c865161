import fs from "fs-extra"
import path from "path"
import { createConfigError, ErrorCodes } from "../utils/errors"
import { renderDefaultConfig } from "./defaults"
import { userConfigPath } from "./loader"

export type SetupResult = {
  readonly filePath: string
  readonly created: boolean
}

/**
 * Writes the default cppforge.yaml unless a file already exists there.
 */
export const writeDefaultConfig = async (filePath: string = userConfigPath()): Promise<SetupResult> => {
  if (await fs.pathExists(filePath)) {
    return { filePath, created: false }
  }

  try {
    await fs.ensureDir(path.dirname(filePath))
    await fs.writeFile(filePath, renderDefaultConfig(), "utf8")
  } catch (error) {
    throw createConfigError("Failed to write configuration file", ErrorCodes.CONFIG_PERMISSION_ERROR, {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    })
  }

  return { filePath, created: true }
}
