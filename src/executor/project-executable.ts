import fs from "fs-extra"
import path from "path"
import { createCoreError, CoreErrorCodes } from "../core/errors"

const PROJECT_COMMAND = /^[ \t]*project[ \t]*\([ \t]*"?([^\s")]+)/im

/**
 * Reads the project name from the first `project(...)` command of a CMakeLists.txt.
 */
export const parseProjectName = (cmakeLists: string): string | undefined => {
  const match = PROJECT_COMMAND.exec(cmakeLists)
  const name = match?.[1]?.split("/")[0]
  return name === undefined || name.length === 0 ? undefined : name
}

/**
 * Locates `<binaryDir>/<project name>` for presets that do not name their executable.
 * @throws {CoreError} PRECONDITION_FAILED when CMakeLists.txt is missing or declares no project
 */
export const resolveProjectExecutable = async ({
  binaryDir,
  cmakeListsPath,
}: {
  readonly binaryDir: string
  readonly cmakeListsPath: string
}): Promise<string> => {
  if (!(await fs.pathExists(cmakeListsPath))) {
    throw createCoreError("execution", {
      code: CoreErrorCodes.PRECONDITION_FAILED,
      message: `Cannot infer the executable: ${cmakeListsPath} not found`,
      path: "run",
      details: { cmakeListsPath, hint: "Pass --executable <path> or set targetExecutable in the preset" },
    })
  }

  const name = parseProjectName(await fs.readFile(cmakeListsPath, "utf8"))
  if (name === undefined) {
    throw createCoreError("execution", {
      code: CoreErrorCodes.PRECONDITION_FAILED,
      message: `Could not find a project() name in ${cmakeListsPath}`,
      path: "run",
      details: { cmakeListsPath },
    })
  }

  return path.join(binaryDir, name)
}
