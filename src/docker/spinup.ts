import { execa } from "execa"
import fs from "fs-extra"
import path from "path"
import type { ProcessExecutor } from "../contracts"
import { formatCommand } from "../executor/invocation"
import type { ToolConfig } from "../models/types"
import { createEnvironmentError, ErrorCodes } from "../utils/errors"
import type { Logger } from "../utils/logger"

export type DockerProbe = () => Promise<boolean>

/**
 * Checks that `docker compose` is installed and answers.
 */
export const probeDockerCompose: DockerProbe = async () => {
  try {
    await execa("docker", ["compose", "version"], { stdio: "ignore" })
    return true
  } catch {
    // Missing binary or a failing plugin both mean compose is unusable
    return false
  }
}

export type SpinupInput = {
  readonly toolConfig: ToolConfig
  readonly cwd: string
  readonly env: Readonly<Record<string, string | undefined>>
  readonly executor: ProcessExecutor
  readonly logger: Logger
  readonly probe?: DockerProbe
}

/**
 * Starts the configured compose service with `docker compose up -d <service>`.
 * The project directory is exported to the compose file as PROJECT_DIR.
 * @throws {EnvironmentError} When docker is unavailable, the compose file is missing, or compose fails
 */
export const spinup = async ({
  toolConfig,
  cwd,
  env,
  executor,
  logger,
  probe = probeDockerCompose,
}: SpinupInput): Promise<void> => {
  const composeFile = path.resolve(cwd, toolConfig.dockerComposeFile)
  if (!(await fs.pathExists(composeFile))) {
    throw createEnvironmentError("Compose file not found", ErrorCodes.COMPOSE_FILE_NOT_FOUND, { composeFile })
  }

  if (!executor.isDryRun() && !(await probe())) {
    throw createEnvironmentError("Docker Compose is not installed or not working", ErrorCodes.DOCKER_NOT_INSTALLED)
  }

  logger.info(`Using project directory: ${cwd}`)

  const args = ["compose", "-f", composeFile, "up", "-d", toolConfig.dockerService]
  const invocationEnv: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      invocationEnv[key] = value
    }
  }

  const exitCode = await executor.execute({
    file: "docker",
    args,
    cwd,
    env: { ...invocationEnv, PROJECT_DIR: cwd },
  })

  if (exitCode !== 0) {
    throw createEnvironmentError("Failed to start the development container", ErrorCodes.DOCKER_COMMAND_FAILED, {
      command: formatCommand("docker", args),
      exitCode,
    })
  }

  const container = toolConfig.defaultContainerName
  logger.success(`Container ${container} started`)
  logger.info(`Attach with: docker exec -it ${container} zsh`)
}
