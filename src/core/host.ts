import path from "path"
import type { PresetDocument } from "./document"

/**
 * Values the macro expander reads from outside the presets document.
 */
export type HostContext = {
  readonly sourceDir: string
  readonly fileDir: string
  readonly hostSystemName: string
  readonly pathListSep: string
  readonly processEnv: Readonly<Record<string, string | undefined>>
}

const HOST_SYSTEM_NAMES: Readonly<Partial<Record<NodeJS.Platform, string>>> = {
  linux: "Linux",
  darwin: "Darwin",
  win32: "Windows",
  freebsd: "FreeBSD",
  openbsd: "OpenBSD",
  sunos: "SunOS",
  aix: "AIX",
}

export const hostSystemNameOf = (platform: NodeJS.Platform): string => {
  return HOST_SYSTEM_NAMES[platform] ?? platform
}

export const createHostContext = ({
  document,
  env,
  platform,
}: {
  readonly document: Pick<PresetDocument, "filePath" | "sourceDir">
  readonly env: Readonly<Record<string, string | undefined>>
  readonly platform: NodeJS.Platform
}): HostContext => ({
  sourceDir: document.sourceDir,
  fileDir: path.dirname(path.resolve(document.filePath)),
  hostSystemName: hostSystemNameOf(platform),
  pathListSep: platform === "win32" ? ";" : ":",
  processEnv: env,
})
