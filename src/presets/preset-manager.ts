import fs from "fs-extra"
import path from "path"
import type { PresetManager } from "../contracts"
import { loadPresetDocument, presetsOfKind, type PresetDocument } from "../core/document"
import type { PresetInfo, PresetKind } from "../models/types"
import { createConfigError, ErrorCodes } from "../utils/errors"

export const DEFAULT_PRESETS_FILE = "CMakePresets.json"
export const USER_PRESETS_FILE = "CMakeUserPresets.json"

const PRESET_KINDS: ReadonlyArray<PresetKind> = ["configure", "build", "run"]

export type PresetManagerOptions = {
  readonly presetsPath?: string
  readonly cwd?: string
}

/**
 * Reads the presets file, plus a sibling CMakeUserPresets.json when present.
 */
export const createPresetManager = (options: PresetManagerOptions = {}): PresetManager => {
  let presetsPath = options.presetsPath ?? DEFAULT_PRESETS_FILE
  let document: PresetDocument | null = null

  const resolvePresetsPath = (): string => path.resolve(options.cwd ?? process.cwd(), presetsPath)

  const loadDocument = async (): Promise<PresetDocument> => {
    const filePath = resolvePresetsPath()
    if (!(await fs.pathExists(filePath))) {
      throw createConfigError("Presets file not found", ErrorCodes.PRESETS_FILE_NOT_FOUND, { filePath })
    }

    const text = await readPresetsFile(filePath)
    const userPath = path.join(path.dirname(filePath), USER_PRESETS_FILE)
    const user =
      path.basename(filePath) !== USER_PRESETS_FILE && (await fs.pathExists(userPath))
        ? { filePath: userPath, text: await readPresetsFile(userPath) }
        : undefined

    document = loadPresetDocument({ text, filePath, user })
    return document
  }

  const getDocument = (): PresetDocument => {
    if (document === null) {
      throw createConfigError("Presets file not loaded", ErrorCodes.PRESETS_FILE_NOT_FOUND, {
        filePath: resolvePresetsPath(),
      })
    }
    return document
  }

  const listPresets = (kind?: PresetKind): PresetInfo[] => {
    if (document === null) {
      return []
    }

    const loaded = document
    const kinds = kind === undefined ? PRESET_KINDS : [kind]
    return kinds.flatMap((presetKind) =>
      presetsOfKind(loaded, presetKind)
        .filter((preset) => !preset.hidden)
        .map((preset) => ({
          kind: presetKind,
          name: preset.name,
          displayName: preset.displayName,
          description: preset.description,
        })),
    )
  }

  const setPresetsPath = (filePath: string): void => {
    presetsPath = filePath
    document = null
  }

  return { loadDocument, getDocument, listPresets, setPresetsPath }
}

const readPresetsFile = async (filePath: string): Promise<string> => {
  try {
    return await fs.readFile(filePath, "utf8")
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error)
    throw createConfigError("Failed to read presets file", ErrorCodes.PRESETS_FILE_UNREADABLE, {
      filePath,
      error: errorMessage,
    })
  }
}
