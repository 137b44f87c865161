import type { PresetDocument } from "../core/document"
import type { PresetInfo, PresetKind } from "../models/types"

export type PresetManager = {
  readonly loadDocument: () => Promise<PresetDocument>
  readonly getDocument: () => PresetDocument
  readonly listPresets: (kind?: PresetKind) => PresetInfo[]
  readonly setPresetsPath?: (filePath: string) => void
}
