import { createHostContext, type HostContext } from "../host"
import { loadPresetDocument, type PresetDocument } from "../document"

export const PRESETS_FILE = "/work/project/CMakePresets.json"

export const createDocument = (value: Record<string, unknown>): PresetDocument => {
  return loadPresetDocument({ text: JSON.stringify({ version: 6, ...value }), filePath: PRESETS_FILE })
}

export const createHost = (
  document: PresetDocument,
  env: Readonly<Record<string, string | undefined>> = {},
): HostContext => {
  return createHostContext({ document, env, platform: "linux" })
}

export const captureError = (fn: () => unknown): unknown => {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error("expected failure")
}
