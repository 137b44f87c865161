import { expandPreset, type ResolvedConfiguration } from "./expander"
import { resolvePreset, type ResolvePresetInput } from "./resolver"

/**
 * Resolves and expands one preset into its final, immutable configuration.
 */
export const resolveConfiguration = (input: ResolvePresetInput): ResolvedConfiguration => {
  const preset = resolvePreset(input)
  return expandPreset({
    preset,
    scope: { host: input.host, presetName: preset.name, inherited: input.inherited },
  })
}
