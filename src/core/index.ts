export { loadPresetDocument, presetsOfKind, MAX_PRESETS_VERSION, MIN_PRESETS_VERSION } from "./document"
export { createHostContext, hostSystemNameOf } from "./host"
export { isPresetEnabled, mergeFields, mergePresetChain, resolvePreset } from "./resolver"
export { evaluateCondition } from "./condition"
export { expandPreset, expandString } from "./expander"
export { resolveConfiguration } from "./configuration"
export { binaryDirOf, planPipeline, PIPELINE_VERBS, VERB_STEPS } from "./pipeline"

export type {
  LoadPresetDocumentInput,
  PresetCondition,
  PresetDefinition,
  PresetDocument,
  PresetFields,
  PresetOrigin,
} from "./document"

export type { HostContext } from "./host"
export type { MergedFields, MergedPreset, ResolvePresetInput } from "./resolver"
export type { ConditionExpander } from "./condition"
export type { ExpansionScope, InheritedScope, ResolvedConfiguration } from "./expander"

export type {
  ExecutableTarget,
  PipelinePlan,
  PipelineSettings,
  PipelineStep,
  PipelineStepName,
  PipelineVerb,
  PlanPipelineInput,
  ProcessInvocation,
  RunStep,
  ToolStep,
} from "./pipeline"

export type { CoreError, CoreErrorCode, CoreErrorKind } from "./errors"
export { createCoreError, CoreErrorCodes, isCoreError } from "./errors"
