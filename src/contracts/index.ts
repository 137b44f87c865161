export type { ProcessExecutor, ProcessInvocation } from "./process-executor"
export type { PresetManager } from "./preset-manager"
