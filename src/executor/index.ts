export { createRealExecutor } from "./real-executor"
export { createDryRunExecutor } from "./dry-run-executor"
export { executePipeline } from "./pipeline-runner"
export { formatCommand } from "./invocation"
export { parseProjectName, resolveProjectExecutable } from "./project-executable"
