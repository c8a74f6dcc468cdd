// src/executor/index.ts

export { Executor } from "./executor";
export { allocatePort } from "./port_allocator";
export { runCommand, launchDetached, isPortAvailable } from "./process_runner";
export { Workspace, atomicWriteFileSync } from "./workspace";
export type {
    CommandResult,
    CommandRunner,
    ExecuteOptions,
    ExecutionResult,
    ExecutionStatus,
    ExecutorOptions,
    LaunchSpec,
    PortProbe,
    ProcessLauncher,
} from "./types";
