// src/executor/types.ts

import type { ErrorCode } from '../structured_error';

export type ExecutionStatus = 'completed' | 'blocked' | 'failed';

export interface ExecutionResult {
    status: ExecutionStatus;
    success: boolean;
    logs: string[];
    /** artifact file name → absolute path */
    artifacts: Record<string, string>;
    container_id: string | null;
    process_id: number | null;
    endpoints: string[];
    error: string | null;
    error_code: ErrorCode | null;
    /** seconds */
    execution_time: number;
}

export interface ExecuteOptions {
    skipApproval?: boolean;
}

/* -------------------------------------------------------------------------- */
/* Process seams                                                              */
/* -------------------------------------------------------------------------- */

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
    timedOut: boolean;
}

/** Runs a command to completion. Rejects only when it cannot be started. */
export type CommandRunner = (
    command: string,
    args: string[],
    options: { timeoutMs: number; cwd?: string }
) => Promise<CommandResult>;

export interface LaunchSpec {
    command: string;
    args: string[];
    cwd: string;
    env: Record<string, string>;
}

/** Starts a detached background process and returns its pid. */
export type ProcessLauncher = (launch: LaunchSpec) => number;

/** Resolves true when the TCP port can be bound. */
export type PortProbe = (port: number) => Promise<boolean>;

export interface ExecutorOptions {
    /** Fixed workspace; a temp directory is created when absent */
    workspaceDir?: string;
    skipApproval?: boolean;
    engine?: string;
    containerPrefix?: string;
    /** Internal container port and first port probed when none is declared */
    defaultPort?: number;
    portProbeAttempts?: number;
    runner?: CommandRunner;
    launcher?: ProcessLauncher;
    probe?: PortProbe;
}
