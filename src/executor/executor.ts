/**
 * Executor: commits an approved IntentIR.
 *
 * Writes the planner's artifacts into a workspace, then builds and runs a
 * container (docker) or launches a background process (local). Failures come
 * back as ExecutionResult data; execute() never rejects.
 *
 * External effects go through three seams (CommandRunner, ProcessLauncher,
 * PortProbe) so callers and tests can substitute them.
 */

import {
    CONTAINER_ENGINE,
    CONTAINER_ID_CHARS,
    CONTAINER_PORT,
    CONTAINER_PREFIX,
    FRAMEWORK_VERSIONS,
    MAX_STDERR_LOG_CHARS,
    PORT_PROBE_ATTEMPTS,
    SKIP_APPROVAL,
    TIMEOUTS,
    WORKSPACE_DIR,
    getLanguageProfile,
} from '../config';
import { clearCorrelation, createLogger, setCorrelation } from '../logger';
import type { ErrorCode } from '../structured_error';
import type { IntentIR } from '../ir';
import { allocatePort } from './port_allocator';
import { isPortAvailable, launchDetached, runCommand } from './process_runner';
import {
    CommandRunner,
    ExecuteOptions,
    ExecutionResult,
    ExecutionStatus,
    ExecutorOptions,
    PortProbe,
    ProcessLauncher,
} from './types';
import { Workspace } from './workspace';

const log = createLogger('executor');

/** Thrown inside execute() to end a run with a tagged failure. */
class ExecutionFailure extends Error {
    constructor(message: string, public readonly code: ErrorCode) {
        super(message);
        this.name = 'ExecutionFailure';
    }
}

interface RunState {
    started: number;
    logs: string[];
    artifacts: Record<string, string>;
    container_id: string | null;
    process_id: number | null;
    endpoints: string[];
    hostPorts: Set<number>;
}

function truncate(text: string, max: number = MAX_STDERR_LOG_CHARS): string {
    const trimmed = text.trim();
    return trimmed.length > max ? `${trimmed.slice(0, max)}...` : trimmed;
}

export class Executor {
    private readonly workspace: Workspace;
    private readonly skipApproval: boolean;
    private readonly engine: string;
    private readonly prefix: string;
    private readonly defaultPort: number;
    private readonly probeAttempts: number;
    private readonly runner: CommandRunner;
    private readonly launcher: ProcessLauncher;
    private readonly probe: PortProbe;

    constructor(options: ExecutorOptions = {}) {
        this.prefix = options.containerPrefix || CONTAINER_PREFIX;
        this.workspace = new Workspace(options.workspaceDir ?? WORKSPACE_DIR, this.prefix);
        this.skipApproval = options.skipApproval ?? SKIP_APPROVAL;
        this.engine = options.engine || CONTAINER_ENGINE;
        this.defaultPort = options.defaultPort ?? CONTAINER_PORT;
        this.probeAttempts = options.portProbeAttempts ?? PORT_PROBE_ATTEMPTS;
        this.runner = options.runner || runCommand;
        this.launcher = options.launcher || launchDetached;
        this.probe = options.probe || isPortAvailable;
    }

    /** Run fn with a fresh executor and remove its workspace afterwards. */
    static async withWorkspace<T>(options: ExecutorOptions, fn: (executor: Executor) => Promise<T>): Promise<T> {
        const executor = new Executor(options);
        try {
            return await fn(executor);
        } finally {
            executor.cleanup();
        }
    }

    /** Workspace directory, or null until something has been written. */
    get workspacePath(): string | null {
        return this.workspace.path;
    }

    cleanup(): boolean {
        return this.workspace.remove();
    }

    async execute(ir: IntentIR, options: ExecuteOptions = {}): Promise<ExecutionResult> {
        const state: RunState = {
            started: Date.now(),
            logs: [],
            artifacts: {},
            container_id: null,
            process_id: null,
            endpoints: [],
            hostPorts: new Set(),
        };
        setCorrelation({ intentId: ir.id, stage: 'execute' });

        try {
            /* ---- approval gate ---- */

            const blocked = this.checkApproval(ir, options.skipApproval ?? this.skipApproval, state);
            if (blocked) return blocked;

            if (ir.generated_code === null || ir.dockerfile === null) {
                throw new ExecutionFailure('No generated artifacts; run the planner first', 'MISSING_ARTIFACTS');
            }

            const runtime = ir.environment.runtime;
            if (runtime === 'kubernetes') {
                throw new ExecutionFailure(`Unsupported runtime: ${runtime}`, 'UNSUPPORTED_RUNTIME');
            }

            this.writeArtifacts(ir, ir.generated_code, ir.dockerfile, state);

            if (runtime === 'docker') {
                await this.runContainer(ir, state);
            } else {
                await this.runLocal(ir, state);
            }

            log.info('Execution completed', { runtime, endpoints: state.endpoints.length });
            return this.finish(state, 'completed', null, null);
        } catch (e: unknown) {
            const code: ErrorCode = e instanceof ExecutionFailure ? e.code : 'INTERNAL';
            const message = e instanceof Error ? e.message : String(e);
            state.logs.push(`Execution failed: ${message}`);
            log.error('Execution failed', { code, error: message });
            return this.finish(state, 'failed', message, code);
        } finally {
            clearCorrelation();
        }
    }

    /* ---------------------------------------------------------------------- */
    /* Steps                                                                  */
    /* ---------------------------------------------------------------------- */

    private checkApproval(ir: IntentIR, skip: boolean, state: RunState): ExecutionResult | null {
        if (ir.amen_approved && ir.execution_mode === 'transactional') return null;

        if (skip) {
            ir.approve();
            state.logs.push('Approval check bypassed: intent auto-approved');
            log.warn('Approval check bypassed; intent auto-approved');
            return null;
        }

        const [message, code]: [string, ErrorCode] = !ir.amen_approved
            ? ['Intent not approved. Call approve() first.', 'APPROVAL_REQUIRED']
            : ['Intent is not in transactional mode', 'NOT_TRANSACTIONAL'];
        state.logs.push(`Blocked: ${message}`);
        log.warn('Execution blocked', { code });
        return this.finish(state, 'blocked', message, code);
    }

    private writeArtifacts(ir: IntentIR, code: string, dockerfile: string, state: RunState): void {
        const profile = getLanguageProfile(ir.implementation.language);
        try {
            state.logs.push(`Workspace: ${this.workspace.ensure()}`);

            const files: [string, string][] = [
                [profile.entryFile, code],
                ['Dockerfile', dockerfile],
            ];
            if (profile.manifest === 'package.json') {
                files.push(['package.json', this.manifest(ir)]);
            }

            for (const [name, content] of files) {
                state.artifacts[name] = this.workspace.write(name, content);
                state.logs.push(`Wrote ${name}`);
            }
            for (const w of this.workspace.warnings.splice(0)) state.logs.push(w);
        } catch (e: unknown) {
            const message = e instanceof Error ? e.message : String(e);
            throw new ExecutionFailure(`Failed to write artifacts: ${message}`, 'FILESYSTEM_ERROR');
        }
    }

    private manifest(ir: IntentIR): string {
        const framework = ir.implementation.framework;
        const dependencies: Record<string, string> = {};
        if (framework) dependencies[framework] = FRAMEWORK_VERSIONS[framework] || 'latest';

        return JSON.stringify({
            name: ir.intent.name.toLowerCase(),
            version: '1.0.0',
            private: true,
            main: getLanguageProfile(ir.implementation.language).entryFile,
            dependencies,
        }, null, 2) + '\n';
    }

    /** Host port for requested, skipping ports already assigned in this run. */
    private async hostPortFor(requested: number, state: RunState): Promise<number> {
        const port = await allocatePort(requested, this.probeAttempts, this.probe, state.hostPorts);
        state.hostPorts.add(port);
        if (port !== requested) {
            state.logs.push(`Port ${requested} in use, using ${port}`);
            log.info('Port substituted', { requested, allocated: port });
        }
        return port;
    }

    private async runContainer(ir: IntentIR, state: RunState): Promise<void> {
        const slug = ir.intent.name.toLowerCase();
        const image = `${this.prefix}-${slug}:latest`;
        const containerName = `${this.prefix}-${slug}-${ir.id}`;
        const workspaceDir = this.workspace.ensure();

        state.logs.push(`Building image ${image}`);
        const build = await this.runner(this.engine, ['build', '-t', image, workspaceDir], {
            timeoutMs: TIMEOUTS.BUILD_MS,
        });
        if (build.exitCode !== 0) {
            const detail = build.timedOut ? 'timed out' : truncate(build.stderr);
            state.logs.push(`Build failed (exit ${build.exitCode}): ${detail}`);
            throw new ExecutionFailure(`Image build failed: ${detail}`, 'BUILD_FAILED');
        }
        state.logs.push(`Built image ${image}`);

        // Best effort: a missing container is the normal case
        try {
            await this.runner(this.engine, ['rm', '-f', containerName], { timeoutMs: TIMEOUTS.REMOVE_MS });
        } catch (e: unknown) {
            log.debug('Container removal skipped', { container: containerName, error: String(e) });
        }

        const ports = ir.environment.ports;
        const primary = ports[0] ?? this.defaultPort;
        const hostPort = await this.hostPortFor(primary, state);

        const args = ['run', '-d', '--name', containerName, '-p', `${hostPort}:${this.defaultPort}`];
        for (const [key, value] of Object.entries(ir.environment.env_vars)) {
            args.push('-e', `${key}=${value}`);
        }
        for (const extra of new Set(ports.slice(1))) {
            if (extra === this.defaultPort) continue;
            const host = await this.hostPortFor(extra, state);
            args.push('-p', `${host}:${extra}`);
        }
        args.push(image);

        const run = await this.runner(this.engine, args, { timeoutMs: TIMEOUTS.RUN_MS });
        if (run.exitCode !== 0) {
            const detail = run.timedOut ? 'timed out' : truncate(run.stderr);
            state.logs.push(`Container start failed (exit ${run.exitCode}): ${detail}`);
            throw new ExecutionFailure(`Container start failed: ${detail}`, 'RUN_FAILED');
        }

        state.container_id = run.stdout.trim().slice(0, CONTAINER_ID_CHARS);
        state.logs.push(`Container started: ${state.container_id} (${containerName})`);
        state.endpoints = this.endpoints(ir, hostPort);
    }

    private async runLocal(ir: IntentIR, state: RunState): Promise<void> {
        const language = ir.implementation.language;
        const profile = getLanguageProfile(language);
        if (!profile.interpreter) {
            throw new ExecutionFailure(`No local interpreter for language '${language}'`, 'UNSUPPORTED_LANGUAGE');
        }

        const port = await this.hostPortFor(ir.environment.ports[0] ?? this.defaultPort, state);

        let pid: number;
        try {
            pid = this.launcher({
                command: profile.interpreter,
                args: [profile.entryFile],
                cwd: this.workspace.ensure(),
                env: { ...ir.environment.env_vars, PORT: String(port) },
            });
        } catch (e: unknown) {
            const message = e instanceof Error ? e.message : String(e);
            throw new ExecutionFailure(message, 'LAUNCH_FAILED');
        }

        state.process_id = pid;
        state.logs.push(`Launched ${profile.interpreter} ${profile.entryFile} (pid ${pid}) on port ${port}`);
        state.endpoints = this.endpoints(ir, port);
    }

    private endpoints(ir: IntentIR, port: number): string[] {
        const base = `http://localhost:${port}`;
        const urls = [base];
        for (const action of ir.implementation.actions) {
            if (action.type === 'api.expose') urls.push(`${base}${action.target}`);
        }
        return urls;
    }

    private finish(
        state: RunState,
        status: ExecutionStatus,
        error: string | null,
        errorCode: ErrorCode | null
    ): ExecutionResult {
        return {
            status,
            success: status === 'completed',
            logs: state.logs,
            artifacts: state.artifacts,
            container_id: state.container_id,
            process_id: state.process_id,
            endpoints: state.endpoints,
            error,
            error_code: errorCode,
            execution_time: (Date.now() - state.started) / 1000,
        };
    }
}
