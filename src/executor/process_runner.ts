/**
 * Default process seams: child_process for commands and launches, net for
 * port probes.
 */

import { spawn } from 'child_process';
import * as net from 'net';

import { createLogger } from '../logger';
import type { CommandResult, CommandRunner, LaunchSpec, PortProbe, ProcessLauncher } from './types';

const log = createLogger('process');

export const runCommand: CommandRunner = (command, args, options) => {
    return new Promise<CommandResult>((resolve, reject) => {
        const child = spawn(command, args, { cwd: options.cwd, stdio: ['ignore', 'pipe', 'pipe'] });
        let stdout = '';
        let stderr = '';
        let timedOut = false;

        child.stdout.on('data', (chunk: Buffer) => { stdout += chunk.toString(); });
        child.stderr.on('data', (chunk: Buffer) => { stderr += chunk.toString(); });

        // Hard kill on timeout
        const timer = setTimeout(() => {
            timedOut = true;
            child.kill('SIGKILL');
        }, options.timeoutMs);

        child.on('error', (err) => {
            clearTimeout(timer);
            reject(err);
        });

        child.on('close', (code) => {
            clearTimeout(timer);
            log.debug('Command finished', { command, args, code, timed_out: timedOut });
            resolve({ exitCode: code ?? -1, stdout, stderr, timedOut });
        });
    });
};

export const launchDetached: ProcessLauncher = (launch: LaunchSpec) => {
    const child = spawn(launch.command, launch.args, {
        cwd: launch.cwd,
        env: { ...process.env, ...launch.env },
        detached: true,
        stdio: 'ignore',
    });
    child.on('error', (err) => log.error('Background process error', { command: launch.command, error: err.message }));

    if (child.pid === undefined) {
        throw new Error(`Failed to launch ${launch.command} ${launch.args.join(' ')}`);
    }
    child.unref();
    return child.pid;
};

export const isPortAvailable: PortProbe = (port) => {
    return new Promise<boolean>((resolve) => {
        const server = net.createServer();
        server.once('error', () => resolve(false));
        server.listen(port, () => {
            server.close(() => resolve(true));
        });
    });
};
