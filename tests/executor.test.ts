import { describe, test, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import net from 'node:net';
import os from 'node:os';
import path from 'node:path';

import { Executor, allocatePort } from '../src/executor';
import type { CommandResult, CommandRunner, ExecutorOptions, LaunchSpec } from '../src/executor';
import type { IntentIR } from '../src/ir';
import { parseDsl } from '../src/parser';
import { Planner } from '../src/planner';

interface RecordedCall {
    command: string;
    args: string[];
}

const OK: CommandResult = { exitCode: 0, stdout: 'abcdef0123456789\n', stderr: '', timedOut: false };

function fakeRunner(calls: RecordedCall[], respond: (args: string[]) => CommandResult = () => OK): CommandRunner {
    return async (command, args) => {
        calls.push({ command, args });
        return respond(args);
    };
}

const alwaysFree = async (): Promise<boolean> => true;

function plannedIntent(opts: { runtime?: string; language?: string; framework?: string; ports?: number[] } = {}): IntentIR {
    const ports = opts.ports || [8080, 9000];
    const ir = parseDsl(`INTENT:
  name: Ping-Service
  goal: Answer pings
ENVIRONMENT:
  runtime: ${opts.runtime || 'docker'}
  ports: [${ports.join(', ')}]
  env_vars:
    MODE: test
IMPLEMENTATION:
  language: ${opts.language || 'python'}
${opts.framework ? `  framework: ${opts.framework}\n` : ''}  actions:
    - api.expose GET /ping
    - api.expose POST /users
`);
    new Planner().dryRun(ir);
    return ir;
}

describe('Executor', () => {
    let tmpRoot: string;
    let wsDir: string;

    beforeEach(() => {
        tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'executor-test-'));
        wsDir = path.join(tmpRoot, 'ws');
    });

    afterEach(() => {
        fs.rmSync(tmpRoot, { recursive: true, force: true });
    });

    function options(extra: ExecutorOptions = {}): ExecutorOptions {
        return {
            workspaceDir: wsDir,
            skipApproval: false,
            engine: 'docker',
            containerPrefix: 'intent',
            defaultPort: 8000,
            probe: alwaysFree,
            ...extra,
        };
    }

    // ======================================================================
    // Approval gate
    // ======================================================================

    test('unapproved intent is blocked without touching the filesystem', async () => {
        const calls: RecordedCall[] = [];
        const ir = plannedIntent();
        const result = await new Executor(options({ runner: fakeRunner(calls) })).execute(ir);

        assert.equal(result.status, 'blocked');
        assert.equal(result.success, false);
        assert.equal(result.error, 'Intent not approved. Call approve() first.');
        assert.equal(result.error_code, 'APPROVAL_REQUIRED');
        assert.deepEqual(result.artifacts, {});
        assert.equal(fs.existsSync(wsDir), false);
        assert.equal(calls.length, 0);
    });

    test('bypass auto-approves and logs it', async () => {
        const ir = plannedIntent();
        const executor = new Executor(options({ runner: fakeRunner([]) }));
        const result = await executor.execute(ir, { skipApproval: true });

        assert.equal(result.status, 'completed');
        assert.equal(ir.amen_approved, true);
        assert.equal(ir.execution_mode, 'transactional');
        assert.equal(result.logs[0], 'Approval check bypassed: intent auto-approved');
    });

    test('approved intent without a plan fails before creating a workspace', async () => {
        const ir = parseDsl('INTENT:\n  name: bare\n  goal: g\nIMPLEMENTATION:\n  language: python\n');
        ir.approve();
        const result = await new Executor(options({ runner: fakeRunner([]) })).execute(ir);

        assert.equal(result.status, 'failed');
        assert.equal(result.error_code, 'MISSING_ARTIFACTS');
        assert.equal(result.error, 'No generated artifacts; run the planner first');
        assert.equal(fs.existsSync(wsDir), false);
    });

    // ======================================================================
    // Container runtime
    // ======================================================================

    test('docker run builds, replaces and starts the container', async () => {
        const calls: RecordedCall[] = [];
        const ir = plannedIntent();
        ir.approve();

        const result = await new Executor(options({ runner: fakeRunner(calls) })).execute(ir);

        assert.equal(result.status, 'completed');
        assert.equal(result.success, true);
        assert.equal(result.error, null);
        const name = `intent-ping-service-${ir.id}`;
        assert.deepEqual(calls, [
            { command: 'docker', args: ['build', '-t', 'intent-ping-service:latest', wsDir] },
            { command: 'docker', args: ['rm', '-f', name] },
            {
                command: 'docker',
                args: ['run', '-d', '--name', name, '-p', '8080:8000', '-e', 'MODE=test', '-p', '9000:9000', 'intent-ping-service:latest'],
            },
        ]);
        assert.equal(result.container_id, 'abcdef012345');
        assert.equal(result.process_id, null);
        assert.deepEqual(result.endpoints, [
            'http://localhost:8080',
            'http://localhost:8080/ping',
            'http://localhost:8080/users',
        ]);
        assert.deepEqual(Object.keys(result.artifacts), ['app.py', 'Dockerfile']);
        assert.equal(fs.readFileSync(path.join(wsDir, 'app.py'), 'utf8'), ir.generated_code);
        assert.equal(fs.readFileSync(path.join(wsDir, 'Dockerfile'), 'utf8'), ir.dockerfile);
    });

    test('failed build reports truncated stderr and stops', async () => {
        const calls: RecordedCall[] = [];
        const runner = fakeRunner(calls, () => ({ exitCode: 1, stdout: '', stderr: 'x'.repeat(600), timedOut: false }));
        const ir = plannedIntent();
        ir.approve();

        const result = await new Executor(options({ runner })).execute(ir);

        assert.equal(result.status, 'failed');
        assert.equal(result.error_code, 'BUILD_FAILED');
        assert.equal(result.error, `Image build failed: ${'x'.repeat(500)}...`);
        assert.equal(calls.length, 1);
        assert.equal(result.container_id, null);
    });

    test('failed container start is a failed result', async () => {
        const runner = fakeRunner([], (args) =>
            args[0] === 'run' ? { exitCode: 125, stdout: '', stderr: 'port is already allocated\n', timedOut: false } : OK
        );
        const ir = plannedIntent();
        ir.approve();

        const result = await new Executor(options({ runner })).execute(ir);

        assert.equal(result.status, 'failed');
        assert.equal(result.error_code, 'RUN_FAILED');
        assert.equal(result.error, 'Container start failed: port is already allocated');
    });

    test('runner that cannot start the engine becomes a failed result', async () => {
        const runner: CommandRunner = async () => {
            throw new Error('spawn docker ENOENT');
        };
        const ir = plannedIntent();
        ir.approve();

        const result = await new Executor(options({ runner })).execute(ir);

        assert.equal(result.status, 'failed');
        assert.equal(result.error_code, 'INTERNAL');
        assert.equal(result.error, 'spawn docker ENOENT');
        assert.equal(result.logs[result.logs.length - 1], 'Execution failed: spawn docker ENOENT');
    });

    test('node service gets a package manifest', async () => {
        const ir = plannedIntent({ language: 'node', framework: 'express' });
        ir.approve();

        const result = await new Executor(options({ runner: fakeRunner([]) })).execute(ir);

        assert.deepEqual(Object.keys(result.artifacts), ['app.js', 'Dockerfile', 'package.json']);
        const manifest: unknown = JSON.parse(fs.readFileSync(path.join(wsDir, 'package.json'), 'utf8'));
        assert.deepEqual(manifest, {
            name: 'ping-service',
            version: '1.0.0',
            private: true,
            main: 'app.js',
            dependencies: { express: '^4.18.0' },
        });
    });

    test('kubernetes is unsupported and writes nothing', async () => {
        const ir = plannedIntent({ runtime: 'kubernetes' });
        ir.approve();

        const result = await new Executor(options({ runner: fakeRunner([]) })).execute(ir);

        assert.equal(result.status, 'failed');
        assert.equal(result.error_code, 'UNSUPPORTED_RUNTIME');
        assert.equal(result.error, 'Unsupported runtime: kubernetes');
        assert.equal(fs.existsSync(wsDir), false);
    });

    // ======================================================================
    // Local runtime
    // ======================================================================

    test('local runtime launches the entry file in the background', async () => {
        const launches: LaunchSpec[] = [];
        const calls: RecordedCall[] = [];
        const ir = plannedIntent({ runtime: 'local', ports: [7000] });
        ir.approve();

        const result = await new Executor(options({
            runner: fakeRunner(calls),
            launcher: (launch) => {
                launches.push(launch);
                return 4242;
            },
        })).execute(ir);

        assert.equal(result.status, 'completed');
        assert.equal(result.process_id, 4242);
        assert.equal(calls.length, 0);
        assert.deepEqual(launches, [{
            command: 'python3',
            args: ['app.py'],
            cwd: path.resolve(wsDir),
            env: { MODE: 'test', PORT: '7000' },
        }]);
        assert.deepEqual(result.endpoints, [
            'http://localhost:7000',
            'http://localhost:7000/ping',
            'http://localhost:7000/users',
        ]);
    });

    test('local runtime without an interpreter fails after writing artifacts', async () => {
        const ir = plannedIntent({ runtime: 'local', language: 'cobol' });
        ir.approve();

        const result = await new Executor(options({ launcher: () => 1 })).execute(ir);

        assert.equal(result.status, 'failed');
        assert.equal(result.error_code, 'UNSUPPORTED_LANGUAGE');
        assert.equal(result.error, "No local interpreter for language 'cobol'");
        assert.ok(fs.existsSync(path.join(wsDir, 'app.sh')));
    });

    test('launcher failure is a failed result', async () => {
        const ir = plannedIntent({ runtime: 'local' });
        ir.approve();

        const result = await new Executor(options({
            launcher: () => {
                throw new Error('Failed to launch python3 app.py');
            },
        })).execute(ir);

        assert.equal(result.status, 'failed');
        assert.equal(result.error_code, 'LAUNCH_FAILED');
        assert.equal(result.error, 'Failed to launch python3 app.py');
    });

    // ======================================================================
    // Ports
    // ======================================================================

    test('occupied primary port is substituted and logged', async () => {
        const blocker = net.createServer();
        await new Promise<void>((resolve) => blocker.listen(0, resolve));
        const address = blocker.address();
        assert.ok(address !== null && typeof address === 'object');
        const taken = address.port;

        try {
            const ir = plannedIntent({ ports: [taken] });
            ir.approve();
            const result = await new Executor(options({ runner: fakeRunner([]), probe: undefined })).execute(ir);

            assert.equal(result.status, 'completed');
            const allocated = Number(new URL(result.endpoints[0]).port);
            assert.ok(allocated > taken, `expected a port above ${taken}, got ${allocated}`);
            assert.ok(result.logs.includes(`Port ${taken} in use, using ${allocated}`));
        } finally {
            await new Promise<void>((resolve) => blocker.close(() => resolve()));
        }
    });

    test('allocatePort walks forward and falls back past the last attempt', async () => {
        const busy = new Set([8000, 8001]);
        const probe = async (port: number): Promise<boolean> => !busy.has(port);
        assert.equal(await allocatePort(8000, 10, probe), 8002);
        assert.equal(await allocatePort(8000, 2, probe), 8002);
        assert.equal(await allocatePort(8000, 3, async () => false), 8003);
    });

    test('allocatePort skips reserved ports, including the fallback', async () => {
        assert.equal(await allocatePort(8000, 10, alwaysFree, new Set([8000, 8001])), 8002);
        assert.equal(await allocatePort(8000, 2, async () => false, new Set([8002, 8003])), 8004);
    });

    test('extra ports never reuse the host port given to the primary', async () => {
        const calls: RecordedCall[] = [];
        const ir = plannedIntent({ ports: [9000, 9001] });
        ir.approve();
        const probe = async (port: number): Promise<boolean> => port !== 9000;

        const result = await new Executor(options({ runner: fakeRunner(calls), probe })).execute(ir);

        assert.equal(result.status, 'completed');
        const run = calls.find(c => c.args[0] === 'run');
        assert.ok(run);
        assert.deepEqual(run.args, [
            'run', '-d', '--name', `intent-ping-service-${ir.id}`,
            '-p', '9001:8000',
            '-e', 'MODE=test',
            '-p', '9002:9001',
            'intent-ping-service:latest',
        ]);
        assert.ok(result.logs.includes('Port 9000 in use, using 9001'));
        assert.ok(result.logs.includes('Port 9001 in use, using 9002'));
    });

    // ======================================================================
    // Workspace lifecycle
    // ======================================================================

    test('cleanup removes the workspace once', async () => {
        const ir = plannedIntent();
        ir.approve();
        const executor = new Executor(options({ runner: fakeRunner([]) }));
        await executor.execute(ir);

        assert.equal(executor.workspacePath, path.resolve(wsDir));
        assert.equal(executor.cleanup(), true);
        assert.equal(fs.existsSync(wsDir), false);
        assert.equal(executor.cleanup(), false);
    });

    test('withWorkspace cleans up a temp workspace even when the callback throws', async () => {
        const seen: { path: string | null } = { path: null };
        const ir = plannedIntent();
        ir.approve();

        await assert.rejects(
            Executor.withWorkspace(
                { skipApproval: false, workspaceDir: '', runner: fakeRunner([]), probe: alwaysFree },
                async (executor) => {
                    await executor.execute(ir);
                    seen.path = executor.workspacePath;
                    throw new Error('caller failed');
                }
            ),
            { message: 'caller failed' }
        );

        assert.ok(seen.path !== null);
        assert.equal(fs.existsSync(seen.path), false);
    });
});
