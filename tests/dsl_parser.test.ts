import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import {
    emptyDiagnostics,
    formatAction,
    parseAction,
    parseActionLine,
    parseDsl,
    parseDslFile,
    parseDslWithDiagnostics,
} from '../src/parser';
import { ParseError, StructuralError, ValidationError } from '../src/structured_error';

const FIXTURE = path.join(__dirname, 'fixtures', 'ping_service.yaml');

function validationErrors(content: string): string[] {
    try {
        parseDsl(content);
    } catch (e: unknown) {
        if (e instanceof ValidationError) return e.errors;
        throw e;
    }
    assert.fail('expected a ValidationError');
}

function doc(implementation: string, extra: string = ''): string {
    return `INTENT:
  name: demo
  goal: Demo goal
${extra}
IMPLEMENTATION:
${implementation}
`;
}

// ==========================================================================
// Action grammar
// ==========================================================================

describe('action lines', () => {
    test('expose line with verb and no params', () => {
        const diag = emptyDiagnostics();
        assert.deepEqual(parseActionLine('api.expose GET /ping', diag), {
            type: 'api.expose',
            method: 'GET',
            target: '/ping',
            params: {},
        });
        assert.deepEqual(diag, { errors: [], warnings: [] });
    });

    test('key=value tokens and bare flags', () => {
        const diag = emptyDiagnostics();
        const action = parseActionLine('db.create users columns=id,name temporary', diag);
        assert.deepEqual(action, {
            type: 'db.create',
            method: null,
            target: 'users',
            params: { columns: 'id,name', temporary: true },
        });
    });

    test('value keeps everything after the first =', () => {
        const action = parseActionLine('shell.exec echo msg=a=b', emptyDiagnostics());
        assert.deepEqual(action?.params, { msg: 'a=b' });
    });

    test('line without a target is malformed', () => {
        const diag = emptyDiagnostics();
        assert.equal(parseActionLine('api.expose', diag), null);
        assert.deepEqual(diag.errors, ["Invalid action format: 'api.expose'"]);
    });

    test('unknown action type is an error', () => {
        const diag = emptyDiagnostics();
        assert.equal(parseActionLine('api.destroy /x', diag), null);
        assert.deepEqual(diag.errors, ["Unknown action type: 'api.destroy'"]);
    });

    test('expose without a verb defaults to GET with a warning', () => {
        const diag = emptyDiagnostics();
        assert.equal(parseActionLine('api.expose /health', diag)?.method, 'GET');
        assert.deepEqual(diag.warnings, ["Action 'api.expose /health' has no HTTP method, defaulting to GET"]);
    });

    test('verb on a non-HTTP action is dropped with a warning', () => {
        const diag = emptyDiagnostics();
        const action = parseActionLine('db.create POST users', diag);
        assert.equal(action?.method, null);
        assert.equal(action?.target, 'users');
        assert.deepEqual(diag.warnings, ["Action 'db.create users' does not take an HTTP method, ignoring POST"]);
    });

    test('structured mapping formats to a line that parses back to the same action', () => {
        const diag = emptyDiagnostics();
        const action = parseAction(
            { type: 'rest.call', method: 'post', target: 'https://hooks.example.test/notify', params: { retries: 3, verbose: true } },
            diag
        );
        assert.ok(action);
        const line = formatAction(action);
        assert.equal(line, 'rest.call POST https://hooks.example.test/notify retries=3 verbose');
        assert.deepEqual(parseActionLine(line, diag), action);
        assert.equal(formatAction(action), line);
        assert.deepEqual(diag.errors, []);
    });

    test('structured false param becomes the string "false" and survives a line round trip', () => {
        const diag = emptyDiagnostics();
        const action = parseAction({ type: 'file.create', target: 'out.txt', params: { overwrite: false, mode: 644 } }, diag);
        assert.ok(action);
        assert.deepEqual(action.params, { overwrite: 'false', mode: '644' });
        const line = formatAction(action);
        assert.equal(line, 'file.create out.txt overwrite=false mode=644');
        assert.deepEqual(parseActionLine(line, diag), action);
        assert.deepEqual(diag.errors, []);
    });

    test('structured mapping without a target is an error', () => {
        const diag = emptyDiagnostics();
        assert.equal(parseAction({ type: 'file.create' }, diag), null);
        assert.deepEqual(diag.errors, ["Action 'file.create' requires a target"]);
    });

    test('non-string, non-mapping entry is an error', () => {
        const diag = emptyDiagnostics();
        assert.equal(parseAction(42, diag), null);
        assert.deepEqual(diag.errors, ['Invalid action entry: 42']);
    });
});

// ==========================================================================
// Documents
// ==========================================================================

describe('DSL documents', () => {
    test('fixture parses into a dry-run IR', () => {
        const ir = parseDslFile(FIXTURE);
        assert.equal(ir.intent.name, 'ping-service');
        assert.equal(ir.intent.goal, 'Answer health checks over HTTP');
        assert.equal(ir.intent.description, 'Minimal service used by the pipeline tests');
        assert.equal(ir.environment.base_image, 'python:3.11-slim');
        assert.deepEqual(ir.environment.ports, [8000]);
        assert.deepEqual(ir.environment.env_vars, { LOG_LEVEL: 'debug' });
        assert.equal(ir.implementation.framework, 'fastapi');
        assert.deepEqual(ir.implementation.actions.map(formatAction), ['api.expose GET /ping', 'api.expose POST /users']);
        assert.equal(ir.execution_mode, 'dry-run');
        assert.equal(ir.amen_approved, false);
    });

    test('missing INTENT names the section', () => {
        const errors = validationErrors('IMPLEMENTATION:\n  language: python\n');
        assert.deepEqual(errors, ['Missing required section: INTENT']);
    });

    test('missing IMPLEMENTATION is an error', () => {
        const errors = validationErrors('INTENT:\n  name: demo\n  goal: Demo goal\n');
        assert.deepEqual(errors, ['Missing required section: IMPLEMENTATION']);
    });

    test('every problem is reported in one error', () => {
        const content = `INTENT:
  name: demo
ENVIRONMENT:
  ports: [0, "x"]
IMPLEMENTATION:
  language: python
  framework: express
  actions:
    - bogus.type /x
`;
        assert.deepEqual(validationErrors(content), [
            'INTENT.goal is required',
            'ENVIRONMENT.ports[0] must be a port number (1-65535), got 0',
            'ENVIRONMENT.ports[1] must be a port number (1-65535), got "x"',
            "Unknown action type: 'bogus.type'",
            "Framework 'express' requires language 'node' (got 'python')",
        ]);
    });

    test('name must be an identifier', () => {
        const errors = validationErrors('INTENT:\n  name: my service\n  goal: g\nIMPLEMENTATION:\n  language: python\n');
        assert.deepEqual(errors, ["INTENT.name 'my service' must be an identifier (letters, digits, '.', '_', '-')"]);
    });

    test('section that is not a mapping is an error', () => {
        const errors = validationErrors('INTENT: just text\nIMPLEMENTATION:\n  language: python\n');
        assert.deepEqual(errors, ['INTENT must be a mapping']);
    });

    test('empty text is a parse error', () => {
        assert.throws(() => parseDsl(''), (e: unknown) =>
            e instanceof ParseError && e.message === 'Parse error: Empty DSL content'
        );
    });

    test('top-level list is a parse error', () => {
        assert.throws(() => parseDsl('- a\n- b\n'), {
            name: 'ParseError',
            message: 'Parse error: DSL document must be a mapping of sections',
        });
    });

    test('malformed YAML is a structural error', () => {
        assert.throws(() => parseDsl('INTENT: [unclosed\n'), (e: unknown) =>
            e instanceof StructuralError && e.message.startsWith('Parse error: Invalid YAML: ')
        );
    });

    test('unknown runtime and mode fall back with warnings', () => {
        const { ir, warnings } = parseDslWithDiagnostics(
            doc('  language: python', 'ENVIRONMENT:\n  runtime: nomad\nEXECUTION:\n  mode: yolo\n')
        );
        assert.equal(ir.environment.runtime, 'docker');
        assert.equal(ir.execution_mode, 'dry-run');
        assert.deepEqual(warnings, [
            "Unknown runtime 'nomad', defaulting to docker",
            "Unknown execution mode 'yolo', defaulting to dry-run",
        ]);
    });

    test('shell command mentioning root is a warning', () => {
        const { warnings } = parseDslWithDiagnostics(
            doc('  language: python\n  actions:\n    - shell.exec apt-get user=ROOT')
        );
        assert.deepEqual(warnings, ["Action 'apt-get' may run as root - review carefully"]);
    });

    test('transactional mode pre-approves through the gate', () => {
        const { ir, warnings } = parseDslWithDiagnostics(
            doc('  language: python', 'EXECUTION:\n  mode: transactional\n')
        );
        assert.equal(ir.amen_approved, true);
        assert.equal(ir.execution_mode, 'transactional');
        assert.deepEqual(warnings, [
            'EXECUTION.mode transactional pre-approves the intent (AMEN boundary passed at parse time)',
        ]);
    });

    test('language and framework tokens are normalized', () => {
        const ir = parseDsl(doc('  language: " Python "\n  framework: FastAPI'));
        assert.equal(ir.implementation.language, 'python');
        assert.equal(ir.implementation.framework, 'fastapi');
    });

    test('env var scalars become strings', () => {
        const ir = parseDsl(doc('  language: python', 'ENVIRONMENT:\n  env_vars:\n    DEBUG: true\n    WORKERS: 2\n'));
        assert.deepEqual(ir.environment.env_vars, { DEBUG: 'true', WORKERS: '2' });
    });

    test('unknown keys are ignored', () => {
        const ir = parseDsl(doc('  language: python\n  flavour: vanilla', 'EXTRA:\n  anything: 1\n'));
        assert.equal(ir.intent.name, 'demo');
        assert.deepEqual(ir.implementation.actions, []);
    });

    test('each parse gets a fresh id', () => {
        const content = doc('  language: python');
        assert.notEqual(parseDsl(content).id, parseDsl(content).id);
    });
});
