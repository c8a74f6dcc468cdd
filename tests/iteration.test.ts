import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { applyIteration } from '../src/iteration';
import { formatAction, parseDslFile } from '../src/parser';
import { ApprovalGateError, ValidationError } from '../src/structured_error';

const FIXTURE = path.join(__dirname, 'fixtures', 'ping_service.yaml');

describe('applyIteration', () => {
    test('applies known keys, reports unknown ones and records one history entry', () => {
        const ir = parseDslFile(FIXTURE);
        const changes = { action: 'api.expose POST /items', framework: 'Flask', colour: 'blue' };

        const outcome = applyIteration(ir, changes);

        assert.deepEqual(outcome.applied, ['action', 'framework']);
        assert.deepEqual(outcome.ignored, ['colour']);
        assert.equal(ir.implementation.framework, 'flask');
        assert.equal(formatAction(ir.implementation.actions[2]), 'api.expose POST /items');
        assert.equal(ir.iteration_count, 1);
        assert.deepEqual(outcome.record, ir.iteration_history[0]);
        assert.equal(outcome.record.source, 'user');
        assert.deepEqual(outcome.record.changes, changes);
    });

    test('several actions and scalar fields at once', () => {
        const ir = parseDslFile(FIXTURE);
        applyIteration(ir, {
            actions: ['db.create users', { type: 'file.create', target: 'README.md' }],
            goal: 'Serve users',
            description: null,
            base_image: 'python:3.12-alpine',
        }, 'suggestion');

        assert.deepEqual(ir.implementation.actions.slice(2).map(formatAction), ['db.create users', 'file.create README.md']);
        assert.equal(ir.intent.goal, 'Serve users');
        assert.equal(ir.intent.description, null);
        assert.equal(ir.environment.base_image, 'python:3.12-alpine');
        assert.equal(ir.iteration_history[0].source, 'suggestion');
    });

    test('switching language and framework together passes the compatibility table', () => {
        const ir = parseDslFile(FIXTURE);
        applyIteration(ir, { language: 'node', framework: 'express' });
        assert.equal(ir.implementation.language, 'node');
        assert.equal(ir.implementation.framework, 'express');
    });

    test('rejected change set leaves the IR untouched', () => {
        const ir = parseDslFile(FIXTURE);
        const before = ir.updated_at;

        assert.throws(
            () => applyIteration(ir, { action: 'nope /x', framework: 'express', goal: '  ' }),
            (e: unknown) => {
                assert.ok(e instanceof ValidationError);
                assert.deepEqual(e.errors, [
                    "Unknown action type: 'nope'",
                    'goal must be a non-empty string',
                    "Framework 'express' requires language 'node' (got 'python')",
                ]);
                return true;
            }
        );

        assert.equal(ir.iteration_count, 0);
        assert.equal(ir.implementation.actions.length, 2);
        assert.equal(ir.implementation.framework, 'fastapi');
        assert.equal(ir.intent.goal, 'Answer health checks over HTTP');
        assert.equal(ir.updated_at, before);
    });

    test('approved intent no longer accepts iterations', () => {
        const ir = parseDslFile(FIXTURE);
        ir.approve();
        assert.throws(() => applyIteration(ir, { goal: 'late change' }), ApprovalGateError);
        assert.equal(ir.iteration_count, 0);
    });

    test('framework can be cleared', () => {
        const ir = parseDslFile(FIXTURE);
        applyIteration(ir, { framework: null });
        assert.equal(ir.implementation.framework, null);
    });
});
