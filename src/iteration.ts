/**
 * Iteration: apply a change set to a dry-run IntentIR.
 *
 * Every value is validated before anything is mutated, so a rejected change
 * set leaves the IR (and its history) exactly as it was.
 */

import { createLogger } from './logger';
import { ApprovalGateError, ValidationError } from './structured_error';
import { Action, ChangeSet, IntentIR, IterationRecord } from './ir';
import { emptyDiagnostics, parseAction } from './parser/action_grammar';
import { checkFrameworkCompatibility, normalizeToken } from './parser/dsl_parser';

const log = createLogger('iteration');

export const ITERATION_KEYS = [
    'action',
    'actions',
    'framework',
    'language',
    'goal',
    'description',
    'base_image',
] as const;

export type IterationKey = typeof ITERATION_KEYS[number];

export interface IterationOutcome {
    record: IterationRecord;
    applied: IterationKey[];
    ignored: string[];
    warnings: string[];
}

function isIterationKey(key: string): key is IterationKey {
    return ITERATION_KEYS.some(k => k === key);
}

function nonEmptyString(value: unknown): string | null {
    return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

export function applyIteration(ir: IntentIR, changes: ChangeSet, source: string = 'user'): IterationOutcome {
    if (ir.amen_approved) {
        throw new ApprovalGateError(`Intent ${ir.id} is approved; iterations are closed`, ir.id);
    }

    const diag = emptyDiagnostics();
    const applied: IterationKey[] = [];
    const ignored: string[] = [];

    const newActions: Action[] = [];
    let language = ir.implementation.language;
    let framework = ir.implementation.framework;
    let goal: string | null = null;
    let description: string | null | undefined;
    let baseImage: string | null = null;

    for (const [key, value] of Object.entries(changes)) {
        if (!isIterationKey(key)) {
            ignored.push(key);
            continue;
        }
        applied.push(key);

        switch (key) {
            case 'action': {
                const action = parseAction(value, diag);
                if (action) newActions.push(action);
                break;
            }
            case 'actions':
                if (!Array.isArray(value)) {
                    diag.errors.push('actions must be a list');
                    break;
                }
                for (const entry of value) {
                    const action = parseAction(entry, diag);
                    if (action) newActions.push(action);
                }
                break;
            case 'framework':
                if (value === null) {
                    framework = null;
                } else {
                    const fw = nonEmptyString(value);
                    if (fw) framework = normalizeToken(fw);
                    else diag.errors.push('framework must be a non-empty string or null');
                }
                break;
            case 'language': {
                const lang = nonEmptyString(value);
                if (lang) language = normalizeToken(lang);
                else diag.errors.push('language must be a non-empty string');
                break;
            }
            case 'goal':
                goal = nonEmptyString(value);
                if (goal === null) diag.errors.push('goal must be a non-empty string');
                break;
            case 'description':
                if (value === null || typeof value === 'string') description = value;
                else diag.errors.push('description must be a string or null');
                break;
            case 'base_image':
                baseImage = nonEmptyString(value);
                if (baseImage === null) diag.errors.push('base_image must be a non-empty string');
                break;
        }
    }

    const incompatible = checkFrameworkCompatibility(language, framework);
    if (incompatible) diag.errors.push(incompatible);

    if (diag.errors.length > 0) {
        log.warn('Iteration rejected', { intent: ir.id, error_count: diag.errors.length });
        throw new ValidationError(diag.errors);
    }

    /* ---- all checks passed; mutate ---- */

    ir.implementation.actions.push(...newActions);
    ir.implementation.language = language;
    ir.implementation.framework = framework;
    if (goal !== null) ir.intent.goal = goal;
    if (description !== undefined) ir.intent.description = description;
    if (baseImage !== null) ir.environment.base_image = baseImage;

    const record = ir.recordIteration(changes, source);
    for (const w of diag.warnings) log.warn(w, { intent: ir.id });
    log.info('Iteration recorded', { intent: ir.id, sequence: record.sequence, applied, ignored });

    return { record, applied, ignored, warnings: diag.warnings };
}
