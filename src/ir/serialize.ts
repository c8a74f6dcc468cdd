// src/ir/serialize.ts

import { DEFAULT_BASE_IMAGE, DEFAULT_LANGUAGE } from '../config';
import { JsonSchema, SchemaValidator } from '../schema_validator';
import { StructuralError } from '../structured_error';
import { IntentIR, newIntentId } from './intent_ir';
import { stableStringify } from './stable_stringify';
import {
    ACTION_TYPES,
    Action,
    ChangeSet,
    EXECUTION_MODES,
    HTTP_METHODS,
    IntentIRDocument,
    IterationRecord,
    METHOD_ACTIONS,
    ParamValue,
    RUNTIME_TYPES,
    isActionType,
    isExecutionMode,
    isHttpMethod,
    isRuntimeType,
} from './types';

export const IR_SCHEMA_ID = 'intent-ir-v1';

const STRING_LIST: JsonSchema = { type: 'array', items: { type: 'string' } };
const NULLABLE_STRING: JsonSchema = { type: ['string', 'null'] };

const ACTION_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['type', 'target'],
    properties: {
        type: { type: 'string', enum: ACTION_TYPES },
        method: { type: ['string', 'null'], enum: [...HTTP_METHODS, null] },
        target: { type: 'string' },
        params: { type: 'object', additionalProperties: { type: ['string', 'boolean'] } },
    },
};

export const IR_DOCUMENT_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['intent'],
    properties: {
        id: { type: 'string', pattern: '^\\S+$' },
        version: { type: 'integer', minimum: 1 },
        created_at: { type: 'string' },
        updated_at: { type: 'string' },
        intent: {
            type: 'object',
            required: ['name', 'goal'],
            properties: {
                name: { type: 'string' },
                goal: { type: 'string' },
                description: NULLABLE_STRING,
            },
        },
        environment: {
            type: 'object',
            properties: {
                runtime: { type: 'string', enum: RUNTIME_TYPES },
                base_image: { type: 'string' },
                services: STRING_LIST,
                ports: { type: 'array', items: { type: 'integer', minimum: 1, maximum: 65535 } },
                volumes: STRING_LIST,
                env_vars: { type: 'object', additionalProperties: { type: 'string' } },
            },
        },
        implementation: {
            type: 'object',
            properties: {
                language: { type: 'string' },
                framework: NULLABLE_STRING,
                actions: { type: 'array', items: ACTION_SCHEMA },
            },
        },
        execution_mode: { type: 'string', enum: EXECUTION_MODES },
        amen_approved: { type: 'boolean' },
        iteration_count: { type: 'integer', minimum: 0 },
        iteration_history: {
            type: 'array',
            items: {
                type: 'object',
                required: ['sequence', 'timestamp', 'source', 'changes'],
                properties: {
                    sequence: { type: 'integer', minimum: 1 },
                    timestamp: { type: 'string' },
                    source: { type: 'string' },
                    changes: { type: 'object' },
                },
            },
        },
        generated_code: NULLABLE_STRING,
        dockerfile: NULLABLE_STRING,
        dry_run_logs: STRING_LIST,
    },
};

const validator = new SchemaValidator();
validator.registerSchema(IR_SCHEMA_ID, IR_DOCUMENT_SCHEMA);

/* -------------------------------------------------------------------------- */
/* Serialize                                                                  */
/* -------------------------------------------------------------------------- */

export function serializeIR(ir: IntentIR): IntentIRDocument {
    return {
        id: ir.id,
        version: ir.version,
        created_at: ir.created_at,
        updated_at: ir.updated_at,
        intent: { ...ir.intent },
        environment: {
            runtime: ir.environment.runtime,
            base_image: ir.environment.base_image,
            services: [...ir.environment.services],
            ports: [...ir.environment.ports],
            volumes: [...ir.environment.volumes],
            env_vars: { ...ir.environment.env_vars },
        },
        implementation: {
            language: ir.implementation.language,
            framework: ir.implementation.framework,
            actions: ir.implementation.actions.map(a => ({
                type: a.type,
                method: a.method,
                target: a.target,
                params: { ...a.params },
            })),
        },
        execution_mode: ir.execution_mode,
        amen_approved: ir.amen_approved,
        iteration_count: ir.iteration_count,
        iteration_history: structuredClone([...ir.iteration_history]),
        generated_code: ir.generated_code,
        dockerfile: ir.dockerfile,
        dry_run_logs: [...ir.dry_run_logs],
    };
}

export function toJson(ir: IntentIR, indent: number = 2): string {
    return JSON.stringify(serializeIR(ir), null, indent);
}

/** Sorted-key form; two IRs with equal state have equal canonical JSON. */
export function canonicalJson(ir: IntentIR): string {
    return stableStringify(serializeIR(ir));
}

/* -------------------------------------------------------------------------- */
/* Deserialize                                                                */
/* -------------------------------------------------------------------------- */

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> {
    return isRecord(value) ? value : {};
}

function pickString(value: unknown, fallback: string): string {
    return typeof value === 'string' ? value : fallback;
}

function pickNullableString(value: unknown): string | null {
    return typeof value === 'string' ? value : null;
}

function pickStrings(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((x): x is string => typeof x === 'string') : [];
}

function pickParams(value: unknown): Record<string, ParamValue> {
    const params: Record<string, ParamValue> = {};
    for (const [k, v] of Object.entries(asRecord(value))) {
        if (typeof v === 'string' || typeof v === 'boolean') params[k] = v;
    }
    return params;
}

function pickActions(value: unknown, problems: string[]): Action[] {
    const actions: Action[] = [];
    const list = Array.isArray(value) ? value : [];
    list.forEach((raw, i) => {
        const entry = asRecord(raw);
        if (!isActionType(entry.type)) return;
        const method = isHttpMethod(entry.method) ? entry.method : null;
        const needsMethod = METHOD_ACTIONS.includes(entry.type);
        if (needsMethod && method === null) {
            problems.push(`.implementation.actions[${i}]: ${entry.type} requires a method`);
        }
        if (!needsMethod && method !== null) {
            problems.push(`.implementation.actions[${i}]: ${entry.type} does not take a method`);
        }
        actions.push({
            type: entry.type,
            method,
            target: pickString(entry.target, ''),
            params: pickParams(entry.params),
        });
    });
    return actions;
}

function pickHistory(value: unknown): IterationRecord[] {
    const list = Array.isArray(value) ? value : [];
    return list.map((raw): IterationRecord => {
        const entry = asRecord(raw);
        const changes: ChangeSet = { ...asRecord(entry.changes) };
        return {
            sequence: typeof entry.sequence === 'number' ? entry.sequence : 0,
            timestamp: pickString(entry.timestamp, ''),
            source: pickString(entry.source, 'user'),
            changes,
        };
    });
}

export function deserializeIR(document: unknown): IntentIR {
    if (!isRecord(document)) {
        throw new StructuralError('IR document must be an object');
    }

    const result = validator.validate(document, IR_SCHEMA_ID);
    const problems = result.errors.map(e => `${e.path || '$'}: ${e.message}`);
    if (!result.valid) {
        throw new StructuralError('Invalid IR document', problems);
    }

    const intent = asRecord(document.intent);
    const environment = asRecord(document.environment);
    const implementation = asRecord(document.implementation);
    const now = new Date().toISOString();

    const history = pickHistory(document.iteration_history);
    history.forEach((h, i) => {
        if (h.sequence !== i + 1) {
            problems.push(`.iteration_history[${i}]: sequence ${h.sequence} does not match position ${i + 1}`);
        }
    });
    if (typeof document.iteration_count === 'number' && document.iteration_count !== history.length) {
        problems.push(`.iteration_count: ${document.iteration_count} does not match ${history.length} history entries`);
    }

    const executionMode = isExecutionMode(document.execution_mode) ? document.execution_mode : 'dry-run';
    const amenApproved = document.amen_approved === true;
    if (amenApproved !== (executionMode === 'transactional')) {
        problems.push('.amen_approved: approval flag and execution_mode disagree');
    }

    const actions = pickActions(implementation.actions, problems);
    if (problems.length > 0) {
        throw new StructuralError('Inconsistent IR document', problems);
    }

    const envVars: Record<string, string> = {};
    for (const [k, v] of Object.entries(asRecord(environment.env_vars))) {
        if (typeof v === 'string') envVars[k] = v;
    }

    const createdAt = pickString(document.created_at, now);
    return IntentIR.restore({
        id: pickString(document.id, newIntentId()),
        version: typeof document.version === 'number' ? document.version : 1,
        created_at: createdAt,
        updated_at: pickString(document.updated_at, createdAt),
        intent: {
            name: pickString(intent.name, ''),
            goal: pickString(intent.goal, ''),
            description: pickNullableString(intent.description),
        },
        environment: {
            runtime: isRuntimeType(environment.runtime) ? environment.runtime : 'docker',
            base_image: pickString(environment.base_image, DEFAULT_BASE_IMAGE),
            services: pickStrings(environment.services),
            ports: Array.isArray(environment.ports)
                ? environment.ports.filter((p): p is number => typeof p === 'number')
                : [],
            volumes: pickStrings(environment.volumes),
            env_vars: envVars,
        },
        implementation: {
            language: pickString(implementation.language, DEFAULT_LANGUAGE),
            framework: pickNullableString(implementation.framework),
            actions,
        },
        execution_mode: executionMode,
        amen_approved: amenApproved,
        iteration_count: history.length,
        iteration_history: history,
        generated_code: pickNullableString(document.generated_code),
        dockerfile: pickNullableString(document.dockerfile),
        dry_run_logs: pickStrings(document.dry_run_logs),
    });
}

export function fromJson(text: string): IntentIR {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (e: unknown) {
        throw new StructuralError(`Invalid IR JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    return deserializeIR(parsed);
}
