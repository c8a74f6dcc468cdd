// src/ir/types.ts

export type ExecutionMode = 'dry-run' | 'transactional';

export type RuntimeType = 'docker' | 'kubernetes' | 'local';

export type ActionType =
    | 'api.expose'
    | 'db.create'
    | 'db.add_column'
    | 'shell.exec'
    | 'rest.call'
    | 'file.create';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export const EXECUTION_MODES: readonly ExecutionMode[] = ['dry-run', 'transactional'];
export const RUNTIME_TYPES: readonly RuntimeType[] = ['docker', 'kubernetes', 'local'];
export const ACTION_TYPES: readonly ActionType[] = [
    'api.expose',
    'db.create',
    'db.add_column',
    'shell.exec',
    'rest.call',
    'file.create',
];
export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH'];

// Variants whose target is reached over HTTP and so need a verb
export const METHOD_ACTIONS: readonly ActionType[] = ['api.expose', 'rest.call'];

export function isExecutionMode(v: unknown): v is ExecutionMode {
    return EXECUTION_MODES.some(m => m === v);
}

export function isRuntimeType(v: unknown): v is RuntimeType {
    return RUNTIME_TYPES.some(r => r === v);
}

export function isActionType(v: unknown): v is ActionType {
    return ACTION_TYPES.some(t => t === v);
}

export function isHttpMethod(v: unknown): v is HttpMethod {
    return HTTP_METHODS.some(m => m === v);
}

/** A flag token parses to `true`; a key=value token to its string value. */
export type ParamValue = string | boolean;

export interface Action {
    type: ActionType;
    method: HttpMethod | null;
    target: string;
    params: Record<string, ParamValue>;
}

export interface Intent {
    name: string;
    goal: string;
    description: string | null;
}

export interface Environment {
    runtime: RuntimeType;
    base_image: string;
    services: string[];
    ports: number[];
    volumes: string[];
    env_vars: Record<string, string>;
}

export interface Implementation {
    language: string;
    framework: string | null;
    actions: Action[];
}

export type ChangeSet = Record<string, unknown>;

export interface IterationRecord {
    sequence: number;
    timestamp: string;
    source: string;
    changes: ChangeSet;
}

/** Serialized form of an IntentIR; field names and enum tokens are the wire format. */
export interface IntentIRDocument {
    id: string;
    version: number;
    created_at: string;
    updated_at: string;
    intent: Intent;
    environment: Environment;
    implementation: Implementation;
    execution_mode: ExecutionMode;
    amen_approved: boolean;
    iteration_count: number;
    iteration_history: IterationRecord[];
    generated_code: string | null;
    dockerfile: string | null;
    dry_run_logs: string[];
}
