/**
 * IntentIR: the canonical aggregate every pipeline stage consumes.
 *
 * Approval state and iteration history are private: approve() is the only
 * writer of (amen_approved, execution_mode), and iteration_count is derived
 * from the history so the two can never disagree.
 */

import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_BASE_IMAGE, DEFAULT_LANGUAGE } from '../config';
import type {
    ChangeSet,
    Environment,
    ExecutionMode,
    Implementation,
    Intent,
    IntentIRDocument,
    IterationRecord,
} from './types';

export function newIntentId(): string {
    return uuidv4().slice(0, 8);
}

export function defaultEnvironment(): Environment {
    return {
        runtime: 'docker',
        base_image: DEFAULT_BASE_IMAGE,
        services: [],
        ports: [],
        volumes: [],
        env_vars: {},
    };
}

export function defaultImplementation(): Implementation {
    return {
        language: DEFAULT_LANGUAGE,
        framework: null,
        actions: [],
    };
}

export interface IntentIRInit {
    intent: Intent;
    environment?: Environment;
    implementation?: Implementation;
}

export interface PlanArtifacts {
    generated_code: string;
    dockerfile: string;
    logs: string[];
}

export class IntentIR {
    readonly id: string;
    readonly version: number;
    readonly created_at: string;
    private _updatedAt: string;

    intent: Intent;
    environment: Environment;
    implementation: Implementation;

    private _executionMode: ExecutionMode = 'dry-run';
    private _amenApproved = false;
    private _history: IterationRecord[] = [];

    private _generatedCode: string | null = null;
    private _dockerfile: string | null = null;
    private _dryRunLogs: string[] = [];

    constructor(init: IntentIRInit, id: string = newIntentId(), version: number = 1, createdAt?: string) {
        const now = new Date().toISOString();
        this.id = id;
        this.version = version;
        this.created_at = createdAt || now;
        this._updatedAt = createdAt || now;
        this.intent = init.intent;
        this.environment = init.environment || defaultEnvironment();
        this.implementation = init.implementation || defaultImplementation();
    }

    get updated_at(): string { return this._updatedAt; }
    get execution_mode(): ExecutionMode { return this._executionMode; }
    get amen_approved(): boolean { return this._amenApproved; }
    get iteration_count(): number { return this._history.length; }
    get iteration_history(): readonly IterationRecord[] { return this._history; }
    get generated_code(): string | null { return this._generatedCode; }
    get dockerfile(): string | null { return this._dockerfile; }
    get dry_run_logs(): readonly string[] { return this._dryRunLogs; }

    /** Refresh updated_at; called by every mutation. */
    touch(): string {
        this._updatedAt = new Date().toISOString();
        return this._updatedAt;
    }

    recordIteration(changes: ChangeSet, source: string = 'user'): IterationRecord {
        const timestamp = this.touch();
        const record: IterationRecord = {
            sequence: this._history.length + 1,
            timestamp,
            source,
            changes: structuredClone(changes),
        };
        this._history.push(record);
        return record;
    }

    /** Pass the AMEN boundary. One-way; repeated calls change nothing. */
    approve(): void {
        if (this._amenApproved && this._executionMode === 'transactional') return;
        this._amenApproved = true;
        this._executionMode = 'transactional';
        this.touch();
    }

    recordPlan(artifacts: PlanArtifacts): void {
        this._generatedCode = artifacts.generated_code;
        this._dockerfile = artifacts.dockerfile;
        this._dryRunLogs = [...artifacts.logs];
        this.touch();
    }

    /**
     * Rebuild an instance from an already-validated document without
     * refreshing any timestamp.
     */
    static restore(doc: IntentIRDocument): IntentIR {
        const ir = new IntentIR(
            {
                intent: structuredClone(doc.intent),
                environment: structuredClone(doc.environment),
                implementation: structuredClone(doc.implementation),
            },
            doc.id,
            doc.version,
            doc.created_at
        );
        ir._updatedAt = doc.updated_at;
        ir._executionMode = doc.execution_mode;
        ir._amenApproved = doc.amen_approved;
        ir._history = structuredClone(doc.iteration_history);
        ir._generatedCode = doc.generated_code;
        ir._dockerfile = doc.dockerfile;
        ir._dryRunLogs = [...doc.dry_run_logs];
        return ir;
    }
}
