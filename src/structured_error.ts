/**
 * Error taxonomy for the intent pipeline.
 *
 * Parser, deserializer and approval-gate problems are thrown as the classes
 * below. Executor problems are never thrown; they come back as result data
 * tagged with an ErrorCode. describeError() turns either into a
 * machine-readable StructuredError with recovery options for the CLI.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Input errors
    | 'STRUCTURAL_ERROR'
    | 'VALIDATION_FAILED'

    // Approval gate
    | 'APPROVAL_REQUIRED'
    | 'NOT_TRANSACTIONAL'

    // Execution
    | 'MISSING_ARTIFACTS'
    | 'BUILD_FAILED'
    | 'RUN_FAILED'
    | 'UNSUPPORTED_RUNTIME'
    | 'UNSUPPORTED_LANGUAGE'
    | 'LAUNCH_FAILED'
    | 'FILESYSTEM_ERROR'

    | 'INTERNAL';

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export type RecoveryAction =
    | 'fix_dsl'
    | 'approve_intent'
    | 'run_planner'
    | 'check_container_engine'
    | 'change_runtime'
    | 'change_language'
    | 'inspect_workspace'
    | 'escalate_to_human';

export interface RecoveryOption {
    action: RecoveryAction;
    description: string;
    risk_level: RiskLevel;
    command?: string;
}

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: 'FATAL' | 'ERROR' | 'WARNING';
    details: string[];
    recovery_options: RecoveryOption[];
    human_intervention_required: boolean;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Thrown errors                                                              */
/* -------------------------------------------------------------------------- */

/** Document could not be decoded at all. */
export class StructuralError extends Error {
    readonly code: ErrorCode = 'STRUCTURAL_ERROR';

    constructor(message: string, readonly problems: string[] = []) {
        super(message);
        this.name = 'StructuralError';
    }
}

/** DSL text is not a well-formed document. */
export class ParseError extends StructuralError {
    constructor(message: string) {
        super(`Parse error: ${message}`);
        this.name = 'ParseError';
    }
}

/** Document decoded but is semantically invalid; carries every problem found. */
export class ValidationError extends Error {
    readonly code: ErrorCode = 'VALIDATION_FAILED';

    constructor(readonly errors: string[]) {
        super(`Validation failed: ${errors.join('; ')}`);
        this.name = 'ValidationError';
    }
}

/** Operation not permitted in the intent's current approval state. */
export class ApprovalGateError extends Error {
    readonly code: ErrorCode = 'APPROVAL_REQUIRED';

    constructor(message: string, readonly intentId: string) {
        super(message);
        this.name = 'ApprovalGateError';
    }
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    details: string[] = [],
    recoveryOptions: RecoveryOption[] = []
): StructuredError {
    return {
        code,
        message,
        severity: getSeverity(code),
        details,
        recovery_options: recoveryOptions,
        human_intervention_required: recoveryOptions.length === 0 ||
            recoveryOptions.some(opt => opt.action === 'escalate_to_human'),
        timestamp: new Date().toISOString(),
    };
}

function getSeverity(code: ErrorCode): 'FATAL' | 'ERROR' | 'WARNING' {
    const fatalCodes: ErrorCode[] = ['INTERNAL', 'FILESYSTEM_ERROR'];
    const warningCodes: ErrorCode[] = ['APPROVAL_REQUIRED', 'NOT_TRANSACTIONAL'];

    if (fatalCodes.includes(code)) return 'FATAL';
    if (warningCodes.includes(code)) return 'WARNING';
    return 'ERROR';
}

/* -------------------------------------------------------------------------- */
/* Common Recovery Options                                                    */
/* -------------------------------------------------------------------------- */

export const CommonRecoveryOptions = {
    fixDsl: (): RecoveryOption => ({
        action: 'fix_dsl',
        description: 'Correct the listed problems in the intent document and parse again',
        risk_level: 'LOW',
    }),

    approveIntent: (): RecoveryOption => ({
        action: 'approve_intent',
        description: 'Review the dry-run output, then pass the AMEN boundary',
        risk_level: 'MEDIUM',
        command: 'intentctl execute <file> --amen',
    }),

    runPlanner: (): RecoveryOption => ({
        action: 'run_planner',
        description: 'Run a dry-run so generated code and the build file exist',
        risk_level: 'LOW',
        command: 'intentctl plan <file>',
    }),

    checkContainerEngine: (engine: string): RecoveryOption => ({
        action: 'check_container_engine',
        description: `Check that ${engine} is installed and its daemon is reachable`,
        risk_level: 'LOW',
        command: `${engine} info`,
    }),

    changeRuntime: (): RecoveryOption => ({
        action: 'change_runtime',
        description: 'Switch ENVIRONMENT.runtime to docker or local',
        risk_level: 'LOW',
    }),

    changeLanguage: (): RecoveryOption => ({
        action: 'change_language',
        description: 'Use a language with a local interpreter (python or node)',
        risk_level: 'LOW',
    }),

    inspectWorkspace: (workspace: string): RecoveryOption => ({
        action: 'inspect_workspace',
        description: 'Inspect the materialized workspace',
        risk_level: 'LOW',
        command: `ls -la ${workspace}`,
    }),

    escalateToHuman: (reason: string): RecoveryOption => ({
        action: 'escalate_to_human',
        description: `Escalate to human: ${reason}`,
        risk_level: 'LOW',
    }),
};

/* -------------------------------------------------------------------------- */
/* Conversion                                                                 */
/* -------------------------------------------------------------------------- */

export function recoveryFor(code: ErrorCode, context: { engine?: string; workspace?: string } = {}): RecoveryOption[] {
    switch (code) {
        case 'STRUCTURAL_ERROR':
        case 'VALIDATION_FAILED':
            return [CommonRecoveryOptions.fixDsl()];
        case 'APPROVAL_REQUIRED':
        case 'NOT_TRANSACTIONAL':
            return [CommonRecoveryOptions.approveIntent()];
        case 'MISSING_ARTIFACTS':
            return [CommonRecoveryOptions.runPlanner()];
        case 'BUILD_FAILED':
        case 'RUN_FAILED':
            return [
                CommonRecoveryOptions.checkContainerEngine(context.engine || 'docker'),
                ...(context.workspace ? [CommonRecoveryOptions.inspectWorkspace(context.workspace)] : []),
            ];
        case 'UNSUPPORTED_RUNTIME':
            return [CommonRecoveryOptions.changeRuntime()];
        case 'UNSUPPORTED_LANGUAGE':
        case 'LAUNCH_FAILED':
            return [CommonRecoveryOptions.changeLanguage()];
        case 'FILESYSTEM_ERROR':
        case 'INTERNAL':
            return [CommonRecoveryOptions.escalateToHuman('unexpected failure')];
    }
}

export function describeError(err: unknown): StructuredError {
    if (err instanceof ValidationError) {
        return createStructuredError(err.code, 'Intent document failed validation', err.errors, recoveryFor(err.code));
    }
    if (err instanceof StructuralError) {
        return createStructuredError(err.code, err.message, err.problems, recoveryFor(err.code));
    }
    if (err instanceof ApprovalGateError) {
        return createStructuredError(err.code, err.message, [`intent ${err.intentId}`], recoveryFor(err.code));
    }
    const message = err instanceof Error ? err.message : String(err);
    return createStructuredError('INTERNAL', message, [], recoveryFor('INTERNAL'));
}
