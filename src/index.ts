/**
 * Main entry point - exports all public APIs
 */

export * from './ir';
export * from './parser';
export * from './planner';
export * from './executor';
export { applyIteration, ITERATION_KEYS } from './iteration';
export type { IterationKey, IterationOutcome } from './iteration';
export { SchemaValidator } from './schema_validator';
export type { ValidationResult, ValidationIssue, JsonSchema } from './schema_validator';
export {
    StructuralError,
    ParseError,
    ValidationError,
    ApprovalGateError,
    createStructuredError,
    describeError,
    recoveryFor,
    CommonRecoveryOptions,
} from './structured_error';
export type { ErrorCode, RecoveryOption, StructuredError } from './structured_error';
export { createLogger, setCorrelation, clearCorrelation } from './logger';
export type { Logger, LogLevel } from './logger';
export { IntentCli } from './cli';
export type { CliIO } from './cli';
