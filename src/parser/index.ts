// src/parser/index.ts

export {
    DslParser,
    parseDsl,
    parseDslWithDiagnostics,
    parseDslFile,
    checkFrameworkCompatibility,
    normalizeToken,
} from "./dsl_parser";
export type { ParseOutcome } from "./dsl_parser";
export {
    ACTION_PATTERN,
    parseAction,
    parseActionLine,
    formatAction,
    rootShellWarning,
    emptyDiagnostics,
} from "./action_grammar";
export type { Diagnostics } from "./action_grammar";
