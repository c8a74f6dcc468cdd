// src/ir/index.ts

export { IntentIR, defaultEnvironment, defaultImplementation, newIntentId } from "./intent_ir";
export type { IntentIRInit, PlanArtifacts } from "./intent_ir";
export { serializeIR, deserializeIR, toJson, fromJson, canonicalJson, IR_DOCUMENT_SCHEMA, IR_SCHEMA_ID } from "./serialize";
export { stableStringify } from "./stable_stringify";
export * from "./types";
