// src/planner/generators/types.ts

import type { Action, HttpMethod } from '../../ir';

export interface Route {
    handler: string;
    method: HttpMethod;
    path: string;
}

export interface GeneratorContext {
    name: string;
    goal: string;
    language: string;
    framework: string | null;
    /** One per api.expose action, in declaration order */
    routes: Route[];
    actions: readonly Action[];
    /** Port the service listens on when PORT is unset */
    port: number;
}

export type CodeGenerator = (ctx: GeneratorContext) => string;

/** Quoted literal valid in both generated Python and JavaScript. */
export function lit(value: string): string {
    return JSON.stringify(value);
}

/** Collapse newlines so the value can sit inside a line comment. */
export function oneLine(value: string): string {
    return value.replace(/\s*[\r\n]+\s*/g, ' ').trim();
}
