/**
 * Code generator table
 *
 * Keys are `<language>:<framework>`, with `<language>:*` as the per-language
 * fallback. Add a pair here to support a new target.
 */

import { generateExpress } from './express';
import { generateFastApi } from './fastapi';
import { generateFlask } from './flask';
import { generateNode } from './node';
import { generatePlaceholder } from './placeholder';
import { generatePython } from './python';
import type { CodeGenerator } from './types';

export { buildRoutes, handlerName } from './routes';
export { lit, oneLine } from './types';
export type { CodeGenerator, GeneratorContext, Route } from './types';

export const CODE_GENERATORS: Record<string, CodeGenerator> = {
    'python:fastapi': generateFastApi,
    'python:flask': generateFlask,
    'python:*': generatePython,
    'node:express': generateExpress,
    'node:*': generateNode,
};

export interface GeneratorSelection {
    key: string;
    generate: CodeGenerator;
    /** Set when the exact pair had no entry */
    warning: string | null;
}

export function selectGenerator(language: string, framework: string | null): GeneratorSelection {
    if (framework) {
        const exact = CODE_GENERATORS[`${language}:${framework}`];
        if (exact) return { key: `${language}:${framework}`, generate: exact, warning: null };
    }

    const fallback = CODE_GENERATORS[`${language}:*`];
    if (fallback) {
        return {
            key: `${language}:*`,
            generate: fallback,
            warning: framework ? `No generator for framework '${framework}', using plain ${language}` : null,
        };
    }

    return {
        key: 'placeholder',
        generate: generatePlaceholder,
        warning: `No code generator for language '${language}', emitted placeholder script`,
    };
}
