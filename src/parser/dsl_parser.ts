/**
 * DSL Parser: intent documents (YAML) → IntentIR
 *
 * Example document:
 *
 *   INTENT:
 *     name: my-api
 *     goal: Create REST API
 *
 *   ENVIRONMENT:
 *     runtime: docker
 *     base_image: python:3.12-slim
 *
 *   IMPLEMENTATION:
 *     language: python
 *     framework: fastapi
 *     actions:
 *       - api.expose GET /ping
 *       - api.expose POST /users
 *
 *   EXECUTION:
 *     mode: dry-run
 *
 * Sections are parsed independently and every problem is collected before
 * anything is thrown, so one call reports all of them.
 */

import * as fs from 'fs';
import * as yaml from 'yaml';

import { DEFAULT_LANGUAGE, FRAMEWORK_LANGUAGE_REQUIREMENTS } from '../config';
import { createLogger } from '../logger';
import { ParseError, ValidationError } from '../structured_error';
import {
    Action,
    Environment,
    ExecutionMode,
    Implementation,
    Intent,
    IntentIR,
    defaultEnvironment,
    defaultImplementation,
    isExecutionMode,
    isRuntimeType,
} from '../ir';
import { Diagnostics, emptyDiagnostics, parseAction, rootShellWarning } from './action_grammar';

const log = createLogger('dsl-parser');

const NAME_RE = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export interface ParseOutcome {
    ir: IntentIR;
    warnings: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Error text when the framework needs a different language, else null. */
export function checkFrameworkCompatibility(language: string, framework: string | null): string | null {
    if (!framework) return null;
    const required = FRAMEWORK_LANGUAGE_REQUIREMENTS[framework];
    if (required && required !== language) {
        return `Framework '${framework}' requires language '${required}' (got '${language}')`;
    }
    return null;
}

/** Lower-cased, trimmed language/framework token. */
export function normalizeToken(value: string): string {
    return value.trim().toLowerCase();
}

export class DslParser {
    parseFile(filePath: string): IntentIR {
        return this.parse(fs.readFileSync(filePath, 'utf8'));
    }

    parse(content: string): IntentIR {
        return this.parseWithDiagnostics(content).ir;
    }

    parseWithDiagnostics(content: string): ParseOutcome {
        const diag = emptyDiagnostics();
        const data = this.decode(content);

        let intent: Intent = { name: '', goal: '', description: null };
        if ('INTENT' in data) {
            intent = this.parseIntent(data.INTENT, diag);
        } else {
            diag.errors.push('Missing required section: INTENT');
        }

        const environment = 'ENVIRONMENT' in data
            ? this.parseEnvironment(data.ENVIRONMENT, diag)
            : defaultEnvironment();

        let implementation = defaultImplementation();
        if ('IMPLEMENTATION' in data) {
            implementation = this.parseImplementation(data.IMPLEMENTATION, diag);
        } else {
            diag.errors.push('Missing required section: IMPLEMENTATION');
        }

        const mode = 'EXECUTION' in data ? this.parseExecution(data.EXECUTION, diag) : 'dry-run';

        this.validate(implementation, diag);

        if (diag.errors.length > 0) {
            log.warn('DSL validation failed', { error_count: diag.errors.length });
            throw new ValidationError(diag.errors);
        }

        const ir = new IntentIR({ intent, environment, implementation });
        if (mode === 'transactional') {
            ir.approve();
            diag.warnings.push('EXECUTION.mode transactional pre-approves the intent (AMEN boundary passed at parse time)');
        }

        for (const w of diag.warnings) log.warn(w, { intent: intent.name });
        log.info('Parsed intent', { id: ir.id, name: intent.name, actions: implementation.actions.length });

        return { ir, warnings: diag.warnings };
    }

    /* ---------------------------------------------------------------------- */
    /* Document decoding                                                      */
    /* ---------------------------------------------------------------------- */

    private decode(content: string): Record<string, unknown> {
        let data: unknown;
        try {
            data = yaml.parse(content);
        } catch (e: unknown) {
            throw new ParseError(`Invalid YAML: ${e instanceof Error ? e.message : String(e)}`);
        }

        if (data === null || data === undefined) {
            throw new ParseError('Empty DSL content');
        }
        if (!isRecord(data)) {
            throw new ParseError('DSL document must be a mapping of sections');
        }
        return data;
    }

    /* ---------------------------------------------------------------------- */
    /* Sections                                                               */
    /* ---------------------------------------------------------------------- */

    private parseIntent(section: unknown, diag: Diagnostics): Intent {
        if (!isRecord(section)) {
            diag.errors.push('INTENT must be a mapping');
            return { name: '', goal: '', description: null };
        }

        const name = typeof section.name === 'string' ? section.name.trim() : '';
        const goal = typeof section.goal === 'string' ? section.goal.trim() : '';

        if (!name) {
            diag.errors.push('INTENT.name is required');
        } else if (!NAME_RE.test(name)) {
            diag.errors.push(`INTENT.name '${name}' must be an identifier (letters, digits, '.', '_', '-')`);
        }
        if (!goal) diag.errors.push('INTENT.goal is required');

        return {
            name,
            goal,
            description: typeof section.description === 'string' ? section.description : null,
        };
    }

    private parseEnvironment(section: unknown, diag: Diagnostics): Environment {
        const env = defaultEnvironment();
        if (!isRecord(section)) {
            diag.errors.push('ENVIRONMENT must be a mapping');
            return env;
        }

        if (section.runtime !== undefined) {
            if (isRuntimeType(section.runtime)) {
                env.runtime = section.runtime;
            } else {
                diag.warnings.push(`Unknown runtime '${String(section.runtime)}', defaulting to docker`);
            }
        }

        if (section.base_image !== undefined) {
            if (typeof section.base_image === 'string' && section.base_image.trim()) {
                env.base_image = section.base_image.trim();
            } else {
                diag.errors.push('ENVIRONMENT.base_image must be a non-empty string');
            }
        }

        env.services = this.stringList(section.services, 'ENVIRONMENT.services', diag);
        env.volumes = this.stringList(section.volumes, 'ENVIRONMENT.volumes', diag);

        if (section.ports !== undefined && section.ports !== null) {
            if (!Array.isArray(section.ports)) {
                diag.errors.push('ENVIRONMENT.ports must be a list');
            } else {
                section.ports.forEach((p: unknown, i: number) => {
                    if (typeof p === 'number' && Number.isInteger(p) && p >= 1 && p <= 65535) {
                        env.ports.push(p);
                    } else {
                        diag.errors.push(`ENVIRONMENT.ports[${i}] must be a port number (1-65535), got ${JSON.stringify(p)}`);
                    }
                });
            }
        }

        if (section.env_vars !== undefined && section.env_vars !== null) {
            if (!isRecord(section.env_vars)) {
                diag.errors.push('ENVIRONMENT.env_vars must be a mapping');
            } else {
                for (const [key, value] of Object.entries(section.env_vars)) {
                    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
                        env.env_vars[key] = String(value);
                    } else {
                        diag.errors.push(`ENVIRONMENT.env_vars.${key} must be a scalar value`);
                    }
                }
            }
        }

        return env;
    }

    private parseImplementation(section: unknown, diag: Diagnostics): Implementation {
        const impl = defaultImplementation();
        if (!isRecord(section)) {
            diag.errors.push('IMPLEMENTATION must be a mapping');
            return impl;
        }

        if (section.language !== undefined) {
            if (typeof section.language === 'string' && section.language.trim()) {
                impl.language = normalizeToken(section.language);
            } else {
                diag.errors.push('IMPLEMENTATION.language must be a non-empty string');
            }
        }
        if (!impl.language) impl.language = DEFAULT_LANGUAGE;

        if (section.framework !== undefined && section.framework !== null) {
            if (typeof section.framework === 'string' && section.framework.trim()) {
                impl.framework = normalizeToken(section.framework);
            } else {
                diag.errors.push('IMPLEMENTATION.framework must be a non-empty string');
            }
        }

        if (section.actions !== undefined && section.actions !== null) {
            if (!Array.isArray(section.actions)) {
                diag.errors.push('IMPLEMENTATION.actions must be a list');
            } else {
                for (const entry of section.actions) {
                    const action: Action | null = parseAction(entry, diag);
                    if (action) impl.actions.push(action);
                }
            }
        }

        return impl;
    }

    private parseExecution(section: unknown, diag: Diagnostics): ExecutionMode {
        if (!isRecord(section)) {
            diag.errors.push('EXECUTION must be a mapping');
            return 'dry-run';
        }
        const mode = section.mode ?? 'dry-run';
        if (isExecutionMode(mode)) return mode;
        diag.warnings.push(`Unknown execution mode '${String(mode)}', defaulting to dry-run`);
        return 'dry-run';
    }

    /* ---------------------------------------------------------------------- */
    /* Semantic checks                                                        */
    /* ---------------------------------------------------------------------- */

    private validate(impl: Implementation, diag: Diagnostics): void {
        for (const action of impl.actions) {
            const warning = rootShellWarning(action);
            if (warning) diag.warnings.push(warning);
        }

        const incompatible = checkFrameworkCompatibility(impl.language, impl.framework);
        if (incompatible) diag.errors.push(incompatible);
    }

    private stringList(value: unknown, label: string, diag: Diagnostics): string[] {
        if (value === undefined || value === null) return [];
        if (!Array.isArray(value)) {
            diag.errors.push(`${label} must be a list`);
            return [];
        }
        const out: string[] = [];
        value.forEach((v: unknown, i: number) => {
            if (typeof v === 'string') out.push(v);
            else diag.errors.push(`${label}[${i}] must be a string`);
        });
        return out;
    }
}

export function parseDsl(content: string): IntentIR {
    return new DslParser().parse(content);
}

export function parseDslWithDiagnostics(content: string): ParseOutcome {
    return new DslParser().parseWithDiagnostics(content);
}

export function parseDslFile(filePath: string): IntentIR {
    return new DslParser().parseFile(filePath);
}

