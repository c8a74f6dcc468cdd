/**
 * Action grammar
 *
 *   <action-type> [<HTTP-METHOD>] <target> [<param tokens>]
 *
 * Param tokens are `key=value` (value is everything after the first `=`) or a
 * bare flag, which maps to `true`. Structured mappings with explicit
 * type/method/target/params are accepted as well.
 */

import {
    Action,
    HTTP_METHODS,
    HttpMethod,
    METHOD_ACTIONS,
    ParamValue,
    ActionType,
    isActionType,
    isHttpMethod,
} from '../ir';

export interface Diagnostics {
    errors: string[];
    warnings: string[];
}

export function emptyDiagnostics(): Diagnostics {
    return { errors: [], warnings: [] };
}

export const ACTION_PATTERN = new RegExp(
    '^(?<type>[\\w.]+)\\s+' +
    `(?:(?<method>${HTTP_METHODS.join('|')})\\s+)?` +
    '(?<target>\\S+)' +
    '(?:\\s+(?<params>.+))?$'
);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/* -------------------------------------------------------------------------- */
/* Parsing                                                                    */
/* -------------------------------------------------------------------------- */

function parseParamTokens(raw: string, line: string, diag: Diagnostics): Record<string, ParamValue> | null {
    const params: Record<string, ParamValue> = {};
    for (const token of raw.split(/\s+/).filter(Boolean)) {
        const eq = token.indexOf('=');
        if (eq === -1) {
            params[token] = true;
            continue;
        }
        const key = token.slice(0, eq);
        if (!key) {
            diag.errors.push(`Invalid parameter '${token}' in action: '${line}'`);
            return null;
        }
        params[key] = token.slice(eq + 1);
    }
    return params;
}

// expose/call need a verb; every other variant ignores it
function settleMethod(type: ActionType, method: HttpMethod | null, target: string, diag: Diagnostics): HttpMethod | null {
    const needsMethod = METHOD_ACTIONS.includes(type);
    if (needsMethod && method === null) {
        diag.warnings.push(`Action '${type} ${target}' has no HTTP method, defaulting to GET`);
        return 'GET';
    }
    if (!needsMethod && method !== null) {
        diag.warnings.push(`Action '${type} ${target}' does not take an HTTP method, ignoring ${method}`);
        return null;
    }
    return method;
}

export function parseActionLine(line: string, diag: Diagnostics): Action | null {
    const trimmed = line.trim();
    const match = ACTION_PATTERN.exec(trimmed);
    const groups = match?.groups;
    if (!groups || !groups.type || !groups.target) {
        diag.errors.push(`Invalid action format: '${line}'`);
        return null;
    }

    const type = groups.type;
    if (!isActionType(type)) {
        diag.errors.push(`Unknown action type: '${type}'`);
        return null;
    }

    const params = groups.params ? parseParamTokens(groups.params, trimmed, diag) : {};
    if (params === null) return null;

    const method = isHttpMethod(groups.method) ? groups.method : null;
    return {
        type,
        method: settleMethod(type, method, groups.target, diag),
        target: groups.target,
        params,
    };
}

function parseActionMapping(entry: Record<string, unknown>, diag: Diagnostics): Action | null {
    const type = entry.type;
    if (!isActionType(type)) {
        diag.errors.push(`Unknown action type: '${String(type ?? '')}'`);
        return null;
    }

    const target = entry.target;
    if (typeof target !== 'string' || target.trim() === '') {
        diag.errors.push(`Action '${type}' requires a target`);
        return null;
    }

    let method: HttpMethod | null = null;
    if (entry.method !== undefined && entry.method !== null) {
        const upper = String(entry.method).toUpperCase();
        if (!isHttpMethod(upper)) {
            diag.errors.push(`Invalid HTTP method '${String(entry.method)}' for action '${type} ${target}'`);
            return null;
        }
        method = upper;
    }

    const params: Record<string, ParamValue> = {};
    if (entry.params !== undefined && entry.params !== null) {
        if (!isRecord(entry.params)) {
            diag.errors.push(`Action '${type} ${target}' params must be a mapping`);
            return null;
        }
        for (const [key, value] of Object.entries(entry.params)) {
            // Only `true` has a line form (a bare flag); false and numbers become strings
            if (typeof value === 'string' || value === true) {
                params[key] = value;
            } else if (typeof value === 'number' || value === false) {
                params[key] = String(value);
            } else {
                diag.errors.push(`Action '${type} ${target}' param '${key}' must be a string, boolean or number`);
                return null;
            }
        }
    }

    return {
        type,
        method: settleMethod(type, method, target, diag),
        target,
        params,
    };
}

/** Parse one entry of IMPLEMENTATION.actions (line or mapping). */
export function parseAction(entry: unknown, diag: Diagnostics): Action | null {
    if (typeof entry === 'string') return parseActionLine(entry, diag);
    if (isRecord(entry)) return parseActionMapping(entry, diag);
    diag.errors.push(`Invalid action entry: ${JSON.stringify(entry)}`);
    return null;
}

/* -------------------------------------------------------------------------- */
/* Formatting & checks                                                        */
/* -------------------------------------------------------------------------- */

/** Canonical single-line form of an action. */
export function formatAction(action: Action): string {
    const parts: string[] = [action.type];
    if (action.method) parts.push(action.method);
    parts.push(action.target);
    for (const [key, value] of Object.entries(action.params)) {
        if (value === true) parts.push(key);
        else parts.push(`${key}=${String(value)}`);
    }
    return parts.join(' ');
}

/** Warning text when a shell command looks like it runs as root, else null. */
export function rootShellWarning(action: Action): string | null {
    if (action.type !== 'shell.exec') return null;
    const mentionsRoot = Object.entries(action.params).some(([key, value]) =>
        typeof value === 'string' ? /root/i.test(value) : value === true && /root/i.test(key)
    );
    return mentionsRoot ? `Action '${action.target}' may run as root - review carefully` : null;
}
