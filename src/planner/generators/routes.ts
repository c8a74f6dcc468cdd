// src/planner/generators/routes.ts

import type { Action } from '../../ir';
import type { Route } from './types';

// Python keywords and the module-level names the Python generators bind
const RESERVED_NAMES: ReadonlySet<string> = new Set([
    'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await',
    'break', 'class', 'continue', 'def', 'del', 'elif', 'else', 'except',
    'finally', 'for', 'from', 'global', 'if', 'import', 'in', 'is',
    'lambda', 'nonlocal', 'not', 'or', 'pass', 'raise', 'return', 'try',
    'while', 'with', 'yield',
    'app', 'os', 'json', 'jsonify', 'Flask', 'FastAPI', 'uvicorn',
]);

/**
 * Identifier derived from an endpoint path:
 *   /users/{id} → users_id,  / → root,  /2fa → route_2fa,  /import → route_import
 */
export function handlerName(path: string): string {
    const base = path.replace(/[^A-Za-z0-9]+/g, '_').replace(/^_+|_+$/g, '');
    if (!base) return 'root';
    return /^[0-9]/.test(base) || RESERVED_NAMES.has(base) ? `route_${base}` : base;
}

export function buildRoutes(actions: readonly Action[]): Route[] {
    const used = new Set<string>();
    const routes: Route[] = [];

    for (const action of actions) {
        if (action.type !== 'api.expose') continue;
        const method = action.method || 'GET';

        let handler = handlerName(action.target);
        if (used.has(handler)) handler = `${handler}_${method.toLowerCase()}`;
        let suffix = 2;
        const stem = handler;
        while (used.has(handler)) handler = `${stem}_${suffix++}`;

        used.add(handler);
        routes.push({ handler, method, path: action.target });
    }
    return routes;
}
