// src/planner/dockerfile.ts

import { CONTAINER_PORT, FRAMEWORK_COMPANIONS, getLanguageProfile } from '../config';
import type { IntentIR } from '../ir';

/** Framework plus the server packages it needs, in install order. */
export function frameworkDependencies(framework: string | null): string[] {
    if (!framework) return [];
    return [framework, ...(FRAMEWORK_COMPANIONS[framework] || [])];
}

/** Default port first, then declared ports, duplicates removed. */
export function exposedPorts(ports: readonly number[], defaultPort: number = CONTAINER_PORT): number[] {
    return [...new Set([defaultPort, ...ports])];
}

export function generateDockerfile(ir: IntentIR): string {
    const profile = getLanguageProfile(ir.implementation.language);
    const deps = frameworkDependencies(ir.implementation.framework);

    const lines: string[] = [
        `# Auto-generated Dockerfile for: ${ir.intent.name}`,
        `FROM ${ir.environment.base_image}`,
        '',
        'WORKDIR /app',
        '',
    ];

    if (profile.installCommand && deps.length > 0) {
        lines.push(profile.installCommand(deps), '');
    }
    lines.push(...profile.copyDirectives, '');

    for (const port of exposedPorts(ir.environment.ports)) {
        lines.push(`EXPOSE ${port}`);
    }
    lines.push('', `CMD ${JSON.stringify(profile.command)}`);

    return lines.join('\n') + '\n';
}
