/**
 * Planner: dry-run simulation of an IntentIR.
 *
 * Produces generated code, a Dockerfile, a simulation log, warnings and a
 * resource estimate. Nothing touches the filesystem, network or processes;
 * the only visible mutation is ir.recordPlan(). Log lines carry no
 * timestamps, so planning the same IR twice yields identical output.
 */

import {
    CONTAINER_PORT,
    HEAVY_FRAMEWORKS,
    HEAVY_FRAMEWORK_MEMORY,
    RESOURCE_CONSTANTS,
    getLanguageProfile,
} from '../config';
import { clearCorrelation, createLogger, setCorrelation } from '../logger';
import type { Action, IntentIR } from '../ir';
import { formatAction } from '../parser/action_grammar';
import { buildRoutes, selectGenerator } from './generators';
import { generateDockerfile } from './dockerfile';

const log = createLogger('planner');

export interface ResourceEstimate {
    memory: string;
    cpu: string;
    estimated_build_time: string;
    estimated_startup_time: string;
}

export interface PlanResult {
    success: boolean;
    logs: string[];
    generated_code: string;
    dockerfile: string;
    warnings: string[];
    estimated_resources: ResourceEstimate;
}

export function estimateResources(language: string, framework: string | null): ResourceEstimate {
    const memory = framework && HEAVY_FRAMEWORKS.includes(framework)
        ? HEAVY_FRAMEWORK_MEMORY
        : getLanguageProfile(language).memory;
    return { memory, ...RESOURCE_CONSTANTS };
}

function describeParams(action: Action): string {
    const entries = Object.entries(action.params);
    if (entries.length === 0) return '';
    return ` (${entries.map(([k, v]) => (v === true ? k : `${k}=${String(v)}`)).join(', ')})`;
}

/** Effect line for one action, indented under its `→ Simulating:` line. */
export function simulateAction(action: Action): string {
    const params = describeParams(action);
    switch (action.type) {
        case 'api.expose':
            return `  would expose endpoint ${action.method || 'GET'} ${action.target}`;
        case 'db.create':
            return `  would create table ${action.target}${params}`;
        case 'db.add_column':
            return `  would add column to table ${action.target}${params}`;
        case 'shell.exec':
            return `  would execute shell command: ${formatAction(action).slice(action.type.length + 1)}`;
        case 'rest.call':
            return `  would call ${action.method || 'GET'} ${action.target}${params}`;
        case 'file.create':
            return `  would create file ${action.target}${params}`;
    }
}

export class Planner {
    dryRun(ir: IntentIR): PlanResult {
        setCorrelation({ intentId: ir.id, stage: 'plan' });
        try {
            return this.plan(ir);
        } catch (e: unknown) {
            const message = e instanceof Error ? e.message : String(e);
            log.error('Planning failed', { error: message });
            return {
                success: false,
                logs: [`[DRY RUN] Planning failed: ${message}`],
                generated_code: '',
                dockerfile: '',
                warnings: [message],
                estimated_resources: estimateResources(ir.implementation.language, ir.implementation.framework),
            };
        } finally {
            clearCorrelation();
        }
    }

    private plan(ir: IntentIR): PlanResult {
        const { language, framework, actions } = ir.implementation;
        const logs: string[] = [];
        const warnings: string[] = [];

        logs.push(`[DRY RUN] Planning intent: ${ir.intent.name} (${ir.id})`);
        logs.push(`[DRY RUN] Runtime: ${ir.environment.runtime}, base image: ${ir.environment.base_image}`);
        logs.push(`[DRY RUN] Language: ${language}, framework: ${framework || 'none'}`);

        if (ir.environment.runtime === 'kubernetes') {
            warnings.push('Runtime kubernetes is not supported by the executor; plan is simulation only');
        }

        /* ---- code ---- */

        const selection = selectGenerator(language, framework);
        if (selection.warning) warnings.push(selection.warning);
        const generatedCode = selection.generate({
            name: ir.intent.name,
            goal: ir.intent.goal,
            language,
            framework,
            routes: buildRoutes(actions),
            actions,
            port: CONTAINER_PORT,
        });

        const dockerfile = generateDockerfile(ir);

        /* ---- simulation ---- */

        for (const action of actions) {
            logs.push(`→ Simulating: ${formatAction(action)}`);
            logs.push(simulateAction(action));
            if (action.type === 'shell.exec') {
                warnings.push(`Shell execution planned: ${action.target}`);
            }
        }

        const entryFile = getLanguageProfile(language).entryFile;
        logs.push(`[DRY RUN] Generated ${entryFile} with ${selection.key} generator`);
        logs.push('[DRY RUN] Generated Dockerfile');
        logs.push(`[DRY RUN] Simulation complete: ${actions.length} action(s), ${warnings.length} warning(s)`);

        ir.recordPlan({ generated_code: generatedCode, dockerfile, logs });
        log.info('Plan complete', { actions: actions.length, warnings: warnings.length, generator: selection.key });

        return {
            success: true,
            logs,
            generated_code: generatedCode,
            dockerfile,
            warnings,
            estimated_resources: estimateResources(language, framework),
        };
    }
}
