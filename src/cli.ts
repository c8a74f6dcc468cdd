/**
 * CLI Entry Point for the intent pipeline
 *
 *   intentctl new <name> [--goal <text>] [--out <file.yaml>]
 *   intentctl parse <file.yaml> [--out <ir.json>]
 *   intentctl plan <file.yaml|ir.json> [--out <ir.json>] [--json]
 *   intentctl iterate <file.yaml|ir.json> [key=value ...] [--action <line> ...] [--out <ir.json>]
 *   intentctl show <file.yaml|ir.json> [--json]
 *   intentctl amen <file.yaml|ir.json> [--out <ir.json>]
 *   intentctl execute <file.yaml|ir.json> --amen [--workspace <dir>] [--json]
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';

import { CONTAINER_ENGINE, DEFAULT_BASE_IMAGE, DEFAULT_LANGUAGE } from './config';
import { Executor } from './executor';
import type { ExecutionResult, ExecutorOptions } from './executor';
import { applyIteration } from './iteration';
import { ChangeSet, IntentIR, fromJson, toJson } from './ir';
import { formatAction, parseDslWithDiagnostics } from './parser';
import { Planner } from './planner';
import { createStructuredError, describeError, recoveryFor } from './structured_error';

export interface CliIO {
    out(line: string): void;
    err(line: string): void;
}

const consoleIO: CliIO = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
};

/* -------------------------------------------------------------------------- */
/* Argument helpers                                                           */
/* -------------------------------------------------------------------------- */

const VALUE_FLAGS = ['--out', '--goal', '--workspace', '--action'];

function flagValues(args: string[], flag: string): string[] {
    const values: string[] = [];
    args.forEach((arg, i) => {
        const next = args[i + 1];
        if (arg === flag && next !== undefined) values.push(next);
    });
    return values;
}

function flagValue(args: string[], flag: string): string | undefined {
    return flagValues(args, flag)[0];
}

function positionals(args: string[]): string[] {
    const out: string[] = [];
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (VALUE_FLAGS.includes(arg)) {
            i++;
            continue;
        }
        if (!arg.startsWith('--')) out.push(arg);
    }
    return out;
}

/* -------------------------------------------------------------------------- */
/* CLI                                                                        */
/* -------------------------------------------------------------------------- */

class IntentCli {
    constructor(
        private readonly io: CliIO = consoleIO,
        private readonly executorOptions: ExecutorOptions = {}
    ) {}

    /** argv as process.argv (node, script, command, ...). Resolves to the exit code. */
    async run(argv: string[]): Promise<number> {
        const command = argv[2] || 'help';
        const args = argv.slice(3);

        try {
            switch (command) {
                case 'new':
                    return this.runNew(args);
                case 'parse':
                    return this.runParse(args);
                case 'plan':
                    return this.runPlan(args);
                case 'iterate':
                    return this.runIterate(args);
                case 'show':
                    return this.runShow(args);
                case 'amen':
                    return this.runAmen(args);
                case 'execute':
                    return await this.runExecute(args);
                case 'help':
                    this.showHelp();
                    return 0;
                default:
                    this.io.err(`Error: Unknown command: ${command}`);
                    this.showHelp();
                    return 1;
            }
        } catch (e: unknown) {
            this.reportError(e, args.includes('--json'));
            return 1;
        }
    }

    private runNew(args: string[]): number {
        const [name] = positionals(args);
        if (!name) {
            this.io.err('Error: Intent name required');
            this.io.err('Usage: intentctl new <name> [--goal <text>] [--out <file.yaml>]');
            return 1;
        }

        const text = yaml.stringify({
            INTENT: {
                name,
                goal: flagValue(args, '--goal') || 'Describe what this service should do',
            },
            ENVIRONMENT: {
                runtime: 'docker',
                base_image: DEFAULT_BASE_IMAGE,
                ports: [8000],
            },
            IMPLEMENTATION: {
                language: DEFAULT_LANGUAGE,
                framework: 'fastapi',
                actions: ['api.expose GET /health'],
            },
            EXECUTION: {
                mode: 'dry-run',
            },
        });

        // Validates the name and goal before anything is written
        parseDslWithDiagnostics(text);

        return this.emit(text.trimEnd(), flagValue(args, '--out'));
    }

    private runParse(args: string[]): number {
        const file = this.requireFile(args, 'parse');
        if (!file) return 1;

        const ir = this.load(file);
        return this.emit(toJson(ir), flagValue(args, '--out'));
    }

    private runPlan(args: string[]): number {
        const file = this.requireFile(args, 'plan');
        if (!file) return 1;

        const ir = this.load(file);
        const result = new Planner().dryRun(ir);

        const out = flagValue(args, '--out');
        if (out) this.writeFile(out, toJson(ir));

        if (args.includes('--json')) {
            this.io.out(JSON.stringify(result, null, 2));
        } else {
            for (const line of result.logs) this.io.out(line);
            for (const w of result.warnings) this.io.out(`Warning: ${w}`);
            const r = result.estimated_resources;
            this.io.out(`Resources: memory=${r.memory} cpu=${r.cpu} build=${r.estimated_build_time} startup=${r.estimated_startup_time}`);
        }
        return result.success ? 0 : 1;
    }

    private runIterate(args: string[]): number {
        const file = this.requireFile(args, 'iterate');
        if (!file) return 1;

        const out = this.irOutput(args, file, 'iterate');
        if (!out) return 1;

        const changes: ChangeSet = {};
        for (const token of positionals(args).slice(1)) {
            const eq = token.indexOf('=');
            if (eq <= 0) {
                this.io.err(`Error: Expected key=value, got '${token}'`);
                return 1;
            }
            const value = token.slice(eq + 1);
            changes[token.slice(0, eq)] = value === '' ? null : value;
        }
        const actions = flagValues(args, '--action');
        if (actions.length === 1) changes.action = actions[0];
        if (actions.length > 1) changes.actions = actions;

        const ir = this.load(file);
        const outcome = applyIteration(ir, changes, 'cli');
        this.writeFile(out, toJson(ir));

        for (const w of outcome.warnings) this.io.err(`Warning: ${w}`);
        if (outcome.ignored.length > 0) this.io.err(`Ignored keys: ${outcome.ignored.join(', ')}`);
        this.io.out(`Iteration ${outcome.record.sequence} recorded (${outcome.applied.join(', ') || 'no changes'})`);
        return 0;
    }

    private runShow(args: string[]): number {
        const file = this.requireFile(args, 'show');
        if (!file) return 1;

        const ir = this.load(file);
        if (args.includes('--json')) {
            this.io.out(toJson(ir));
        } else {
            for (const line of this.summary(ir)) this.io.out(line);
        }
        return 0;
    }

    /** Show the intent, re-plan it and persist it past the AMEN boundary. */
    private runAmen(args: string[]): number {
        const file = this.requireFile(args, 'amen');
        if (!file) return 1;

        const out = this.irOutput(args, file, 'amen');
        if (!out) return 1;

        const ir = this.load(file);
        if (!this.replan(ir)) return 1;

        for (const line of this.summary(ir)) this.io.out(line);
        ir.approve();
        this.writeFile(out, toJson(ir));
        this.io.out(`AMEN: intent ${ir.id} approved, saved to ${out}`);
        return 0;
    }

    private async runExecute(args: string[]): Promise<number> {
        const file = this.requireFile(args, 'execute');
        if (!file) return 1;

        // Artifacts are always rebuilt so the deployed code matches the IR being approved
        const ir = this.load(file);
        if (!this.replan(ir)) return 1;
        if (args.includes('--amen')) ir.approve();

        const executor = new Executor({
            ...this.executorOptions,
            workspaceDir: flagValue(args, '--workspace') ?? this.executorOptions.workspaceDir,
        });
        const result = await executor.execute(ir);
        this.reportExecution(result, args.includes('--json'), executor.workspacePath);

        if (result.status === 'completed') return 0;
        return result.status === 'blocked' ? 2 : 1;
    }

    /* ---------------------------------------------------------------------- */
    /* Helpers                                                                */
    /* ---------------------------------------------------------------------- */

    private requireFile(args: string[], command: string): string | null {
        const [file] = positionals(args);
        if (!file) {
            this.io.err(`Error: Intent file required`);
            this.io.err(`Usage: intentctl ${command} <file.yaml|ir.json>`);
            return null;
        }
        if (!fs.existsSync(file)) {
            this.io.err(`Error: File not found: ${file}`);
            return null;
        }
        return file;
    }

    /** Where a command that rewrites the IR saves it: --out, or in place for .json input. */
    private irOutput(args: string[], file: string, command: string): string | null {
        const out = flagValue(args, '--out') || (file.endsWith('.json') ? file : undefined);
        if (!out) {
            this.io.err(`Error: ${command} on a DSL file needs --out <ir.json>`);
            return null;
        }
        return out;
    }

    private replan(ir: IntentIR): boolean {
        const plan = new Planner().dryRun(ir);
        if (!plan.success) {
            for (const w of plan.warnings) this.io.err(`Error: Planning failed: ${w}`);
        }
        return plan.success;
    }

    private summary(ir: IntentIR): string[] {
        const { intent, environment, implementation } = ir;
        const lines = [`Intent: ${intent.name} (${ir.id})`, `Goal: ${intent.goal}`];
        if (intent.description) lines.push(`Description: ${intent.description}`);
        lines.push(
            `Runtime: ${environment.runtime}, base image: ${environment.base_image}`,
            `Ports: ${environment.ports.join(', ') || 'none'}`,
            `Language: ${implementation.language}, framework: ${implementation.framework || 'none'}`,
            `Actions (${implementation.actions.length}):`,
            ...implementation.actions.map(a => `  ${formatAction(a)}`),
            `Mode: ${ir.execution_mode} (approved: ${ir.amen_approved ? 'yes' : 'no'})`,
            `Iterations: ${ir.iteration_count}`,
            `Planned: ${ir.generated_code !== null ? 'yes' : 'no'}`
        );
        return lines;
    }

    /** DSL (.yaml/.yml) or serialized IR (.json). */
    private load(file: string): IntentIR {
        const text = fs.readFileSync(file, 'utf-8');
        if (file.endsWith('.json')) return fromJson(text);

        const { ir, warnings } = parseDslWithDiagnostics(text);
        for (const w of warnings) this.io.err(`Warning: ${w}`);
        return ir;
    }

    private emit(text: string, out: string | undefined): number {
        if (out) {
            this.writeFile(out, text);
            this.io.out(`Wrote ${out}`);
        } else {
            this.io.out(text);
        }
        return 0;
    }

    private writeFile(file: string, text: string): void {
        fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
        fs.writeFileSync(file, text.endsWith('\n') ? text : text + '\n');
    }

    private reportExecution(result: ExecutionResult, json: boolean, workspace: string | null): void {
        if (json) {
            this.io.out(JSON.stringify(result, null, 2));
        } else {
            for (const line of result.logs) this.io.out(line);
            for (const url of result.endpoints) this.io.out(`Endpoint: ${url}`);
            this.io.out(`Status: ${result.status} (${result.execution_time.toFixed(2)}s)`);
        }

        if (result.error_code && result.error) {
            const structured = createStructuredError(
                result.error_code,
                result.error,
                [],
                recoveryFor(result.error_code, { engine: CONTAINER_ENGINE, workspace: workspace || undefined })
            );
            this.io.err(json ? JSON.stringify(structured, null, 2) : `Error: ${structured.message}`);
        }
    }

    private reportError(e: unknown, json: boolean): void {
        const structured = describeError(e);
        if (json) {
            this.io.err(JSON.stringify(structured, null, 2));
            return;
        }
        this.io.err(`Error: ${structured.message}`);
        for (const detail of structured.details) this.io.err(`  - ${detail}`);
        for (const option of structured.recovery_options) {
            this.io.err(`  → ${option.description}${option.command ? ` (${option.command})` : ''}`);
        }
    }

    private showHelp(): void {
        this.io.out(`
intentctl - intent DSL pipeline

USAGE:
  intentctl <command> [options]

COMMANDS:
  new <name>            Print a starter intent document
  parse <file>          Parse a DSL document and print the IR as JSON
  plan <file>           Dry-run: generate code and Dockerfile, simulate actions
  iterate <file>        Apply key=value changes and --action lines to a dry-run IR
  show <file>           Print an intent summary (--json for the full IR)
  amen <file>           Re-plan, approve and save the IR (in place for .json, else --out)
  execute <file>        Build and run an approved intent (--amen approves it)
  help                  Show this help

OPTIONS:
  --out <file>          Write the result (IR JSON or DSL) to a file
  --json                Machine-readable output
  --workspace <dir>     Directory for generated artifacts (execute)

EXAMPLES:
  intentctl new ping-service --goal "Answer health checks" --out ping.yaml
  intentctl plan ping.yaml --out ping.ir.json
  intentctl iterate ping.ir.json framework=flask --action "api.expose POST /users"
  intentctl amen ping.ir.json
  intentctl execute ping.ir.json
`);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new IntentCli();
    cli.run(process.argv)
        .then((code) => {
            process.exitCode = code;
        })
        .catch((err: unknown) => {
            console.error('Fatal error:', err);
            process.exit(1);
        });
}

export { IntentCli };
