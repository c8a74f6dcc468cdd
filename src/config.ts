/**
 * Shared Configuration Constants
 *
 * Centralized configuration for the intent pipeline.
 * Values can be overridden via environment variables.
 */

function envInt(name: string, fallback: number): number {
    const parsed = parseInt(process.env[name] || '', 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

function envBool(name: string, fallback: boolean): boolean {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return fallback;
    return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

// DSL defaults (mirrored by deserialization)
export const DEFAULT_BASE_IMAGE = 'python:3.12-slim';
export const DEFAULT_LANGUAGE = 'python';

// Executor
export const WORKSPACE_DIR = process.env.INTENT_WORKSPACE_DIR || '';
export const SKIP_APPROVAL = envBool('INTENT_SKIP_APPROVAL', false);
export const CONTAINER_PORT = envInt('INTENT_CONTAINER_PORT', 8000);
export const CONTAINER_PREFIX = process.env.INTENT_CONTAINER_PREFIX || 'intent';
export const PORT_PROBE_ATTEMPTS = envInt('INTENT_PORT_PROBE_ATTEMPTS', 100);
export const CONTAINER_ENGINE = process.env.INTENT_CONTAINER_ENGINE || 'docker';

// Timeouts (milliseconds)
export const TIMEOUTS = {
    BUILD_MS: envInt('INTENT_BUILD_TIMEOUT', 300000), // 5 minutes
    RUN_MS: 60000,
    REMOVE_MS: 30000,
};

// Diagnostic truncation
export const MAX_STDERR_LOG_CHARS = 500;
export const CONTAINER_ID_CHARS = 12;

/* -------------------------------------------------------------------------- */
/* Language profiles                                                          */
/* -------------------------------------------------------------------------- */

export interface LanguageProfile {
    /** Application entry file written into the workspace */
    entryFile: string;
    /** Interpreter for local-process runtime; absent means unsupported */
    interpreter?: string;
    /** Installer used in the build file, receives the dependency list */
    installCommand?: (deps: string[]) => string;
    /** Build-file directives that copy sources in */
    copyDirectives: string[];
    /** Container start command */
    command: string[];
    /** Base memory estimate */
    memory: string;
    /** Manifest file emitted beside the entry file */
    manifest?: 'package.json';
}

export const LANGUAGE_PROFILES: Record<string, LanguageProfile> = {
    python: {
        entryFile: 'app.py',
        interpreter: 'python3',
        installCommand: (deps) => `RUN pip install --no-cache-dir ${deps.join(' ')}`,
        copyDirectives: ['COPY app.py .'],
        command: ['python', 'app.py'],
        memory: '256MB',
    },
    node: {
        entryFile: 'app.js',
        interpreter: 'node',
        copyDirectives: ['COPY package*.json ./', 'RUN npm install', '', 'COPY . .'],
        command: ['node', 'app.js'],
        memory: '128MB',
        manifest: 'package.json',
    },
};

// Unknown languages get the placeholder script
export const FALLBACK_LANGUAGE_PROFILE: LanguageProfile = {
    entryFile: 'app.sh',
    copyDirectives: ['COPY . .'],
    command: ['sh', 'app.sh'],
    memory: '256MB',
};

export function getLanguageProfile(language: string): LanguageProfile {
    return LANGUAGE_PROFILES[language] || FALLBACK_LANGUAGE_PROFILE;
}

/* -------------------------------------------------------------------------- */
/* Framework tables                                                           */
/* -------------------------------------------------------------------------- */

// framework → language it requires
export const FRAMEWORK_LANGUAGE_REQUIREMENTS: Record<string, string> = {
    fastapi: 'python',
    flask: 'python',
    django: 'python',
    express: 'node',
};

// Extra installables a framework needs to serve
export const FRAMEWORK_COMPANIONS: Record<string, string[]> = {
    fastapi: ['uvicorn'],
};

// Version ranges used in generated manifests
export const FRAMEWORK_VERSIONS: Record<string, string> = {
    express: '^4.18.0',
};

// Frameworks that bump the memory estimate
export const HEAVY_FRAMEWORKS = ['fastapi', 'django'];
export const HEAVY_FRAMEWORK_MEMORY = '512MB';

// Fixed estimates, not derived from the action list
export const RESOURCE_CONSTANTS = {
    cpu: '0.5',
    estimated_build_time: '30s',
    estimated_startup_time: '5s',
};
