import { config as loadDotenv } from 'dotenv';
import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, MAX_PAGE_SIZE, type AppConfig } from '../types/index.js';
import { ConfigError } from './errors.js';
import { getLogger, parseLogLevel } from './logger.js';

const configSchema = z.object({
    apiKey: z.string().trim().min(1, 'API key is empty').optional(),
    apiUrl: z.string().url(),
    pageSize: z.number().int().min(1).max(MAX_PAGE_SIZE),
    maxRecords: z.number().int().min(1).optional(),
    timeoutMs: z.number().int().positive(),
    retries: z.number().int().min(0).max(10),
    topN: z.number().int().min(1),
    minTermLength: z.number().int().min(1),
    logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
    jsonLogs: z.boolean(),
});

/**
 * Keys a config file may set. The credential is deliberately not one of them.
 */
const fileConfigSchema = configSchema.omit({ apiKey: true }).partial().strict();

/**
 * Load configuration from bibliometrics.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults apply).
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<AppConfig> | null> {
    const explorer = cosmiconfig('bibliometrics', {
        searchPlaces: ['bibliometrics.config.json', '.bibliometricsrc.json'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) return null;

    const parsed = fileConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new ConfigError(`Invalid config file ${result.filepath}`, formatIssues(parsed.error));
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 * `api_key` is the legacy variable name some `.env` files still use;
 * a non-empty SCOPUS_API_KEY wins over it.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<AppConfig> {
    const fromEnv: Partial<AppConfig> = {};

    const apiKey = env['SCOPUS_API_KEY']?.trim() || env['api_key']?.trim();
    if (apiKey) fromEnv.apiKey = apiKey;

    if (env['SCOPUS_API_URL']) fromEnv.apiUrl = env['SCOPUS_API_URL'];

    const logLevel = parseLogLevel(env['LOG_LEVEL']);
    if (logLevel) fromEnv.logLevel = logLevel;

    return fromEnv;
}

/**
 * Merge configuration from multiple sources and validate the result.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * The returned object is frozen for the lifetime of the process.
 */
export async function resolveConfig(
    cliFlags: Partial<AppConfig>,
    options: { env?: NodeJS.ProcessEnv; searchFrom?: string; dotenv?: boolean } = {}
): Promise<Readonly<AppConfig>> {
    if (options.dotenv ?? true) {
        loadDotenv();
    }

    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    const merged: Record<string, unknown> = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
    };
    // Unset CLI options arrive as undefined and must not mask lower layers
    for (const [key, value] of Object.entries(cliFlags)) {
        if (value !== undefined) merged[key] = value;
    }

    const parsed = configSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigError('Invalid configuration', formatIssues(parsed.error));
    }

    return Object.freeze(parsed.data);
}

/**
 * The API key, or a ConfigError when none was provided.
 */
export function requireApiKey(config: Pick<AppConfig, 'apiKey'>): string {
    if (!config.apiKey) {
        throw new ConfigError(
            'Missing Scopus API key: set SCOPUS_API_KEY (environment or .env) or pass --api-key'
        );
    }
    return config.apiKey;
}

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
