import { userInfo } from 'node:os';
import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, LOG_LEVELS, SORT_ORDERS, type EutilsConfig, type PubtrailConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Shape accepted from pubtrail.config.json. Every field is optional.
 */
const FileConfigSchema = z
    .object({
        eutils: z
            .object({
                baseUrl: z.string().url(),
                tool: z.string().min(1),
                email: z.string().min(1),
                apiKey: z.string().min(1),
                minIntervalMs: z.number().int().nonnegative(),
                timeoutMs: z.number().int().positive(),
            })
            .partial(),
        db: z.string().min(1),
        owner: z.string().min(1),
        pageSize: z.number().int().positive().max(10000),
        sort: z.enum(toTuple(SORT_ORDERS)),
        logLevel: z.enum(toTuple(LOG_LEVELS)),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

/**
 * Overrides from CLI flags.
 */
export type ConfigOverrides = Partial<Omit<PubtrailConfig, 'eutils'>> & { eutils?: Partial<EutilsConfig> };

/**
 * Load configuration from pubtrail.config.json using cosmiconfig.
 * Returns null if no config file is found (which is fine — defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<FileConfig | null> {
    const explorer = cosmiconfig('pubtrail', {
        searchPlaces: ['pubtrail.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = FileConfigSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn({ path: result.filepath, issues: parsed.error.issues }, 'Invalid config file, using defaults');
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const config: ConfigOverrides = {};
    const eutils: Partial<EutilsConfig> = {};

    if (env['NCBI_API_KEY']) eutils.apiKey = env['NCBI_API_KEY'];
    if (env['NCBI_EMAIL']) eutils.email = env['NCBI_EMAIL'];
    if (env['NCBI_TOOL']) eutils.tool = env['NCBI_TOOL'];
    if (Object.keys(eutils).length > 0) config.eutils = eutils;

    if (env['PUBTRAIL_DB']) config.db = env['PUBTRAIL_DB'];
    if (env['PUBTRAIL_OWNER']) config.owner = env['PUBTRAIL_OWNER'];

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { env?: NodeJS.ProcessEnv; searchFrom?: string } = {}
): Promise<PubtrailConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return {
        ...DEFAULT_CONFIG,
        owner: defaultOwner(),
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        // Deep merge nested objects
        eutils: {
            ...DEFAULT_CONFIG.eutils,
            ...fileConfig?.eutils,
            ...envConfig.eutils,
            ...cliFlags.eutils,
        },
    };
}

function defaultOwner(): string {
    try {
        return userInfo().username;
    } catch {
        return 'default';
    }
}

function toTuple<T extends string>(values: readonly T[]): [T, ...T[]] {
    const [first, ...rest] = values;
    if (first === undefined) throw new Error('enum needs at least one value');
    return [first, ...rest];
}
