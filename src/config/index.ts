import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../utils/errors';

dotenv.config();

const weight = z.number().finite().min(0);

export const ConfigSchema = z.object({
    pipeline: z.object({
        max_workers: z.number().int().positive(),
        enable_deduplication: z.boolean(),
        enable_enrichment: z.boolean(),
        enable_scoring: z.boolean(),
        min_score_threshold: z.number().min(0).max(100),
    }),
    deduplication: z.object({
        name_similarity_threshold: z.number().min(0).max(1),
    }),
    scoring: z.object({
        weights: z.object({
            intent: weight,
            fit: weight,
            tech: weight,
            engagement: weight,
        }),
    }),
    retry: z.object({
        max_attempts: z.number().int().positive(),
        base_delay_ms: z.number().min(0),
        multiplier: z.number().min(1),
    }),
    fetcher: z.object({
        timeout_ms: z.number().int().positive(),
        user_agent: z.string().min(1),
    }),
    logging: z.object({
        level: z.enum(['error', 'warn', 'info', 'debug']),
        dir: z.string().min(1).optional(),
    }),
    output: z.object({
        dir: z.string().min(1),
        format: z.enum(['csv', 'json']),
    }),
});

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG_PATH = path.join(path.dirname(fileURLToPath(import.meta.url)), 'default.yaml');

type RawConfig = Record<string, unknown>;

const isRecord = (value: unknown): value is RawConfig =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const deepMerge = (base: RawConfig, override: RawConfig): RawConfig => {
    const merged: RawConfig = { ...base };
    for (const [key, value] of Object.entries(override)) {
        const current = merged[key];
        merged[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
    }
    return merged;
};

const readYaml = (file: string): RawConfig => {
    let parsed: unknown;
    try {
        parsed = yaml.load(fs.readFileSync(file, 'utf8'));
    } catch (e) {
        throw new ConfigurationError(`Cannot read config ${file}: ${errorMessage(e)}`);
    }
    if (parsed === undefined || parsed === null) return {};
    if (!isRecord(parsed)) {
        throw new ConfigurationError(`Config ${file} must contain a mapping at the top level`);
    }
    return parsed;
};

const numberFromEnv = (name: string, env: NodeJS.ProcessEnv): number | undefined => {
    const raw = env[name];
    if (raw === undefined || raw === '') return undefined;
    const value = Number(raw);
    if (Number.isNaN(value)) {
        throw new ConfigurationError(`Environment variable ${name} must be numeric (got "${raw}")`);
    }
    return value;
};

const envOverrides = (env: NodeJS.ProcessEnv): RawConfig => {
    const pipeline: RawConfig = {};
    const logging: RawConfig = {};
    const output: RawConfig = {};

    const maxWorkers = numberFromEnv('MAX_WORKERS', env);
    if (maxWorkers !== undefined) pipeline.max_workers = maxWorkers;
    const minScore = numberFromEnv('MIN_SCORE_THRESHOLD', env);
    if (minScore !== undefined) pipeline.min_score_threshold = minScore;
    if (env.LOG_LEVEL) logging.level = env.LOG_LEVEL.toLowerCase();
    if (env.LOG_DIR) logging.dir = env.LOG_DIR;
    if (env.OUTPUT_DIR) output.dir = env.OUTPUT_DIR;

    return { pipeline, logging, output };
};

/**
 * Defaults from default.yaml, then the optional user file, then environment
 * overrides. The merged result is validated; any issue is fatal.
 */
export const loadConfig = (configPath?: string, env: NodeJS.ProcessEnv = process.env): Config => {
    let raw = readYaml(DEFAULT_CONFIG_PATH);
    if (configPath) {
        raw = deepMerge(raw, readYaml(configPath));
    }
    raw = deepMerge(raw, envOverrides(env));

    const parsed = ConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }
    return parsed.data;
};
