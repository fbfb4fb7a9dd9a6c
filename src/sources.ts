import fs from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { Config } from './config';
import { DataSource } from './types';
import { JsonApiAdapter, SourceTask, StaticListAdapter, sourceTask } from './modules/adapters';
import { Logger } from './modules/observability';
import { ConfigurationError, errorMessage } from './utils/errors';

const StaticSourceSchema = z.object({
    type: z.literal('static'),
    name: z.string().min(1).optional(),
    source: z.nativeEnum(DataSource).optional(),
    file: z.string().min(1).optional(),
    records: z.array(z.unknown()).optional(),
    max_records: z.number().int().positive().optional(),
}).refine(s => s.file !== undefined || s.records !== undefined, {
    message: 'a static source needs either file or records'
});

const JsonApiSourceSchema = z.object({
    type: z.literal('json_api'),
    name: z.string().min(1).optional(),
    source: z.nativeEnum(DataSource).optional(),
    url: z.string().url(),
    items_path: z.string().min(1).optional(),
    max_records: z.number().int().positive().optional(),
});

export const SourcesFileSchema = z.object({
    sources: z.array(z.union([StaticSourceSchema, JsonApiSourceSchema])).min(1),
});

export type SourcesFile = z.infer<typeof SourcesFileSchema>;

export const parseSources = (raw: unknown): SourcesFile => {
    const parsed = SourcesFileSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw new ConfigurationError(`Invalid sources file: ${issues.join('; ')}`, issues);
    }
    return parsed.data;
};

export const loadSources = (file: string): SourcesFile => {
    let raw: unknown;
    try {
        raw = yaml.load(fs.readFileSync(file, 'utf8'));
    } catch (e) {
        throw new ConfigurationError(`Cannot read sources file ${file}: ${errorMessage(e)}`);
    }
    return parseSources(raw);
};

/** One adapter per entry, each with its own configuration and retry policy. */
export const buildSourceTasks = (file: SourcesFile, config: Config, logger: Logger): SourceTask[] =>
    file.sources.map((entry, index) => {
        const name = entry.name ?? `${entry.type}-${index + 1}`;
        if (entry.type === 'static') {
            const adapter = new StaticListAdapter(logger, name, entry.source ?? DataSource.MANUAL);
            return sourceTask(adapter, { file: entry.file, records: entry.records, maxRecords: entry.max_records });
        }

        const adapter = new JsonApiAdapter(logger, {
            name,
            source: entry.source ?? DataSource.API,
            timeoutMs: config.fetcher.timeout_ms,
            userAgent: config.fetcher.user_agent,
            retry: {
                maxAttempts: config.retry.max_attempts,
                baseDelayMs: config.retry.base_delay_ms,
                multiplier: config.retry.multiplier,
            },
        });
        return sourceTask(adapter, { url: entry.url, itemsPath: entry.items_path, maxRecords: entry.max_records });
    });
