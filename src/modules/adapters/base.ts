import { z } from 'zod';
import { BatchResult, Company, CompanySize, DataSource, FundingStage } from '../../types';
import {
    addError,
    addRecord,
    addWarning,
    createBatchResult,
    createCompany,
    createEnrichment,
    createHiringIntent,
} from '../../types/factories';
import { errorMessage } from '../../utils/errors';
import { Normalizer } from '../normalizer';
import { Logger } from '../observability';

/**
 * A data source. scrape() resolves with a batch even when the source fails:
 * failures are reported through batch.errors and batch.succeeded.
 */
export interface SourceAdapter<TConfig> {
    readonly name: string;
    readonly source: DataSource;
    scrape(config: TConfig, signal?: AbortSignal): Promise<BatchResult>;
    parseRecord(raw: unknown): Company | null;
}

/** An adapter bound to its own configuration, ready for the orchestrator. */
export interface SourceTask {
    readonly name: string;
    run(signal?: AbortSignal): Promise<BatchResult>;
}

export const sourceTask = <TConfig>(adapter: SourceAdapter<TConfig>, config: TConfig): SourceTask => ({
    name: adapter.name,
    run: (signal) => adapter.scrape(config, signal),
});

const optionalText = z.string().trim().min(1).optional();

export const RawCompanySchema = z.object({
    name: z.string().trim().min(1),
    domain: optionalText,
    website: z.string().url().optional(),
    description: optionalText,
    source_url: z.string().url().optional(),
    industry: optionalText,
    country: optionalText,
    city: optionalText,
    employee_count: z.number().int().nonnegative().optional(),
    company_size: z.nativeEnum(CompanySize).optional(),
    founded_year: z.number().int().min(1800).max(new Date().getFullYear()).optional(),
    funding_stage: z.nativeEnum(FundingStage).optional(),
    open_positions: z.number().int().nonnegative().optional(),
    is_hiring: z.boolean().optional(),
    tags: z.array(z.string()).optional(),
}).passthrough();

export type RawCompany = z.infer<typeof RawCompanySchema>;

const KNOWN_FIELDS = new Set(Object.keys(RawCompanySchema.shape));

/**
 * Maps a loosely structured source item onto a Company. Fields the schema
 * does not know about are kept in extraData.
 */
export const parseRawCompany = (raw: unknown, source: DataSource): Company | null => {
    const parsed = RawCompanySchema.safeParse(raw);
    if (!parsed.success) return null;
    const item = parsed.data;

    const extraData: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(item)) {
        if (!KNOWN_FIELDS.has(key)) extraData[key] = value;
    }

    const hasEnrichment = item.industry !== undefined || item.country !== undefined || item.city !== undefined
        || item.employee_count !== undefined || item.company_size !== undefined || item.founded_year !== undefined
        || item.funding_stage !== undefined || item.open_positions !== undefined || item.is_hiring !== undefined
        || item.tags !== undefined;

    return createCompany({
        name: item.name,
        domain: item.domain ?? Normalizer.extractDomain(item.website),
        website: item.website,
        description: item.description,
        source,
        sourceUrl: item.source_url,
        extraData,
        enrichment: hasEnrichment ? createEnrichment({
            industry: item.industry,
            employeeCount: item.employee_count,
            companySize: item.company_size,
            foundedYear: item.founded_year,
            tags: item.tags,
            geographicInfo: item.country || item.city ? { country: item.country, city: item.city } : undefined,
            fundingInfo: item.funding_stage ? { stage: item.funding_stage, investors: [] } : undefined,
            hiringIntent: item.open_positions !== undefined || item.is_hiring !== undefined
                ? createHiringIntent({
                    totalOpenPositions: item.open_positions,
                    isHiring: item.is_hiring ?? (item.open_positions ?? 0) > 0
                })
                : undefined,
        }) : undefined,
    });
};

/**
 * Template for adapters: builds and times the batch, and turns anything
 * thrown by collect() into a batch error. Holds no state besides the logger.
 */
export abstract class BaseAdapter<TConfig> implements SourceAdapter<TConfig> {
    abstract readonly name: string;
    protected logger: Logger;

    constructor(readonly source: DataSource, logger: Logger) {
        this.logger = logger.child({ component: 'adapter', source });
    }

    async scrape(config: TConfig, signal?: AbortSignal): Promise<BatchResult> {
        const batch = createBatchResult(this.source);
        const start = Date.now();

        try {
            await this.collect(config, batch, signal);
        } catch (e) {
            this.logger.error(`${this.name} failed: ${errorMessage(e)}`);
            addError(batch, errorMessage(e));
        }

        batch.elapsedMs = Date.now() - start;
        this.logger.info(`${this.name}: ${batch.records.length} companies in ${batch.elapsedMs}ms`, {
            succeeded: batch.succeeded,
            warnings: batch.warnings.length
        });
        return batch;
    }

    parseRecord(raw: unknown): Company | null {
        return parseRawCompany(raw, this.source);
    }

    protected abstract collect(config: TConfig, batch: BatchResult, signal?: AbortSignal): Promise<void>;

    protected addItems(batch: BatchResult, items: unknown[], maxRecords?: number, sourceUrl?: string) {
        const limit = maxRecords ?? items.length;
        for (const [index, item] of items.entries()) {
            if (batch.records.length >= limit) break;

            const company = this.parseRecord(item);
            if (!company) {
                addWarning(batch, `Skipped item ${index}: not a valid company record`);
                continue;
            }
            if (sourceUrl && !company.sourceUrl) company.sourceUrl = sourceUrl;

            // Same name twice within one source is a listing artefact, not a new company
            if (batch.records.some(existing => existing.name === company.name)) {
                addWarning(batch, `Skipped item ${index}: duplicate name "${company.name}"`);
                continue;
            }
            addRecord(batch, company);
        }
    }
}
