import {
    BatchResult,
    Company,
    CompanySize,
    DataSource,
    Enrichment,
    HiringIntent,
    TechStack,
} from './index';
import { ValidationError } from '../utils/errors';

export type CompanyInput = Omit<Partial<Company>, 'name'> & { name: string };

export const createCompany = (input: CompanyInput): Company => {
    const name = (input.name ?? '').trim();
    if (!name) {
        throw new ValidationError('Company name must not be empty');
    }

    const now = new Date();
    return {
        ...input,
        name,
        domain: input.domain ? input.domain.trim().toLowerCase() || undefined : undefined,
        source: input.source ?? DataSource.OTHER,
        scrapedAt: input.scrapedAt ?? now,
        updatedAt: input.updatedAt ?? now,
        extraData: input.extraData ?? {},
    };
};

export const createEnrichment = (input: Partial<Enrichment> = {}): Enrichment => {
    const currentYear = new Date().getFullYear();
    if (input.foundedYear !== undefined && (input.foundedYear < 1800 || input.foundedYear > currentYear)) {
        throw new ValidationError(`Invalid founded year: ${input.foundedYear}`);
    }

    return {
        ...input,
        companySize: input.companySize ?? CompanySize.UNKNOWN,
        tags: input.tags ?? [],
    };
};

export const createTechStack = (input: Partial<TechStack> = {}): TechStack => ({
    languages: input.languages ?? [],
    frameworks: input.frameworks ?? [],
    databases: input.databases ?? [],
    cloudProviders: input.cloudProviders ?? [],
    tools: input.tools ?? [],
    analytics: input.analytics ?? [],
    marketing: input.marketing ?? [],
});

export const allTechnologies = (stack: TechStack): string[] => [
    ...stack.languages,
    ...stack.frameworks,
    ...stack.databases,
    ...stack.cloudProviders,
    ...stack.tools,
    ...stack.analytics,
    ...stack.marketing,
];

export const createHiringIntent = (input: Partial<HiringIntent> = {}): HiringIntent => ({
    totalOpenPositions: input.totalOpenPositions ?? 0,
    recentPostings: input.recentPostings ?? 0,
    engineeringPositions: input.engineeringPositions ?? 0,
    salesPositions: input.salesPositions ?? 0,
    marketingPositions: input.marketingPositions ?? 0,
    hiringVelocity: Math.round((input.hiringVelocity ?? 0) * 100) / 100,
    isHiring: input.isHiring ?? false,
});

export const createBatchResult = (source: DataSource): BatchResult => ({
    source,
    records: [],
    succeeded: true,
    errors: [],
    warnings: [],
    elapsedMs: 0,
});

export const addRecord = (batch: BatchResult, company: Company) => {
    batch.records.push(company);
};

export const addError = (batch: BatchResult, error: string) => {
    batch.errors.push(error);
    batch.succeeded = false;
};

export const addWarning = (batch: BatchResult, warning: string) => {
    batch.warnings.push(warning);
};
