export enum DataSource {
    PRODUCT_HUNT = 'product_hunt',
    ANGELLIST = 'angellist',
    CRUNCHBASE = 'crunchbase',
    CLUTCH = 'clutch',
    JOB_BOARDS = 'job_boards',
    LINKEDIN = 'linkedin',
    MANUAL = 'manual',
    API = 'api',
    OTHER = 'other',
}

export enum CompanySize {
    STARTUP = 'startup',       // 1-10 employees
    SMALL = 'small',           // 11-50
    MEDIUM = 'medium',         // 51-200
    LARGE = 'large',           // 201-1000
    ENTERPRISE = 'enterprise', // 1000+
    UNKNOWN = 'unknown',
}

export enum FundingStage {
    BOOTSTRAPPED = 'bootstrapped',
    PRE_SEED = 'pre_seed',
    SEED = 'seed',
    SERIES_A = 'series_a',
    SERIES_B = 'series_b',
    SERIES_C = 'series_c',
    SERIES_D_PLUS = 'series_d_plus',
    IPO = 'ipo',
    ACQUIRED = 'acquired',
    UNKNOWN = 'unknown',
}

export type Priority = 'low' | 'medium' | 'high';

export type TechStack = {
    languages: string[];
    frameworks: string[];
    databases: string[];
    cloudProviders: string[];
    tools: string[];
    analytics: string[];
    marketing: string[];
};

export type HiringIntent = {
    totalOpenPositions: number;
    recentPostings: number; // last 30 days
    engineeringPositions: number;
    salesPositions: number;
    marketingPositions: number;
    hiringVelocity: number; // jobs per month
    isHiring: boolean;
};

export type FundingInfo = {
    stage: FundingStage;
    totalFunding?: number; // USD
    lastFundingDate?: Date;
    lastFundingAmount?: number;
    investors: string[];
    valuation?: number;
};

export type GeographicInfo = {
    country?: string;
    region?: string;
    city?: string;
    timezone?: string;
    headquarters?: string;
};

export type SocialProfiles = {
    linkedin?: string;
    twitter?: string;
    facebook?: string;
    github?: string;
    crunchbase?: string;
};

export type Enrichment = {
    techStack?: TechStack;
    hiringIntent?: HiringIntent;
    fundingInfo?: FundingInfo;
    geographicInfo?: GeographicInfo;
    socialProfiles?: SocialProfiles;
    employeeCount?: number;
    companySize: CompanySize;
    foundedYear?: number;
    industry?: string;
    tags: string[];
};

export type LeadScore = {
    intent: number;
    fit: number;
    tech: number;
    engagement: number;
    total: number;
    priority: Priority;
};

export type Company = {
    name: string;
    domain?: string;
    website?: string;
    description?: string;
    source: DataSource;
    sourceUrl?: string;
    enrichment?: Enrichment;
    score?: LeadScore;
    scrapedAt: Date;
    updatedAt: Date;
    extraData: Record<string, unknown>;
};

/**
 * Outcome envelope of a single adapter invocation.
 * `succeeded` flips to false as soon as one error is recorded.
 */
export type BatchResult = {
    source: DataSource;
    records: Company[];
    succeeded: boolean;
    errors: string[];
    warnings: string[];
    elapsedMs: number;
};

export type ScoreWeights = {
    intent: number;
    fit: number;
    tech: number;
    engagement: number;
};

export enum PipelineStage {
    IDLE = 'IDLE',
    COLLECTING = 'COLLECTING',
    DEDUPLICATING = 'DEDUPLICATING',
    ENRICHING = 'ENRICHING',
    SCORING = 'SCORING',
    FILTERING = 'FILTERING',
    DONE = 'DONE',
}

export type RunStats = {
    sources: number;
    failedSources: number;
    collected: number;
    afterDeduplication: number;
    enrichmentFailures: number;
    scored: number;
    filteredOut: number;
    returned: number;
    durationMs: number;
};

export type PipelineResult = {
    runId: string;
    companies: Company[];
    errors: string[];
    warnings: string[];
    cancelled: boolean;
    skippedStages: PipelineStage[];
    stats: RunStats;
};

export type ExportFormat = 'csv' | 'json';
