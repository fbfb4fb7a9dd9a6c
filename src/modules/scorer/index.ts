import { Company, CompanySize, FundingStage, LeadScore, Priority, ScoreWeights } from '../../types';
import { allTechnologies } from '../../types/factories';
import { ConfigurationError } from '../../utils/errors';
import { Logger } from '../observability';

export const DEFAULT_WEIGHTS: ScoreWeights = {
    intent: 0.35,
    fit: 0.30,
    tech: 0.20,
    engagement: 0.15,
};

export const PRIORITY_THRESHOLDS = { high: 70, medium: 40 } as const;

const WEIGHT_EPSILON = 1e-6;

const SIZE_SCORES: Record<CompanySize, number> = {
    [CompanySize.STARTUP]: 70,
    [CompanySize.SMALL]: 80,
    [CompanySize.MEDIUM]: 90,
    [CompanySize.LARGE]: 70,
    [CompanySize.ENTERPRISE]: 50,
    [CompanySize.UNKNOWN]: 40,
};

// Stages missing here count as 0 in the average, which halves the fit score
// of bootstrapped, IPO, acquired and unknown-stage companies.
const FUNDING_SCORES: Partial<Record<FundingStage, number>> = {
    [FundingStage.SEED]: 60,
    [FundingStage.SERIES_A]: 80,
    [FundingStage.SERIES_B]: 90,
    [FundingStage.SERIES_C]: 85,
    [FundingStage.SERIES_D_PLUS]: 75,
};

const MODERN_FRAMEWORKS = ['React', 'Vue', 'Angular', 'Svelte', 'Next.js'];
const MODERN_DATABASES = ['MongoDB', 'PostgreSQL', 'Redis'];

const cap = (score: number) => Math.max(0, Math.min(100, score));

const mentionsAny = (values: string[], needles: string[]) =>
    values.some(value => needles.some(needle => value.includes(needle)));

export const priorityFor = (total: number): Priority => {
    if (total >= PRIORITY_THRESHOLDS.high) return 'high';
    if (total >= PRIORITY_THRESHOLDS.medium) return 'medium';
    return 'low';
};

/**
 * Weighted lead score over four components (intent, fit, tech, engagement),
 * each in [0, 100].
 */
export class LeadScorer {
    readonly weights: ScoreWeights;

    constructor(private logger: Logger, weights: ScoreWeights = DEFAULT_WEIGHTS) {
        this.weights = LeadScorer.normalizeWeights(weights, logger);
        this.logger.debug('Initialized LeadScorer', { weights: this.weights });
    }

    static normalizeWeights(weights: ScoreWeights, logger?: Logger): ScoreWeights {
        const values = Object.values(weights);
        if (values.some(w => !Number.isFinite(w) || w < 0)) {
            throw new ConfigurationError(`Score weights must be finite and non-negative: ${JSON.stringify(weights)}`);
        }

        const total = values.reduce((sum, w) => sum + w, 0);
        if (total === 0) {
            throw new ConfigurationError('Score weights must not all be zero');
        }
        if (Math.abs(total - 1) <= WEIGHT_EPSILON) return { ...weights };

        logger?.warn(`Score weights sum to ${total}, normalizing to 1.0`);
        return {
            intent: weights.intent / total,
            fit: weights.fit / total,
            tech: weights.tech / total,
            engagement: weights.engagement / total,
        };
    }

    score(company: Company): LeadScore {
        const intent = this.intentScore(company);
        const fit = this.fitScore(company);
        const tech = this.techScore(company);
        const engagement = this.engagementScore(company);

        // Unrounded, so a total just below a threshold stays in the lower bucket
        const total = cap(
            intent * this.weights.intent +
            fit * this.weights.fit +
            tech * this.weights.tech +
            engagement * this.weights.engagement
        );

        const priority = priorityFor(total);
        this.logger.debug(`Scored ${company.name}: ${total.toFixed(2)} (${priority})`);

        return { intent, fit, tech, engagement, total, priority };
    }

    /** Attaches a score to every company and returns them highest first. */
    scoreAll(companies: Company[]): Company[] {
        this.logger.info(`Scoring ${companies.length} companies`);
        for (const company of companies) {
            company.score = this.score(company);
        }
        return [...companies].sort((a, b) => (b.score?.total ?? 0) - (a.score?.total ?? 0));
    }

    intentScore(company: Company): number {
        const hiring = company.enrichment?.hiringIntent;
        if (!hiring) return 0;

        let score = 0;
        if (hiring.isHiring) score += 30;
        if (hiring.totalOpenPositions > 0) score += Math.min(hiring.totalOpenPositions * 5, 30);
        if (hiring.recentPostings > 0) score += Math.min(hiring.recentPostings * 10, 20);
        if (hiring.hiringVelocity > 0) score += Math.min(hiring.hiringVelocity * 5, 20);

        return cap(score);
    }

    fitScore(company: Company): number {
        const enrichment = company.enrichment;
        if (!enrichment) return 50;

        let score = SIZE_SCORES[enrichment.companySize] ?? 50;

        if (enrichment.fundingInfo) {
            const funding = FUNDING_SCORES[enrichment.fundingInfo.stage] ?? 0;
            score = (score + funding) / 2;
        }

        const employees = enrichment.employeeCount;
        if (employees) {
            if (employees >= 20 && employees <= 500) {
                score += 10;
            } else if (employees < 20) {
                score += 5;
            }
        }

        return cap(score);
    }

    techScore(company: Company): number {
        const stack = company.enrichment?.techStack;
        if (!stack) return 0;

        let score = 0;
        if (allTechnologies(stack).length > 0) score = 40;
        if (mentionsAny(stack.frameworks, MODERN_FRAMEWORKS)) score += 20;
        if (stack.cloudProviders.length > 0) score += 15;
        if (mentionsAny(stack.databases, MODERN_DATABASES)) score += 15;
        if (stack.analytics.length > 0) score += 10;

        return cap(score);
    }

    engagementScore(company: Company): number {
        let score = 0;
        if (company.website || company.domain) score += 30;
        if (company.description && company.description.trim()) score += 20;

        const profiles = company.enrichment?.socialProfiles;
        if (profiles) {
            if (profiles.linkedin) score += 15;
            if (profiles.twitter) score += 10;
            if (profiles.github) score += 15;
            if (profiles.crunchbase) score += 10;
        }

        return cap(score);
    }
}

export { RulesEngine, isHighValueTarget } from './rules';
export type { Rule } from './rules';
