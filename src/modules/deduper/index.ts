import { Company } from '../../types';
import { Normalizer } from '../normalizer';
import { StringUtils } from '../../utils/similarity';
import { ConfigurationError } from '../../utils/errors';
import { Logger } from '../observability';

export const DEFAULT_NAME_SIMILARITY = 0.85;

/**
 * Removes duplicate companies by exact domain, then by fuzzy name.
 * First arrival wins: later duplicates are dropped even if they carry more data.
 */
export class CompanyDeduper {
    readonly threshold: number;

    constructor(private logger: Logger, threshold = DEFAULT_NAME_SIMILARITY) {
        if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
            throw new ConfigurationError(`Name similarity threshold must be within [0, 1] (got ${threshold})`);
        }
        this.threshold = threshold;
    }

    dedupe(companies: Company[]): Company[] {
        if (companies.length === 0) return [];

        const unique: Company[] = [];
        const seenDomains = new Set<string>();
        const seenNames: string[] = [];

        for (const company of companies) {
            const domain = Normalizer.companyDomain(company);
            if (domain && seenDomains.has(domain)) {
                this.logger.debug(`Duplicate domain: ${domain} (${company.name})`);
                continue;
            }

            const name = Normalizer.normalizeCompany(company.name);
            const match = this.findSimilar(name, seenNames);
            if (match) {
                this.logger.debug(`Duplicate name: ${company.name} ~ ${match.name} (similarity: ${match.ratio.toFixed(2)})`);
                continue;
            }

            unique.push(company);
            if (domain) seenDomains.add(domain);
            seenNames.push(name);
        }

        this.logger.info(`Deduplication complete: ${unique.length}/${companies.length} unique (${companies.length - unique.length} duplicates removed)`);
        return unique;
    }

    private findSimilar(name: string, seenNames: string[]): { name: string; ratio: number } | null {
        for (const seen of seenNames) {
            const ratio = StringUtils.similarityRatio(name, seen);
            if (ratio >= this.threshold) return { name: seen, ratio };
        }
        return null;
    }
}
