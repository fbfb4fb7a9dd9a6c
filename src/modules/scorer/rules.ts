import { Company } from '../../types';

export type Rule = (company: Company) => boolean;

const US_COUNTRIES = ['USA', 'US', 'United States'];

/**
 * Named yes/no business rules evaluated next to the numeric score, e.g. to
 * flag accounts sales wants to see first regardless of their total.
 */
export class RulesEngine {
    private rules = new Map<string, Rule>();

    addRule(name: string, rule: Rule): this {
        this.rules.set(name, rule);
        return this;
    }

    get size(): number {
        return this.rules.size;
    }

    /** Outcome of every rule, keyed by name, in the order they were added. */
    apply(company: Company): Record<string, boolean> {
        const results: Record<string, boolean> = {};
        for (const [name, rule] of this.rules) {
            results[name] = rule(company);
        }
        return results;
    }
}

/** A US company with a known framework stack that has more than 5 open positions. */
export const isHighValueTarget: Rule = (company) => {
    const enrichment = company.enrichment;
    if (!enrichment) return false;

    const usesFrameworks = (enrichment.techStack?.frameworks.length ?? 0) > 0;
    const hiring = (enrichment.hiringIntent?.totalOpenPositions ?? 0) > 5;
    const country = enrichment.geographicInfo?.country;
    return usesFrameworks && hiring && country !== undefined && US_COUNTRIES.includes(country);
};
