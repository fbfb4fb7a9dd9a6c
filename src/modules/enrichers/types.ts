import { Company } from '../../types';

/**
 * Attaches facts to a company in place. Throwing is allowed: the pipeline
 * isolates a failure to the company/enricher pair that raised it.
 */
export interface Enricher {
    readonly name: string;
    enrichRecord(company: Company): Company | Promise<Company>;
}
