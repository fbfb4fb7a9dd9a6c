import { Company, CompanySize } from '../../types';
import { createEnrichment } from '../../types/factories';
import { Enricher } from './types';

export const sizeForEmployees = (employees: number): CompanySize => {
    if (employees <= 10) return CompanySize.STARTUP;
    if (employees <= 50) return CompanySize.SMALL;
    if (employees <= 200) return CompanySize.MEDIUM;
    if (employees <= 1000) return CompanySize.LARGE;
    return CompanySize.ENTERPRISE;
};

/** Fills companySize from the employee count, or from open positions as a proxy. */
export class CompanySizeEstimator implements Enricher {
    readonly name = 'company-size';

    enrichRecord(company: Company): Company {
        const enrichment = company.enrichment ?? createEnrichment();
        company.enrichment = enrichment;

        if (enrichment.companySize !== CompanySize.UNKNOWN) return company;

        if (enrichment.employeeCount) {
            enrichment.companySize = sizeForEmployees(enrichment.employeeCount);
            return company;
        }

        const openPositions = enrichment.hiringIntent?.totalOpenPositions ?? 0;
        if (openPositions > 50) {
            enrichment.companySize = CompanySize.LARGE;
        } else if (openPositions > 10) {
            enrichment.companySize = CompanySize.MEDIUM;
        } else if (openPositions > 0) {
            enrichment.companySize = CompanySize.SMALL;
        }

        return company;
    }
}
