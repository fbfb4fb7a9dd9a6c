import dns from 'dns/promises';
import { Company } from '../../types';
import { createEnrichment } from '../../types/factories';
import { EnrichmentFailure, errorMessage } from '../../utils/errors';
import { Normalizer } from '../normalizer';
import { Enricher } from './types';

export type HostResolver = (hostname: string) => Promise<string>;

const lookupAddress: HostResolver = async (hostname) => (await dns.lookup(hostname)).address;

/**
 * Resolves the company domain and keeps the address under
 * extraData.ip_address, as input for a later geo-IP lookup.
 */
export class DomainEnricher implements Enricher {
    readonly name = 'domain';

    constructor(private resolve: HostResolver = lookupAddress) { }

    async enrichRecord(company: Company): Promise<Company> {
        const domain = Normalizer.companyDomain(company);
        if (!domain) return company;

        let address: string;
        try {
            address = await this.resolve(domain);
        } catch (e) {
            throw new EnrichmentFailure(this.name, company.name, `Cannot resolve ${domain}: ${errorMessage(e)}`);
        }

        company.enrichment = company.enrichment ?? createEnrichment();
        company.enrichment.geographicInfo = company.enrichment.geographicInfo ?? {};
        company.extraData.ip_address = address;
        return company;
    }
}
