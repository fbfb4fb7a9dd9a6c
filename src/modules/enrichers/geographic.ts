import { Company } from '../../types';
import { Enricher } from './types';

const REGIONS: Record<string, string> = {
    'us': 'North America',
    'usa': 'North America',
    'united states': 'North America',
    'canada': 'North America',
    'uk': 'Europe',
    'united kingdom': 'Europe',
    'germany': 'Europe',
    'france': 'Europe',
    'italy': 'Europe',
    'spain': 'Europe',
    'netherlands': 'Europe',
};

export class GeographicEnricher implements Enricher {
    readonly name = 'geographic';

    enrichRecord(company: Company): Company {
        const geo = company.enrichment?.geographicInfo;
        if (!geo?.country || geo.region) return company;

        const region = REGIONS[geo.country.trim().toLowerCase()];
        if (region) geo.region = region;
        return company;
    }
}
