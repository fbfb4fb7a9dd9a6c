import fs from 'fs';
import path from 'path';
import { pipeline } from 'stream/promises';
import * as fastcsv from 'fast-csv';
import { Company, ExportFormat } from '../../types';
import { allTechnologies } from '../../types/factories';
import { ConfigurationError } from '../../utils/errors';
import { Logger } from '../observability';

export const FLAT_HEADERS = [
    'company_name',
    'domain',
    'website',
    'description',
    'source',
    'source_url',
    'scraped_at',
    'employee_count',
    'company_size',
    'founded_year',
    'industry',
    'country',
    'city',
    'funding_stage',
    'total_funding',
    'open_positions',
    'is_hiring',
    'technologies',
    'total_score',
    'priority',
] as const;

export type FlatRecord = Partial<Record<typeof FLAT_HEADERS[number], string | number | boolean>>;

export const toFlatRecord = (company: Company): FlatRecord => {
    const flat: FlatRecord = {
        company_name: company.name,
        domain: company.domain,
        website: company.website,
        description: company.description,
        source: company.source,
        source_url: company.sourceUrl,
        scraped_at: company.scrapedAt.toISOString(),
    };

    const enrichment = company.enrichment;
    if (enrichment) {
        flat.employee_count = enrichment.employeeCount;
        flat.company_size = enrichment.companySize;
        flat.founded_year = enrichment.foundedYear;
        flat.industry = enrichment.industry;
        flat.country = enrichment.geographicInfo?.country;
        flat.city = enrichment.geographicInfo?.city;
        flat.funding_stage = enrichment.fundingInfo?.stage;
        flat.total_funding = enrichment.fundingInfo?.totalFunding;
        flat.open_positions = enrichment.hiringIntent?.totalOpenPositions;
        flat.is_hiring = enrichment.hiringIntent?.isHiring;
        if (enrichment.techStack) {
            flat.technologies = allTechnologies(enrichment.techStack).slice(0, 10).join(', ');
        }
    }

    if (company.score) {
        flat.total_score = Math.round(company.score.total * 100) / 100;
        flat.priority = company.score.priority;
    }

    return flat;
};

const timestamp = (date = new Date()) => date.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);

export class DataExporter {

    constructor(private outputDir: string, private logger: Logger) { }

    /** Writes the companies and returns the file path, or null when there is nothing to write. */
    async export(companies: Company[], format: ExportFormat, filename?: string): Promise<string | null> {
        if (companies.length === 0) {
            this.logger.warn('No companies to export');
            return null;
        }

        const base = path.parse(filename ?? `companies_${timestamp()}`).name;
        await fs.promises.mkdir(this.outputDir, { recursive: true });

        switch (format) {
            case 'csv':
                return this.exportCsv(companies, path.join(this.outputDir, `${base}.csv`));
            case 'json':
                return this.exportJson(companies, path.join(this.outputDir, `${base}.json`));
            default:
                throw new ConfigurationError(`Unsupported export format: ${String(format)}`);
        }
    }

    async exportCsv(companies: Company[], filepath: string): Promise<string> {
        this.logger.info(`Exporting ${companies.length} companies to CSV: ${filepath}`);

        const csvStream = fastcsv.format<FlatRecord, FlatRecord>({ headers: [...FLAT_HEADERS] });
        const written = pipeline(csvStream, fs.createWriteStream(filepath));

        for (const company of companies) {
            csvStream.write(toFlatRecord(company));
        }
        csvStream.end();
        await written;

        this.logger.info(`CSV export completed: ${filepath}`);
        return filepath;
    }

    async exportJson(companies: Company[], filepath: string): Promise<string> {
        this.logger.info(`Exporting ${companies.length} companies to JSON: ${filepath}`);
        await fs.promises.writeFile(filepath, JSON.stringify(companies, null, 2), 'utf8');
        this.logger.info(`JSON export completed: ${filepath}`);
        return filepath;
    }
}
